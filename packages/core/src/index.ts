export { GeneratePipeline, countRelationships, type RendererFactory } from "./pipeline";
export { generateSources, parseDiagram } from "./transform";
export { LogSubscriber } from "./log-subscriber";
export { ErrorSubscriber } from "./error-subscriber";
export { DEFAULT_CONFIG } from "./types";
export type {
    GenerationResult,
    Pipeline,
    PipelineConfig,
    PipelineError,
    PipelineResult,
    PipelineStats,
} from "./types";
