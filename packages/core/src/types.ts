import type { Logger, AppLogObj } from "@plantforge/logger";
import type { PipelinePhase, UserErrorMessage } from "@plantforge/constants";
import type { DiagramModel } from "@plantforge/parser";
import type { WrittenArtifact } from "@plantforge/io";

/**
 * Configuration for one generation run.
 */
export interface PipelineConfig {
    /**
     * Path of the class diagram to read.
     */
    input: string;
    /**
     * Directory receiving one `.java` file per declaration.
     */
    outputDir: string;
    /**
     * Package line emitted at the top of every file. Omitted when unset.
     */
    packageName?: string;
    /**
     * Indentation unit. Defaults to four spaces.
     */
    indent?: string;
    /**
     * Write the built-in sample diagram when `input` does not exist.
     * Defaults to true
     */
    createSample?: boolean;
    /**
     * Render without writing anything.
     */
    dryRun?: boolean;
}

export const DEFAULT_CONFIG = {
    input: "diagram.puml",
    outputDir: "generated_java",
    indent: "    ",
    createSample: true,
} as const;

/**
 * Output of the in-memory transform.
 */
export interface GenerationResult {
    /**
     * Rendered source text keyed by type name, in declaration order.
     */
    sources: Map<string, string>;
    model: DiagramModel;
}

/**
 * Aggregated statistics for a pipeline run.
 */
export interface PipelineStats {
    declarations: number;
    relationships: number;
    artifactsRendered: number;
    artifactsWritten: number;
    errorsCount: number;
}

/**
 * Error that occurred during pipeline execution.
 */
export interface PipelineError {
    phase: PipelinePhase;
    /**
     * File path where the error occurred.
     */
    path: string;
    /**
     * Raw system error message.
     */
    message: string;
    /**
     * System error code (e.g., ENOENT, EACCES).
     */
    code: string;
    userMessage: UserErrorMessage;
}

/**
 * Aggregate result from pipeline.
 */
export interface PipelineResult {
    /**
     * Absolute path of the diagram that was read, when reading succeeded.
     */
    input?: string;
    sampleCreated: boolean;
    model?: DiagramModel;
    sources: Map<string, string>;
    written: WrittenArtifact[];
    errors: PipelineError[];
    stats: PipelineStats;
}

/**
 * Pipeline contract for injectable pipeline implementations.
 */
export interface Pipeline {
    run(config: PipelineConfig, logger?: Logger<AppLogObj>): Promise<PipelineResult>;
}
