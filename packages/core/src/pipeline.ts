import { GeneratorEvent, GenericEvent, LogLevel, PipelineErrors, PipelinePhase } from "@plantforge/constants";
import { PipelineEventBus } from "@plantforge/event-bus";
import { JAVA_FILE_EXTENSION, JavaRenderer, type RenderOptions } from "@plantforge/generator";
import { ArtifactWriter, DiagramSource, errorMessage, type WrittenArtifact } from "@plantforge/io";
import { createSilentLogger, type AppLogObj, type Logger } from "@plantforge/logger";
import type { DiagramModel } from "@plantforge/parser";
import { ErrorSubscriber } from "./error-subscriber";
import { LogSubscriber } from "./log-subscriber";
import { parseDiagram } from "./transform";
import { DEFAULT_CONFIG, type Pipeline, type PipelineConfig, type PipelineResult } from "./types";

/**
 * Builds the renderer for one run from the configured package name and indent.
 */
export type RendererFactory = (options: RenderOptions) => JavaRenderer;

/**
 * Main orchestrator for one generation run:
 * read (diagram file) → extract (declarations + relationships) → render (Java text) → write (files).
 *
 * I/O failures never throw; they travel over the event bus and end up in `result.errors`.
 */
export class GeneratePipeline implements Pipeline {
    private readonly source: DiagramSource;
    private readonly writer: ArtifactWriter;
    private readonly createRenderer: RendererFactory;

    constructor(
        source = new DiagramSource(),
        writer = new ArtifactWriter(),
        createRenderer: RendererFactory = (options) => new JavaRenderer(options),
    ) {
        this.source = source;
        this.writer = writer;
        this.createRenderer = createRenderer;
    }

    async run(config: PipelineConfig, logger: Logger<AppLogObj> = createSilentLogger("plantforge")): Promise<PipelineResult> {
        // One bus per run
        const bus = new PipelineEventBus();
        const logSubscriber = new LogSubscriber(logger);
        const errorSubscriber = new ErrorSubscriber();
        bus.onAll((payload) => logSubscriber.handle(payload));
        bus.onLevel(LogLevel.ERROR, (payload) => errorSubscriber.handle(payload));

        const sources = new Map<string, string>();
        let written: WrittenArtifact[] = [];

        // Phase 1: Read
        bus.emitPhaseStart(PipelinePhase.READ);
        const file = await this.source.read(
            config.input,
            { createSample: config.createSample ?? DEFAULT_CONFIG.createSample },
            bus,
        );
        bus.emitPhaseEnd(PipelinePhase.READ, { files: file ? 1 : 0 });

        if (!file) {
            return {
                sampleCreated: false,
                sources,
                written,
                errors: errorSubscriber.errors,
                stats: {
                    declarations: 0,
                    relationships: 0,
                    artifactsRendered: 0,
                    artifactsWritten: 0,
                    errorsCount: errorSubscriber.count,
                },
            };
        }

        // Phase 2: Extract
        bus.emitPhaseStart(PipelinePhase.EXTRACT);
        const model = parseDiagram(file.content);
        for (const name of model.duplicates) {
            bus.emitWarn(
                GeneratorEvent.DUPLICATE_DECLARATION,
                PipelinePhase.EXTRACT,
                `Duplicate declaration "${name}": the last definition wins`,
                { name },
            );
        }
        const relationships = countRelationships(model);
        bus.emitDebug(GeneratorEvent.DIAGRAM_PARSE, PipelinePhase.EXTRACT, "Parsed diagram", {
            file: file.path,
            declarations: model.declarations.size,
            relationships,
        });
        bus.emitPhaseEnd(PipelinePhase.EXTRACT, { declarations: model.declarations.size, relationships });

        // Phase 3: Render
        bus.emitPhaseStart(PipelinePhase.RENDER);
        const renderer = this.createRenderer({
            packageName: config.packageName,
            indent: config.indent ?? DEFAULT_CONFIG.indent,
        });
        for (const declaration of model.declarations.values()) {
            try {
                sources.set(declaration.name, renderer.render(declaration, model));
                bus.emitDebug(GeneratorEvent.SOURCE_RENDER, PipelinePhase.RENDER, `Rendered ${declaration.name}`, {
                    name: declaration.name,
                    kind: declaration.kind,
                });
            } catch (error: unknown) {
                const message = errorMessage(error);
                bus.emitError(GeneratorEvent.SOURCE_RENDER, PipelinePhase.RENDER, {
                    path: file.path,
                    message,
                    code: "RENDER_FAILURE",
                    userMessage: PipelineErrors.RENDER_FAILURE(declaration.name, message),
                });
            }
        }
        bus.emitPhaseEnd(PipelinePhase.RENDER, { artifacts: sources.size });

        // Phase 4: Write (skipped on dry run)
        if (config.dryRun) {
            bus.emitInfo(GenericEvent.LOG, PipelinePhase.WRITE, "Dry run: no files written", {
                artifacts: sources.size,
            });
        } else {
            bus.emitPhaseStart(PipelinePhase.WRITE);
            const result = await this.writer.write(config.outputDir, sources, JAVA_FILE_EXTENSION, bus);
            written = result.written;
            bus.emitPhaseEnd(PipelinePhase.WRITE, { written: written.length, failed: result.failed });
        }

        return {
            input: file.path,
            sampleCreated: file.sampleCreated,
            model,
            sources,
            written,
            errors: errorSubscriber.errors,
            stats: {
                declarations: model.declarations.size,
                relationships,
                artifactsRendered: sources.size,
                artifactsWritten: written.length,
                errorsCount: errorSubscriber.count,
            },
        };
    }
}

/**
 * Resolved edges: one per extends entry plus one per implemented interface.
 */
export function countRelationships(model: DiagramModel): number {
    let count = model.relationships.extends.size;
    for (const interfaces of model.relationships.implements.values()) {
        count += interfaces.length;
    }
    return count;
}
