import type { PipelineConfig, PipelineResult } from "@plantforge/core";
import { countRelationships } from "@plantforge/core";
import type { DeclarationKind, DiagramModel, ParsedMethod, Visibility } from "@plantforge/parser";
import { Command, type OutputMode } from "./types";

const VISIBILITY_SYMBOLS: Record<Visibility, string> = {
    public: "+",
    private: "-",
    protected: "#",
    package: "~",
};

const KIND_LABELS: Record<DeclarationKind, string> = {
    class: "class",
    abstract_class: "abstract class",
    interface: "interface",
};

/**
 * Formats the outcome of a run based on command and mode.
 */
export class ProgressReporter {
    private mode: OutputMode;

    constructor(mode: OutputMode = "normal") {
        this.mode = mode;
    }

    /**
     * Display command-specific completion summary.
     */
    complete(command: Command, config: PipelineConfig, result: PipelineResult): void {
        if (this.mode === "json") {
            console.log(JSON.stringify(this.toJson(command, result)));
            return;
        }

        if (command === Command.PARSE) {
            // The model is the output of parse, so it prints even in quiet mode
            if (result.model) {
                console.log(this.formatModel(result.model));
            }
            return;
        }

        if (this.mode === "quiet") return;

        console.log(this.formatGenerateResult(config, result));
        if (this.mode === "verbose") {
            for (const artifact of result.written) {
                console.log(`  ${artifact.path}`);
            }
        }
    }

    formatGenerateResult(config: PipelineConfig, result: PipelineResult): string {
        const { stats } = result;
        if (config.dryRun) {
            return `Dry run complete: ${stats.artifactsRendered} files rendered from ${stats.declarations} declarations, nothing written`;
        }
        const lines = [
            `Generation complete: ${stats.artifactsWritten} files written to ${config.outputDir}, ${stats.errorsCount} errors`,
        ];
        if (result.sampleCreated && result.input) {
            lines.unshift(`Sample diagram created at ${result.input}`);
        }
        return lines.join("\n");
    }

    formatModel(model: DiagramModel): string {
        const lines = [
            `Parsed ${model.declarations.size} declarations, ${countRelationships(model)} relationships`,
        ];

        for (const declaration of model.declarations.values()) {
            lines.push(`${KIND_LABELS[declaration.kind]} ${declaration.name} (line ${declaration.line})`);
            for (const attribute of declaration.attributes) {
                lines.push(`  ${VISIBILITY_SYMBOLS[attribute.visibility]} ${attribute.name}: ${attribute.type}`);
            }
            for (const method of declaration.methods) {
                lines.push(`  ${this.formatMethod(method)}`);
            }
        }

        const edges = [
            ...[...model.relationships.extends].map(([child, parent]) => `  ${child} extends ${parent}`),
            ...[...model.relationships.implements].flatMap(([name, interfaces]) =>
                interfaces.map((target) => `  ${name} implements ${target}`),
            ),
        ];
        if (edges.length > 0) {
            lines.push("Relationships:", ...edges);
        }

        if (model.duplicates.length > 0) {
            lines.push(`Duplicates: ${model.duplicates.join(", ")}`);
        }

        return lines.join("\n");
    }

    private formatMethod(method: ParsedMethod): string {
        const markers = [method.isAbstract ? "{abstract} " : "", method.isStatic ? "{static} " : ""].join("");
        const params = method.parameters
            .map((parameter) => (parameter.kind === "typed" ? `${parameter.name}: ${parameter.type}` : parameter.text))
            .join(", ");
        return `${VISIBILITY_SYMBOLS[method.visibility]} ${markers}${method.name}(${params}): ${method.returnType}`;
    }

    private toJson(command: Command, result: PipelineResult): Record<string, unknown> {
        const output: Record<string, unknown> = {
            type: "complete",
            command,
            stats: result.stats,
        };

        if (command === Command.PARSE && result.model) {
            output.model = {
                declarations: [...result.model.declarations.values()].map(({ rawBody: _rawBody, ...rest }) => rest),
                extends: Object.fromEntries(result.model.relationships.extends),
                implements: Object.fromEntries(result.model.relationships.implements),
                duplicates: result.model.duplicates,
            };
        } else {
            output.files = result.written.map((artifact) => artifact.path);
        }

        return output;
    }
}
