import { ClassDiagramParser, type DiagramModel } from "@plantforge/parser";
import { JavaRenderer, type RenderOptions } from "@plantforge/generator";
import type { GenerationResult } from "./types";

/**
 * Parse a class diagram into declarations and resolved relationships.
 */
export function parseDiagram(source: string): DiagramModel {
    return new ClassDiagramParser().parse(source);
}

/**
 * Turn diagram text into Java source text, one entry per declared type.
 * Every call builds its own tables, so concurrent calls share nothing.
 */
export function generateSources(source: string, options: RenderOptions = {}): GenerationResult {
    const model = parseDiagram(source);
    const sources = new JavaRenderer(options).renderAll(model);
    return { sources, model };
}
