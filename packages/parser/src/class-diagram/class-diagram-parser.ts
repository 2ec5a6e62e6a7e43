import { stripComments } from "./comments";
import { DeclarationExtractor } from "./declaration-extractor";
import { MemberParser } from "./member-parser";
import { RelationshipResolver } from "./relationship-resolver";
import type { DiagramModel } from "./types";

/**
 * Parses PlantUML class-diagram text into declarations and relationship tables.
 *
 * Runs comment stripping → declaration extraction → member parsing →
 * relationship resolution in a single forward pass. Never throws on malformed
 * input; anything unrecognized is left out of the model. Each call builds its
 * own tables, so one instance can be shared.
 */
export class ClassDiagramParser {
    private readonly extractor = new DeclarationExtractor();
    private readonly memberParser = new MemberParser();
    private readonly relationshipResolver = new RelationshipResolver();

    public parse(source: string): DiagramModel {
        const text = stripComments(source);
        const { declarations, duplicates, headerEdges } = this.extractor.extract(text);

        for (const declaration of declarations.values()) {
            const { attributes, methods } = this.memberParser.parse(declaration.rawBody);
            declaration.attributes = attributes;
            declaration.methods = methods;
        }

        const relationships = this.relationshipResolver.resolve(text, declarations, headerEdges);

        return { declarations, relationships, duplicates };
    }
}
