import { lineAt } from "./comments";
import type {
    Declaration,
    DeclarationKind,
    DeclarationTable,
    ExtractionResult,
    RelationshipEdge,
} from "./types";

/**
 * `[abstract] class Name [clauses] {` or `interface Name [clauses] {`.
 * The clause group stops at the line end; the opening brace may follow on a later line.
 */
const HEADER_PATTERN = /\b(?:(abstract)\s+)?(class|interface)\s+(\w+)([^{}\n]*)\s*\{/g;

const EXTENDS_CLAUSE = /\bextends\s+(\w+)/;
const IMPLEMENTS_CLAUSE = /\bimplements\s+(\w+(?:\s*,\s*\w+)*)/;

/**
 * Locates type declarations and their raw bodies in PlantUML class-diagram text.
 *
 * Bodies are found with a depth-tracking brace scan rather than a non-greedy
 * match, so inline markers such as `{abstract}` stay inside the body they
 * belong to. A header whose body never closes yields no declaration.
 *
 * Expects text that has already been through `stripComments`.
 */
export class DeclarationExtractor {
    public extract(source: string): ExtractionResult {
        const declarations: DeclarationTable = new Map();
        const duplicates: string[] = [];
        let headerEdges: RelationshipEdge[] = [];

        const pattern = new RegExp(HEADER_PATTERN.source, "g");
        let match: RegExpExecArray | null;

        while ((match = pattern.exec(source)) !== null) {
            const [header, abstractToken, keyword, name, clauses] = match;
            if (!keyword || !name) continue;

            const openIndex = match.index + header.length - 1;
            const closeIndex = this.findClosingBrace(source, openIndex);
            if (closeIndex === -1) {
                // Unclosed body: keep scanning from inside it so later declarations are still found.
                continue;
            }

            if (declarations.has(name)) {
                duplicates.push(name);
                headerEdges = headerEdges.filter((edge) => edge.source !== name);
            }

            const declaration: Declaration = {
                name,
                kind: this.resolveKind(keyword, abstractToken),
                rawBody: source.slice(openIndex + 1, closeIndex),
                attributes: [],
                methods: [],
                line: lineAt(source, match.index),
            };
            declarations.set(name, declaration);
            headerEdges.push(...this.parseClauses(name, clauses ?? "", match.index));

            pattern.lastIndex = closeIndex + 1;
        }

        return { declarations, duplicates, headerEdges };
    }

    /**
     * Index of the `}` that balances the `{` at `openIndex`, or -1.
     */
    private findClosingBrace(source: string, openIndex: number): number {
        let depth = 0;
        for (let i = openIndex; i < source.length; i++) {
            const char = source[i];
            if (char === "{") {
                depth++;
            } else if (char === "}") {
                depth--;
                if (depth === 0) return i;
            }
        }
        return -1;
    }

    private resolveKind(keyword: string, abstractToken: string | undefined): DeclarationKind {
        if (keyword === "interface") return "interface";
        return abstractToken ? "abstract_class" : "class";
    }

    private parseClauses(name: string, clauses: string, offset: number): RelationshipEdge[] {
        const edges: RelationshipEdge[] = [];

        const extendsMatch = clauses.match(EXTENDS_CLAUSE);
        if (extendsMatch && extendsMatch[1]) {
            edges.push({ kind: "extends", source: name, target: extendsMatch[1], offset });
        }

        const implementsMatch = clauses.match(IMPLEMENTS_CLAUSE);
        if (implementsMatch && implementsMatch[1]) {
            for (const target of implementsMatch[1].split(",")) {
                edges.push({ kind: "implements", source: name, target: target.trim(), offset });
            }
        }

        return edges;
    }
}
