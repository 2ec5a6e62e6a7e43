import type {
    DeclarationTable,
    RelationshipEdge,
    RelationshipKind,
    RelationshipTable,
} from "./types";

interface EdgePattern {
    regex: RegExp;
    kind: RelationshipKind;
    /**
     * Whether the left-hand token is the edge source (the subclass or implementing class).
     */
    sourceOnLeft: boolean;
}

const EDGE_PATTERNS: readonly EdgePattern[] = [
    // Parent <|-- Child
    { regex: /(\w+)\s*<\|-{2,}\s*(\w+)/g, kind: "extends", sourceOnLeft: false },
    // Child --|> Parent
    { regex: /(\w+)\s*-{2,}\|>\s*(\w+)/g, kind: "extends", sourceOnLeft: true },
    // Class ..|> Interface
    { regex: /(\w+)\s*\.{2,}\|>\s*(\w+)/g, kind: "implements", sourceOnLeft: true },
    // Interface <|.. Class
    { regex: /(\w+)\s*<\|\.{2,}\s*(\w+)/g, kind: "implements", sourceOnLeft: false },
];

/**
 * Builds the extends/implements tables from relationship arrows in the diagram text.
 *
 * Edges are applied in the order they appear. An edge whose endpoints are not
 * both declared is dropped. `extends` keeps the last edge per child;
 * `implements` keeps every interface once, in order of first appearance.
 */
export class RelationshipResolver {
    public resolve(
        source: string,
        declarations: DeclarationTable,
        headerEdges: readonly RelationshipEdge[] = [],
    ): RelationshipTable {
        const table: RelationshipTable = { extends: new Map(), implements: new Map() };

        const edges = [...headerEdges, ...this.scanEdges(source)].sort((a, b) => a.offset - b.offset);

        for (const edge of edges) {
            if (!declarations.has(edge.source) || !declarations.has(edge.target)) continue;

            if (edge.kind === "extends") {
                table.extends.set(edge.source, edge.target);
                continue;
            }

            let interfaces = table.implements.get(edge.source);
            if (!interfaces) {
                interfaces = [];
                table.implements.set(edge.source, interfaces);
            }
            if (!interfaces.includes(edge.target)) {
                interfaces.push(edge.target);
            }
        }

        return table;
    }

    /**
     * All arrow edges in the text, unresolved.
     */
    public scanEdges(source: string): RelationshipEdge[] {
        const edges: RelationshipEdge[] = [];

        for (const pattern of EDGE_PATTERNS) {
            for (const match of source.matchAll(pattern.regex)) {
                const [, left, right] = match;
                if (!left || !right) continue;

                edges.push({
                    kind: pattern.kind,
                    source: pattern.sourceOnLeft ? left : right,
                    target: pattern.sourceOnLeft ? right : left,
                    offset: match.index ?? 0,
                });
            }
        }

        return edges;
    }
}
