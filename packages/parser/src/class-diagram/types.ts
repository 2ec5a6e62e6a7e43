export type Visibility = "public" | "private" | "protected" | "package";

export type DeclarationKind = "class" | "abstract_class" | "interface";

export interface ParsedAttribute {
    readonly visibility: Visibility;
    readonly type: string;
    readonly name: string;
}

/**
 * A method parameter. `raw` keeps text that did not split into exactly `name: type`.
 */
export type ParsedParameter =
    | { readonly kind: "typed"; readonly name: string; readonly type: string }
    | { readonly kind: "raw"; readonly text: string };

export interface ParsedMethod {
    readonly visibility: Visibility;
    readonly name: string;
    readonly parameters: readonly ParsedParameter[];
    readonly returnType: string;
    readonly isAbstract: boolean;
    readonly isStatic: boolean;
}

export interface Declaration {
    name: string;
    kind: DeclarationKind;
    rawBody: string;
    attributes: ParsedAttribute[];
    methods: ParsedMethod[];
    /**
     * 1-based line of the declaration header.
     */
    line: number;
}

/**
 * Declarations keyed by name in insertion order. A later declaration of the
 * same name replaces the earlier one.
 */
export type DeclarationTable = Map<string, Declaration>;

export type RelationshipKind = "extends" | "implements";

/**
 * A directed edge found in the diagram text, before endpoint resolution.
 * `offset` is the character position it was found at; edges apply in offset order.
 */
export interface RelationshipEdge {
    kind: RelationshipKind;
    source: string;
    target: string;
    offset: number;
}

export interface ExtractionResult {
    declarations: DeclarationTable;
    /**
     * Names declared more than once, in the order the overwrite happened.
     */
    duplicates: string[];
    /**
     * Edges written in declaration headers (`class A extends B implements C, D`).
     */
    headerEdges: RelationshipEdge[];
}

export interface RelationshipTable {
    /**
     * child → parent
     */
    extends: Map<string, string>;
    /**
     * class → interfaces, in order of first appearance
     */
    implements: Map<string, string[]>;
}

export interface DiagramModel {
    declarations: DeclarationTable;
    relationships: RelationshipTable;
    duplicates: string[];
}
