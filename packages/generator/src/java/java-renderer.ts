import {
    DEFAULT_RETURN_TYPE,
    type Declaration,
    type DeclarationKind,
    type DiagramModel,
    type ParsedAttribute,
    type ParsedMethod,
    type ParsedParameter,
    type Visibility,
} from "@plantforge/parser";
import { collectImports } from "./imports";
import { DEFAULT_INDENT, type RenderOptions } from "./types";

const KIND_KEYWORDS: Record<DeclarationKind, string> = {
    class: "public class",
    abstract_class: "public abstract class",
    interface: "public interface",
};

const VISIBILITY_KEYWORDS: Record<Visibility, string> = {
    public: "public",
    private: "private",
    protected: "protected",
    package: "",
};

/**
 * Renders parsed declarations as Java source skeletons.
 *
 * Output per type: optional package line, imports, header with extends and
 * implements clauses, fields, one constructor, accessors for private fields,
 * and method stubs. Interfaces get method signatures only.
 */
export class JavaRenderer {
    private readonly packageName?: string;
    private readonly indent: string;

    constructor(options: RenderOptions = {}) {
        this.packageName = options.packageName;
        this.indent = options.indent ?? DEFAULT_INDENT;
    }

    /**
     * Render every declaration of the model, keyed by type name in declaration order.
     */
    renderAll(model: DiagramModel): Map<string, string> {
        const sources = new Map<string, string>();
        for (const declaration of model.declarations.values()) {
            sources.set(declaration.name, this.render(declaration, model));
        }
        return sources;
    }

    render(declaration: Declaration, model: DiagramModel): string {
        const isInterface = declaration.kind === "interface";
        const fields = isInterface ? [] : declaration.attributes;
        const inherited = isInterface ? [] : this.inheritedAttributes(declaration, model);

        const blocks: string[][] = [];
        if (fields.length > 0) {
            blocks.push(fields.map((attribute) => this.renderField(attribute)));
        }
        if (!isInterface) {
            blocks.push(this.renderConstructor(declaration.name, inherited, fields));
            for (const attribute of fields) {
                if (attribute.visibility !== "private") continue;
                blocks.push(this.renderGetter(attribute), this.renderSetter(attribute));
            }
        }
        for (const method of declaration.methods) {
            blocks.push(this.renderMethod(method, declaration.kind));
        }

        const preamble: string[] = [];
        if (this.packageName) {
            preamble.push(`package ${this.packageName};`, "");
        }
        const imports = collectImports(this.signatures(declaration, fields, inherited));
        if (imports.length > 0) {
            preamble.push(...imports, "");
        }

        const lines = [
            ...preamble,
            `${this.renderHeader(declaration, model)} {`,
            ...(blocks.length > 0 ? [blocks.map((block) => block.join("\n")).join("\n\n")] : []),
            "}",
        ];

        return `${lines.join("\n")}\n`;
    }

    private renderHeader(declaration: Declaration, model: DiagramModel): string {
        let header = `${KIND_KEYWORDS[declaration.kind]} ${declaration.name}`;

        const parent = model.relationships.extends.get(declaration.name);
        if (parent) {
            header += ` extends ${parent}`;
        }

        const interfaces = model.relationships.implements.get(declaration.name);
        if (declaration.kind !== "interface" && interfaces && interfaces.length > 0) {
            header += ` implements ${interfaces.join(", ")}`;
        }

        return header;
    }

    /**
     * Attributes of the direct parent when that parent is a class. Grandparents are not visited.
     */
    private inheritedAttributes(declaration: Declaration, model: DiagramModel): ParsedAttribute[] {
        const parentName = model.relationships.extends.get(declaration.name);
        if (!parentName) return [];

        const parent = model.declarations.get(parentName);
        if (!parent || parent.kind === "interface") return [];

        return parent.attributes;
    }

    private renderField(attribute: ParsedAttribute): string {
        const parts = [VISIBILITY_KEYWORDS[attribute.visibility], attribute.type, attribute.name];
        return `${this.indent}${this.join(parts)};`;
    }

    private renderConstructor(
        name: string,
        inherited: readonly ParsedAttribute[],
        own: readonly ParsedAttribute[],
    ): string[] {
        const i1 = this.indent;
        const i2 = this.indent.repeat(2);
        const params = [...inherited, ...own].map((attribute) => `${attribute.type} ${attribute.name}`);

        const lines = [`${i1}public ${name}(${params.join(", ")}) {`];
        if (inherited.length > 0) {
            lines.push(`${i2}super(${inherited.map((attribute) => attribute.name).join(", ")});`);
        }
        for (const attribute of own) {
            lines.push(`${i2}this.${attribute.name} = ${attribute.name};`);
        }
        lines.push(`${i1}}`);

        return lines;
    }

    private renderGetter(attribute: ParsedAttribute): string[] {
        const i1 = this.indent;
        return [
            `${i1}public ${attribute.type} get${capitalize(attribute.name)}() {`,
            `${i1}${i1}return ${attribute.name};`,
            `${i1}}`,
        ];
    }

    private renderSetter(attribute: ParsedAttribute): string[] {
        const i1 = this.indent;
        return [
            `${i1}public void set${capitalize(attribute.name)}(${attribute.type} ${attribute.name}) {`,
            `${i1}${i1}this.${attribute.name} = ${attribute.name};`,
            `${i1}}`,
        ];
    }

    private renderMethod(method: ParsedMethod, kind: DeclarationKind): string[] {
        const i1 = this.indent;
        const call = `${method.name}(${formatParameters(method.parameters)})`;

        // Interface members are public and abstract; markers are not rendered.
        if (kind === "interface") {
            return [`${i1}public ${method.returnType} ${call};`];
        }

        const isAbstract = kind === "abstract_class" && method.visibility === "public" && method.isAbstract;
        const signature = this.join([
            VISIBILITY_KEYWORDS[method.visibility],
            isAbstract ? "abstract" : "",
            method.isStatic ? "static" : "",
            method.returnType,
            call,
        ]);

        if (isAbstract) {
            return [`${i1}${signature};`];
        }

        const lines = [`${i1}${signature} {`, `${i1}${i1}// TODO: Implement method logic`];
        if (method.returnType !== DEFAULT_RETURN_TYPE) {
            lines.push(`${i1}${i1}return ${placeholderHelper(method.returnType)}(); // Placeholder return`);
        }
        lines.push(`${i1}}`);

        return lines;
    }

    /**
     * Every type string that ends up in the file, for import detection.
     */
    private signatures(
        declaration: Declaration,
        fields: readonly ParsedAttribute[],
        inherited: readonly ParsedAttribute[],
    ): string[] {
        return [
            ...fields.map((attribute) => attribute.type),
            ...inherited.map((attribute) => attribute.type),
            ...declaration.methods.flatMap((method) => [formatParameters(method.parameters), method.returnType]),
        ];
    }

    private join(parts: readonly string[]): string {
        return parts.filter((part) => part.length > 0).join(" ");
    }
}

/**
 * First character upper-cased, the rest lower-cased: `courseId` → `Courseid`.
 */
export function capitalize(name: string): string {
    return name.charAt(0).toUpperCase() + name.slice(1).toLowerCase();
}

export function formatParameters(parameters: readonly ParsedParameter[]): string {
    return parameters
        .map((parameter) => (parameter.kind === "typed" ? `${parameter.type} ${parameter.name}` : parameter.text))
        .join(", ");
}

/**
 * `default<Type>Value` with anything that is not an identifier character removed.
 */
export function placeholderHelper(returnType: string): string {
    return `default${returnType.replace(/\W/g, "")}Value`;
}
