import type { ParsedAttribute, ParsedMethod, ParsedParameter, Visibility } from "./types";

export const DEFAULT_ATTRIBUTE_TYPE = "Object";
export const DEFAULT_RETURN_TYPE = "void";

/**
 * Dotted identifier with at most one level of generic arguments and any number of `[]`.
 */
const TYPE_TOKEN = String.raw`[\w.]+(?:<[^<>()]*>)?(?:\[\])*`;

/**
 * marker? name (: type)? ((params))? (: returnType)?
 *
 * The marker is any single symbol; only `+ - # ~` carry a visibility, the rest read as public.
 */
const MEMBER_PATTERN = new RegExp(
    String.raw`^([^\w\s{}()])?\s*(\w+)(?:\s*:\s*(${TYPE_TOKEN}))?(?:\s*\(([^)]*)\))?(?:\s*:\s*(${TYPE_TOKEN}))?$`,
);

const MODIFIER_MARKER = /\{(abstract|static|classifier)\}/gi;

export interface ParsedMembers {
    attributes: ParsedAttribute[];
    methods: ParsedMethod[];
}

/**
 * Parses the raw body of a declaration, one member per line.
 *
 * A line with a parameter list (even an empty one) is a method, anything else
 * that matches is an attribute. Lines that do not match are skipped.
 */
export class MemberParser {
    public parse(rawBody: string): ParsedMembers {
        const members: ParsedMembers = { attributes: [], methods: [] };

        for (const line of rawBody.split("\n")) {
            this.parseLine(line, members);
        }

        return members;
    }

    private parseLine(line: string, members: ParsedMembers): void {
        let isAbstract = false;
        let isStatic = false;

        const text = line
            .replace(MODIFIER_MARKER, (_marker, modifier: string) => {
                if (modifier.toLowerCase() === "abstract") {
                    isAbstract = true;
                } else {
                    isStatic = true;
                }
                return " ";
            })
            .replace(/\s+/g, " ")
            .trim();

        if (!text) return;

        const match = text.match(MEMBER_PATTERN);
        if (!match) return;

        const [, marker, name, attributeType, paramsStr, returnType] = match;
        if (!name) return;
        const visibility = this.mapVisibility(marker);

        if (paramsStr !== undefined) {
            members.methods.push({
                visibility,
                name,
                parameters: this.parseParameters(paramsStr),
                returnType: returnType ?? DEFAULT_RETURN_TYPE,
                isAbstract,
                isStatic,
            });
            return;
        }

        members.attributes.push({
            visibility,
            type: attributeType ?? DEFAULT_ATTRIBUTE_TYPE,
            name,
        });
    }

    private mapVisibility(char: string | undefined): Visibility {
        switch (char) {
            case "-":
                return "private";
            case "#":
                return "protected";
            case "~":
                return "package";
            default:
                return "public";
        }
    }

    private parseParameters(paramsStr: string): ParsedParameter[] {
        const parameters: ParsedParameter[] = [];

        for (const part of paramsStr.split(",")) {
            const text = part.trim();
            if (!text) continue;

            const pieces = text.split(":");
            const [name, type] = pieces;
            if (pieces.length === 2 && name !== undefined && type !== undefined) {
                parameters.push({ kind: "typed", name: name.trim(), type: type.trim() });
            } else {
                parameters.push({ kind: "raw", text });
            }
        }

        return parameters;
    }
}
