/**
 * Auxiliary types that get an import when their name shows up in a rendered signature.
 */
const WELL_KNOWN_IMPORTS: readonly { token: string; imports: readonly string[] }[] = [
    { token: "Date", imports: ["java.util.Date"] },
    { token: "List", imports: ["java.util.List", "java.util.ArrayList"] },
    { token: "Map", imports: ["java.util.Map", "java.util.HashMap"] },
    { token: "Set", imports: ["java.util.Set", "java.util.HashSet"] },
];

/**
 * Import statements for the well-known types referenced in `signatures`.
 *
 * Plain substring match: `Dates` or `UpdateList` also count.
 */
export function collectImports(signatures: readonly string[]): string[] {
    const lines: string[] = [];

    for (const { token, imports } of WELL_KNOWN_IMPORTS) {
        if (!signatures.some((signature) => signature.includes(token))) continue;
        for (const name of imports) {
            lines.push(`import ${name};`);
        }
    }

    return lines;
}
