const BLOCK_COMMENT = /\/'[\s\S]*?'\//g;
const LINE_COMMENT = /^[ \t]*'.*$/gm;

/**
 * Blank out PlantUML comments: `/' ... '/` blocks and lines starting with `'`.
 * Newlines inside comments are kept so offsets map to the same line numbers.
 */
export function stripComments(source: string): string {
    return source
        .replace(BLOCK_COMMENT, (comment) => comment.replace(/[^\n]/g, " "))
        .replace(LINE_COMMENT, "");
}

/**
 * 1-based line number of a character offset.
 */
export function lineAt(source: string, offset: number): number {
    let line = 1;
    for (let i = 0; i < offset && i < source.length; i++) {
        if (source[i] === "\n") line++;
    }
    return line;
}
