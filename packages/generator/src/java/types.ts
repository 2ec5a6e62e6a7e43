export interface RenderOptions {
    /**
     * Emits `package <name>;` at the top of every file when set.
     */
    packageName?: string;
    /**
     * One level of indentation. Defaults to four spaces.
     */
    indent?: string;
}

export const JAVA_FILE_EXTENSION = ".java";

export const DEFAULT_INDENT = "    ";
