export { JavaRenderer, capitalize, formatParameters, placeholderHelper } from "./java-renderer";
export { collectImports } from "./imports";
export { JAVA_FILE_EXTENSION, DEFAULT_INDENT, type RenderOptions } from "./types";
