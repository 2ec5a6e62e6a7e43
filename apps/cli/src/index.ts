export { CLI } from "./cli";
export { createProgram, parseArgs } from "./args";
export { ConfigLoader, DEFAULT_CONFIG } from "./config-loader";
export { ProgressReporter } from "./progress-reporter";
export { Command, ExitCode } from "./types";
export type { FileConfig, OutputMode, ParseOptions } from "./types";
