/**
 * CLI subcommand identifying which operation to perform.
 */
export enum Command {
    GENERATE = "generate",
    PARSE = "parse",
}

/**
 * Exit codes for CLI process.
 */
export enum ExitCode {
    SUCCESS = 0,
    GENERATION_ERROR = 1,
    CONFIG_ERROR = 2,
}

/**
 * Parsed CLI arguments.
 */
export interface ParseOptions {
    command: Command;
    input?: string;
    output?: string;
    packageName?: string;
    configPath?: string;
    noConfig: boolean;
    /**
     * False when `--no-sample` was given.
     */
    sample: boolean;
    dryRun: boolean;
    verbose: boolean;
    quiet: boolean;
    json: boolean;
    help: boolean;
    version: boolean;
}

/**
 * Settings a config file may provide. Every key is optional in the file;
 * after loading, only `packageName` may still be absent.
 */
export interface FileConfig {
    input: string;
    outputDir: string;
    packageName?: string;
    indent: string;
    createSample: boolean;
}

/**
 * Output mode for formatting.
 */
export type OutputMode = "normal" | "verbose" | "quiet" | "json";
