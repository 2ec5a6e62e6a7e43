import { CLIErrors } from "@plantforge/constants";
import type { Pipeline, PipelineConfig } from "@plantforge/core";
import { createJsonLogger, createLogger, type LogMode } from "@plantforge/logger";
import { createProgram, parseArgs } from "./args";
import { ConfigLoader, DEFAULT_CONFIG } from "./config-loader";
import { ProgressReporter } from "./progress-reporter";
import { ExitCode, type OutputMode, type ParseOptions } from "./types";

const PACKAGE_NAME = /^[A-Za-z_$][\w$]*(\.[A-Za-z_$][\w$]*)*$/;

const LOG_MODE_MAP: Record<OutputMode, LogMode> = {
    quiet: "error",
    normal: "info",
    verbose: "debug",
    json: "debug",
};

/**
 * Main CLI class.
 */
export class CLI {
    private pipeline: Pipeline;

    constructor(pipeline: Pipeline) {
        this.pipeline = pipeline;
    }

    /**
     * Run CLI with given arguments.
     * @returns Exit code
     */
    async run(args: string[]): Promise<number> {
        // Default logger so argument errors are reported the same way as the rest
        let logger = createLogger("plantforge", "info");
        let options: ParseOptions;

        try {
            options = parseArgs(args);
        } catch (error) {
            logger.error(error instanceof Error ? error.message : String(error));
            return ExitCode.CONFIG_ERROR;
        }

        if (options.help) {
            console.log(createProgram().helpInformation());
            return ExitCode.SUCCESS;
        }

        if (options.version) {
            console.log(createProgram().version());
            return ExitCode.SUCCESS;
        }

        const mode = this.getOutputMode(options);
        logger = mode === "json"
            ? createJsonLogger("plantforge", LOG_MODE_MAP[mode])
            : createLogger("plantforge", LOG_MODE_MAP[mode]);

        let config: PipelineConfig;
        try {
            config = await this.buildConfig(options);
        } catch (error) {
            logger.error(`Config error: ${error instanceof Error ? error.message : String(error)}`);
            return ExitCode.CONFIG_ERROR;
        }

        const result = await this.pipeline.run(config, logger);

        new ProgressReporter(mode).complete(options.command, config, result);

        if (result.errors.length > 0) {
            for (const err of result.errors) {
                logger.error(`[${err.phase}] ${err.path}: ${err.userMessage.join(" ")}`, { code: err.code });
            }
            return ExitCode.GENERATION_ERROR;
        }
        return ExitCode.SUCCESS;
    }

    /**
     * Build PipelineConfig from the config file (unless --no-config) and CLI flags.
     */
    async buildConfig(options: ParseOptions): Promise<PipelineConfig> {
        const base = options.noConfig
            ? { ...DEFAULT_CONFIG }
            : await ConfigLoader.load(options.configPath ?? ConfigLoader.findConfigFile());

        const config = ConfigLoader.mergeWithCLI(base, options);

        if (config.packageName !== undefined && !PACKAGE_NAME.test(config.packageName)) {
            throw new Error(CLIErrors.INVALID_PACKAGE(config.packageName));
        }

        return config;
    }

    private getOutputMode(options: ParseOptions): OutputMode {
        if (options.json) return "json";
        if (options.quiet) return "quiet";
        if (options.verbose) return "verbose";
        return "normal";
    }
}
