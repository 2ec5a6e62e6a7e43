import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { CLIErrors } from "@plantforge/constants";
import { DEFAULT_CONFIG as PIPELINE_DEFAULTS, type PipelineConfig } from "@plantforge/core";
import type { FileConfig, ParseOptions } from "./types";

/**
 * Default built-in configuration.
 */
export const DEFAULT_CONFIG: FileConfig = { ...PIPELINE_DEFAULTS };

/**
 * Config file search locations.
 */
const CONFIG_FILENAMES = ["plantforge.config.json", ".plantforge.json"];

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Loads and merges configuration from files and CLI options.
 */
export class ConfigLoader {
    /**
     * Find config file using priority order:
     * 1. PLANTFORGE_CONFIG env var
     * 2. Search up from startDir to git root
     * 3. User config (~/.config/plantforge/config.json)
     */
    static findConfigFile(startDir: string = process.cwd()): string | undefined {
        const envConfig = process.env.PLANTFORGE_CONFIG;
        if (envConfig && existsSync(envConfig)) {
            return envConfig;
        }

        let currentDir = resolve(startDir);

        while (true) {
            for (const filename of CONFIG_FILENAMES) {
                const configPath = join(currentDir, filename);
                if (existsSync(configPath)) {
                    return configPath;
                }
            }

            if (existsSync(join(currentDir, ".git"))) {
                break;
            }

            const parentDir = dirname(currentDir);
            if (parentDir === currentDir) {
                break;
            }
            currentDir = parentDir;
        }

        const homeDir = process.env.HOME;
        if (homeDir) {
            const userConfig = join(homeDir, ".config", "plantforge", "config.json");
            if (existsSync(userConfig)) {
                return userConfig;
            }
        }

        return undefined;
    }

    /**
     * Load configuration from file.
     * @throws Error if the file is not valid JSON or a key has the wrong type
     */
    static async load(path?: string): Promise<FileConfig> {
        if (!path) {
            return { ...DEFAULT_CONFIG };
        }

        const content = await readFile(path, "utf-8");
        let parsed: unknown;
        try {
            parsed = JSON.parse(content);
        } catch (error) {
            if (error instanceof SyntaxError) {
                throw new Error(CLIErrors.INVALID_CONFIG(path));
            }
            throw error;
        }

        if (!isRecord(parsed)) {
            throw new Error(CLIErrors.INVALID_CONFIG(path));
        }
        return this.mergeWithDefaults(parsed, path);
    }

    private static mergeWithDefaults(userConfig: Record<string, unknown>, path: string): FileConfig {
        const text = (key: string, fallback: string): string => {
            const value = userConfig[key];
            if (value === undefined) return fallback;
            if (typeof value !== "string") {
                throw new Error(CLIErrors.INVALID_CONFIG_KEY(path, key, "a string"));
            }
            return value;
        };

        const packageName = userConfig.packageName;
        if (packageName !== undefined && typeof packageName !== "string") {
            throw new Error(CLIErrors.INVALID_CONFIG_KEY(path, "packageName", "a string"));
        }

        const createSample = userConfig.createSample ?? DEFAULT_CONFIG.createSample;
        if (typeof createSample !== "boolean") {
            throw new Error(CLIErrors.INVALID_CONFIG_KEY(path, "createSample", "a boolean"));
        }

        return {
            input: text("input", DEFAULT_CONFIG.input),
            outputDir: text("outputDir", DEFAULT_CONFIG.outputDir),
            packageName,
            indent: text("indent", DEFAULT_CONFIG.indent),
            createSample,
        };
    }

    /**
     * Merge base config with CLI options (CLI wins).
     */
    static mergeWithCLI(base: FileConfig, options: ParseOptions): PipelineConfig {
        return {
            input: options.input ?? base.input,
            outputDir: options.output ?? base.outputDir,
            packageName: options.packageName ?? base.packageName,
            indent: base.indent,
            createSample: options.sample && base.createSample,
            dryRun: options.dryRun,
        };
    }
}
