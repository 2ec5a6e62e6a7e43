import { Command as CommanderProgram, CommanderError } from "commander";
import { CLIDescriptions, CLIErrors } from "@plantforge/constants";
import { Command, type ParseOptions } from "./types";

const VERSION = "0.1.0";

/**
 * Add shared options to a subcommand.
 */
function addSharedOptions(cmd: CommanderProgram): CommanderProgram {
    return cmd
        .argument("[input]", "PlantUML class diagram to read (default: diagram.puml)")
        .allowExcessArguments(false)
        .option("--config <path>", "use specific config file")
        .option("--no-config", "skip config file loading")
        .option("-v, --verbose", "show detailed output", false)
        .option("-q, --quiet", "show errors only", false)
        .option("--json", "output as JSON lines", false);
}

/**
 * Create the commander program with all subcommands.
 */
export function createProgram(): CommanderProgram {
    const program = new CommanderProgram();
    program
        .name("plantforge")
        .description(CLIDescriptions.PROGRAM)
        .version(VERSION)
        .exitOverride()
        .configureOutput({
            writeOut: () => {},
            writeErr: () => {},
        });

    addSharedOptions(
        program
            .command("generate", { isDefault: true })
            .description(CLIDescriptions.GENERATE)
            .option("-o, --output <dir>", "directory for generated files (default: generated_java)")
            .option("--package <name>", "package declaration for every generated file")
            .option("--no-sample", "fail instead of writing the sample diagram when the input is missing")
            .option("--dry-run", "render without writing files", false),
    );

    addSharedOptions(program.command("parse").description(CLIDescriptions.PARSE));

    return program;
}

function text(value: unknown): string | undefined {
    return typeof value === "string" ? value : undefined;
}

function flag(value: unknown): boolean {
    return value === true;
}

/**
 * Map commander-parsed options to our ParseOptions type.
 */
function buildParseOptions(command: Command, input: string | undefined, opts: Record<string, unknown>): ParseOptions {
    if (opts.verbose && opts.quiet) {
        throw new Error(CLIErrors.CONFLICTING_FLAGS);
    }

    return {
        command,
        input,
        output: text(opts.output),
        packageName: text(opts.package),
        configPath: text(opts.config),
        noConfig: opts.config === false,
        // parse never writes, the sample included
        sample: command === Command.GENERATE && opts.sample !== false,
        dryRun: command === Command.PARSE || flag(opts.dryRun),
        verbose: flag(opts.verbose),
        quiet: flag(opts.quiet),
        json: flag(opts.json),
        help: false,
        version: false,
    };
}

function defaultOptions(overrides: Partial<ParseOptions>): ParseOptions {
    return {
        command: Command.GENERATE,
        noConfig: false,
        sample: true,
        dryRun: false,
        verbose: false,
        quiet: false,
        json: false,
        help: false,
        version: false,
        ...overrides,
    };
}

/**
 * Parse CLI arguments into ParseOptions using commander.
 *
 * @param args - Command-line arguments (without program name)
 * @throws Error if unknown flag, missing value, or too many inputs
 */
export function parseArgs(args: string[]): ParseOptions {
    const program = createProgram();

    let result: ParseOptions | undefined;

    const commandMap: Record<string, Command> = {
        generate: Command.GENERATE,
        parse: Command.PARSE,
    };

    for (const cmd of program.commands) {
        const command = commandMap[cmd.name()];
        if (!command) continue;

        cmd.action((input: string | undefined, opts: Record<string, unknown>) => {
            result = buildParseOptions(command, input, opts);
        });
    }

    try {
        program.parse(args, { from: "user" });
    } catch (err) {
        if (err instanceof CommanderError) {
            if (err.code === "commander.helpDisplayed") {
                return defaultOptions({ help: true });
            }
            if (err.code === "commander.version") {
                return defaultOptions({ version: true });
            }
            throw new Error(err.message.replace(/^error: /, ""));
        }
        throw err;
    }

    return result ?? defaultOptions({});
}
