import { Logger, type ILogObj, type ISettingsParam } from "tslog";

/**
 * Context object passed as the second argument of a log call.
 *
 * The generation pipeline fills these from its bus payloads:
 * - `phase`: read, extract, render or write
 * - `file`/`path`: the diagram being read or the `.java` file being written
 * - `name`/`kind`: the declaration a render message is about
 * - `code`: the error code of a failed file operation or render
 * - `bytes`, `files`, `declarations`, `relationships`, `artifacts`, `written`, `failed`: phase counters
 */
export interface AppLogObj extends ILogObj {
	phase?: string;
	file?: string;
	path?: string;
	name?: string;
	kind?: string;
	code?: string;
	bytes?: number;
	files?: number;
	declarations?: number;
	relationships?: number;
	artifacts?: number;
	written?: number;
	failed?: number;
	[key: string]: unknown;
}

/**
 * Log verbosity mode. The CLI derives it from `--quiet`, `--verbose` and `--json`.
 */
export type LogMode = "silent" | "error" | "info" | "debug";

export const DEFAULT_LOGGER_NAME = "plantforge";

const MIN_LEVELS: Record<LogMode, number> = {
	silent: 7,
	error: 5,
	info: 3,
	debug: 2,
};

function settingsFor(
	name: string,
	type: NonNullable<ISettingsParam<AppLogObj>["type"]>,
	mode: LogMode,
): ISettingsParam<AppLogObj> {
	return {
		name,
		type: mode === "silent" ? "hidden" : type,
		minLevel: MIN_LEVELS[mode],
		hideLogPositionForProduction: true,
	};
}

/**
 * Pretty terminal output, used for the normal, quiet and verbose CLI modes.
 */
export function createLogger(
	name: string = DEFAULT_LOGGER_NAME,
	mode: LogMode = "info",
): Logger<AppLogObj> {
	return new Logger<AppLogObj>(settingsFor(name, "pretty", mode));
}

/**
 * One JSON object per line, used for `--json`. Debug by default so every
 * render and write message reaches the consumer.
 */
export function createJsonLogger(
	name: string = DEFAULT_LOGGER_NAME,
	mode: LogMode = "debug",
): Logger<AppLogObj> {
	return new Logger<AppLogObj>(settingsFor(name, "json", mode));
}

/**
 * Hidden logger for library callers that pass none to `GeneratePipeline.run`.
 * Transports attached to it still receive every message.
 */
export function createSilentLogger(name: string = DEFAULT_LOGGER_NAME): Logger<AppLogObj> {
	return new Logger<AppLogObj>(settingsFor(name, "hidden", "debug"));
}
