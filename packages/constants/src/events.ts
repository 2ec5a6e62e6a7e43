/**
 * Log severity level: orthogonal to event types.
 */
export enum LogLevel {
	ERROR = "ERROR",
	WARN = "WARN",
	INFO = "INFO",
	DEBUG = "DEBUG",
}

/**
 * Tier 1: Generic events not tied to a specific domain.
 */
export enum GenericEvent {
	LOG = "LOG",
}

/**
 * Tier 2: Pipeline phase boundary markers.
 */
export enum PhaseEvent {
	PHASE_START = "PHASE_START",
	PHASE_END = "PHASE_END",
}

/**
 * Tier 3: IO module events.
 */
export enum IoEvent {
	FILE_READ = "FILE_READ",
	SAMPLE_CREATED = "SAMPLE_CREATED",
	FILE_WRITE = "FILE_WRITE",
}

/**
 * Tier 3: Parser and generator events.
 */
export enum GeneratorEvent {
	DIAGRAM_PARSE = "DIAGRAM_PARSE",
	DUPLICATE_DECLARATION = "DUPLICATE_DECLARATION",
	SOURCE_RENDER = "SOURCE_RENDER",
}

/**
 * Union of all event types across all tiers.
 */
export type PipelineEvent = GenericEvent | PhaseEvent | IoEvent | GeneratorEvent;
