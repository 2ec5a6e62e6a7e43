import type { LogLevel, PipelineEvent, PhaseEvent, PipelinePhase, UserErrorMessage } from "@plantforge/constants";

/**
 * Fields shared by every payload emitted through the pipeline event bus.
 * Every payload carries two orthogonal dimensions: event (what happened) and level (severity).
 */
interface BasePayload {
	event: PipelineEvent;
	level: LogLevel;
	phase: PipelinePhase;
	timestamp: number;
}

/**
 * Payload for ERROR-level events: a pipeline error with user-facing message.
 */
export interface ErrorPayload extends BasePayload {
	kind: "error";
	level: LogLevel.ERROR;
	path: string;
	message: string;
	code: string;
	userMessage: UserErrorMessage;
}

/**
 * Payload for WARN, INFO, and DEBUG-level events: a log message with optional context.
 */
export interface LogPayload extends BasePayload {
	kind: "log";
	level: LogLevel.WARN | LogLevel.INFO | LogLevel.DEBUG;
	message: string;
	context?: Record<string, unknown>;
}

/**
 * Payload for phase boundary events: marks PHASE_START and PHASE_END.
 */
export interface PhasePayload extends BasePayload {
	kind: "phase";
	event: PhaseEvent;
	level: LogLevel.INFO;
	stats?: Record<string, number>;
}

export type BusPayload = ErrorPayload | LogPayload | PhasePayload;

/**
 * Error details supplied by producers; the bus fills in the envelope.
 */
export type ErrorDetails = Pick<ErrorPayload, "path" | "message" | "code" | "userMessage">;

/**
 * Callback type for event subscribers.
 */
export type EventHandler = (payload: BusPayload) => void;
