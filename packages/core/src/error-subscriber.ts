import type { BusPayload } from "@plantforge/event-bus";
import type { PipelineError } from "./types";

/**
 * Subscribes to ERROR-level payloads via bus.onLevel(LogLevel.ERROR) and
 * accumulates them as PipelineError[].
 */
export class ErrorSubscriber {
	readonly errors: PipelineError[] = [];

	get count(): number {
		return this.errors.length;
	}

	handle(event: BusPayload): void {
		if (event.kind !== "error") {
			return;
		}

		this.errors.push({
			phase: event.phase,
			path: event.path,
			message: event.message,
			code: event.code,
			userMessage: event.userMessage,
		});
	}
}
