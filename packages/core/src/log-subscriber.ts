import type { Logger, AppLogObj } from "@plantforge/logger";
import { LogLevel, PhaseEvent, PipelinePhaseLabels } from "@plantforge/constants";
import type { BusPayload } from "@plantforge/event-bus";

/**
 * Subscribes to all payloads via bus.onAll() and routes them to the
 * matching Logger method.
 *
 * Routing:
 *   error payload → logger.warn()
 *   WARN          → logger.warn()
 *   INFO          → logger.info()
 *   DEBUG         → logger.debug()
 *   phase payload → logger.info() (with phase start/end formatting)
 */
export class LogSubscriber {
	private readonly logger: Logger<AppLogObj>;

	constructor(logger: Logger<AppLogObj>) {
		this.logger = logger;
	}

	handle(event: BusPayload): void {
		switch (event.kind) {
			case "phase": {
				const label = PipelinePhaseLabels[event.phase];
				const verb = event.event === PhaseEvent.PHASE_START ? "started" : "ended";
				this.logger.info(`${label} phase ${verb}`, { phase: event.phase, ...event.stats });
				return;
			}
			case "error":
				this.logger.warn(event.message, { phase: event.phase, path: event.path, code: event.code });
				return;
			case "log":
				this.routeLog(event.level, event.message, { phase: event.phase, ...event.context });
				return;
		}
	}

	private routeLog(level: LogLevel.WARN | LogLevel.INFO | LogLevel.DEBUG, message: string, context: AppLogObj): void {
		switch (level) {
			case LogLevel.WARN:
				this.logger.warn(message, context);
				break;
			case LogLevel.INFO:
				this.logger.info(message, context);
				break;
			case LogLevel.DEBUG:
				this.logger.debug(message, context);
				break;
		}
	}
}
