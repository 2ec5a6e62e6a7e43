export type {
	BusPayload,
	ErrorPayload,
	LogPayload,
	PhasePayload,
	ErrorDetails,
	EventHandler,
} from "./types";

export { PipelineEventBus } from "./pipeline-event-bus";
