export type { UserErrorMessage } from "./types";
export { IoErrors } from "./io";
export { PipelinePhase, PipelinePhaseLabels, PipelineErrors } from "./pipeline";
export { CLIErrors, CLIDescriptions } from "./cli";
export {
	LogLevel,
	GenericEvent,
	PhaseEvent,
	IoEvent,
	GeneratorEvent,
	type PipelineEvent,
} from "./events";
