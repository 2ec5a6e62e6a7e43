import type { UserErrorMessage } from "./types";

/**
 * Generation pipeline phases.
 */
export enum PipelinePhase {
	READ = "read",
	EXTRACT = "extract",
	RENDER = "render",
	WRITE = "write",
}

/**
 * Human-readable labels for each pipeline phase, used in log messages.
 */
export const PipelinePhaseLabels: Record<PipelinePhase, string> = {
	[PipelinePhase.READ]: "Read",
	[PipelinePhase.EXTRACT]: "Extract",
	[PipelinePhase.RENDER]: "Render",
	[PipelinePhase.WRITE]: "Write",
};

export const PipelineErrors = {
	RENDER_FAILURE: (name: string, message: string): UserErrorMessage => [
		`Failed to render "${name}"`,
		message,
	],
} as const;
