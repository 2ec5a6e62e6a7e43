import type { UserErrorMessage } from "./types";

export const IoErrors = {
	PATH_NOT_FOUND: ["Diagram file does not exist"],
	PERMISSION_DENIED: ["Permission denied"],
	IS_DIRECTORY: ["Expected a file but found a directory"],
	UNEXPECTED_ERROR: ["Unexpected error accessing file"],
} as const satisfies Record<string, UserErrorMessage>;
