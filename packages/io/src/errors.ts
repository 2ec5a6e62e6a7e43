import { IoErrors, type UserErrorMessage } from "@plantforge/constants";

/**
 * System error code of a failed fs call, or "UNKNOWN".
 */
export function errorCode(error: unknown): string {
	if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
		return error.code;
	}
	return "UNKNOWN";
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export function toUserMessage(code: string): UserErrorMessage {
	switch (code) {
		case "ENOENT":
			return IoErrors.PATH_NOT_FOUND;
		case "EACCES":
		case "EPERM":
			return IoErrors.PERMISSION_DENIED;
		case "EISDIR":
			return IoErrors.IS_DIRECTORY;
		default:
			return IoErrors.UNEXPECTED_ERROR;
	}
}
