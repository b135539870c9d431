// =============================================================================
// CLIENT ERROR — Typed error from API responses
// =============================================================================

import type { ClearlineErrorCode } from "@clearline/core";

export class ClearlineClientError extends Error {
	readonly code: ClearlineErrorCode;
	/** HTTP status, or 0 when no response was received */
	readonly status: number;
	readonly details?: Record<string, unknown>;

	constructor(
		code: ClearlineErrorCode,
		message: string,
		status: number,
		details?: Record<string, unknown>,
		options?: { cause?: unknown },
	) {
		super(message, { cause: options?.cause });
		this.name = "ClearlineClientError";
		this.code = code;
		this.status = status;
		this.details = details;
	}
}

export function isClearlineClientError(error: unknown): error is ClearlineClientError {
	return error instanceof ClearlineClientError;
}
