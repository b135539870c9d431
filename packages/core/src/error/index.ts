import { BASE_ERROR_CODES, type BaseErrorCode } from "./codes.js";

export { BASE_ERROR_CODES, type BaseErrorCode, isBaseErrorCode, type RawErrorCode } from "./codes.js";

export type ClearlineErrorCode = BaseErrorCode;

export class ClearlineError extends Error {
	readonly code: ClearlineErrorCode;
	readonly status: number;
	readonly details?: Record<string, unknown>;
	/**
	 * Whether this error is transient: the condition may change and a later
	 * attempt may succeed (remote instance back online, balance topped up).
	 */
	readonly transient: boolean;

	constructor(
		code: ClearlineErrorCode,
		message: string,
		options?: {
			cause?: unknown;
			status?: number;
			transient?: boolean;
			details?: Record<string, unknown>;
		},
	) {
		super(message, { cause: options?.cause });
		this.code = code;
		this.status = options?.status ?? BASE_ERROR_CODES[code].status;
		this.transient = options?.transient ?? BASE_ERROR_CODES[code].transient;
		this.details = options?.details;
		this.name = "ClearlineError";
	}

	/**
	 * Create a ClearlineError from a typed error code.
	 * Uses the default message and status from BASE_ERROR_CODES.
	 */
	static fromCode(
		code: ClearlineErrorCode,
		options?: { message?: string; cause?: unknown; details?: Record<string, unknown> },
	): ClearlineError {
		const raw = BASE_ERROR_CODES[code];
		return new ClearlineError(code, options?.message ?? raw.message, {
			cause: options?.cause,
			status: raw.status,
			transient: raw.transient,
			details: options?.details,
		});
	}

	// --- Transient errors ---

	static insufficientFunds(message = "Insufficient funds", details?: Record<string, unknown>) {
		return new ClearlineError("INSUFFICIENT_FUNDS", message, { details });
	}

	static notFound(message = "Resource not found", cause?: unknown) {
		return new ClearlineError("NOT_FOUND", message, { cause });
	}

	static remoteUnreachable(message = "Remote instance unreachable", cause?: unknown) {
		return new ClearlineError("REMOTE_UNREACHABLE", message, { cause });
	}

	// --- Deterministic errors ---

	static invalidArgument(message = "Invalid argument", cause?: unknown) {
		return new ClearlineError("INVALID_ARGUMENT", message, { cause });
	}

	static accountInactive(message = "Account is not active", cause?: unknown) {
		return new ClearlineError("ACCOUNT_INACTIVE", message, { cause });
	}

	static signatureInvalid(message = "Message signature is invalid", cause?: unknown) {
		return new ClearlineError("SIGNATURE_INVALID", message, { cause });
	}

	static replayDetected(message = "Message was already processed", cause?: unknown) {
		return new ClearlineError("REPLAY_DETECTED", message, { cause });
	}

	static conflict(message = "Resource conflict", cause?: unknown) {
		return new ClearlineError("CONFLICT", message, { cause });
	}

	static illegalTransition(message = "Illegal state transition", cause?: unknown) {
		return new ClearlineError("ILLEGAL_TRANSITION", message, { cause });
	}

	static storageUnavailable(message = "Ledger storage unavailable", cause?: unknown) {
		return new ClearlineError("STORAGE_UNAVAILABLE", message, { cause });
	}

	static internal(message = "Internal error", cause?: unknown) {
		return new ClearlineError("INTERNAL", message, { cause });
	}
}

/** Extract a loggable message from anything thrown. */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
