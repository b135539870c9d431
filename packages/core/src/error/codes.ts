// =============================================================================
// TYPED ERROR CODES
// =============================================================================
// Registry of error codes with HTTP status codes and default messages.
// Shared by the bank, the registry and the client so that a code raised on one
// instance is understood by every other instance.

export type RawErrorCode = {
	message: string;
	status: number;
	/**
	 * Whether the condition may change on its own.
	 *
	 * - `true`: Balance may increase, a remote instance may come back, a
	 *   registration may appear. Retrying later may succeed.
	 * - `false` (default): Validation failure, forged message, illegal state
	 *   transition. Retrying the same request will always fail.
	 */
	transient?: boolean;
};

export const BASE_ERROR_CODES = {
	// Transient
	INSUFFICIENT_FUNDS: { message: "Insufficient funds", status: 422, transient: true },
	NOT_FOUND: { message: "Resource not found", status: 404, transient: true },
	REMOTE_UNREACHABLE: { message: "Remote instance unreachable", status: 503, transient: true },

	// Deterministic
	INVALID_ARGUMENT: { message: "Invalid argument", status: 400, transient: false },
	ACCOUNT_INACTIVE: { message: "Account is not active", status: 403, transient: false },
	SIGNATURE_INVALID: { message: "Message signature is invalid", status: 401, transient: false },
	REPLAY_DETECTED: { message: "Message was already processed", status: 409, transient: false },
	CONFLICT: { message: "Resource conflict", status: 409, transient: false },
	ILLEGAL_TRANSITION: { message: "Illegal state transition", status: 409, transient: false },
	STORAGE_UNAVAILABLE: { message: "Ledger storage unavailable", status: 500, transient: false },
	INTERNAL: { message: "Internal error", status: 500, transient: false },
} as const satisfies Record<string, RawErrorCode>;

export type BaseErrorCode = keyof typeof BASE_ERROR_CODES;

export function isBaseErrorCode(code: string): code is BaseErrorCode {
	return Object.hasOwn(BASE_ERROR_CODES, code);
}
