// =============================================================================
// HTTP TRANSPORT -- Delivers protocol requests to a peer's /protocol/messages
// =============================================================================

import { createBankClient, isClearlineClientError } from "@clearline/client";
import type { ParticipantTransport, RequestEnvelope } from "@clearline/core";
import { ClearlineError } from "@clearline/core";

export interface HttpTransportOptions {
	/** Custom fetch implementation (default: globalThis.fetch) */
	fetch?: typeof globalThis.fetch;
	/** Static headers sent with every protocol request */
	headers?: Record<string, string>;
}

/**
 * A peer that answers 4xx rejected the message itself: the error keeps the
 * peer's code. No answer, or a 5xx, means the peer could not decide and the
 * attempt counts as unreachable.
 */
function toTransportError(address: string, error: unknown): ClearlineError {
	if (isClearlineClientError(error) && error.status >= 400 && error.status < 500) {
		return new ClearlineError(error.code, error.message, {
			status: error.status,
			details: error.details,
			cause: error,
		});
	}
	const reason = error instanceof Error ? error.message : String(error);
	return ClearlineError.remoteUnreachable(`Participant at ${address} unreachable: ${reason}`, error);
}

export function createHttpTransport(options: HttpTransportOptions = {}): ParticipantTransport {
	return {
		async send(address: string, envelope: RequestEnvelope, sendOptions: { timeoutMs: number }) {
			const client = createBankClient({
				baseURL: address,
				fetch: options.fetch,
				headers: options.headers,
				timeout: sendOptions.timeoutMs,
			});
			try {
				return await client.protocol.send(envelope, { timeoutMs: sendOptions.timeoutMs });
			} catch (error) {
				throw toTransportError(address, error);
			}
		},
	};
}
