// =============================================================================
// EXCHANGE -- One request/reply round with a participant, retried
// =============================================================================
// Every attempt is a freshly signed envelope (new nonce, same transfer id).
// Replies are accepted only when signed by the participant's registered key
// and bound to the attempt through `inReplyTo`.

import type {
	PayloadByType,
	ReplyEnvelope,
	RequestType,
	ResolvedInstance,
	Transfer,
} from "@clearline/core";
import { ClearlineError, errorMessage } from "@clearline/core";
import type { BankContext } from "../context/context.js";
import { verifySignature } from "../identity/index.js";
import { isReply, parseEnvelope, sealMessage, signedContent } from "../protocol/messages.js";
import { findTransfer } from "../managers/transfer-store.js";
import { withStorage } from "../infrastructure/storage.js";

export type ExchangeResult =
	| { kind: "reply"; reply: ReplyEnvelope }
	/** Participant refused the message itself (bad signature, replay, malformed) */
	| { kind: "rejected"; error: ClearlineError }
	/** No valid reply within the retry budget */
	| { kind: "exhausted"; error: unknown }
	/** Cancellation was requested between attempts */
	| { kind: "cancelled" };

export interface ExchangeOptions {
	timeoutMs: number;
	/** Check the transfer's cancel flag before each attempt */
	honourCancel?: boolean;
}

/** Backoff before retry number `retry` (1-based), doubling up to the cap. */
export function backoffDelay(ctx: Pick<BankContext, "options">, retry: number): number {
	const { retryBackoffMs, maxRetryBackoffMs } = ctx.options.protocol;
	return Math.min(retryBackoffMs * 2 ** (retry - 1), maxRetryBackoffMs);
}

async function cancelRequested(ctx: BankContext, transferId: string): Promise<boolean> {
	const transfer = await withStorage(ctx, "checkCancel", (adapter) => findTransfer(adapter, transferId));
	return transfer?.cancelRequested ?? false;
}

/**
 * Validate a raw reply body against the request it answers. Throws
 * SIGNATURE_INVALID or INVALID_ARGUMENT.
 */
export function acceptReply(
	raw: unknown,
	request: { transferId: string; nonce: string },
	peer: ResolvedInstance,
): ReplyEnvelope {
	const envelope = parseEnvelope(raw);
	if (!isReply(envelope)) {
		throw ClearlineError.invalidArgument(`Expected ACK or NACK, got ${envelope.type}`);
	}
	if (envelope.transferId !== request.transferId || envelope.payload.inReplyTo !== request.nonce) {
		throw ClearlineError.invalidArgument("Reply does not answer this request");
	}
	if (envelope.senderId !== peer.instanceId) {
		throw ClearlineError.signatureInvalid(
			`Reply sent by ${envelope.senderId}, expected ${peer.instanceId}`,
		);
	}
	const valid = verifySignature(
		peer.publicKey,
		signedContent(envelope),
		envelope.nonce,
		envelope.transferId,
		envelope.signature,
	);
	if (!valid) throw ClearlineError.signatureInvalid(`Reply from ${peer.instanceId} has a bad signature`);
	return envelope;
}

export async function exchange<K extends RequestType>(
	ctx: BankContext,
	transfer: Pick<Transfer, "id">,
	peer: ResolvedInstance,
	type: K,
	payload: PayloadByType[K],
	options: ExchangeOptions,
): Promise<ExchangeResult> {
	const { retryBudget } = ctx.options.protocol;
	let lastError: unknown = null;

	for (let attempt = 0; attempt <= retryBudget; attempt++) {
		if (attempt > 0) {
			const delay = backoffDelay(ctx, attempt);
			ctx.logger.debug("Retrying protocol message", {
				transferId: transfer.id,
				type,
				attempt,
				delayMs: delay,
			});
			await ctx.sleep(delay);
		}
		if (options.honourCancel && (await cancelRequested(ctx, transfer.id))) {
			return { kind: "cancelled" };
		}

		const request = sealMessage(ctx.identity, type, transfer.id, payload);
		let raw: unknown;
		try {
			raw = await ctx.transport.send(peer.address, request, { timeoutMs: options.timeoutMs });
		} catch (error) {
			lastError = error;
			if (error instanceof ClearlineError && error.code !== "REMOTE_UNREACHABLE") {
				ctx.logger.warn("Participant rejected protocol message", {
					transferId: transfer.id,
					type,
					peer: peer.instanceId,
					code: error.code,
					error: error.message,
				});
				return { kind: "rejected", error };
			}
			ctx.logger.warn("Protocol message not delivered", {
				transferId: transfer.id,
				type,
				peer: peer.instanceId,
				attempt,
				error: errorMessage(error),
			});
			continue;
		}

		try {
			return { kind: "reply", reply: acceptReply(raw, request, peer) };
		} catch (error) {
			lastError = error;
			ctx.logger.warn("Discarded invalid reply", {
				transferId: transfer.id,
				type,
				peer: peer.instanceId,
				nonce: request.nonce,
				code: error instanceof ClearlineError ? error.code : "INTERNAL",
				error: errorMessage(error),
			});
		}
	}

	return { kind: "exhausted", error: lastError };
}
