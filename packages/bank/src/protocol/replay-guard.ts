// =============================================================================
// REPLAY GUARD -- Remembers processed (sender, nonce, transfer) triples
// =============================================================================
// A triple seen again with the same digest is a harmless re-delivery and gets
// the recorded reply back. The same triple with a different digest is a replay.

import type {
	ClearlineTransactionAdapter,
	ProcessedMessage,
	ReplyEnvelope,
	RequestEnvelope,
} from "@clearline/core";
import { ClearlineError, MODELS } from "@clearline/core";
import type { BankContext } from "../context/context.js";
import { nowIso } from "../context/context.js";
import { withStorage } from "../infrastructure/storage.js";

export function replayKey(envelope: Pick<RequestEnvelope, "senderId" | "nonce" | "transferId">): string {
	return `${envelope.senderId}:${envelope.nonce}:${envelope.transferId}`;
}

/**
 * Look up the triple of `envelope`. Returns the recorded reply for a
 * re-delivery, null for a new message, and throws REPLAY_DETECTED otherwise.
 */
export async function checkReplay(
	tx: Pick<ClearlineTransactionAdapter, "findOne">,
	envelope: RequestEnvelope,
	digest: string,
): Promise<ReplyEnvelope | null> {
	const seen = await tx.findOne<ProcessedMessage>({
		model: MODELS.processedMessage,
		where: [{ field: "id", operator: "eq", value: replayKey(envelope) }],
	});
	if (!seen) return null;
	if (seen.digest === digest) return seen.reply;
	throw ClearlineError.replayDetected(
		`Nonce ${envelope.nonce} from ${envelope.senderId} was already used for transfer ${envelope.transferId}`,
	);
}

export async function recordProcessed(
	ctx: BankContext,
	tx: ClearlineTransactionAdapter,
	envelope: RequestEnvelope,
	digest: string,
	reply: ReplyEnvelope,
): Promise<void> {
	const now = ctx.clock();
	await tx.create<ProcessedMessage>({
		model: MODELS.processedMessage,
		data: {
			id: replayKey(envelope),
			senderId: envelope.senderId,
			nonce: envelope.nonce,
			transferId: envelope.transferId,
			digest,
			reply,
			expiresAt: new Date(now.getTime() + ctx.options.protocol.replayWindowMs).toISOString(),
			createdAt: now.toISOString(),
		},
	});
}

/** Forget triples older than the replay window. */
export async function cleanupProcessedMessages(ctx: BankContext): Promise<{ deleted: number }> {
	const deleted = await withStorage(ctx, "cleanupProcessedMessages", (adapter) =>
		adapter.delete({
			model: MODELS.processedMessage,
			where: [{ field: "expiresAt", operator: "lt", value: nowIso(ctx) }],
		}),
	);
	if (deleted > 0) {
		ctx.logger.info("Cleaned processed protocol messages", { count: deleted });
	}
	return { deleted };
}
