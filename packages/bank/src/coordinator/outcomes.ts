// =============================================================================
// LOCAL OUTCOMES -- Settle the coordinator's side of a transfer
// =============================================================================
// The local debit is applied only after the participant confirmed it applied
// the credit; every other outcome releases the hold.

import type { ResolvedInstance, Transfer, TransferFailureReason } from "@clearline/core";
import { ClearlineError, errorMessage, lockKeys, TERMINAL_TRANSFER_STATUSES } from "@clearline/core";
import type { BankContext } from "../context/context.js";
import { withTransaction } from "../infrastructure/storage.js";
import {
	applyReservation,
	findReservation,
	releaseReservation,
} from "../managers/reservation-manager.js";
import { findTransfer, transitionTransfer } from "../managers/transfer-store.js";
import { sealMessage } from "../protocol/messages.js";

/** Apply the debit hold and mark the transfer COMMITTED, in one transaction. */
export async function commitLocally(ctx: BankContext, transferId: string): Promise<Transfer> {
	return withTransaction(ctx, "commitTransfer", async (tx) => {
		await tx.advisoryLock(lockKeys.transfer(transferId));
		const current = await findTransfer(tx, transferId, true);
		if (!current) throw ClearlineError.notFound(`Transfer ${transferId} not found`);
		if (current.status === "COMMITTED") return current;

		const hold = await findReservation(tx, transferId, "debit");
		if (hold?.status !== "held") {
			throw ClearlineError.internal(
				`Transfer ${transferId} has no held debit reservation to apply (found ${hold?.status ?? "none"})`,
			);
		}
		await applyReservation(ctx, tx, hold);
		return transitionTransfer(ctx, tx, transferId, "COMMITTED");
	});
}

/** Release the debit hold and mark the transfer ABORTED. Terminal transfers are returned as is. */
export async function abortLocally(
	ctx: BankContext,
	transferId: string,
	failureReason: TransferFailureReason,
	remoteReason?: string,
): Promise<Transfer> {
	return withTransaction(ctx, "abortTransfer", async (tx) => {
		await tx.advisoryLock(lockKeys.transfer(transferId));
		const current = await findTransfer(tx, transferId, true);
		if (!current) throw ClearlineError.notFound(`Transfer ${transferId} not found`);
		if (TERMINAL_TRANSFER_STATUSES.has(current.status)) return current;

		const hold = await findReservation(tx, transferId, "debit");
		if (hold?.status === "held") {
			await releaseReservation(ctx, tx, hold);
		}
		return transitionTransfer(ctx, tx, transferId, "ABORTED", {
			failureReason,
			remoteReason: remoteReason ?? null,
		});
	});
}

/**
 * One unretried ABORT. The participant's reservation expiry covers the case
 * where it never arrives.
 */
export async function notifyAbort(
	ctx: BankContext,
	transferId: string,
	peer: ResolvedInstance,
	reason: string,
): Promise<void> {
	const envelope = sealMessage(ctx.identity, "ABORT", transferId, { reason });
	try {
		await ctx.transport.send(peer.address, envelope, {
			timeoutMs: ctx.options.protocol.commitTimeoutMs,
		});
	} catch (error) {
		ctx.logger.warn("Best-effort ABORT not delivered", {
			transferId,
			peer: peer.instanceId,
			error: errorMessage(error),
		});
	}
}
