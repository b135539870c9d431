// =============================================================================
// TRANSFER COORDINATOR -- Origin side of the two-phase commit
// =============================================================================
// INITIATED → PREPARED → COMMITTED | ABORTED. One protocol run per transfer
// at a time on this instance; a transfer left unfinished by a crash or an
// unreachable participant is picked up by `recoverTransfers`.

import type { AccountRef, Reservation, ResolvedInstance, Transfer } from "@clearline/core";
import { ClearlineError, errorMessage, generateId, isInstanceId, isUuid, lockKeys } from "@clearline/core";
import type { BankContext } from "../context/context.js";
import { withTransaction } from "../infrastructure/storage.js";
import { findAccount, getAccount, mutateAccount } from "../managers/account-manager.js";
import { applyReservation, reserveDebit } from "../managers/reservation-manager.js";
import {
	findTransfer,
	getTransfer,
	insertTransfer,
	listStaleTransfers,
	requestCancel,
	transitionTransfer,
} from "../managers/transfer-store.js";
import { exchange } from "./exchange.js";
import { abortLocally, commitLocally, notifyAbort } from "./outcomes.js";

const MAX_ACCOUNT_ID_LENGTH = 255;

export interface InitiateTransferParams {
	sourceAccountId: string;
	destination: AccountRef;
	amount: number;
	/** UUID; becomes the transfer id. Re-submitting it returns the same transfer. */
	idempotencyKey?: string;
}

// =============================================================================
// INITIATE
// =============================================================================

export async function initiateTransfer(
	ctx: BankContext,
	params: InitiateTransferParams,
): Promise<Transfer> {
	const { sourceAccountId, destination, amount, idempotencyKey } = params;

	if (!Number.isInteger(amount) || amount <= 0 || amount > ctx.options.protocol.maxTransferAmount) {
		throw ClearlineError.invalidArgument(
			"Amount must be a positive integer (in smallest currency units) and not exceed maximum limit",
		);
	}
	if (idempotencyKey !== undefined && !isUuid(idempotencyKey)) {
		throw ClearlineError.invalidArgument("idempotencyKey must be a UUID");
	}
	if (!destination.instanceId || !destination.accountId) {
		throw ClearlineError.invalidArgument("destination.instanceId and destination.accountId are required");
	}
	if (!isInstanceId(destination.instanceId)) {
		throw ClearlineError.invalidArgument(
			"destination.instanceId must be 2-64 letters, digits, '-' or '_', starting with a letter or digit",
		);
	}
	if (destination.accountId.length > MAX_ACCOUNT_ID_LENGTH) {
		throw ClearlineError.invalidArgument(
			`destination.accountId must be at most ${MAX_ACCOUNT_ID_LENGTH} characters`,
		);
	}

	const transferId = idempotencyKey ?? generateId();
	const fields = {
		id: transferId,
		sourceAccountId,
		destinationInstanceId: destination.instanceId,
		destinationAccountId: destination.accountId,
		amount,
	};

	if (idempotencyKey) {
		const existing = await findExisting(ctx, fields);
		if (existing) return existing;
	}

	const source = await getAccount(ctx, sourceAccountId);
	if (source.status !== "active") {
		throw ClearlineError.accountInactive(`Account ${sourceAccountId} is ${source.status}`);
	}

	if (destination.instanceId === ctx.options.instanceId) {
		return transferLocally(ctx, fields);
	}

	const started = await withTransaction(ctx, "initiateTransfer", async (tx) => {
		await tx.advisoryLock(lockKeys.transfer(transferId));
		const raced = await findTransfer(tx, transferId, true);
		if (raced) return { transfer: raced, run: false };

		const transfer = await insertTransfer(ctx, tx, fields);
		try {
			await reserveDebit(ctx, tx, { transferId, accountId: sourceAccountId, amount });
		} catch (error) {
			if (error instanceof ClearlineError && error.code === "INSUFFICIENT_FUNDS") {
				const aborted = await transitionTransfer(ctx, tx, transferId, "ABORTED", {
					failureReason: "INSUFFICIENT_FUNDS",
				});
				return { transfer: aborted, run: false };
			}
			throw error;
		}
		return { transfer, run: true };
	});

	if (!started.run) {
		assertSameFields(started.transfer, fields);
		return started.transfer;
	}
	return runProtocol(ctx, transferId, { fresh: true });
}

type TransferFields = Pick<
	Transfer,
	"id" | "sourceAccountId" | "destinationInstanceId" | "destinationAccountId" | "amount"
>;

function assertSameFields(existing: Transfer, requested: TransferFields): void {
	const mismatched = (
		["sourceAccountId", "destinationInstanceId", "destinationAccountId", "amount"] as const
	).filter((field) => existing[field] !== requested[field]);
	if (mismatched.length > 0) {
		throw ClearlineError.conflict(
			`Idempotency key ${requested.id} was already used with different ${mismatched.join(", ")}`,
		);
	}
}

async function findExisting(ctx: BankContext, fields: TransferFields): Promise<Transfer | null> {
	try {
		const existing = await getTransfer(ctx, fields.id);
		assertSameFields(existing, fields);
		return existing;
	} catch (error) {
		if (error instanceof ClearlineError && error.code === "NOT_FOUND") return null;
		throw error;
	}
}

/** Both accounts live here: reserve, debit and credit in one transaction. */
async function transferLocally(ctx: BankContext, fields: TransferFields): Promise<Transfer> {
	if (fields.sourceAccountId === fields.destinationAccountId) {
		throw ClearlineError.invalidArgument("Source and destination accounts must differ");
	}
	const destination = await getAccount(ctx, fields.destinationAccountId);
	if (destination.status !== "active") {
		throw ClearlineError.accountInactive(
			`Account ${fields.destinationAccountId} is ${destination.status}`,
		);
	}

	const transfer = await withTransaction(ctx, "transferLocally", async (tx) => {
		await tx.advisoryLock(lockKeys.transfer(fields.id));
		const raced = await findTransfer(tx, fields.id, true);
		if (raced) return raced;

		await insertTransfer(ctx, tx, fields);
		let hold: Reservation;
		try {
			hold = await reserveDebit(ctx, tx, {
				transferId: fields.id,
				accountId: fields.sourceAccountId,
				amount: fields.amount,
			});
		} catch (error) {
			if (error instanceof ClearlineError && error.code === "INSUFFICIENT_FUNDS") {
				return transitionTransfer(ctx, tx, fields.id, "ABORTED", {
					failureReason: "INSUFFICIENT_FUNDS",
				});
			}
			throw error;
		}

		const credited = await findAccount(tx, fields.destinationAccountId, true);
		if (credited?.status !== "active") {
			throw ClearlineError.accountInactive(`Account ${fields.destinationAccountId} is not active`);
		}
		await transitionTransfer(ctx, tx, fields.id, "PREPARED");
		await applyReservation(ctx, tx, hold);
		await mutateAccount(ctx, tx, fields.destinationAccountId, { balance: fields.amount }, {
			transferId: fields.id,
			description: "Transfer credit",
		});
		return transitionTransfer(ctx, tx, fields.id, "COMMITTED");
	});

	assertSameFields(transfer, fields);
	return transfer;
}

// =============================================================================
// PROTOCOL RUN
// =============================================================================

/**
 * Drive a transfer as far as it can go now. `fresh` is false when resuming
 * (cancellation, recovery): an earlier run may have reached the participant.
 */
async function runProtocol(
	ctx: BankContext,
	transferId: string,
	options: { fresh: boolean },
): Promise<Transfer> {
	if (ctx.activeRuns.has(transferId)) return getTransfer(ctx, transferId);
	ctx.activeRuns.add(transferId);
	try {
		let transfer = await getTransfer(ctx, transferId);
		if (transfer.status === "INITIATED") {
			transfer = await preparePhase(ctx, transfer, options);
		}
		if (transfer.status === "PREPARED") {
			transfer = await commitPhase(ctx, transfer);
		}
		return transfer;
	} finally {
		ctx.activeRuns.delete(transferId);
	}
}

async function resolvePeer(ctx: BankContext, transfer: Transfer): Promise<ResolvedInstance | null> {
	try {
		return await ctx.discovery.resolve(transfer.destinationInstanceId);
	} catch (error) {
		ctx.logger.warn("Destination instance could not be resolved", {
			transferId: transfer.id,
			destinationInstanceId: transfer.destinationInstanceId,
			code: error instanceof ClearlineError ? error.code : "INTERNAL",
			error: errorMessage(error),
		});
		return null;
	}
}

async function preparePhase(
	ctx: BankContext,
	transfer: Transfer,
	options: { fresh: boolean },
): Promise<Transfer> {
	const peer = await resolvePeer(ctx, transfer);

	if (transfer.cancelRequested) {
		if (peer && !options.fresh) await notifyAbort(ctx, transfer.id, peer, "CANCELLED");
		return abortLocally(ctx, transfer.id, "CANCELLED");
	}
	if (!peer) {
		return abortLocally(ctx, transfer.id, "REMOTE_UNREACHABLE");
	}

	const result = await exchange(
		ctx,
		transfer,
		peer,
		"PREPARE",
		{
			sourceAccountId: transfer.sourceAccountId,
			destinationInstanceId: transfer.destinationInstanceId,
			destinationAccountId: transfer.destinationAccountId,
			amount: transfer.amount,
		},
		{ timeoutMs: ctx.options.protocol.prepareTimeoutMs, honourCancel: true },
	);

	switch (result.kind) {
		case "reply": {
			const { reply } = result;
			const held = reply.payload.decision === "RESERVED" || reply.payload.decision === "APPLIED";
			if (reply.type === "ACK" && held) {
				return withTransaction(ctx, "prepareTransfer", (tx) =>
					transitionTransfer(ctx, tx, transfer.id, "PREPARED"),
				);
			}
			return abortLocally(ctx, transfer.id, "PREPARE_REJECTED", reply.payload.reason);
		}
		case "rejected":
			return abortLocally(ctx, transfer.id, "PREPARE_REJECTED", result.error.code);
		case "cancelled":
			await notifyAbort(ctx, transfer.id, peer, "CANCELLED");
			return abortLocally(ctx, transfer.id, "CANCELLED");
		case "exhausted":
			await notifyAbort(ctx, transfer.id, peer, "PREPARE_TIMEOUT");
			return abortLocally(ctx, transfer.id, "REMOTE_UNREACHABLE");
	}
}

async function commitPhase(ctx: BankContext, transfer: Transfer): Promise<Transfer> {
	const current = await getTransfer(ctx, transfer.id);
	const peer = await resolvePeer(ctx, current);
	if (!peer) {
		ctx.logger.warn("Transfer left in doubt", { transferId: current.id, status: current.status });
		return current;
	}

	if (current.cancelRequested) {
		return abortThroughPeer(ctx, current, peer, "CANCELLED");
	}

	const result = await exchange(ctx, current, peer, "COMMIT", {}, {
		timeoutMs: ctx.options.protocol.commitTimeoutMs,
	});

	if (result.kind === "reply") {
		const { reply } = result;
		if (reply.payload.decision === "APPLIED") {
			return commitLocally(ctx, current.id);
		}
		return abortLocally(ctx, current.id, "COMMIT_REJECTED", reply.payload.reason);
	}
	return resolveInDoubt(ctx, current, peer);
}

/**
 * Ask the participant what it decided. APPLIED commits; anything else is
 * turned into an ABORT whose reply settles the outcome. Without an answer the
 * transfer stays PREPARED.
 */
async function resolveInDoubt(
	ctx: BankContext,
	transfer: Transfer,
	peer: ResolvedInstance,
): Promise<Transfer> {
	const query = await exchange(ctx, transfer, peer, "QUERY", {}, {
		timeoutMs: ctx.options.protocol.commitTimeoutMs,
	});
	if (query.kind !== "reply") {
		ctx.logger.warn("Transfer left in doubt", { transferId: transfer.id, status: transfer.status });
		return getTransfer(ctx, transfer.id);
	}
	if (query.reply.payload.decision === "APPLIED") {
		return commitLocally(ctx, transfer.id);
	}
	const reason = transfer.cancelRequested ? "CANCELLED" : "RESOLVED_NOT_APPLIED";
	return abortThroughPeer(ctx, transfer, peer, reason);
}

/** Abort a PREPARED transfer once the participant confirms it released. */
async function abortThroughPeer(
	ctx: BankContext,
	transfer: Transfer,
	peer: ResolvedInstance,
	failureReason: "CANCELLED" | "RESOLVED_NOT_APPLIED",
): Promise<Transfer> {
	const result = await exchange(ctx, transfer, peer, "ABORT", { reason: failureReason }, {
		timeoutMs: ctx.options.protocol.commitTimeoutMs,
	});
	if (result.kind !== "reply") {
		ctx.logger.warn("Transfer left in doubt", { transferId: transfer.id, status: transfer.status });
		return getTransfer(ctx, transfer.id);
	}
	if (result.reply.payload.decision === "APPLIED") {
		return commitLocally(ctx, transfer.id);
	}
	return abortLocally(ctx, transfer.id, failureReason, result.reply.payload.reason);
}

// =============================================================================
// CANCEL & RECOVER
// =============================================================================

/**
 * Request cancellation. A running protocol honours it at its next
 * checkpoint; otherwise it is resolved here through the abort path.
 */
export async function cancelTransfer(ctx: BankContext, transferId: string): Promise<Transfer> {
	const transfer = await getTransfer(ctx, transferId);
	if (transfer.status === "COMMITTED") {
		throw ClearlineError.conflict(`Transfer ${transferId} is already committed`);
	}
	if (transfer.status === "ABORTED") return transfer;

	const flagged = await withTransaction(ctx, "cancelTransfer", (tx) => requestCancel(ctx, tx, transferId));
	if (ctx.activeRuns.has(transferId)) return flagged;
	return runProtocol(ctx, transferId, { fresh: false });
}

/**
 * Resume transfers nobody is driving that have not moved for
 * `recoveryAfterMs`: INITIATED ones are aborted, PREPARED ones resolved with
 * the participant.
 */
export async function recoverTransfers(ctx: BankContext): Promise<{ recovered: number }> {
	const cutoff = new Date(ctx.clock().getTime() - ctx.options.protocol.recoveryAfterMs).toISOString();
	const stale = await listStaleTransfers(ctx, cutoff);

	let recovered = 0;
	for (const transfer of stale) {
		if (ctx.activeRuns.has(transfer.id)) continue;
		ctx.activeRuns.add(transfer.id);
		try {
			const outcome = await recoverOne(ctx, transfer);
			if (outcome.status !== transfer.status) recovered++;
		} catch (error) {
			ctx.logger.error("Transfer recovery failed", {
				transferId: transfer.id,
				error: errorMessage(error),
			});
		} finally {
			ctx.activeRuns.delete(transfer.id);
		}
	}

	if (recovered > 0) {
		ctx.logger.info("Recovered transfers", { count: recovered });
	}
	return { recovered };
}

async function recoverOne(ctx: BankContext, transfer: Transfer): Promise<Transfer> {
	const peer = await resolvePeer(ctx, transfer);
	if (transfer.status === "INITIATED") {
		if (peer) await notifyAbort(ctx, transfer.id, peer, "RECOVERY");
		return abortLocally(ctx, transfer.id, transfer.cancelRequested ? "CANCELLED" : "REMOTE_UNREACHABLE");
	}
	if (!peer) return transfer;
	return resolveInDoubt(ctx, transfer, peer);
}
