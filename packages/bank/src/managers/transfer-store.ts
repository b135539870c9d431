// =============================================================================
// TRANSFER STORE -- Coordinator-side transfer records and their state machine
// =============================================================================

import type {
	ClearlineTransactionAdapter,
	PaginatedResult,
	PaginationParams,
	Transfer,
	TransferFailureReason,
	TransferStatus,
	Where,
} from "@clearline/core";
import {
	ClearlineError,
	isUuid,
	lockKeys,
	MODELS,
	resolvePagination,
	TERMINAL_TRANSFER_STATUSES,
	TRANSFER_TRANSITIONS,
} from "@clearline/core";
import type { BankContext } from "../context/context.js";
import { nowIso } from "../context/context.js";
import { withStorage } from "../infrastructure/storage.js";

export async function findTransfer(
	tx: Pick<ClearlineTransactionAdapter, "findOne">,
	transferId: string,
	forUpdate = false,
): Promise<Transfer | null> {
	if (!isUuid(transferId)) return null;
	return tx.findOne<Transfer>({
		model: MODELS.transfer,
		where: [{ field: "id", operator: "eq", value: transferId }],
		forUpdate,
	});
}

export async function getTransfer(ctx: BankContext, transferId: string): Promise<Transfer> {
	const transfer = await withStorage(ctx, "getTransfer", (adapter) => findTransfer(adapter, transferId));
	if (!transfer) throw ClearlineError.notFound(`Transfer ${transferId} not found`);
	return transfer;
}

export async function listTransfers(
	ctx: BankContext,
	params: PaginationParams & { status?: TransferStatus; sourceAccountId?: string } = {},
): Promise<PaginatedResult<Transfer>> {
	const { limit, offset } = resolvePagination(params);
	const where: Where[] = [];
	if (params.status) where.push({ field: "status", operator: "eq", value: params.status });
	if (params.sourceAccountId) {
		where.push({ field: "sourceAccountId", operator: "eq", value: params.sourceAccountId });
	}

	return withStorage(ctx, "listTransfers", async (adapter) => {
		const [rows, total] = await Promise.all([
			adapter.findMany<Transfer>({
				model: MODELS.transfer,
				where,
				limit: limit + 1,
				offset,
				sortBy: { field: "createdAt", direction: "desc" },
			}),
			adapter.count({ model: MODELS.transfer, where }),
		]);
		return { data: rows.slice(0, limit), hasMore: rows.length > limit, total };
	});
}

/** Unfinished transfers last touched at or before `cutoff`. */
export async function listStaleTransfers(ctx: BankContext, cutoff: string): Promise<Transfer[]> {
	return withStorage(ctx, "listStaleTransfers", (adapter) =>
		adapter.findMany<Transfer>({
			model: MODELS.transfer,
			where: [
				{ field: "status", operator: "in", value: ["INITIATED", "PREPARED"] },
				{ field: "updatedAt", operator: "lte", value: cutoff },
			],
			sortBy: { field: "updatedAt", direction: "asc" },
			limit: 100,
		}),
	);
}

export async function insertTransfer(
	ctx: BankContext,
	tx: ClearlineTransactionAdapter,
	params: Pick<
		Transfer,
		"id" | "destinationInstanceId" | "sourceAccountId" | "destinationAccountId" | "amount"
	>,
): Promise<Transfer> {
	const now = nowIso(ctx);
	const transfer = await tx.create<Transfer>({
		model: MODELS.transfer,
		data: {
			...params,
			originInstanceId: ctx.options.instanceId,
			status: "INITIATED",
			failureReason: null,
			remoteReason: null,
			cancelRequested: false,
			version: 0,
			createdAt: now,
			updatedAt: now,
		},
	});
	ctx.logger.info("Transfer initiated", {
		transferId: transfer.id,
		destinationInstanceId: transfer.destinationInstanceId,
		amount: transfer.amount,
	});
	return transfer;
}

/**
 * Move a transfer along INITIATED → PREPARED → COMMITTED | ABORTED. Terminal
 * transfers reject every transition with ILLEGAL_TRANSITION.
 */
export async function transitionTransfer(
	ctx: BankContext,
	tx: ClearlineTransactionAdapter,
	transferId: string,
	to: TransferStatus,
	patch: { failureReason?: TransferFailureReason; remoteReason?: string | null } = {},
): Promise<Transfer> {
	await tx.advisoryLock(lockKeys.transfer(transferId));
	const current = await findTransfer(tx, transferId, true);
	if (!current) throw ClearlineError.notFound(`Transfer ${transferId} not found`);

	if (!TRANSFER_TRANSITIONS[current.status].includes(to)) {
		throw ClearlineError.illegalTransition(
			`Transfer ${transferId} cannot move from ${current.status} to ${to}`,
		);
	}

	const updated = await tx.update<Transfer>({
		model: MODELS.transfer,
		where: [
			{ field: "id", operator: "eq", value: transferId },
			{ field: "version", operator: "eq", value: current.version },
		],
		update: {
			status: to,
			failureReason: patch.failureReason ?? current.failureReason,
			remoteReason: patch.remoteReason ?? current.remoteReason,
			version: current.version + 1,
			updatedAt: nowIso(ctx),
		},
	});
	if (!updated) throw ClearlineError.conflict(`Transfer ${transferId} was modified concurrently`);

	ctx.logger.info("Transfer state changed", {
		transferId,
		from: current.status,
		to,
		...(updated.failureReason ? { failureReason: updated.failureReason } : {}),
	});
	return updated;
}

/** Flag a transfer for cancellation. Terminal transfers are returned unchanged. */
export async function requestCancel(
	ctx: BankContext,
	tx: ClearlineTransactionAdapter,
	transferId: string,
): Promise<Transfer> {
	await tx.advisoryLock(lockKeys.transfer(transferId));
	const current = await findTransfer(tx, transferId, true);
	if (!current) throw ClearlineError.notFound(`Transfer ${transferId} not found`);
	if (TERMINAL_TRANSFER_STATUSES.has(current.status) || current.cancelRequested) return current;

	const updated = await tx.update<Transfer>({
		model: MODELS.transfer,
		where: [{ field: "id", operator: "eq", value: transferId }],
		update: { cancelRequested: true, version: current.version + 1, updatedAt: nowIso(ctx) },
	});
	if (!updated) throw ClearlineError.notFound(`Transfer ${transferId} not found`);
	ctx.logger.info("Transfer cancellation requested", { transferId, status: updated.status });
	return updated;
}
