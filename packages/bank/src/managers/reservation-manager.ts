// =============================================================================
// RESERVATION MANAGER -- Holds against local accounts pending a decision
// =============================================================================
// A debit reservation holds `reserved` on the source account (coordinator
// side); a credit reservation holds `pendingCredit` on the destination account
// (participant side). At most one reservation exists per (transfer, direction).

import type {
	ClearlineTransactionAdapter,
	Reservation,
	ReservationDirection,
} from "@clearline/core";
import { ClearlineError, errorMessage, generateId, lockKeys, MODELS } from "@clearline/core";
import type { BankContext } from "../context/context.js";
import { nowIso } from "../context/context.js";
import { withStorage, withTransaction } from "../infrastructure/storage.js";
import { findAccount, mutateAccount } from "./account-manager.js";

export async function findReservation(
	tx: Pick<ClearlineTransactionAdapter, "findOne">,
	transferId: string,
	direction: ReservationDirection,
): Promise<Reservation | null> {
	return tx.findOne<Reservation>({
		model: MODELS.reservation,
		where: [
			{ field: "transferId", operator: "eq", value: transferId },
			{ field: "direction", operator: "eq", value: direction },
		],
	});
}

export async function getReservation(
	ctx: BankContext,
	transferId: string,
	direction: ReservationDirection,
): Promise<Reservation | null> {
	return withStorage(ctx, "getReservation", (adapter) =>
		findReservation(adapter, transferId, direction),
	);
}

async function requireActiveAccount(tx: ClearlineTransactionAdapter, accountId: string) {
	await tx.advisoryLock(lockKeys.account(accountId));
	const account = await findAccount(tx, accountId, true);
	if (!account) throw ClearlineError.notFound(`Account ${accountId} not found`);
	if (account.status !== "active") {
		throw ClearlineError.accountInactive(`Account ${accountId} is ${account.status}`);
	}
	return account;
}

async function insertReservation(
	ctx: BankContext,
	tx: ClearlineTransactionAdapter,
	params: {
		transferId: string;
		accountId: string;
		direction: ReservationDirection;
		amount: number;
		expiresAt: string | null;
	},
): Promise<Reservation> {
	const now = nowIso(ctx);
	return tx.create<Reservation>({
		model: MODELS.reservation,
		data: { id: generateId(), ...params, status: "held", createdAt: now, updatedAt: now },
	});
}

// =============================================================================
// RESERVE
// =============================================================================

/**
 * Hold `amount` of the source account's available balance. Fails with
 * INSUFFICIENT_FUNDS before writing anything, so the caller may catch it and
 * carry on in the same transaction. Re-reserving the same transfer returns the
 * existing hold.
 */
export async function reserveDebit(
	ctx: BankContext,
	tx: ClearlineTransactionAdapter,
	params: { transferId: string; accountId: string; amount: number },
): Promise<Reservation> {
	const account = await requireActiveAccount(tx, params.accountId);

	const existing = await findReservation(tx, params.transferId, "debit");
	if (existing) {
		if (existing.status === "held") return existing;
		throw ClearlineError.conflict(`Debit reservation for transfer ${params.transferId} is ${existing.status}`);
	}

	const available = account.balance - account.reserved;
	if (available < params.amount) {
		throw ClearlineError.insufficientFunds(
			`Insufficient funds: available ${available}, requested ${params.amount}`,
			{ accountId: params.accountId, available, requested: params.amount },
		);
	}

	await mutateAccount(ctx, tx, params.accountId, { reserved: params.amount });
	return insertReservation(ctx, tx, { ...params, direction: "debit", expiresAt: null });
}

/** Hold an incoming credit. Never fails on balance grounds. */
export async function reserveCredit(
	ctx: BankContext,
	tx: ClearlineTransactionAdapter,
	params: { transferId: string; accountId: string; amount: number; expiresAt: string },
): Promise<Reservation> {
	await requireActiveAccount(tx, params.accountId);

	const existing = await findReservation(tx, params.transferId, "credit");
	if (existing) {
		if (existing.status === "held") return existing;
		throw ClearlineError.conflict(`Credit reservation for transfer ${params.transferId} is ${existing.status}`);
	}

	await mutateAccount(ctx, tx, params.accountId, { pendingCredit: params.amount });
	return insertReservation(ctx, tx, { ...params, direction: "credit" });
}

// =============================================================================
// APPLY / RELEASE
// =============================================================================

async function settle(
	ctx: BankContext,
	tx: ClearlineTransactionAdapter,
	reservation: Reservation,
	status: "applied" | "released" | "expired",
): Promise<Reservation> {
	const updated = await tx.update<Reservation>({
		model: MODELS.reservation,
		where: [
			{ field: "id", operator: "eq", value: reservation.id },
			{ field: "status", operator: "eq", value: "held" },
		],
		update: { status, updatedAt: nowIso(ctx) },
	});
	if (!updated) {
		throw ClearlineError.illegalTransition(
			`Reservation ${reservation.id} is no longer held, cannot mark ${status}`,
		);
	}
	return updated;
}

/** Turn a held reservation into a settled balance movement. */
export async function applyReservation(
	ctx: BankContext,
	tx: ClearlineTransactionAdapter,
	reservation: Reservation,
): Promise<Reservation> {
	const { amount, accountId, transferId } = reservation;
	const applied = await settle(ctx, tx, reservation, "applied");
	if (reservation.direction === "debit") {
		await mutateAccount(ctx, tx, accountId, { balance: -amount, reserved: -amount }, {
			transferId,
			description: "Transfer debit",
		});
	} else {
		await mutateAccount(ctx, tx, accountId, { balance: amount, pendingCredit: -amount }, {
			transferId,
			description: "Transfer credit",
		});
	}
	return applied;
}

/** Drop a held reservation, returning the account to its pre-reservation state. */
export async function releaseReservation(
	ctx: BankContext,
	tx: ClearlineTransactionAdapter,
	reservation: Reservation,
	reason: "released" | "expired" = "released",
): Promise<Reservation> {
	const released = await settle(ctx, tx, reservation, reason);
	const delta =
		reservation.direction === "debit"
			? { reserved: -reservation.amount }
			: { pendingCredit: -reservation.amount };
	await mutateAccount(ctx, tx, reservation.accountId, delta);
	return released;
}

// =============================================================================
// EXPIRY SWEEP
// =============================================================================

/**
 * Release every held credit reservation whose deadline has passed. Each one
 * is settled in its own transaction under the transfer's lock; `onExpired`
 * runs inside that transaction.
 */
export async function expireReservations(
	ctx: BankContext,
	onExpired?: (tx: ClearlineTransactionAdapter, reservation: Reservation) => Promise<void>,
): Promise<{ expired: number }> {
	const now = nowIso(ctx);
	const candidates = await withStorage(ctx, "expireReservations", (adapter) =>
		adapter.findMany<Reservation>({
			model: MODELS.reservation,
			where: [
				{ field: "status", operator: "eq", value: "held" },
				{ field: "direction", operator: "eq", value: "credit" },
				{ field: "expiresAt", operator: "lte", value: now },
			],
			sortBy: { field: "expiresAt", direction: "asc" },
		}),
	);

	let expired = 0;
	for (const candidate of candidates) {
		try {
			const released = await ctx.participantLocks.run(candidate.transferId, () =>
				withTransaction(ctx, "expireReservation", async (tx) => {
					await tx.advisoryLock(lockKeys.transfer(candidate.transferId));
					const current = await findReservation(tx, candidate.transferId, "credit");
					if (current?.status !== "held" || current.expiresAt === null || current.expiresAt > now) {
						return false;
					}
					await releaseReservation(ctx, tx, current, "expired");
					await onExpired?.(tx, current);
					return true;
				}),
			);
			if (released) expired++;
		} catch (error) {
			ctx.logger.error("Failed to expire reservation", {
				reservationId: candidate.id,
				transferId: candidate.transferId,
				error: errorMessage(error),
			});
		}
	}

	if (expired > 0) {
		ctx.logger.info("Expired credit reservations", { count: expired });
	}
	return { expired };
}
