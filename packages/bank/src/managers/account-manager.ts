// =============================================================================
// ACCOUNT MANAGER -- Local accounts and their transaction log
// =============================================================================
// Every balance mutation bumps the account version and writes exactly one
// entry. Mutations take the account's advisory lock inside the caller's
// transaction.

import type {
	Account,
	AccountBalance,
	AccountEntry,
	AccountStatus,
	ClearlineTransactionAdapter,
	PaginatedResult,
	PaginationParams,
	Where,
} from "@clearline/core";
import {
	ClearlineError,
	generateAccountNumber,
	generateId,
	isUuid,
	lockKeys,
	MODELS,
	resolvePagination,
} from "@clearline/core";
import type { BankContext } from "../context/context.js";
import { nowIso } from "../context/context.js";
import { withStorage, withTransaction } from "../infrastructure/storage.js";

const ACCOUNT_NUMBER_ATTEMPTS = 5;

function validateAmount(ctx: BankContext, amount: number, allowZero = false): void {
	const min = allowZero ? 0 : 1;
	if (!Number.isInteger(amount) || amount < min || amount > ctx.options.protocol.maxTransferAmount) {
		throw ClearlineError.invalidArgument(
			`Amount must be a ${allowZero ? "non-negative" : "positive"} integer (in smallest currency units) and not exceed maximum limit`,
		);
	}
}

export function toBalance(account: Account): AccountBalance {
	return {
		accountId: account.id,
		balance: account.balance,
		reserved: account.reserved,
		pendingCredit: account.pendingCredit,
		available: account.balance - account.reserved,
		version: account.version,
	};
}

// =============================================================================
// READS
// =============================================================================

export async function findAccount(
	tx: Pick<ClearlineTransactionAdapter, "findOne">,
	accountId: string,
	forUpdate = false,
): Promise<Account | null> {
	// Ids are UUID columns; anything else cannot exist
	if (!isUuid(accountId)) return null;
	return tx.findOne<Account>({
		model: MODELS.account,
		where: [{ field: "id", operator: "eq", value: accountId }],
		forUpdate,
	});
}

export async function getAccount(ctx: BankContext, accountId: string): Promise<Account> {
	const account = await withStorage(ctx, "getAccount", (adapter) => findAccount(adapter, accountId));
	if (!account) throw ClearlineError.notFound(`Account ${accountId} not found`);
	return account;
}

export async function getAccountByNumber(ctx: BankContext, accountNumber: string): Promise<Account> {
	const account = await withStorage(ctx, "getAccountByNumber", (adapter) =>
		adapter.findOne<Account>({
			model: MODELS.account,
			where: [{ field: "accountNumber", operator: "eq", value: accountNumber }],
		}),
	);
	if (!account) throw ClearlineError.notFound(`Account number ${accountNumber} not found`);
	return account;
}

export async function getBalance(ctx: BankContext, accountId: string): Promise<AccountBalance> {
	return toBalance(await getAccount(ctx, accountId));
}

export async function listAccounts(
	ctx: BankContext,
	params: PaginationParams & { status?: AccountStatus; ownerId?: string } = {},
): Promise<PaginatedResult<Account>> {
	const { limit, offset } = resolvePagination(params);
	const where: Where[] = [];
	if (params.status) where.push({ field: "status", operator: "eq", value: params.status });
	if (params.ownerId) where.push({ field: "ownerId", operator: "eq", value: params.ownerId });

	return withStorage(ctx, "listAccounts", async (adapter) => {
		const [rows, total] = await Promise.all([
			adapter.findMany<Account>({
				model: MODELS.account,
				where,
				limit: limit + 1,
				offset,
				sortBy: { field: "createdAt", direction: "asc" },
			}),
			adapter.count({ model: MODELS.account, where }),
		]);
		return { data: rows.slice(0, limit), hasMore: rows.length > limit, total };
	});
}

export async function listEntries(
	ctx: BankContext,
	accountId: string,
	params: PaginationParams = {},
): Promise<PaginatedResult<AccountEntry>> {
	await getAccount(ctx, accountId);
	const { limit, offset } = resolvePagination(params);
	const where: Where[] = [{ field: "accountId", operator: "eq", value: accountId }];

	return withStorage(ctx, "listEntries", async (adapter) => {
		const [rows, total] = await Promise.all([
			adapter.findMany<AccountEntry>({
				model: MODELS.accountEntry,
				where,
				limit: limit + 1,
				offset,
				sortBy: { field: "createdAt", direction: "desc" },
			}),
			adapter.count({ model: MODELS.accountEntry, where }),
		]);
		return { data: rows.slice(0, limit), hasMore: rows.length > limit, total };
	});
}

// =============================================================================
// MUTATION PRIMITIVE
// =============================================================================

export interface BalanceDelta {
	balance?: number;
	reserved?: number;
	pendingCredit?: number;
}

/**
 * Apply `delta` to an account inside `tx`. Writes one entry when the settled
 * balance moves. Any field going negative is an invariant breach and aborts
 * the transaction.
 */
export async function mutateAccount(
	ctx: BankContext,
	tx: ClearlineTransactionAdapter,
	accountId: string,
	delta: BalanceDelta,
	entry?: { transferId: string | null; description: string },
): Promise<Account> {
	await tx.advisoryLock(lockKeys.account(accountId));
	const current = await findAccount(tx, accountId, true);
	if (!current) throw ClearlineError.notFound(`Account ${accountId} not found`);

	const balance = current.balance + (delta.balance ?? 0);
	const reserved = current.reserved + (delta.reserved ?? 0);
	const pendingCredit = current.pendingCredit + (delta.pendingCredit ?? 0);
	if (balance < 0 || reserved < 0 || pendingCredit < 0) {
		throw ClearlineError.internal(
			`Account ${accountId} would go negative (balance ${balance}, reserved ${reserved}, pendingCredit ${pendingCredit})`,
		);
	}

	const now = nowIso(ctx);
	const updated = await tx.update<Account>({
		model: MODELS.account,
		where: [
			{ field: "id", operator: "eq", value: accountId },
			{ field: "version", operator: "eq", value: current.version },
		],
		update: { balance, reserved, pendingCredit, version: current.version + 1, updatedAt: now },
	});
	if (!updated) {
		throw ClearlineError.conflict(`Account ${accountId} was modified concurrently`);
	}

	const amount = delta.balance ?? 0;
	if (entry && amount !== 0) {
		await tx.create<AccountEntry>({
			model: MODELS.accountEntry,
			data: {
				id: generateId(),
				accountId,
				transferId: entry.transferId,
				amount,
				description: entry.description,
				balanceAfter: balance,
				createdAt: now,
			},
		});
	}

	return updated;
}

// =============================================================================
// CREATE
// =============================================================================

export async function createAccount(
	ctx: BankContext,
	params: { ownerId: string; ownerName: string; initialDeposit?: number; status?: AccountStatus },
): Promise<Account> {
	const { ownerId, ownerName, initialDeposit = 0, status = "active" } = params;
	if (!ownerId.trim()) throw ClearlineError.invalidArgument("ownerId must not be empty");
	if (!ownerName.trim()) throw ClearlineError.invalidArgument("ownerName must not be empty");
	validateAmount(ctx, initialDeposit, true);

	const account = await withTransaction(ctx, "createAccount", async (tx) => {
		const accountNumber = await uniqueAccountNumber(tx);
		const now = nowIso(ctx);
		const created = await tx.create<Account>({
			model: MODELS.account,
			data: {
				id: generateId(),
				ownerId,
				ownerName,
				accountNumber,
				status,
				balance: 0,
				reserved: 0,
				pendingCredit: 0,
				version: 0,
				createdAt: now,
				updatedAt: now,
			},
		});
		if (initialDeposit === 0) return created;
		return mutateAccount(ctx, tx, created.id, { balance: initialDeposit }, {
			transferId: null,
			description: "Initial deposit",
		});
	});

	ctx.logger.info("Account created", { accountId: account.id, ownerId, initialDeposit });
	return account;
}

async function uniqueAccountNumber(tx: ClearlineTransactionAdapter): Promise<string> {
	for (let attempt = 0; attempt < ACCOUNT_NUMBER_ATTEMPTS; attempt++) {
		const candidate = generateAccountNumber();
		const taken = await tx.count({
			model: MODELS.account,
			where: [{ field: "accountNumber", operator: "eq", value: candidate }],
		});
		if (taken === 0) return candidate;
	}
	throw ClearlineError.internal("Could not allocate a unique account number");
}

// =============================================================================
// DEPOSIT & CANCEL
// =============================================================================

export async function deposit(
	ctx: BankContext,
	params: { accountId: string; amount: number; description?: string },
): Promise<Account> {
	validateAmount(ctx, params.amount);

	const account = await withTransaction(ctx, "deposit", async (tx) => {
		const current = await findAccount(tx, params.accountId);
		if (!current) throw ClearlineError.notFound(`Account ${params.accountId} not found`);
		if (current.status !== "active") {
			throw ClearlineError.accountInactive(`Account ${params.accountId} is ${current.status}`);
		}
		return mutateAccount(ctx, tx, params.accountId, { balance: params.amount }, {
			transferId: null,
			description: params.description ?? "Deposit",
		});
	});

	ctx.logger.info("Deposit applied", { accountId: account.id, amount: params.amount });
	return account;
}

/**
 * Cancel an account. Refused while it holds funds or has holds in either
 * direction, so that no transfer can be stranded against it.
 */
export async function cancelAccount(ctx: BankContext, accountId: string): Promise<Account> {
	const account = await withTransaction(ctx, "cancelAccount", async (tx) => {
		await tx.advisoryLock(lockKeys.account(accountId));
		const current = await findAccount(tx, accountId, true);
		if (!current) throw ClearlineError.notFound(`Account ${accountId} not found`);
		if (current.status === "canceled") return current;
		if (current.reserved > 0 || current.pendingCredit > 0) {
			throw ClearlineError.conflict(`Account ${accountId} has transfers in progress`);
		}
		if (current.balance > 0) {
			throw ClearlineError.conflict(`Account ${accountId} still holds a balance of ${current.balance}`);
		}
		const updated = await tx.update<Account>({
			model: MODELS.account,
			where: [{ field: "id", operator: "eq", value: accountId }],
			update: { status: "canceled", version: current.version + 1, updatedAt: nowIso(ctx) },
		});
		if (!updated) throw ClearlineError.notFound(`Account ${accountId} not found`);
		return updated;
	});

	ctx.logger.info("Account canceled", { accountId });
	return account;
}

// =============================================================================
// RESET (demo data)
// =============================================================================

const FIRST_NAMES = ["Ada", "Bruno", "Chiara", "Dmitri", "Elena", "Farid", "Grace", "Hugo", "Ines", "Jonas"];
const LAST_NAMES = ["Abara", "Becker", "Costa", "Duval", "Eklund", "Fischer", "Garcia", "Haddad", "Ito", "Jensen"];
const MAX_FAKE_DEPOSIT = 10_000_00;

function pick<T>(items: readonly T[], random: () => number): T {
	const item = items[Math.floor(random() * items.length)];
	if (item === undefined) throw ClearlineError.internal("pick from an empty list");
	return item;
}

/**
 * Wipe every local account along with the transfers, reservations, decisions
 * and processed messages that refer to them, then create `count` fake
 * accounts with random owners, statuses and initial deposits.
 */
export async function resetAccounts(
	ctx: BankContext,
	count: number,
	random: () => number = Math.random,
): Promise<Account[]> {
	if (!Number.isInteger(count) || count < 0) {
		throw ClearlineError.invalidArgument("count must be a non-negative integer");
	}

	await withTransaction(ctx, "resetAccounts", async (tx) => {
		await tx.delete({ model: MODELS.accountEntry, where: [] });
		await tx.delete({ model: MODELS.reservation, where: [] });
		await tx.delete({ model: MODELS.participantDecision, where: [] });
		await tx.delete({ model: MODELS.processedMessage, where: [] });
		await tx.delete({ model: MODELS.transfer, where: [] });
		await tx.delete({ model: MODELS.account, where: [] });
	});

	const accounts: Account[] = [];
	for (let i = 0; i < count; i++) {
		accounts.push(
			await createAccount(ctx, {
				ownerId: generateId(),
				ownerName: `${pick(FIRST_NAMES, random)} ${pick(LAST_NAMES, random)}`,
				initialDeposit: Math.floor(random() * MAX_FAKE_DEPOSIT),
				status: random() < 0.5 ? "active" : "canceled",
			}),
		);
	}

	ctx.logger.info("Accounts reset", { count });
	return accounts;
}
