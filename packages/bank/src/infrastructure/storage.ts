// =============================================================================
// STORAGE BOUNDARY — Transactions and failure mapping for the ledger store
// =============================================================================
// Domain errors raised inside a transaction pass through untouched and roll it
// back. Anything else the adapter throws means storage is unavailable: the
// operation halts and STORAGE_UNAVAILABLE propagates to the caller.

import type { ClearlineAdapter, ClearlineTransactionAdapter } from "@clearline/core";
import { ClearlineError, errorMessage } from "@clearline/core";
import type { BankContext } from "../context/context.js";

type StorageContext = Pick<BankContext, "adapter" | "logger">;

function toStorageError(ctx: StorageContext, operation: string, error: unknown): ClearlineError {
	if (error instanceof ClearlineError) return error;
	ctx.logger.error("Ledger storage failure", { operation, error: errorMessage(error) });
	return ClearlineError.storageUnavailable(`Ledger storage failed during ${operation}`, error);
}

/** Run `fn` in one adapter transaction. */
export async function withTransaction<T>(
	ctx: StorageContext,
	operation: string,
	fn: (tx: ClearlineTransactionAdapter) => Promise<T>,
): Promise<T> {
	try {
		return await ctx.adapter.transaction(fn);
	} catch (error) {
		throw toStorageError(ctx, operation, error);
	}
}

/** Run a read outside a transaction. */
export async function withStorage<T>(
	ctx: StorageContext,
	operation: string,
	fn: (adapter: ClearlineAdapter) => Promise<T>,
): Promise<T> {
	try {
		return await fn(ctx.adapter);
	} catch (error) {
		throw toStorageError(ctx, operation, error);
	}
}
