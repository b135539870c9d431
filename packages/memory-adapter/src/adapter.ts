// =============================================================================
// MEMORY ADAPTER — ClearlineAdapter implementation backed by in-memory Maps
// =============================================================================
// For tests and single-process demos. Data is stored in nested Maps:
// model name -> record id -> record data.
//
// Transactions run one at a time, which stands in for advisory locks: a
// transaction sees no interleaved writes from another transaction, and a
// failed one is rolled back to its snapshot. Writes made outside a
// transaction while one is running are lost if it rolls back.

import { randomUUID } from "node:crypto";
import type {
	ClearlineAdapter,
	ClearlineAdapterOptions,
	ClearlineTransactionAdapter,
	ModelName,
	SortBy,
	Where,
} from "@clearline/core/db";

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

type StoredRecord = Record<string, unknown>;
type Store = Map<string, Map<string, StoredRecord>>;

const OPTIONS: ClearlineAdapterOptions = {
	supportsAdvisoryLocks: false,
	supportsForUpdate: false,
	dialectName: "memory",
};

/**
 * Deep clone a store for rollback. Nested values (JSON columns) are cloned too
 * so that a rolled-back transaction cannot leak mutations.
 */
function cloneStore(store: Store): Store {
	const clone: Store = new Map();
	for (const [model, records] of store) {
		const recordClone = new Map<string, StoredRecord>();
		for (const [id, record] of records) {
			recordClone.set(id, structuredClone(record));
		}
		clone.set(model, recordClone);
	}
	return clone;
}

function getModelStore(store: Store, model: string): Map<string, StoredRecord> {
	let modelStore = store.get(model);
	if (!modelStore) {
		modelStore = new Map();
		store.set(model, modelStore);
	}
	return modelStore;
}

/** Ordering over the scalar types stored in columns. Null when incomparable. */
function compare(a: unknown, b: unknown): number | null {
	if (typeof a === "number" && typeof b === "number") return a - b;
	if (typeof a === "string" && typeof b === "string") return a < b ? -1 : a > b ? 1 : 0;
	return null;
}

function matchesCondition(record: StoredRecord, condition: Where): boolean {
	const value = record[condition.field];

	switch (condition.operator) {
		case "eq":
			return value === condition.value;
		case "ne":
			return value !== condition.value;
		case "gt":
			return (compare(value, condition.value) ?? 0) > 0;
		case "gte": {
			const c = compare(value, condition.value);
			return c !== null && c >= 0;
		}
		case "lt":
			return (compare(value, condition.value) ?? 0) < 0;
		case "lte": {
			const c = compare(value, condition.value);
			return c !== null && c <= 0;
		}
		case "in":
			return Array.isArray(condition.value) && condition.value.includes(value);
		case "is_null":
			return value === null || value === undefined;
		case "is_not_null":
			return value !== null && value !== undefined;
		default:
			return false;
	}
}

/** All conditions must match (AND). Results keep insertion order. */
function filterRecords(records: Map<string, StoredRecord>, where: Where[]): StoredRecord[] {
	const results: StoredRecord[] = [];
	for (const record of records.values()) {
		if (where.every((w) => matchesCondition(record, w))) {
			results.push(record);
		}
	}
	return results;
}

function sortRecords(records: StoredRecord[], sortBy: SortBy): StoredRecord[] {
	return [...records].sort((a, b) => {
		const aVal = a[sortBy.field];
		const bVal = b[sortBy.field];

		if (aVal === bVal) return 0;
		if (aVal === null || aVal === undefined) return 1;
		if (bVal === null || bVal === undefined) return -1;

		const comparison = compare(aVal, bVal) ?? 0;
		return sortBy.direction === "desc" ? -comparison : comparison;
	});
}

function recordId(record: StoredRecord): string {
	const id = record.id;
	return typeof id === "string" ? id : String(id);
}

// Records are plain JSON-like objects; the model's row type is the caller's contract.
function toRow<T>(record: StoredRecord): T {
	return structuredClone(record) as T;
}

// =============================================================================
// ADAPTER METHODS BUILDER
// =============================================================================

/** `getStore` is a closure so that a rollback can swap the store. */
function buildAdapterMethods(
	getStore: () => Store,
): Omit<ClearlineTransactionAdapter, "id" | "options"> {
	return {
		create: async <T extends object>({ model, data }: { model: ModelName; data: T }): Promise<T> => {
			const modelStore = getModelStore(getStore(), model);

			const record: StoredRecord = structuredClone(Object.fromEntries(Object.entries(data)));
			if (record.id === undefined || record.id === null || record.id === "") {
				record.id = randomUUID();
			}
			const id = recordId(record);
			if (modelStore.has(id)) {
				throw new Error(`Duplicate key "${id}" in ${model}`);
			}

			modelStore.set(id, record);
			return toRow<T>(record);
		},

		findOne: async <T>({
			model,
			where,
		}: {
			model: ModelName;
			where: Where[];
			forUpdate?: boolean;
		}): Promise<T | null> => {
			const modelStore = getStore().get(model);
			if (!modelStore) return null;

			const first = filterRecords(modelStore, where)[0];
			if (!first) return null;
			return toRow<T>(first);
		},

		findMany: async <T>({
			model,
			where,
			limit,
			offset,
			sortBy,
		}: {
			model: ModelName;
			where?: Where[];
			limit?: number;
			offset?: number;
			sortBy?: SortBy;
		}): Promise<T[]> => {
			const modelStore = getStore().get(model);
			if (!modelStore) return [];

			let results = filterRecords(modelStore, where ?? []);

			if (sortBy) {
				results = sortRecords(results, sortBy);
			}

			if (offset !== undefined) {
				results = results.slice(offset);
			}

			if (limit !== undefined) {
				results = results.slice(0, limit);
			}

			return results.map((r) => toRow<T>(r));
		},

		update: async <T>({
			model,
			where,
			update: updateData,
		}: {
			model: ModelName;
			where: Where[];
			update: Record<string, unknown>;
		}): Promise<T | null> => {
			const modelStore = getStore().get(model);
			if (!modelStore) return null;

			const first = filterRecords(modelStore, where)[0];
			if (!first) return null;

			const changes: StoredRecord = {};
			for (const [key, value] of Object.entries(updateData)) {
				if (value !== undefined) changes[key] = structuredClone(value);
			}
			const updated = { ...first, ...changes };
			modelStore.set(recordId(first), updated);
			return toRow<T>(updated);
		},

		delete: async ({ model, where }: { model: ModelName; where: Where[] }): Promise<number> => {
			const modelStore = getStore().get(model);
			if (!modelStore) return 0;

			const matches = filterRecords(modelStore, where);
			for (const match of matches) {
				modelStore.delete(recordId(match));
			}
			return matches.length;
		},

		count: async ({ model, where }: { model: ModelName; where?: Where[] }): Promise<number> => {
			const modelStore = getStore().get(model);
			if (!modelStore) return 0;

			if (!where || where.length === 0) {
				return modelStore.size;
			}

			return filterRecords(modelStore, where).length;
		},

		advisoryLock: async (_key: number): Promise<void> => {
			// Transactions are already serialized
		},
	};
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Create a ClearlineAdapter backed by an in-memory store.
 *
 * @example
 * ```ts
 * import { memoryAdapter } from "@clearline/memory-adapter";
 * import { createBank } from "@clearline/bank";
 *
 * const bank = createBank({ instanceId: "BANKAA01", database: memoryAdapter(), ... });
 * ```
 */
export function memoryAdapter(): ClearlineAdapter {
	let store: Store = new Map();
	let queue: Promise<void> = Promise.resolve();
	const options: ClearlineAdapterOptions = { ...OPTIONS };

	const getStore = () => store;
	const methods = buildAdapterMethods(getStore);

	return {
		id: "memory",
		...methods,

		transaction: async <T>(fn: (tx: ClearlineTransactionAdapter) => Promise<T>): Promise<T> => {
			const previous = queue;
			let release: () => void = () => {};
			queue = new Promise<void>((resolve) => {
				release = resolve;
			});

			await previous;
			const snapshot = cloneStore(store);
			try {
				const txAdapter: ClearlineTransactionAdapter = {
					id: "memory",
					...methods,
					options,
				};
				return await fn(txAdapter);
			} catch (error) {
				store = snapshot;
				throw error;
			} finally {
				release();
			}
		},

		options,
	};
}
