// =============================================================================
// CLEARLINE ADAPTER INTERFACE
// =============================================================================
// Storage contract for the ledger store and the registry. Managers only use
// the CRUD methods plus `transaction` and `advisoryLock`; every state change
// runs inside a transaction holding the advisory lock of the entity it touches.

export interface Where {
	field: string;
	operator: WhereOperator;
	value: unknown;
}

export type WhereOperator =
	| "eq"
	| "ne"
	| "gt"
	| "gte"
	| "lt"
	| "lte"
	| "in"
	| "is_null"
	| "is_not_null";

export interface SortBy {
	field: string;
	direction: "asc" | "desc";
}

/** Table names used by the bank and the registry. */
export const MODELS = {
	account: "account",
	accountEntry: "account_entry",
	transfer: "transfer",
	reservation: "reservation",
	participantDecision: "participant_decision",
	processedMessage: "processed_message",
	registryInstance: "registry_instance",
} as const;

export type ModelName = (typeof MODELS)[keyof typeof MODELS];

export interface ClearlineAdapter {
	id: string;

	create<T extends object>(data: { model: ModelName; data: T }): Promise<T>;

	findOne<T>(data: { model: ModelName; where: Where[]; forUpdate?: boolean }): Promise<T | null>;

	findMany<T>(data: {
		model: ModelName;
		where?: Where[];
		limit?: number;
		offset?: number;
		sortBy?: SortBy;
	}): Promise<T[]>;

	update<T>(data: {
		model: ModelName;
		where: Where[];
		update: Record<string, unknown>;
	}): Promise<T | null>;

	/** Returns the number of deleted rows. */
	delete(data: { model: ModelName; where: Where[] }): Promise<number>;

	count(data: { model: ModelName; where?: Where[] }): Promise<number>;

	transaction<T>(fn: (tx: ClearlineTransactionAdapter) => Promise<T>): Promise<T>;

	/** Transaction-scoped lock; released on commit or rollback. */
	advisoryLock(key: number): Promise<void>;

	options: ClearlineAdapterOptions;
}

export type ClearlineTransactionAdapter = Omit<ClearlineAdapter, "transaction">;

export interface ClearlineAdapterOptions {
	supportsAdvisoryLocks: boolean;
	supportsForUpdate: boolean;
	dialectName: "postgres" | "memory";
	/** PostgreSQL schema for table name qualification. Default: "public" */
	schema?: string;
}
