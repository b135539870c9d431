// =============================================================================
// DRIZZLE ADAPTER — ClearlineAdapter implementation backed by Drizzle ORM
// =============================================================================
// Uses raw SQL via drizzle-orm's `sql` template for all operations. The
// statements come from the shared SQL builder in @clearline/core; this file
// only turns `$N` placeholders into drizzle parameters and runs them.

import {
	buildSqlAdapterMethods,
	type ClearlineAdapter,
	type ClearlineAdapterOptions,
	type ClearlineTransactionAdapter,
	type SqlExecutor,
} from "@clearline/core/db";
import { type SQL, sql } from "drizzle-orm";

// =============================================================================
// DRIZZLE HANDLE
// =============================================================================

/**
 * The part of a drizzle node-postgres database (or transaction) this adapter
 * uses. `drizzle(pool)` from `drizzle-orm/node-postgres` satisfies it.
 */
export interface DrizzleHandle {
	execute(query: SQL): Promise<{ rows: Record<string, unknown>[]; rowCount?: number | null }>;
	transaction<T>(fn: (tx: DrizzleHandle) => Promise<T>): Promise<T>;
}

export interface DrizzleAdapterOptions {
	/** PostgreSQL schema holding the tables. Default: "public" */
	schema?: string;
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

/**
 * Convert `$1, $2` placeholders + params into a drizzle sql`` template, so
 * that values are always sent as bound parameters.
 */
export function buildDrizzleSql(query: string, params: unknown[]): SQL {
	const chunks: SQL[] = [];
	let lastIdx = 0;
	const regex = /\$(\d+)/g;
	let match: RegExpExecArray | null = regex.exec(query);

	while (match !== null) {
		if (match.index > lastIdx) {
			chunks.push(sql.raw(query.slice(lastIdx, match.index)));
		}
		const paramIndex = Number.parseInt(match[1] ?? "0", 10) - 1;
		if (paramIndex < 0 || paramIndex >= params.length) {
			throw new Error(`Placeholder $${paramIndex + 1} has no parameter`);
		}
		chunks.push(sql`${params[paramIndex]}`);
		lastIdx = match.index + match[0].length;
		match = regex.exec(query);
	}

	if (lastIdx < query.length) {
		chunks.push(sql.raw(query.slice(lastIdx)));
	}

	return chunks.reduce<SQL>((acc, chunk) => sql`${acc}${chunk}`, sql.raw(""));
}

function createExecutor(db: DrizzleHandle): SqlExecutor {
	return {
		query: async (sqlStr, params) => {
			const result = await db.execute(buildDrizzleSql(sqlStr, params));
			return result.rows;
		},
		mutate: async (sqlStr, params) => {
			const result = await db.execute(buildDrizzleSql(sqlStr, params));
			return result.rowCount ?? 0;
		},
		advisoryLock: async (key) => {
			await db.execute(sql`SELECT pg_advisory_xact_lock(${key})`);
		},
	};
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Create a ClearlineAdapter backed by a Drizzle ORM database instance.
 *
 * @example
 * ```ts
 * import { drizzle } from "drizzle-orm/node-postgres";
 * import { createPool, drizzleAdapter } from "@clearline/drizzle-adapter";
 *
 * const pool = createPool({ connectionString: process.env.DATABASE_URL });
 * const adapter = drizzleAdapter(drizzle(pool));
 * ```
 */
export function drizzleAdapter(db: DrizzleHandle, adapterOptions: DrizzleAdapterOptions = {}): ClearlineAdapter {
	const options: ClearlineAdapterOptions = {
		supportsAdvisoryLocks: true,
		supportsForUpdate: true,
		dialectName: "postgres",
		schema: adapterOptions.schema ?? "public",
	};
	const getSchema = () => options.schema ?? "public";

	return {
		id: "drizzle",
		...buildSqlAdapterMethods(createExecutor(db), getSchema),

		transaction: async <T>(fn: (tx: ClearlineTransactionAdapter) => Promise<T>): Promise<T> => {
			return db.transaction(async (tx) => {
				const txAdapter: ClearlineTransactionAdapter = {
					id: "drizzle",
					...buildSqlAdapterMethods(createExecutor(tx), getSchema),
					options,
				};
				return fn(txAdapter);
			});
		},

		options,
	};
}
