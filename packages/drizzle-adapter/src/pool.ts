// =============================================================================
// CONNECTION POOL
// =============================================================================
// node-postgres pool preconfigured for the ledger tables, plus a wrapper that
// pairs the adapter with monitoring and graceful shutdown.

import type { ClearlineAdapter } from "@clearline/core/db";
import { sql } from "drizzle-orm";
import pg, { type Pool, type PoolConfig } from "pg";
import { type DrizzleAdapterOptions, type DrizzleHandle, drizzleAdapter } from "./adapter.js";

// =============================================================================
// TYPES
// =============================================================================

/** The pg.Pool surface used for monitoring and shutdown. */
export interface PoolLike {
	end(): Promise<void>;
	totalCount: number;
	idleCount: number;
	waitingCount: number;
}

export interface PooledAdapterConfig extends DrizzleAdapterOptions {
	pool: PoolLike;
	/** Drizzle instance created from the same pool, e.g. `drizzle(pool)` */
	drizzle: DrizzleHandle;
}

export interface PooledAdapterResult {
	adapter: ClearlineAdapter;
	/** Waits for active queries to finish, then closes all connections. */
	close: () => Promise<void>;
	stats: () => PoolStats;
}

export interface PoolStats {
	totalCount: number;
	idleCount: number;
	activeCount: number;
	waitingCount: number;
}

// =============================================================================
// RECOMMENDED POOL SETTINGS
// =============================================================================

export const RECOMMENDED_POOL_CONFIG = {
	max: 20,
	idleTimeoutMillis: 30_000,
	/** Fail fast if no connection is available within 10s. */
	connectionTimeoutMillis: 10_000,
	/** Recycle connections after 30min to avoid stale connections behind LBs. */
	maxLifetimeSeconds: 1_800,
	/** Prevent runaway queries (30s). */
	statement_timeout: 30_000,
} as const;

// =============================================================================
// FACTORIES
// =============================================================================

/**
 * Create a pg.Pool with the recommended settings. Amounts are stored as
 * bigint, so int8 columns are parsed into numbers; every amount is bounded
 * by the maximum transfer amount, far below 2^53.
 */
export function createPool(config: PoolConfig): Pool {
	pg.types.setTypeParser(pg.types.builtins.INT8, (value: string) => Number.parseInt(value, 10));
	return new pg.Pool({ ...RECOMMENDED_POOL_CONFIG, ...config });
}

export function createPooledAdapter(config: PooledAdapterConfig): PooledAdapterResult {
	const { pool, drizzle: db, ...adapterOptions } = config;
	const adapter = drizzleAdapter(db, adapterOptions);

	return {
		adapter,

		close: async () => {
			await pool.end();
		},

		stats: () => ({
			totalCount: pool.totalCount,
			idleCount: pool.idleCount,
			activeCount: pool.totalCount - pool.idleCount,
			waitingCount: pool.waitingCount,
		}),
	};
}

/** Run the CREATE statements of ./ddl.ts, in order, outside a transaction. */
export async function applyStatements(db: DrizzleHandle, statements: string[]): Promise<void> {
	for (const statement of statements) {
		await db.execute(sql.raw(statement));
	}
}
