// =============================================================================
// Storage — PostgreSQL through drizzle when DATABASE_URL is set, else memory
// =============================================================================

import type { ClearlineAdapter, ClearlineLogger } from "@clearline/core";
import { applyStatements, buildCreateStatements, createPool, createPooledAdapter } from "@clearline/drizzle-adapter";
import { memoryAdapter } from "@clearline/memory-adapter";
import { drizzle } from "drizzle-orm/node-postgres";

export interface OpenedStorage {
	adapter: ClearlineAdapter;
	/** "postgres" or "memory" */
	kind: "postgres" | "memory";
	close: () => Promise<void>;
}

export async function openStorage(options: {
	databaseUrl: string | null;
	schema: string;
	logger: ClearlineLogger;
}): Promise<OpenedStorage> {
	if (!options.databaseUrl) {
		options.logger.warn("DATABASE_URL is not set, state lives in memory and is lost on exit");
		return { adapter: memoryAdapter(), kind: "memory", close: async () => {} };
	}

	const pool = createPool({ connectionString: options.databaseUrl });
	const db = drizzle(pool);
	await applyStatements(db, buildCreateStatements(options.schema));
	const { adapter, close } = createPooledAdapter({ pool, drizzle: db, schema: options.schema });
	options.logger.info("Connected to PostgreSQL", { schema: options.schema });
	return { adapter, kind: "postgres", close };
}
