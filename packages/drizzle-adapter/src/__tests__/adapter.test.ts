import type { SQL } from "drizzle-orm";
import { PgDialect } from "drizzle-orm/pg-core";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { buildDrizzleSql, type DrizzleHandle, drizzleAdapter } from "../adapter.js";
import { buildCreateStatements } from "../ddl.js";
import { applyStatements, createPooledAdapter } from "../pool.js";

/**
 * Drizzle adapter unit tests against a mocked database handle that records
 * every statement. No PostgreSQL required.
 */

const dialect = new PgDialect();

function createMockDb() {
	const executed: { sql: string; params: unknown[] }[] = [];
	let nextRows: Record<string, unknown>[] = [];
	let nextRowCount: number | null = null;
	let transactions = 0;

	const db: DrizzleHandle = {
		execute: async (query: SQL) => {
			const { sql, params } = dialect.sqlToQuery(query);
			executed.push({ sql, params });
			return { rows: nextRows, rowCount: nextRowCount ?? nextRows.length };
		},
		// Same handle as the transaction handle
		transaction: <T>(fn: (tx: DrizzleHandle) => Promise<T>): Promise<T> => {
			transactions++;
			return fn(db);
		},
	};

	return {
		db,
		executed,
		transactionCount: () => transactions,
		setNextResult: (rows: Record<string, unknown>[], rowCount: number | null = null) => {
			nextRows = rows;
			nextRowCount = rowCount;
		},
	};
}

describe("buildDrizzleSql", () => {
	it("turns placeholders into bound parameters in order", () => {
		const query = dialect.sqlToQuery(
			buildDrizzleSql('SELECT * FROM "transfer" WHERE "id" = $1 AND "status" IN ($2, $3)', [
				"t-1",
				"INITIATED",
				"PREPARED",
			]),
		);
		expect(query.sql).toBe('SELECT * FROM "transfer" WHERE "id" = $1 AND "status" IN ($2, $3)');
		expect(query.params).toEqual(["t-1", "INITIATED", "PREPARED"]);
	});

	it("rejects a placeholder without a parameter", () => {
		expect(() => buildDrizzleSql("SELECT $2", ["only-one"])).toThrow("Placeholder $2 has no parameter");
	});

	it("passes statements without placeholders through", () => {
		expect(dialect.sqlToQuery(buildDrizzleSql("SELECT 1", [])).sql).toBe("SELECT 1");
	});
});

describe("drizzleAdapter", () => {
	let mock: ReturnType<typeof createMockDb>;

	beforeEach(() => {
		mock = createMockDb();
	});

	it("creates an adapter with postgres options", () => {
		const adapter = drizzleAdapter(mock.db);
		expect(adapter.id).toBe("drizzle");
		expect(adapter.options).toEqual({
			supportsAdvisoryLocks: true,
			supportsForUpdate: true,
			dialectName: "postgres",
			schema: "public",
		});
	});

	// =========================================================================
	// CREATE
	// =========================================================================

	it("create inserts snake_case columns and returns camelCase keys", async () => {
		const adapter = drizzleAdapter(mock.db);
		mock.setNextResult([{ id: "a-1", owner_name: "Alice", pending_credit: 0 }]);

		const result = await adapter.create({
			model: "account",
			data: { id: "a-1", ownerName: "Alice", pendingCredit: 0 },
		});

		expect(result).toEqual({ id: "a-1", ownerName: "Alice", pendingCredit: 0 });
		expect(mock.executed[0]).toEqual({
			sql: 'INSERT INTO "account" ("id", "owner_name", "pending_credit") VALUES ($1, $2, $3) RETURNING *',
			params: ["a-1", "Alice", 0],
		});
	});

	it("create rejects empty data", async () => {
		const adapter = drizzleAdapter(mock.db);
		await expect(adapter.create({ model: "account", data: {} })).rejects.toThrow(
			"Cannot insert empty data into account",
		);
	});

	it("qualifies tables with a non-public schema", async () => {
		const adapter = drizzleAdapter(mock.db, { schema: "bank_a" });
		mock.setNextResult([]);

		await adapter.findOne({ model: "transfer", where: [{ field: "id", operator: "eq", value: "t-1" }] });

		expect(mock.executed[0]?.sql).toBe('SELECT * FROM "bank_a"."transfer" WHERE "id" = $1 LIMIT 1');
	});

	// =========================================================================
	// READS
	// =========================================================================

	it("findOne locks the row when asked", async () => {
		const adapter = drizzleAdapter(mock.db);
		mock.setNextResult([{ id: "a-1", lock_version: 3 }]);

		const result = await adapter.findOne<{ id: string; lockVersion: number }>({
			model: "account",
			where: [{ field: "id", operator: "eq", value: "a-1" }],
			forUpdate: true,
		});

		expect(result?.lockVersion).toBe(3);
		expect(mock.executed[0]?.sql).toBe('SELECT * FROM "account" WHERE "id" = $1 LIMIT 1 FOR UPDATE');
	});

	it("findOne returns null when no rows are found", async () => {
		const adapter = drizzleAdapter(mock.db);
		mock.setNextResult([]);
		const result = await adapter.findOne({
			model: "account",
			where: [{ field: "id", operator: "eq", value: "missing" }],
		});
		expect(result).toBeNull();
	});

	it("findMany appends ordering and paging after the filter", async () => {
		const adapter = drizzleAdapter(mock.db);
		mock.setNextResult([{ transfer_id: "t-1" }]);

		const rows = await adapter.findMany<{ transferId: string }>({
			model: "reservation",
			where: [{ field: "status", operator: "eq", value: "held" }],
			sortBy: { field: "createdAt", direction: "desc" },
			limit: 10,
			offset: 20,
		});

		expect(rows).toEqual([{ transferId: "t-1" }]);
		expect(mock.executed[0]).toEqual({
			sql: 'SELECT * FROM "reservation" WHERE "status" = $1 ORDER BY "created_at" DESC LIMIT $2 OFFSET $3',
			params: ["held", 10, 20],
		});
	});

	it("count reads the integer count", async () => {
		const adapter = drizzleAdapter(mock.db);
		mock.setNextResult([{ count: 42 }]);
		expect(await adapter.count({ model: "transfer" })).toBe(42);
		expect(mock.executed[0]?.sql).toBe('SELECT COUNT(*)::int AS count FROM "transfer" WHERE TRUE');
	});

	// =========================================================================
	// WRITES
	// =========================================================================

	it("update numbers WHERE parameters after the SET values", async () => {
		const adapter = drizzleAdapter(mock.db);
		mock.setNextResult([{ id: "t-1", status: "PREPARED", version: 2 }]);

		const updated = await adapter.update<{ status: string }>({
			model: "transfer",
			where: [
				{ field: "id", operator: "eq", value: "t-1" },
				{ field: "status", operator: "eq", value: "INITIATED" },
			],
			update: { status: "PREPARED", version: 2 },
		});

		expect(updated?.status).toBe("PREPARED");
		expect(mock.executed[0]).toEqual({
			sql: 'UPDATE "transfer" SET "status" = $1, "version" = $2 WHERE "id" = $3 AND "status" = $4 RETURNING *',
			params: ["PREPARED", 2, "t-1", "INITIATED"],
		});
	});

	it("update rejects empty update data", async () => {
		const adapter = drizzleAdapter(mock.db);
		await expect(
			adapter.update({
				model: "transfer",
				where: [{ field: "id", operator: "eq", value: "t-1" }],
				update: {},
			}),
		).rejects.toThrow("Cannot update transfer with empty data");
	});

	it("delete returns the affected row count", async () => {
		const adapter = drizzleAdapter(mock.db);
		mock.setNextResult([], 7);

		const deleted = await adapter.delete({
			model: "processed_message",
			where: [{ field: "expiresAt", operator: "lt", value: "2026-01-01T00:00:00.000Z" }],
		});

		expect(deleted).toBe(7);
		expect(mock.executed[0]?.sql).toBe('DELETE FROM "processed_message" WHERE "expires_at" < $1');
	});

	// =========================================================================
	// TRANSACTION
	// =========================================================================

	it("runs the callback inside a drizzle transaction with advisory locks", async () => {
		const adapter = drizzleAdapter(mock.db);
		mock.setNextResult([]);

		const result = await adapter.transaction(async (tx) => {
			expect(tx.id).toBe("drizzle");
			await tx.advisoryLock(1234);
			return "done";
		});

		expect(result).toBe("done");
		expect(mock.transactionCount()).toBe(1);
		expect(mock.executed[0]).toEqual({ sql: "SELECT pg_advisory_xact_lock($1)", params: [1234] });
	});
});

describe("DDL", () => {
	it("creates every table", () => {
		const statements = buildCreateStatements();
		for (const table of [
			"account",
			"account_entry",
			"transfer",
			"reservation",
			"participant_decision",
			"processed_message",
			"registry_instance",
		]) {
			expect(statements.some((s) => s.startsWith(`CREATE TABLE IF NOT EXISTS "${table}" (`))).toBe(true);
		}
	});

	it("indexes the columns accounts and transfers are listed by", () => {
		const statements = buildCreateStatements();
		expect(statements).toContain('CREATE INDEX IF NOT EXISTS "idx_account_owner" ON "account" ("owner_id")');
		expect(statements).toContain(
			'CREATE INDEX IF NOT EXISTS "idx_transfer_source" ON "transfer" ("source_account_id")',
		);
	});

	it("creates the schema first when one is named", () => {
		const statements = buildCreateStatements("bank_a");
		expect(statements[0]).toBe('CREATE SCHEMA IF NOT EXISTS "bank_a"');
		expect(statements[1]?.startsWith('CREATE TABLE IF NOT EXISTS "bank_a"."account" (')).toBe(true);
	});

	it("applies statements one by one", async () => {
		const mock = createMockDb();
		await applyStatements(mock.db, ["SELECT 1", "SELECT 2"]);
		expect(mock.executed.map((q) => q.sql)).toEqual(["SELECT 1", "SELECT 2"]);
	});
});

describe("createPooledAdapter", () => {
	it("reports pool stats and closes the pool", async () => {
		const mock = createMockDb();
		const pool = { end: vi.fn(async () => {}), totalCount: 10, idleCount: 4, waitingCount: 1 };

		const { adapter, stats, close } = createPooledAdapter({ pool, drizzle: mock.db });

		expect(adapter.id).toBe("drizzle");
		expect(stats()).toEqual({ totalCount: 10, idleCount: 4, activeCount: 6, waitingCount: 1 });
		await close();
		expect(pool.end).toHaveBeenCalledTimes(1);
	});
});
