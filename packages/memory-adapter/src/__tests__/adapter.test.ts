import type { Account } from "@clearline/core";
import { describe, expect, it } from "vitest";
import { memoryAdapter } from "../adapter.js";

// =============================================================================
// MEMORY ADAPTER TESTS
// =============================================================================

interface Row {
	id: string;
	status: string;
	amount: number;
	expiresAt: string | null;
}

function row(id: string, status: string, amount: number, expiresAt: string | null = null): Row {
	return { id, status, amount, expiresAt };
}

async function seed() {
	const adapter = memoryAdapter();
	await adapter.create({ model: "reservation", data: row("r1", "held", 500, "2026-01-01T00:00:10.000Z") });
	await adapter.create({ model: "reservation", data: row("r2", "held", 200, "2026-01-01T00:00:20.000Z") });
	await adapter.create({ model: "reservation", data: row("r3", "applied", 300) });
	return adapter;
}

describe("memoryAdapter", () => {
	it("returns an adapter with id 'memory'", () => {
		const adapter = memoryAdapter();
		expect(adapter.id).toBe("memory");
		expect(adapter.options).toEqual({
			supportsAdvisoryLocks: false,
			supportsForUpdate: false,
			dialectName: "memory",
		});
	});

	// =========================================================================
	// CREATE
	// =========================================================================

	describe("create", () => {
		it("generates an id when none is provided", async () => {
			const adapter = memoryAdapter();
			const result = await adapter.create<{ id?: string; name: string }>({
				model: "account",
				data: { name: "Alice" },
			});
			expect(result.id).toMatch(/^[0-9a-f-]{36}$/);
		});

		it("rejects a duplicate id", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "transfer", data: { id: "t1" } });
			await expect(adapter.create({ model: "transfer", data: { id: "t1" } })).rejects.toThrow(
				'Duplicate key "t1" in transfer',
			);
		});

		it("returns a copy of the data", async () => {
			const adapter = memoryAdapter();
			const created = await adapter.create({ model: "account", data: { id: "a1", balance: 10 } });
			created.balance = 999;

			const found = await adapter.findOne<{ balance: number }>({
				model: "account",
				where: [{ field: "id", operator: "eq", value: "a1" }],
			});
			expect(found?.balance).toBe(10);
		});

		it("clones nested JSON values", async () => {
			const adapter = memoryAdapter();
			const metadata = { region: "eu" };
			await adapter.create({ model: "registry_instance", data: { id: "BANKAA01", metadata } });
			metadata.region = "us";

			const found = await adapter.findOne<{ metadata: { region: string } }>({
				model: "registry_instance",
				where: [{ field: "id", operator: "eq", value: "BANKAA01" }],
			});
			expect(found?.metadata.region).toBe("eu");
		});
	});

	// =========================================================================
	// READS
	// =========================================================================

	describe("findOne / findMany / count", () => {
		it("returns null for an empty model", async () => {
			const adapter = memoryAdapter();
			const found = await adapter.findOne<Account>({
				model: "account",
				where: [{ field: "id", operator: "eq", value: "missing" }],
			});
			expect(found).toBeNull();
		});

		it("combines conditions with AND", async () => {
			const adapter = await seed();
			const found = await adapter.findMany<Row>({
				model: "reservation",
				where: [
					{ field: "status", operator: "eq", value: "held" },
					{ field: "amount", operator: "gt", value: 300 },
				],
			});
			expect(found.map((r) => r.id)).toEqual(["r1"]);
		});

		it("compares ISO timestamps as strings", async () => {
			const adapter = await seed();
			const expired = await adapter.findMany<Row>({
				model: "reservation",
				where: [
					{ field: "status", operator: "eq", value: "held" },
					{ field: "expiresAt", operator: "lte", value: "2026-01-01T00:00:15.000Z" },
				],
			});
			expect(expired.map((r) => r.id)).toEqual(["r1"]);
		});

		it("never matches null in range comparisons", async () => {
			const adapter = await seed();
			const found = await adapter.findMany<Row>({
				model: "reservation",
				where: [{ field: "expiresAt", operator: "lte", value: "2030-01-01T00:00:00.000Z" }],
			});
			expect(found.map((r) => r.id)).toEqual(["r1", "r2"]);
		});

		it("supports in, ne and null checks", async () => {
			const adapter = await seed();
			const inList = await adapter.findMany<Row>({
				model: "reservation",
				where: [{ field: "id", operator: "in", value: ["r1", "r3"] }],
			});
			expect(inList.map((r) => r.id)).toEqual(["r1", "r3"]);

			const notHeld = await adapter.findMany<Row>({
				model: "reservation",
				where: [{ field: "status", operator: "ne", value: "held" }],
			});
			expect(notHeld.map((r) => r.id)).toEqual(["r3"]);

			expect(
				await adapter.count({
					model: "reservation",
					where: [{ field: "expiresAt", operator: "is_null", value: null }],
				}),
			).toBe(1);
			expect(
				await adapter.count({
					model: "reservation",
					where: [{ field: "expiresAt", operator: "is_not_null", value: null }],
				}),
			).toBe(2);
		});

		it("sorts, offsets and limits", async () => {
			const adapter = await seed();
			const page = await adapter.findMany<Row>({
				model: "reservation",
				sortBy: { field: "amount", direction: "desc" },
				offset: 1,
				limit: 1,
			});
			expect(page.map((r) => r.id)).toEqual(["r3"]);
		});

		it("counts all records without a filter", async () => {
			const adapter = await seed();
			expect(await adapter.count({ model: "reservation" })).toBe(3);
			expect(await adapter.count({ model: "transfer" })).toBe(0);
		});
	});

	// =========================================================================
	// WRITES
	// =========================================================================

	describe("update / delete", () => {
		it("merges the update and ignores undefined fields", async () => {
			const adapter = await seed();
			const updated = await adapter.update<Row>({
				model: "reservation",
				where: [{ field: "id", operator: "eq", value: "r1" }],
				update: { status: "released", amount: undefined },
			});
			expect(updated).toEqual(row("r1", "released", 500, "2026-01-01T00:00:10.000Z"));
		});

		it("returns null when nothing matches", async () => {
			const adapter = await seed();
			const updated = await adapter.update({
				model: "reservation",
				where: [{ field: "id", operator: "eq", value: "r9" }],
				update: { status: "released" },
			});
			expect(updated).toBeNull();
		});

		it("deletes every match and returns the count", async () => {
			const adapter = await seed();
			const deleted = await adapter.delete({
				model: "reservation",
				where: [{ field: "status", operator: "eq", value: "held" }],
			});
			expect(deleted).toBe(2);
			expect(await adapter.count({ model: "reservation" })).toBe(1);
		});
	});

	// =========================================================================
	// TRANSACTIONS
	// =========================================================================

	describe("transaction", () => {
		it("commits on success and returns the callback's value", async () => {
			const adapter = memoryAdapter();
			const result = await adapter.transaction(async (tx) => {
				await tx.create({ model: "transfer", data: { id: "t1" } });
				return "done";
			});
			expect(result).toBe("done");
			expect(await adapter.count({ model: "transfer" })).toBe(1);
		});

		it("rolls back every write on error", async () => {
			const adapter = await seed();
			await expect(
				adapter.transaction(async (tx) => {
					await tx.delete({ model: "reservation", where: [] });
					await tx.create({ model: "transfer", data: { id: "t1" } });
					throw new Error("abort");
				}),
			).rejects.toThrow("abort");

			expect(await adapter.count({ model: "reservation" })).toBe(3);
			expect(await adapter.count({ model: "transfer" })).toBe(0);
		});

		it("runs transactions one at a time", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "account", data: { id: "a1", balance: 0 } });

			const increment = () =>
				adapter.transaction(async (tx) => {
					const current = await tx.findOne<{ balance: number }>({
						model: "account",
						where: [{ field: "id", operator: "eq", value: "a1" }],
					});
					await new Promise((resolve) => setTimeout(resolve, 2));
					await tx.update({
						model: "account",
						where: [{ field: "id", operator: "eq", value: "a1" }],
						update: { balance: (current?.balance ?? 0) + 1 },
					});
				});

			await Promise.all([increment(), increment(), increment(), increment()]);

			const account = await adapter.findOne<{ balance: number }>({
				model: "account",
				where: [{ field: "id", operator: "eq", value: "a1" }],
			});
			expect(account?.balance).toBe(4);
		});

		it("keeps serving transactions after a rollback", async () => {
			const adapter = memoryAdapter();
			await expect(
				adapter.transaction(async () => {
					throw new Error("first");
				}),
			).rejects.toThrow("first");
			await expect(adapter.transaction(async () => "second")).resolves.toBe("second");
		});

		it("exposes an advisory lock that resolves", async () => {
			const adapter = memoryAdapter();
			await adapter.transaction(async (tx) => {
				await expect(tx.advisoryLock(42)).resolves.toBeUndefined();
			});
		});
	});
});
