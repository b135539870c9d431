import { describe, expect, it } from "vitest";
import { buildWhereClause, keysToCamel, keysToSnake, quoteIdentifier } from "../db/adapter-utils.js";
import { createTableResolver } from "../db/schema-prefix.js";

describe("key conversion", () => {
	it("converts camelCase keys to snake_case and drops undefined", () => {
		expect(keysToSnake({ transferId: "t", pendingCredit: 0, reason: undefined })).toEqual({
			transfer_id: "t",
			pending_credit: 0,
		});
	});

	it("converts snake_case keys to camelCase", () => {
		expect(keysToCamel({ account_number: "1", created_at: "x" })).toEqual({
			accountNumber: "1",
			createdAt: "x",
		});
	});
});

describe("quoteIdentifier", () => {
	it("quotes plain identifiers", () => {
		expect(quoteIdentifier("expires_at")).toBe('"expires_at"');
	});

	it("rejects anything that could break out of the quotes", () => {
		expect(() => quoteIdentifier('x" OR 1=1 --')).toThrow("Invalid SQL identifier");
	});
});

describe("buildWhereClause", () => {
	it("returns TRUE for no conditions", () => {
		expect(buildWhereClause([])).toEqual({ clause: "TRUE", params: [] });
	});

	it("numbers parameters from the start index", () => {
		const result = buildWhereClause(
			[
				{ field: "status", operator: "eq", value: "held" },
				{ field: "expiresAt", operator: "lte", value: "2026-01-01T00:00:00.000Z" },
			],
			3,
		);
		expect(result.clause).toBe('"status" = $3 AND "expires_at" <= $4');
		expect(result.params).toEqual(["held", "2026-01-01T00:00:00.000Z"]);
	});

	it("expands IN lists", () => {
		const result = buildWhereClause([
			{ field: "status", operator: "in", value: ["INITIATED", "PREPARED"] },
			{ field: "id", operator: "ne", value: "t-1" },
		]);
		expect(result.clause).toBe('"status" IN ($1, $2) AND "id" != $3');
		expect(result.params).toEqual(["INITIATED", "PREPARED", "t-1"]);
	});

	it("turns an empty IN list into FALSE", () => {
		expect(buildWhereClause([{ field: "id", operator: "in", value: [] }])).toEqual({
			clause: "FALSE",
			params: [],
		});
	});

	it("emits null checks without parameters", () => {
		const result = buildWhereClause([
			{ field: "expiresAt", operator: "is_null", value: null },
			{ field: "transferId", operator: "is_not_null", value: null },
		]);
		expect(result.clause).toBe('"expires_at" IS NULL AND "transfer_id" IS NOT NULL');
		expect(result.params).toEqual([]);
	});
});

describe("createTableResolver", () => {
	it("leaves public tables unqualified", () => {
		expect(createTableResolver("public")("transfer")).toBe('"transfer"');
	});

	it("qualifies other schemas", () => {
		expect(createTableResolver("bank_a")("transfer")).toBe('"bank_a"."transfer"');
	});
});
