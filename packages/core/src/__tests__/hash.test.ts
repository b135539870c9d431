import { describe, expect, it } from "vitest";
import { canonicalJson, computeDigest, sha256Hex } from "../utils/hash.js";

describe("canonicalJson", () => {
	it("sorts object keys at every depth", () => {
		expect(canonicalJson({ b: 1, a: { d: 2, c: 3 } })).toBe('{"a":{"c":3,"d":2},"b":1}');
	});

	it("keeps array order", () => {
		expect(canonicalJson([3, 1, 2])).toBe("[3,1,2]");
	});

	it("drops undefined properties like JSON.stringify", () => {
		expect(canonicalJson({ reason: undefined, amount: 5 })).toBe('{"amount":5}');
	});

	it("serializes top-level undefined as null", () => {
		expect(canonicalJson(undefined)).toBe("null");
	});
});

describe("sha256Hex", () => {
	it("matches the well-known digest of the empty string", () => {
		expect(sha256Hex("")).toBe("e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855");
	});

	it("returns 64 lowercase hex characters", () => {
		expect(sha256Hex("clearline")).toMatch(/^[0-9a-f]{64}$/);
	});
});

describe("computeDigest", () => {
	it("is independent of key order", () => {
		expect(computeDigest({ amount: 500, transferId: "t-1" })).toBe(
			computeDigest({ transferId: "t-1", amount: 500 }),
		);
	});

	it("changes when a value changes", () => {
		expect(computeDigest({ amount: 500 })).not.toBe(computeDigest({ amount: 501 }));
	});
});
