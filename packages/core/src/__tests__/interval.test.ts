import { describe, expect, it } from "vitest";
import { parseInterval, withJitter } from "../utils/interval.js";

describe("parseInterval", () => {
	it.each([
		["5s", 5_000],
		["1m", 60_000],
		["1h", 3_600_000],
		["1d", 86_400_000],
		["1.5s", 1_500],
	])("parses %s", (input, expected) => {
		expect(parseInterval(input)).toBe(expected);
	});

	it("rejects unknown units", () => {
		expect(() => parseInterval("5w")).toThrow('Invalid interval "5w"');
	});

	it("rejects zero", () => {
		expect(() => parseInterval("0s")).toThrow("Interval value must be positive, got 0");
	});
});

describe("withJitter", () => {
	it("stays within ±25%", () => {
		expect(withJitter(1000, () => 0)).toBe(750);
		expect(withJitter(1000, () => 0.5)).toBe(1000);
		expect(withJitter(1000, () => 1)).toBe(1250);
	});
});
