import { describe, expect, it } from "vitest";
import { createKeyedLock, hashLockKey, lockKeys } from "../utils/lock.js";

describe("hashLockKey", () => {
	it("returns a 32-bit integer", () => {
		const result = hashLockKey("transfer:6f9619ff-8b86-4d01-b42d-00c04fc964ff");
		expect(Number.isInteger(result)).toBe(true);
		expect(result).toBeGreaterThanOrEqual(-2147483648);
		expect(result).toBeLessThanOrEqual(2147483647);
	});

	it("is deterministic", () => {
		expect(hashLockKey("account:a-1")).toBe(hashLockKey("account:a-1"));
	});

	it("produces different hashes for different inputs", () => {
		expect(hashLockKey("account:a-1")).not.toBe(hashLockKey("account:a-2"));
	});

	it("hashes the empty string to 0", () => {
		expect(hashLockKey("")).toBe(0);
	});

	it("hashes a single character to its char code", () => {
		expect(hashLockKey("a")).toBe(97);
	});
});

describe("lockKeys", () => {
	it("prefixes the entity kind", () => {
		expect(lockKeys.account("x")).toBe(hashLockKey("account:x"));
		expect(lockKeys.transfer("x")).toBe(hashLockKey("transfer:x"));
		expect(lockKeys.account("x")).not.toBe(lockKeys.transfer("x"));
	});
});

describe("createKeyedLock", () => {
	const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 5));

	it("runs holders of the same key one at a time, in arrival order", async () => {
		const lock = createKeyedLock();
		const events: string[] = [];

		const first = lock.run("t-1", async () => {
			events.push("first:start");
			await tick();
			events.push("first:end");
			return 1;
		});
		const second = lock.run("t-1", async () => {
			events.push("second:start");
			await tick();
			events.push("second:end");
			return 2;
		});

		expect(await Promise.all([first, second])).toEqual([1, 2]);
		expect(events).toEqual(["first:start", "first:end", "second:start", "second:end"]);
	});

	it("does not serialize different keys", async () => {
		const lock = createKeyedLock();
		const events: string[] = [];

		await Promise.all([
			lock.run("t-1", async () => {
				events.push("a:start");
				await tick();
				events.push("a:end");
			}),
			lock.run("t-2", async () => {
				events.push("b:start");
				await tick();
				events.push("b:end");
			}),
		]);

		expect(events.slice(0, 2)).toEqual(["a:start", "b:start"]);
	});

	it("releases the key when the holder throws", async () => {
		const lock = createKeyedLock();

		await expect(
			lock.run("t-1", async () => {
				throw new Error("boom");
			}),
		).rejects.toThrow("boom");

		await expect(lock.run("t-1", async () => "next")).resolves.toBe("next");
		expect(lock.size()).toBe(0);
	});
});
