import type { Bank } from "@clearline/bank";
import type { Account } from "@clearline/core";
import { stripBasePath } from "@clearline/core/http";
import { createTestNetwork, getTestInstance, type TestNetwork } from "@clearline/test-utils";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createBankFetchHandler } from "../api/fetch.js";
import { type ApiRequest, type ApiResponse, handleRequest } from "../api/handler.js";
import { createBankHono } from "../api/hono.js";

function request(method: string, path: string, body?: unknown, query: ApiRequest["query"] = {}): ApiRequest {
	return { method, path, body, query };
}

describe("bank API", () => {
	let bank: Bank;

	beforeEach(() => {
		({ bank } = getTestInstance({ overrides: { name: "Bank A", baseUrl: "http://banka.test" } }));
	});

	it("answers the health check", async () => {
		const res = await handleRequest(bank, request("GET", "/ok"));
		expect(res.status).toBe(200);
		expect(res.body).toEqual({ ok: true });
	});

	it("describes the instance", async () => {
		const res = await handleRequest(bank, request("GET", "/info"));
		expect(res.body).toMatchObject({ instanceId: "BANKA", name: "Bank A", baseUrl: "http://banka.test" });
	});

	it("sets security headers and echoes the request id", async () => {
		const res = await handleRequest(bank, {
			...request("GET", "/ok"),
			headers: { "x-request-id": "req-1" },
		});
		expect(res.headers).toMatchObject({
			"Content-Type": "application/json",
			"X-Content-Type-Options": "nosniff",
			"X-Frame-Options": "DENY",
			"X-Request-Id": "req-1",
		});
	});

	it("answers 404 for unknown routes", async () => {
		const res = await handleRequest(bank, request("GET", "/nope"));
		expect(res.status).toBe(404);
		expect(res.body).toEqual({ error: { code: "NOT_FOUND", message: "Route not found" } });
	});

	describe("accounts", () => {
		it("creates an account", async () => {
			const res = await handleRequest(
				bank,
				request("POST", "/accounts", { ownerId: "owner-1", ownerName: "Alice", initialDeposit: 700 }),
			);
			expect(res.status).toBe(201);
			expect(res.body).toMatchObject({ ownerId: "owner-1", balance: 700, status: "active" });
		});

		it("names the missing field", async () => {
			const res = await handleRequest(bank, request("POST", "/accounts", { ownerId: "owner-1" }));
			expect(res.status).toBe(400);
			expect(res.body).toEqual({
				error: { code: "INVALID_ARGUMENT", message: 'Missing required field: "ownerName"' },
			});
		});

		it("names a field of the wrong type", async () => {
			const res = await handleRequest(bank, request("POST", "/accounts", { ownerId: 1, ownerName: "Alice" }));
			expect(res.body).toEqual({
				error: { code: "INVALID_ARGUMENT", message: 'Field "ownerId" must be string, got number' },
			});
		});

		it("rejects a body that is not an object", async () => {
			const res = await handleRequest(bank, request("POST", "/accounts", undefined));
			expect(res.body).toEqual({
				error: { code: "INVALID_ARGUMENT", message: "Request body must be a JSON object" },
			});
		});

		it("rejects a fractional initial deposit", async () => {
			const res = await handleRequest(
				bank,
				request("POST", "/accounts", { ownerId: "o", ownerName: "A", initialDeposit: 1.5 }),
			);
			expect(res.status).toBe(400);
		});

		it("reads, deposits into and cancels an account", async () => {
			const account = await bank.accounts.create({ ownerId: "owner-1", ownerName: "Alice" });

			const deposit = await handleRequest(
				bank,
				request("POST", `/accounts/${account.id}/deposit`, { amount: 40, description: "Top-up" }),
			);
			expect(deposit.status).toBe(200);
			expect(deposit.body).toMatchObject({ balance: 40 });

			const balance = await handleRequest(bank, request("GET", `/accounts/${account.id}/balance`));
			expect(balance.body).toEqual({
				accountId: account.id,
				balance: 40,
				reserved: 0,
				pendingCredit: 0,
				available: 40,
				version: 1,
			});

			const entries = await handleRequest(bank, request("GET", `/accounts/${account.id}/entries`));
			expect(entries.body).toMatchObject({ total: 1, hasMore: false });

			const refused = await handleRequest(bank, request("POST", `/accounts/${account.id}/cancel`));
			expect(refused.status).toBe(409);
			expect(refused.body).toMatchObject({ error: { code: "CONFLICT" } });
		});

		it("maps a missing account to 404", async () => {
			const res = await handleRequest(bank, request("GET", "/accounts/6f9619ff-8b86-4d01-b42d-00c04fc964ff"));
			expect(res.status).toBe(404);
			expect(res.body).toMatchObject({ error: { code: "NOT_FOUND" } });
		});

		it("lists accounts with pagination and rejects unknown status filters", async () => {
			await bank.accounts.create({ ownerId: "o1", ownerName: "Alice" });
			await bank.accounts.create({ ownerId: "o2", ownerName: "Bob" });

			const page = await handleRequest(bank, request("GET", "/accounts", undefined, { perPage: "1" }));
			expect(page.body).toMatchObject({ hasMore: true, total: 2 });

			const bad = await handleRequest(bank, request("GET", "/accounts", undefined, { status: "frozen" }));
			expect(bad.status).toBe(400);
		});
	});

	describe("transfers", () => {
		let source: Account;
		let destination: Account;

		beforeEach(async () => {
			source = await bank.accounts.create({ ownerId: "o1", ownerName: "Alice", initialDeposit: 900 });
			destination = await bank.accounts.create({ ownerId: "o2", ownerName: "Bob" });
		});

		it("initiates a transfer and reads it back", async () => {
			const created = await handleRequest(
				bank,
				request("POST", "/transfers", {
					sourceAccountId: source.id,
					destinationInstanceId: "BANKA",
					destinationAccountId: destination.id,
					amount: 300,
				}),
			);
			expect(created.status).toBe(201);
			expect(created.body).toMatchObject({ status: "COMMITTED", amount: 300 });

			const list = await handleRequest(bank, request("GET", "/transfers", undefined, { status: "COMMITTED" }));
			expect(list.body).toMatchObject({ total: 1 });
		});

		it("rejects a non-integer amount before touching the ledger", async () => {
			const res = await handleRequest(
				bank,
				request("POST", "/transfers", {
					sourceAccountId: source.id,
					destinationInstanceId: "BANKA",
					destinationAccountId: destination.id,
					amount: 10.5,
				}),
			);
			expect(res.status).toBe(400);
			expect((await bank.transfers.list()).total).toBe(0);
		});

		it("maps a missing transfer to 404", async () => {
			const res = await handleRequest(bank, request("GET", "/transfers/6f9619ff-8b86-4d01-b42d-00c04fc964ff"));
			expect(res.status).toBe(404);
		});
	});

	describe("interceptors", () => {
		it("short-circuits from onRequest", async () => {
			const res = await handleRequest(bank, request("GET", "/ok"), {
				onRequest: () => ({ status: 401, body: { error: { code: "UNAUTHORIZED", message: "no" } } }),
			});
			expect(res.status).toBe(401);
			expect(res.headers?.["X-Content-Type-Options"]).toBe("nosniff");
		});

		it("lets onResponse rewrite the response", async () => {
			const onResponse = vi.fn((_req: ApiRequest, res: ApiResponse) => ({
				...res,
				status: 299,
			}));
			const res = await handleRequest(bank, request("GET", "/ok"), { onResponse });
			expect(res.status).toBe(299);
			expect(onResponse).toHaveBeenCalledOnce();
		});

		it("hides unexpected errors behind a 500", async () => {
			vi.spyOn(bank.accounts, "list").mockRejectedValue(new Error("connection reset"));

			const res = await handleRequest(bank, request("GET", "/accounts"));

			expect(res.status).toBe(500);
			expect(res.body).toEqual({ error: { code: "INTERNAL", message: "Internal server error" } });
		});
	});
});

describe("fetch adapters", () => {
	let bank: Bank;

	beforeEach(() => {
		({ bank } = getTestInstance());
	});

	it("serves Web requests under a base path", async () => {
		const handler = createBankFetchHandler(bank, { basePath: "/api" });
		const res = await handler(
			new Request("http://banka.test/api/accounts", {
				method: "POST",
				body: JSON.stringify({ ownerId: "o1", ownerName: "Alice" }),
				headers: { "content-type": "application/json" },
			}),
		);

		expect(res.status).toBe(201);
		expect(res.headers.get("X-Content-Type-Options")).toBe("nosniff");
		const body: unknown = await res.json();
		expect(body).toMatchObject({ ownerId: "o1", ownerName: "Alice" });
	});

	it("treats an unparseable body as missing", async () => {
		const handler = createBankFetchHandler(bank);
		const res = await handler(new Request("http://banka.test/accounts", { method: "POST", body: "{oops" }));
		expect(res.status).toBe(400);
	});

	it("hands Hono requests to the same handler", async () => {
		const handler = createBankHono(bank);
		const res = await handler({ req: { raw: new Request("http://banka.test/ok") } });
		expect(res.status).toBe(200);
		expect(await res.json()).toEqual({ ok: true });
	});

	it("strips only a matching base path", () => {
		expect(stripBasePath("/api/ok", "/api")).toBe("/ok");
		expect(stripBasePath("/api", "/api")).toBe("/");
		expect(stripBasePath("/ok", "/api")).toBe("/ok");
	});
});

describe("protocol endpoint over HTTP", () => {
	let network: TestNetwork;

	beforeEach(async () => {
		network = await createTestNetwork();
	});

	afterEach(async () => {
		await network.cleanup();
	});

	it("carries a whole transfer through the fetch handler", async () => {
		const handler = createBankFetchHandler(network.bank("BANKA"));
		const source = await network.bank("BANKA").accounts.create({
			ownerId: "o1",
			ownerName: "A",
			initialDeposit: 50,
		});
		const target = await network.bank("BANKB").accounts.create({ ownerId: "o2", ownerName: "B" });

		const res = await handler(
			new Request("http://banka.test/transfers", {
				method: "POST",
				body: JSON.stringify({
					sourceAccountId: source.id,
					destinationInstanceId: "BANKB",
					destinationAccountId: target.id,
					amount: 20,
				}),
			}),
		);

		expect(res.status).toBe(201);
		expect(await res.json()).toMatchObject({ status: "COMMITTED" });
		expect((await network.bank("BANKB").accounts.getBalance(target.id)).balance).toBe(20);
	});
});
