import { describe, expect, it, vi } from "vitest";
import { ClearlineError } from "../error/index.js";
import {
	type ApiRequest,
	createFetchHandler,
	defineRoute,
	dispatchRequest,
	json,
	matchRoute,
	type Route,
	validateBody,
} from "../http/index.js";
import { silentLogger } from "../logger/index.js";

function request(method: string, path: string, headers?: Record<string, string>): ApiRequest {
	return { method, path, body: undefined, query: {}, headers };
}

describe("matchRoute", () => {
	const route = defineRoute<null>("get", "/accounts/:accountId/balance", async () => json(200, {}));

	it("extracts and decodes parameters", () => {
		expect(route.method).toBe("GET");
		expect(matchRoute(route, "/accounts/a%2Fb/balance")).toEqual({ accountId: "a/b" });
		expect(matchRoute(route, "/accounts/a-1/balance/")).toEqual({ accountId: "a-1" });
	});

	it("rejects other shapes and malformed escapes", () => {
		expect(matchRoute(route, "/accounts/a-1")).toBeNull();
		expect(matchRoute(route, "/accounts/a-1/entries")).toBeNull();
		expect(matchRoute(route, "/accounts/%E0%A4%A/balance")).toBeNull();
	});
});

describe("dispatchRequest", () => {
	const routes: Route<{ name: string }>[] = [
		defineRoute<{ name: string }>("GET", "/name", async (_req, service) => json(200, { name: service.name })),
		defineRoute<{ name: string }>("GET", "/missing", async () => {
			throw ClearlineError.notFound("Nothing here");
		}),
		defineRoute<{ name: string }>("GET", "/broken", async () => {
			throw new Error("disk full");
		}),
	];
	const service = { name: "BANKA" };

	it("hands the service to the first matching route", async () => {
		const res = await dispatchRequest(service, routes, request("get", "/name"), { logger: silentLogger });
		expect(res.status).toBe(200);
		expect(res.body).toEqual({ name: "BANKA" });
	});

	it("maps ClearlineErrors to their status", async () => {
		const res = await dispatchRequest(service, routes, request("GET", "/missing"), { logger: silentLogger });
		expect(res.status).toBe(404);
		expect(res.body).toEqual({ error: { code: "NOT_FOUND", message: "Nothing here" } });
	});

	it("logs and hides other errors", async () => {
		const logger = { ...silentLogger, error: vi.fn() };
		const res = await dispatchRequest(service, routes, request("GET", "/broken", { "X-Request-Id": "req-7" }), {
			logger,
		});
		expect(res.status).toBe(500);
		expect(res.headers?.["X-Request-Id"]).toBe("req-7");
		expect(logger.error).toHaveBeenCalledWith("Unhandled API error", {
			method: "GET",
			path: "/broken",
			requestId: "req-7",
			error: "disk full",
		});
	});

	it("answers 404 for an unknown path or method", async () => {
		const res = await dispatchRequest(service, routes, request("POST", "/name"), { logger: silentLogger });
		expect(res.body).toEqual({ error: { code: "NOT_FOUND", message: "Route not found" } });
	});
});

describe("createFetchHandler", () => {
	it("passes path, query and JSON body through", async () => {
		const seen: ApiRequest[] = [];
		const handler = createFetchHandler(async (req) => {
			seen.push(req);
			return json(201, { ok: true });
		}, "/api");

		const res = await handler(
			new Request("http://bank.test/api/transfers?page=2", {
				method: "POST",
				body: JSON.stringify({ amount: 5 }),
				headers: { "x-request-id": "req-1" },
			}),
		);

		expect(res.status).toBe(201);
		expect(res.headers.get("content-type")).toBe("application/json");
		expect(seen[0]).toMatchObject({
			method: "POST",
			path: "/transfers",
			body: { amount: 5 },
			query: { page: "2" },
			headers: { "x-request-id": "req-1" },
		});
	});
});

describe("validateBody", () => {
	it("returns typed fields and drops unknown keys", () => {
		expect(validateBody({ amount: 5, note: "x", extra: true }, { amount: "number", note: "string?" })).toEqual({
			body: { amount: 5, note: "x" },
		});
	});

	it("names the first bad field", () => {
		expect(validateBody({ amount: "5" }, { amount: "number" })).toEqual({
			error: 'Field "amount" must be number, got string',
		});
		expect(validateBody([], { amount: "number" })).toEqual({ error: "Request body must be a JSON object" });
	});
});
