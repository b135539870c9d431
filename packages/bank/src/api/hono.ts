import type { Bank } from "../bank/base.js";
import { createBankFetchHandler } from "./fetch.js";
import type { ApiHandlerOptions } from "./handler.js";

/**
 * Mount a bank's API in Hono.
 *
 * @example
 * ```ts
 * const app = new Hono();
 * app.all("/api/bank/*", createBankHono(bank, { basePath: "/api/bank" }));
 * ```
 */
export function createBankHono(bank: Bank, options: { basePath?: string } & ApiHandlerOptions = {}) {
	const handler = createBankFetchHandler(bank, options);
	return (c: { req: { raw: Request } }): Promise<Response> => handler(c.req.raw);
}
