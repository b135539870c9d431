// =============================================================================
// FETCH INTEGRATION — Web Fetch API handler
// =============================================================================

import { createFetchHandler } from "@clearline/core/http";
import type { Bank } from "../bank/base.js";
import { type ApiHandlerOptions, handleRequest } from "./handler.js";

/**
 * @example
 * ```ts
 * import { serve } from "@hono/node-server";
 * import { createBankFetchHandler } from "@clearline/bank";
 *
 * serve({ fetch: createBankFetchHandler(bank), port: 4001 });
 * ```
 */
export function createBankFetchHandler(
	bank: Bank,
	options: { basePath?: string } & ApiHandlerOptions = {},
): (request: Request) => Promise<Response> {
	const { basePath, ...handlerOptions } = options;
	return createFetchHandler((req) => handleRequest(bank, req, handlerOptions), basePath);
}
