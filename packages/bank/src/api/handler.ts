// =============================================================================
// API HANDLER — A bank's HTTP API as a framework-agnostic handler
// =============================================================================

import { type ApiHandlerOptions, type ApiRequest, type ApiResponse, dispatchRequest } from "@clearline/core/http";
import type { Bank } from "../bank/base.js";
import { routes } from "./routes/index.js";

export type { ApiHandlerOptions, ApiRequest, ApiResponse };

export function handleRequest(bank: Bank, req: ApiRequest, options: ApiHandlerOptions = {}): Promise<ApiResponse> {
	return dispatchRequest(bank, routes, req, { ...options, logger: bank.$context.logger });
}
