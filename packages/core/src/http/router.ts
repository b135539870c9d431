// =============================================================================
// ROUTER — Framework-agnostic request dispatch shared by the bank and registry
// =============================================================================
// A route path is a list of literal segments and `:name` parameters. The
// first route whose method and segments match handles the request.

import { ClearlineError, errorMessage } from "../error/index.js";
import type { ClearlineLogger } from "../types/config.js";
import { generateId } from "../utils/id.js";

export interface ApiRequest {
	method: string;
	path: string;
	body: unknown;
	query: Record<string, string | undefined>;
	headers?: Record<string, string>;
}

export interface ApiResponse {
	status: number;
	body: unknown;
	headers?: Record<string, string>;
}

export interface ApiHandlerOptions {
	/** Request interceptor. Return an ApiResponse to short-circuit (e.g., 401 for auth). */
	onRequest?: (req: ApiRequest) => ApiRequest | ApiResponse | Promise<ApiRequest | ApiResponse>;
	/** Response interceptor. Runs after the route handler. */
	onResponse?: (req: ApiRequest, res: ApiResponse) => ApiResponse | Promise<ApiResponse>;
}

export type RouteHandler<S> = (req: ApiRequest, service: S, params: Record<string, string>) => Promise<ApiResponse>;

type Segment = { literal: string } | { param: string };

export interface Route<S> {
	method: string;
	segments: Segment[];
	handler: RouteHandler<S>;
}

function splitPath(path: string): string[] {
	return path.split("/").filter((part) => part.length > 0);
}

export function defineRoute<S>(method: string, path: string, handler: RouteHandler<S>): Route<S> {
	const segments = splitPath(path).map((part): Segment =>
		part.startsWith(":") ? { param: part.slice(1) } : { literal: part },
	);
	return { method: method.toUpperCase(), segments, handler };
}

/** Path parameters of `path` under `route`, null when it does not match. */
export function matchRoute<S>(route: Route<S>, path: string): Record<string, string> | null {
	const parts = splitPath(path);
	if (parts.length !== route.segments.length) return null;

	const params: Record<string, string> = {};
	for (const [i, segment] of route.segments.entries()) {
		const part = parts[i] ?? "";
		if ("literal" in segment) {
			if (segment.literal !== part) return null;
			continue;
		}
		try {
			params[segment.param] = decodeURIComponent(part);
		} catch {
			return null;
		}
	}
	return params;
}

export function json(status: number, body: unknown, headers: Record<string, string> = {}): ApiResponse {
	return { status, body, headers: { "Content-Type": "application/json", ...headers } };
}

export function errorResponse(status: number, code: string, message: string): ApiResponse {
	return json(status, { error: { code, message } });
}

export const SECURITY_HEADERS: Readonly<Record<string, string>> = {
	"X-Content-Type-Options": "nosniff",
	"X-Frame-Options": "DENY",
	"Referrer-Policy": "strict-origin-when-cross-origin",
	"X-XSS-Protection": "0",
	"Content-Security-Policy": "default-src 'none'; frame-ancestors 'none'",
};

function isResponse(value: ApiRequest | ApiResponse): value is ApiResponse {
	return "status" in value && "body" in value;
}

function headerValue(headers: Record<string, string> | undefined, name: string): string | undefined {
	if (!headers) return undefined;
	const wanted = name.toLowerCase();
	for (const [key, value] of Object.entries(headers)) {
		if (key.toLowerCase() === wanted) return value;
	}
	return undefined;
}

/**
 * Run `req` through the interceptors and the first matching route.
 * ClearlineErrors become their HTTP status; anything else is logged and
 * answered with a 500 that hides the cause.
 */
export async function dispatchRequest<S>(
	service: S,
	routes: readonly Route<S>[],
	req: ApiRequest,
	options: ApiHandlerOptions & { logger: ClearlineLogger },
): Promise<ApiResponse> {
	const requestId = headerValue(req.headers, "x-request-id") ?? generateId();
	const finish = (response: ApiResponse): ApiResponse => ({
		...response,
		headers: { ...SECURITY_HEADERS, ...response.headers, "X-Request-Id": requestId },
	});

	let current = req;
	if (options.onRequest) {
		const intercepted = await options.onRequest(current);
		if (isResponse(intercepted)) return finish(intercepted);
		current = intercepted;
	}

	const method = current.method.toUpperCase();
	let response: ApiResponse;
	try {
		response = errorResponse(404, "NOT_FOUND", "Route not found");
		for (const route of routes) {
			if (route.method !== method) continue;
			const params = matchRoute(route, current.path);
			if (params === null) continue;
			response = await route.handler(current, service, params);
			break;
		}
	} catch (error) {
		if (error instanceof ClearlineError) {
			response = errorResponse(error.status, error.code, error.message);
		} else {
			options.logger.error("Unhandled API error", {
				method,
				path: current.path,
				requestId,
				error: errorMessage(error),
			});
			response = errorResponse(500, "INTERNAL", "Internal server error");
		}
	}

	if (options.onResponse) {
		response = await options.onResponse(current, response);
	}
	return finish(response);
}
