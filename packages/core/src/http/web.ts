// =============================================================================
// WEB ADAPTER — Fetch API Request/Response <-> ApiRequest/ApiResponse
// =============================================================================

import type { ApiRequest, ApiResponse } from "./router.js";

/** Strip basePath prefix from a URL pathname, returning the relative path. */
export function stripBasePath(pathname: string, basePath: string): string {
	if (!basePath || !pathname.startsWith(basePath)) return pathname;
	const rest = pathname.slice(basePath.length);
	if (rest === "") return "/";
	return rest.startsWith("/") ? rest : pathname;
}

/**
 * JSON body of a request. GET/HEAD, empty and unparseable bodies yield
 * undefined, which route validation rejects.
 */
async function readJsonBody(request: Request): Promise<unknown> {
	if (request.method === "GET" || request.method === "HEAD") return undefined;
	const text = await request.text();
	if (text.trim() === "") return undefined;
	try {
		return JSON.parse(text);
	} catch {
		return undefined;
	}
}

export async function toApiRequest(request: Request, basePath = ""): Promise<ApiRequest> {
	const url = new URL(request.url);
	return {
		method: request.method,
		path: stripBasePath(url.pathname, basePath),
		body: await readJsonBody(request),
		query: Object.fromEntries(url.searchParams),
		headers: Object.fromEntries(request.headers),
	};
}

export function toWebResponse(response: ApiResponse): Response {
	const body = response.status === 204 ? null : JSON.stringify(response.body);
	return new Response(body, { status: response.status, headers: response.headers });
}

/** Fetch handler around an ApiRequest handler, mounted under `basePath`. */
export function createFetchHandler(
	handle: (req: ApiRequest) => Promise<ApiResponse>,
	basePath = "",
): (request: Request) => Promise<Response> {
	return async (request) => toWebResponse(await handle(await toApiRequest(request, basePath)));
}
