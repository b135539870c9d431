// =============================================================================
// FETCH WRAPPER — Internal fetch with interceptors, timeout, error parsing
// =============================================================================

import { type ClearlineErrorCode, isBaseErrorCode } from "@clearline/core";
import { ClearlineClientError } from "./error.js";
import type {
	ClearlineClientOptions,
	RequestInterceptor,
	RequestOptions,
	ResponseInterceptor,
} from "./types.js";

export interface FetchClient {
	get<T>(path: string, query?: Record<string, string | undefined>, options?: RequestOptions): Promise<T>;
	post<T>(path: string, body?: unknown, options?: RequestOptions): Promise<T>;
	del<T>(path: string, body?: unknown, options?: RequestOptions): Promise<T>;
}

interface ErrorBody {
	code: ClearlineErrorCode;
	message: string | undefined;
	details: Record<string, unknown> | undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Read `{ error: { code, message, details } }` from an error response body. */
function parseErrorBody(body: unknown): ErrorBody {
	const error = isRecord(body) && isRecord(body.error) ? body.error : {};
	const code = typeof error.code === "string" && isBaseErrorCode(error.code) ? error.code : "INTERNAL";
	return {
		code,
		message: typeof error.message === "string" ? error.message : undefined,
		details: isRecord(error.details) ? error.details : undefined,
	};
}

export function createFetchClient(options: ClearlineClientOptions): FetchClient {
	const fetchFn = options.fetch ?? globalThis.fetch;
	const timeout = options.timeout ?? 30_000;
	const baseURL = options.baseURL.replace(/\/+$/, "");
	const baseHeaders: Record<string, string> = {
		"Content-Type": "application/json",
		...options.headers,
	};

	const requestInterceptors: RequestInterceptor[] = options.onRequest
		? Array.isArray(options.onRequest)
			? options.onRequest
			: [options.onRequest]
		: [];

	const responseInterceptors: ResponseInterceptor[] = options.onResponse
		? Array.isArray(options.onResponse)
			? options.onResponse
			: [options.onResponse]
		: [];

	async function request<T>(
		method: string,
		path: string,
		body?: unknown,
		requestOptions?: RequestOptions,
	): Promise<T> {
		const url = `${baseURL}${path}`;

		let init: RequestInit = {
			method,
			headers: { ...baseHeaders },
			signal: AbortSignal.timeout(requestOptions?.timeoutMs ?? timeout),
		};

		if (body !== undefined && method !== "GET") {
			init.body = JSON.stringify(body);
		}

		for (const interceptor of requestInterceptors) {
			init = await interceptor(url, init);
		}

		let response: Response;
		try {
			response = await fetchFn(url, init);
		} catch (error) {
			// Refused connection, DNS failure or timeout: nothing was received
			const reason = error instanceof Error ? error.message : String(error);
			throw new ClearlineClientError(
				"REMOTE_UNREACHABLE",
				`${method} ${url} failed: ${reason}`,
				0,
				undefined,
				{ cause: error },
			);
		}

		for (const interceptor of responseInterceptors) {
			response = await interceptor(response, { url, init });
		}

		if (!response.ok) {
			const errorBody = parseErrorBody(await response.json().catch(() => null));
			throw new ClearlineClientError(
				errorBody.code,
				errorBody.message ?? `HTTP ${response.status}`,
				response.status,
				errorBody.details,
			);
		}

		// The response shape is the route's contract
		return response.json() as Promise<T>;
	}

	return {
		async get<T>(
			path: string,
			query?: Record<string, string | undefined>,
			requestOptions?: RequestOptions,
		): Promise<T> {
			let fullPath = path;
			if (query) {
				const params = new URLSearchParams();
				for (const [key, value] of Object.entries(query)) {
					if (value !== undefined) params.set(key, value);
				}
				const qs = params.toString();
				if (qs) fullPath += `?${qs}`;
			}
			return request<T>("GET", fullPath, undefined, requestOptions);
		},
		async post<T>(path: string, body?: unknown, requestOptions?: RequestOptions): Promise<T> {
			return request<T>("POST", path, body, requestOptions);
		},
		async del<T>(path: string, body?: unknown, requestOptions?: RequestOptions): Promise<T> {
			return request<T>("DELETE", path, body, requestOptions);
		},
	};
}
