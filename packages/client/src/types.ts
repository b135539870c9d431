// =============================================================================
// CLIENT SDK TYPES
// =============================================================================

export interface ClearlineClientOptions {
	/** Base URL of the service (e.g., "http://localhost:4001") */
	baseURL: string;

	/** Static headers to include in every request */
	headers?: Record<string, string>;

	/** Custom fetch implementation (default: globalThis.fetch) */
	fetch?: typeof globalThis.fetch;

	/** Request interceptors */
	onRequest?: RequestInterceptor | RequestInterceptor[];

	/** Response interceptors */
	onResponse?: ResponseInterceptor | ResponseInterceptor[];

	/** Timeout in milliseconds (default: 30000) */
	timeout?: number;
}

export interface RequestOptions {
	/** Overrides the client timeout for this request */
	timeoutMs?: number;
}

export type RequestInterceptor = (
	url: string,
	init: RequestInit,
) => RequestInit | Promise<RequestInit>;

export type ResponseInterceptor = (
	response: Response,
	request: { url: string; init: RequestInit },
) => Response | Promise<Response>;
