export interface PaginationParams {
	page?: number;
	/** Default: 20, max: 100 */
	perPage?: number;
}

export interface PaginatedResult<T> {
	data: T[];
	hasMore: boolean;
	total: number;
}

export const DEFAULT_PER_PAGE = 20;
export const MAX_PER_PAGE = 100;

/** Clamp page parameters and convert them to limit/offset. */
export function resolvePagination(params?: PaginationParams): {
	page: number;
	perPage: number;
	limit: number;
	offset: number;
} {
	const page = Math.max(1, Math.floor(params?.page ?? 1));
	const perPage = Math.min(MAX_PER_PAGE, Math.max(1, Math.floor(params?.perPage ?? DEFAULT_PER_PAGE)));
	return { page, perPage, limit: perPage, offset: (page - 1) * perPage };
}
