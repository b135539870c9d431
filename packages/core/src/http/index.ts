export {
	type ApiHandlerOptions,
	type ApiRequest,
	type ApiResponse,
	defineRoute,
	dispatchRequest,
	errorResponse,
	json,
	matchRoute,
	type Route,
	type RouteHandler,
	SECURITY_HEADERS,
} from "./router.js";
export { createFetchHandler, stripBasePath, toApiRequest, toWebResponse } from "./web.js";
export {
	badRequest,
	enumValue,
	type FieldSpec,
	isRecord,
	pageParams,
	type ValidatedBody,
	VALID_ACCOUNT_STATUSES,
	VALID_TRANSFER_STATUSES,
	validateBody,
	validateEnum,
	validatePositiveIntegerAmount,
} from "./validation.js";
