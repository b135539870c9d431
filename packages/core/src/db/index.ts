export {
	type ClearlineAdapter,
	type ClearlineAdapterOptions,
	type ClearlineTransactionAdapter,
	MODELS,
	type ModelName,
	type SortBy,
	type Where,
	type WhereOperator,
} from "./adapter.js";
export {
	buildWhereClause,
	keysToCamel,
	keysToSnake,
	quoteIdentifier,
	toCamelCase,
	toSnakeCase,
} from "./adapter-utils.js";
export { createTableResolver } from "./schema-prefix.js";
export { buildSqlAdapterMethods, type SqlExecutor } from "./sql-adapter-methods.js";
