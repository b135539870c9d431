export { buildDrizzleSql, type DrizzleAdapterOptions, type DrizzleHandle, drizzleAdapter } from "./adapter.js";
export { buildCreateStatements } from "./ddl.js";
export {
	applyStatements,
	createPool,
	createPooledAdapter,
	type PooledAdapterConfig,
	type PooledAdapterResult,
	type PoolLike,
	type PoolStats,
	RECOMMENDED_POOL_CONFIG,
} from "./pool.js";
