// =============================================================================
// SQL ADAPTER METHODS — CRUD built on a 3-method executor
// =============================================================================
// SQL adapters differ only in how a query is executed. This module builds the
// CRUD statements once; an adapter supplies a SqlExecutor.

import type { ClearlineTransactionAdapter, ModelName, SortBy, Where } from "./adapter.js";
import {
	buildWhereClause,
	keysToCamel,
	keysToSnake,
	quoteIdentifier,
	toSnakeCase,
} from "./adapter-utils.js";
import { createTableResolver } from "./schema-prefix.js";

// =============================================================================
// SQL EXECUTOR INTERFACE
// =============================================================================

export interface SqlExecutor {
	/** Execute a SELECT (or a statement with RETURNING) and return rows. */
	query(sql: string, params: unknown[]): Promise<Record<string, unknown>[]>;
	/** Execute an INSERT/UPDATE/DELETE and return affected row count. */
	mutate(sql: string, params: unknown[]): Promise<number>;
	/** Acquire a transaction-scoped PostgreSQL advisory lock. */
	advisoryLock(key: number): Promise<void>;
}

// =============================================================================
// SHARED CRUD BUILDER
// =============================================================================

/**
 * Build the adapter methods from a SqlExecutor.
 * Rows are returned with camelCase keys; typing them is the caller's contract.
 */
export function buildSqlAdapterMethods(
	executor: SqlExecutor,
	getSchema: () => string,
): Omit<ClearlineTransactionAdapter, "id" | "options"> {
	const table = (model: ModelName) => createTableResolver(getSchema())(model);

	// Row → T is the storage boundary: the table layout is the type's contract.
	function fromRow<T>(row: Record<string, unknown>): T {
		return keysToCamel(row) as T;
	}

	return {
		create: async <T extends object>({ model, data }: { model: ModelName; data: T }): Promise<T> => {
			const snakeData = keysToSnake(data);
			const columns = Object.keys(snakeData);
			const values = Object.values(snakeData);

			if (columns.length === 0) {
				throw new Error(`Cannot insert empty data into ${model}`);
			}

			const columnList = columns.map(quoteIdentifier).join(", ");
			const placeholders = columns.map((_, i) => `$${i + 1}`).join(", ");
			const query = `INSERT INTO ${table(model)} (${columnList}) VALUES (${placeholders}) RETURNING *`;

			const rows = await executor.query(query, values);
			const row = rows[0];
			if (!row) {
				throw new Error(`Insert into ${model} returned no rows`);
			}
			return fromRow<T>(row);
		},

		findOne: async <T>({
			model,
			where,
			forUpdate,
		}: {
			model: ModelName;
			where: Where[];
			forUpdate?: boolean;
		}): Promise<T | null> => {
			const { clause, params } = buildWhereClause(where);
			let query = `SELECT * FROM ${table(model)} WHERE ${clause} LIMIT 1`;
			if (forUpdate) {
				query += " FOR UPDATE";
			}

			const rows = await executor.query(query, params);
			const row = rows[0];
			if (!row) return null;
			return fromRow<T>(row);
		},

		findMany: async <T>({
			model,
			where,
			limit,
			offset,
			sortBy,
		}: {
			model: ModelName;
			where?: Where[];
			limit?: number;
			offset?: number;
			sortBy?: SortBy;
		}): Promise<T[]> => {
			const { clause, params } = buildWhereClause(where ?? []);
			let query = `SELECT * FROM ${table(model)} WHERE ${clause}`;
			let paramIdx = params.length + 1;

			if (sortBy) {
				const col = quoteIdentifier(toSnakeCase(sortBy.field));
				const dir = sortBy.direction === "desc" ? "DESC" : "ASC";
				query += ` ORDER BY ${col} ${dir}`;
			}

			if (limit !== undefined) {
				query += ` LIMIT $${paramIdx}`;
				params.push(limit);
				paramIdx++;
			}

			if (offset !== undefined) {
				query += ` OFFSET $${paramIdx}`;
				params.push(offset);
				paramIdx++;
			}

			const rows = await executor.query(query, params);
			return rows.map((r) => fromRow<T>(r));
		},

		update: async <T>({
			model,
			where,
			update: updateData,
		}: {
			model: ModelName;
			where: Where[];
			update: Record<string, unknown>;
		}): Promise<T | null> => {
			const snakeData = keysToSnake(updateData);
			const setCols = Object.keys(snakeData);
			const setValues = Object.values(snakeData);

			if (setCols.length === 0) {
				throw new Error(`Cannot update ${model} with empty data`);
			}

			const setClause = setCols.map((c, i) => `${quoteIdentifier(c)} = $${i + 1}`).join(", ");
			const { clause: whereClause, params: whereParams } = buildWhereClause(
				where,
				setCols.length + 1,
			);

			const allParams = [...setValues, ...whereParams];
			const query = `UPDATE ${table(model)} SET ${setClause} WHERE ${whereClause} RETURNING *`;

			const rows = await executor.query(query, allParams);
			const row = rows[0];
			if (!row) return null;
			return fromRow<T>(row);
		},

		delete: async ({ model, where }: { model: ModelName; where: Where[] }): Promise<number> => {
			const { clause, params } = buildWhereClause(where);
			return executor.mutate(`DELETE FROM ${table(model)} WHERE ${clause}`, params);
		},

		count: async ({ model, where }: { model: ModelName; where?: Where[] }): Promise<number> => {
			const { clause, params } = buildWhereClause(where ?? []);
			const query = `SELECT COUNT(*)::int AS count FROM ${table(model)} WHERE ${clause}`;

			const rows = await executor.query(query, params);
			const count = rows[0]?.count;
			return typeof count === "number" ? count : Number(count ?? 0);
		},

		advisoryLock: executor.advisoryLock.bind(executor),
	};
}
