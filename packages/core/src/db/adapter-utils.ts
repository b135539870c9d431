// =============================================================================
// SHARED ADAPTER UTILITIES
// =============================================================================
// camelCase ↔ snake_case conversion and WHERE clause building for SQL adapters.

import type { Where } from "./adapter.js";

export function toSnakeCase(str: string): string {
	return str.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

export function toCamelCase(str: string): string {
	return str.replace(/_([a-z])/g, (_, letter: string) => letter.toUpperCase());
}

export function keysToSnake(obj: object): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		// undefined means "not set"; let the column default apply
		if (value === undefined) continue;
		result[toSnakeCase(key)] = value;
	}
	return result;
}

export function keysToCamel(obj: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[toCamelCase(key)] = value;
	}
	return result;
}

/** Identifiers come from code, never from requests, but are checked anyway. */
export function quoteIdentifier(name: string): string {
	if (!/^[a-z_][a-z0-9_]*$/.test(name)) {
		throw new Error(`Invalid SQL identifier: "${name}"`);
	}
	return `"${name}"`;
}

/**
 * Build a SQL WHERE clause from an array of Where conditions.
 * Returns the clause (without the WHERE keyword) and its parameter values,
 * numbered from `startIndex` as PostgreSQL `$N` placeholders.
 */
export function buildWhereClause(
	where: Where[],
	startIndex: number = 1,
): { clause: string; params: unknown[] } {
	if (where.length === 0) {
		return { clause: "TRUE", params: [] };
	}

	const comparisons = { eq: "=", ne: "!=", gt: ">", gte: ">=", lt: "<", lte: "<=" } as const;
	const conditions: string[] = [];
	const params: unknown[] = [];
	let paramIdx = startIndex;

	for (const w of where) {
		const col = quoteIdentifier(toSnakeCase(w.field));

		switch (w.operator) {
			case "eq":
			case "ne":
			case "gt":
			case "gte":
			case "lt":
			case "lte":
				conditions.push(`${col} ${comparisons[w.operator]} $${paramIdx}`);
				params.push(w.value);
				paramIdx++;
				break;
			case "in": {
				const values = Array.isArray(w.value) ? w.value : [w.value];
				if (values.length === 0) {
					conditions.push("FALSE");
					break;
				}
				const placeholders = values.map((_, i) => `$${paramIdx + i}`).join(", ");
				conditions.push(`${col} IN (${placeholders})`);
				params.push(...values);
				paramIdx += values.length;
				break;
			}
			case "is_null":
				conditions.push(`${col} IS NULL`);
				break;
			case "is_not_null":
				conditions.push(`${col} IS NOT NULL`);
				break;
		}
	}

	return { clause: conditions.join(" AND "), params };
}
