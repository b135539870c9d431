// =============================================================================
// SCHEMA PREFIX — Qualifies table names with the configured PostgreSQL schema.
// =============================================================================

/**
 * Creates a function that qualifies table names with the configured schema.
 *
 * - `"public"` → `"transfer"`
 * - `"bank_a"` → `"bank_a"."transfer"`
 *
 * Several bank instances can share one database by using one schema each.
 */
export function createTableResolver(schema: string): (tableName: string) => string {
	if (schema === "public") {
		return (tableName: string) => `"${tableName}"`;
	}
	return (tableName: string) => `"${schema}"."${tableName}"`;
}
