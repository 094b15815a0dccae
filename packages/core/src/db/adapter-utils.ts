// =============================================================================
// SHARED ADAPTER UTILITIES
// =============================================================================
// Helpers for SQL adapters: camelCase <-> snake_case conversion, schema
// qualification and WHERE clause building with PostgreSQL `$N` placeholders.

import type { Row, Where } from "./adapter.js";

export function toSnakeCase(str: string): string {
	return str.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

export function toCamelCase(str: string): string {
	return str.replace(/_([a-z])/g, (_, letter: string) => letter.toUpperCase());
}

function renameKeys(row: Row, rename: (key: string) => string): Row {
	return Object.fromEntries(Object.entries(row).map(([key, value]) => [rename(key), value]));
}

/** Field names to column names, for an insert or update payload. */
export function keysToSnake(row: Row): Row {
	return renameKeys(row, toSnakeCase);
}

/** Column names back to field names, for a row read from the store. */
export function keysToCamel(row: Row): Row {
	return renameKeys(row, toCamelCase);
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Double-quote a schema, table or column name. Anything but a plain identifier is rejected. */
export function quoteIdent(name: string): string {
	if (!IDENTIFIER.test(name)) {
		throw new TypeError(`Invalid SQL identifier: ${JSON.stringify(name)}`);
	}
	return `"${name}"`;
}

/**
 * Qualify table names with the configured schema; `public` stays implicit.
 *
 * - `"public"` → `"accounts"`
 * - `"banking"` → `"banking"."accounts"`
 */
export function createTableResolver(schema: string): (tableName: string) => string {
	const prefix = schema === "public" ? "" : `${quoteIdent(schema)}.`;
	return (tableName: string) => `${prefix}${quoteIdent(tableName)}`;
}

const COMPARISON_SQL = {
	eq: "=",
	ne: "!=",
	gt: ">",
	gte: ">=",
	lt: "<",
	lte: "<=",
	like: "LIKE",
} as const;

/**
 * Build a SQL WHERE clause from an array of Where conditions.
 * Returns the clause string (without the WHERE keyword) and parameter values.
 * Parameter numbering starts at startIndex.
 */
export function buildWhereClause(
	where: Where[],
	startIndex: number = 1,
): { clause: string; params: unknown[] } {
	if (where.length === 0) {
		return { clause: "TRUE", params: [] };
	}

	const conditions: string[] = [];
	const params: unknown[] = [];
	let paramIdx = startIndex;

	for (const w of where) {
		const col = quoteIdent(toSnakeCase(w.field));

		switch (w.operator) {
			case "in": {
				if (!Array.isArray(w.value)) {
					throw new TypeError(`"in" condition on ${w.field} requires an array value`);
				}
				if (w.value.length === 0) {
					conditions.push("FALSE");
					break;
				}
				const placeholders = w.value.map((_, i) => `$${paramIdx + i}`).join(", ");
				conditions.push(`${col} IN (${placeholders})`);
				params.push(...w.value);
				paramIdx += w.value.length;
				break;
			}
			case "is_null":
				conditions.push(`${col} IS NULL`);
				break;
			case "is_not_null":
				conditions.push(`${col} IS NOT NULL`);
				break;
			default:
				conditions.push(`${col} ${COMPARISON_SQL[w.operator]} $${paramIdx}`);
				params.push(w.value);
				paramIdx++;
		}
	}

	return { clause: conditions.join(" AND "), params };
}
