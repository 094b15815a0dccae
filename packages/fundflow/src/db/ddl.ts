// =============================================================================
// DDL GENERATION
// =============================================================================
// Renders the table definitions as PostgreSQL DDL. Every statement is
// idempotent so `migrate push` can run against an existing database.

import type { ColumnDefinition, TableDefinition } from "@fundflow/core";
import { createTableResolver, quoteIdent } from "@fundflow/core/db";
import { getFundflowTables } from "./schema.js";

function pgType(col: ColumnDefinition): string {
	switch (col.type) {
		case "uuid":
			return "UUID";
		case "text":
			return "TEXT";
		case "bigint":
			return "BIGINT";
		case "integer":
			return "INTEGER";
		case "boolean":
			return "BOOLEAN";
		case "timestamp":
			return "TIMESTAMPTZ";
		case "jsonb":
			return "JSONB";
	}
}

function columnSQL(
	colName: string,
	col: ColumnDefinition,
	table: (name: string) => string,
): string {
	const parts = [quoteIdent(colName), pgType(col)];
	if (col.primaryKey) parts.push("PRIMARY KEY");
	if (col.notNull && !col.primaryKey) parts.push("NOT NULL");
	if (col.unique) parts.push("UNIQUE");
	if (col.default) parts.push(`DEFAULT ${col.default}`);
	if (col.check) parts.push(`CHECK (${col.check})`);
	if (col.references) {
		parts.push(`REFERENCES ${table(col.references.table)}(${quoteIdent(col.references.column)})`);
	}
	return `  ${parts.join(" ")}`;
}

/** CREATE TABLE plus its indexes. */
export function createTableSQL(tableName: string, def: TableDefinition, schema: string): string[] {
	const table = createTableResolver(schema);
	const qualified = table(tableName);
	const colLines = Object.entries(def.columns).map(([colName, col]) => columnSQL(colName, col, table));

	const statements = [`CREATE TABLE IF NOT EXISTS ${qualified} (\n${colLines.join(",\n")}\n);`];

	for (const idx of def.indexes ?? []) {
		const cols = idx.columns.map(quoteIdent).join(", ");
		const kind = idx.unique ? "UNIQUE INDEX" : "INDEX";
		statements.push(`CREATE ${kind} IF NOT EXISTS ${idx.name} ON ${qualified} (${cols});`);
	}

	return statements;
}

/**
 * Trigger function and per-table triggers that reject UPDATE and DELETE on
 * append-only tables.
 */
export function appendOnlyTriggersSQL(tableNames: string[], schema: string): string[] {
	if (tableNames.length === 0) return [];
	const table = createTableResolver(schema);

	const statements = [
		`CREATE OR REPLACE FUNCTION ${quoteIdent(schema)}.prevent_update_delete()
RETURNS TRIGGER AS $$
BEGIN
  RAISE EXCEPTION 'Table %.% is append-only: % is not allowed', TG_TABLE_SCHEMA, TG_TABLE_NAME, TG_OP;
  RETURN NULL;
END;
$$ LANGUAGE plpgsql;`,
	];

	for (const tableName of tableNames) {
		const qualified = table(tableName);
		const triggerName = `trg_append_only_${tableName}`;
		statements.push(`DROP TRIGGER IF EXISTS ${triggerName} ON ${qualified};`);
		statements.push(`CREATE TRIGGER ${triggerName}
  BEFORE UPDATE OR DELETE ON ${qualified}
  FOR EACH ROW
  EXECUTE FUNCTION ${quoteIdent(schema)}.prevent_update_delete();`);
	}

	return statements;
}

/**
 * Every statement needed to create the fundflow schema from scratch, in
 * execution order.
 */
export function generateSchemaSQL(schema = "public"): string[] {
	const tables = getFundflowTables();
	const statements: string[] = [];

	if (schema !== "public") {
		statements.push(`CREATE SCHEMA IF NOT EXISTS ${quoteIdent(schema)};`);
	}

	for (const [tableName, def] of Object.entries(tables)) {
		statements.push(...createTableSQL(tableName, def, schema));
	}

	const appendOnly = Object.entries(tables)
		.filter(([, def]) => def.appendOnly)
		.map(([tableName]) => tableName);
	statements.push(...appendOnlyTriggersSQL(appendOnly, schema));

	return statements;
}
