import { createHash } from "node:crypto";
import { writeFileSync } from "node:fs";
import { resolve } from "node:path";
import * as p from "@clack/prompts";
import { Command } from "commander";
import { generateSchemaSQL } from "fundflow/db";
import pg, { type Client } from "pg";
import pc from "picocolors";
import { loadCommandContext, resolveDatabaseUrl, resolveSchema } from "../utils/connect.js";

// =============================================================================
// MIGRATION TRACKING HELPERS
// =============================================================================

function qualifyTable(schema: string, tableName: string): string {
	if (schema === "public") return `"${tableName}"`;
	return `"${schema}"."${tableName}"`;
}

export function migrationsTable(schema: string): string {
	return qualifyTable(schema, "_fundflow_migrations");
}

export function hashSQL(statements: string[]): string {
	return createHash("sha256").update(statements.join("\n")).digest("hex").slice(0, 16);
}

/** The full migration script: every schema statement, one per paragraph. */
export function renderMigrationSQL(schema: string): string {
	return `${generateSchemaSQL(schema).join("\n\n")}\n`;
}

async function ensureMigrationsTable(client: Client, schema: string): Promise<void> {
	if (schema !== "public") {
		await client.query(`CREATE SCHEMA IF NOT EXISTS "${schema}"`);
	}
	await client.query(`
		CREATE TABLE IF NOT EXISTS ${migrationsTable(schema)} (
			id SERIAL PRIMARY KEY,
			name TEXT NOT NULL,
			hash TEXT NOT NULL,
			applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
			CONSTRAINT uq_fundflow_migration_name UNIQUE (name)
		);
	`);
}

async function isApplied(client: Client, schema: string, hash: string): Promise<boolean> {
	const result = await client.query(`SELECT 1 FROM ${migrationsTable(schema)} WHERE hash = $1`, [
		hash,
	]);
	return result.rows.length > 0;
}

// =============================================================================
// PUSH COMMAND -- apply schema directly to database
// =============================================================================

const pushCommand = new Command("push")
	.description("Create the fundflow tables, indexes and append-only triggers")
	.option("--url <url>", "PostgreSQL connection URL (or set DATABASE_URL)")
	.option("--schema <name>", "PostgreSQL schema (default: config schema or public)")
	.option("--dry-run", "Print the statements without running them")
	.option("-y, --yes", "Skip confirmation prompt")
	.action(async (options: { url?: string; schema?: string; dryRun?: boolean; yes?: boolean }) => {
		p.intro(pc.bgCyan(pc.black(" fundflow migrate push ")));

		const ctx = await loadCommandContext(pushCommand);
		const schema = resolveSchema(ctx, options.schema);
		const statements = generateSchemaSQL(schema);
		const hash = hashSQL(statements);

		if (options.dryRun) {
			p.log.info(renderMigrationSQL(schema));
			p.outro(pc.dim(`${statements.length} statement(s), hash ${hash}. Nothing was applied.`));
			return;
		}

		const client = new pg.Client({ connectionString: resolveDatabaseUrl(ctx, options.url) });

		try {
			await client.connect();
			await ensureMigrationsTable(client, schema);

			if (await isApplied(client, schema, hash)) {
				p.log.success(`${pc.green("Schema is up to date.")} No changes needed.`);
				p.outro(pc.dim(`Schema ${schema} already has migration ${hash}.`));
				return;
			}

			p.log.step(pc.bold("Migration Plan"));
			p.log.info(`  ${pc.green("APPLY")}  ${statements.length} statement(s) to schema ${pc.cyan(schema)}`);

			if (!options.yes) {
				const confirmed = await p.confirm({
					message: "Apply these changes to the database?",
					initialValue: false,
				});

				if (p.isCancel(confirmed) || !confirmed) {
					p.cancel("Migration cancelled.");
					return;
				}
			}

			// PostgreSQL DDL is transactional, so a failed statement undoes the rest.
			const s = p.spinner();
			s.start("Applying migration...");

			await client.query("BEGIN");
			try {
				for (const statement of statements) {
					await client.query(statement);
				}
				const name = `push_${new Date().toISOString().replace(/[:.]/g, "-").slice(0, 19)}`;
				await client.query(`INSERT INTO ${migrationsTable(schema)} (name, hash) VALUES ($1, $2)`, [
					name,
					hash,
				]);
				await client.query("COMMIT");
			} catch (ddlError) {
				await client.query("ROLLBACK").catch((rollbackError: unknown) => {
					p.log.warn(`Rollback failed: ${String(rollbackError)}`);
				});
				throw ddlError;
			}

			s.stop(`Applied ${pc.cyan(String(statements.length))} statement(s)`);
			p.outro(pc.green("Migration completed successfully!"));
		} finally {
			await client.end();
		}
	});

// =============================================================================
// SQL COMMAND -- print or write the migration script
// =============================================================================

const sqlCommand = new Command("sql")
	.description("Print the schema SQL, or write it to a file")
	.option("--schema <name>", "PostgreSQL schema (default: config schema or public)")
	.option("-o, --out <file>", "Write the SQL to this file instead of stdout")
	.action(async (options: { schema?: string; out?: string }) => {
		const ctx = await loadCommandContext(sqlCommand);
		const sql = renderMigrationSQL(resolveSchema(ctx, options.schema));

		if (!options.out) {
			process.stdout.write(sql);
			return;
		}

		const target = resolve(ctx.cwd, options.out);
		writeFileSync(target, sql);
		p.log.success(`Wrote ${pc.cyan(target)}`);
	});

// =============================================================================
// MIGRATE COMMAND
// =============================================================================

export const migrateCommand = new Command("migrate")
	.description("Manage the fundflow database schema")
	.addCommand(pushCommand)
	.addCommand(sqlCommand);
