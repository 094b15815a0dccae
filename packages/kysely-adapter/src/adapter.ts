// =============================================================================
// KYSELY ADAPTER - FundflowAdapter implementation backed by Kysely
// =============================================================================
// Uses raw SQL via Kysely's `sql` template for all operations, which keeps
// full control over row locking, RETURNING and per-unit session settings.

import {
	buildWhereClause,
	createTableResolver,
	type FundflowAdapter,
	type FundflowAdapterOptions,
	type FundflowTransactionAdapter,
	keysToCamel,
	keysToSnake,
	type Row,
	type TransactionOptions,
	toSnakeCase,
} from "@fundflow/core/db";
import { type Kysely, type RawBuilder, sql, type Transaction } from "kysely";

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

/**
 * Build a Kysely sql template from a query string with $N placeholders.
 * Converts `$1, $2` style placeholders + params into bound parameters.
 */
export function buildKyselySql<R>(query: string, params: unknown[]): RawBuilder<R> {
	const chunks: RawBuilder<unknown>[] = [];
	let lastIdx = 0;
	const regex = /\$(\d+)/g;

	for (const match of query.matchAll(regex)) {
		const index = match.index ?? 0;
		if (index > lastIdx) {
			chunks.push(sql.raw(query.slice(lastIdx, index)));
		}
		const paramIndex = Number(match[1]) - 1;
		chunks.push(sql`${params[paramIndex]}`);
		lastIdx = index + match[0].length;
	}

	if (lastIdx < query.length) {
		chunks.push(sql.raw(query.slice(lastIdx)));
	}

	return sql<R>`${sql.join(chunks, sql.raw(""))}`;
}

// =============================================================================
// ADAPTER METHODS BUILDER
// =============================================================================

function buildAdapterMethods<DB>(
	db: Kysely<DB> | Transaction<DB>,
	table: (model: string) => string,
): Omit<FundflowTransactionAdapter, "id" | "options"> {
	async function rows(query: string, params: unknown[]): Promise<Row[]> {
		const result = await buildKyselySql<Row>(query, params).execute(db);
		return result.rows.map(keysToCamel);
	}

	return {
		create: async ({ model, data }) => {
			const snakeData = keysToSnake(data);
			const columns = Object.keys(snakeData);
			const values = Object.values(snakeData);

			if (columns.length === 0) {
				throw new Error(`Cannot insert empty data into ${model}`);
			}

			const columnList = columns.map((c) => `"${c}"`).join(", ");
			const placeholders = columns.map((_, i) => `$${i + 1}`).join(", ");
			const [row] = await rows(
				`INSERT INTO ${table(model)} (${columnList}) VALUES (${placeholders}) RETURNING *`,
				values,
			);
			if (!row) {
				throw new Error(`Insert into ${model} returned no rows`);
			}
			return row;
		},

		findOne: async ({ model, where, forUpdate, noWait }) => {
			const { clause, params } = buildWhereClause(where);
			let query = `SELECT * FROM ${table(model)} WHERE ${clause} LIMIT 1`;
			if (forUpdate) {
				query += noWait ? " FOR UPDATE NOWAIT" : " FOR UPDATE";
			}
			const [row] = await rows(query, params);
			return row ?? null;
		},

		findMany: async ({ model, where, limit, offset, sortBy }) => {
			const { clause, params } = buildWhereClause(where ?? []);
			let query = `SELECT * FROM ${table(model)} WHERE ${clause}`;

			if (sortBy) {
				const dir = sortBy.direction === "desc" ? "DESC" : "ASC";
				query += ` ORDER BY "${toSnakeCase(sortBy.field)}" ${dir}`;
			}
			if (limit !== undefined) {
				params.push(limit);
				query += ` LIMIT $${params.length}`;
			}
			if (offset !== undefined) {
				params.push(offset);
				query += ` OFFSET $${params.length}`;
			}

			return rows(query, params);
		},

		update: async ({ model, where, update }) => {
			const snakeData = keysToSnake(update);
			const setCols = Object.keys(snakeData);

			if (setCols.length === 0) {
				throw new Error(`Cannot update ${model} with empty data`);
			}

			const setClause = setCols.map((c, i) => `"${c}" = $${i + 1}`).join(", ");
			const { clause, params } = buildWhereClause(where, setCols.length + 1);

			const query = `UPDATE ${table(model)} SET ${setClause} WHERE ${clause} RETURNING *`;
			const [row] = await rows(query, [...Object.values(snakeData), ...params]);
			return row ?? null;
		},

		count: async ({ model, where }) => {
			const { clause, params } = buildWhereClause(where ?? []);
			const result = await buildKyselySql<{ count: number }>(
				`SELECT COUNT(*)::int AS count FROM ${table(model)} WHERE ${clause}`,
				params,
			).execute(db);
			return result.rows[0]?.count ?? 0;
		},
	};
}

// =============================================================================
// PUBLIC API
// =============================================================================

export interface KyselyAdapterOptions {
	/** PostgreSQL schema holding the tables. Default: "public" */
	schema?: string;
}

/**
 * Create a FundflowAdapter backed by a Kysely database instance.
 *
 * Units of work run at READ COMMITTED; isolation between concurrent
 * transfers comes from `SELECT ... FOR UPDATE` on the account rows.
 *
 * @example
 * ```ts
 * import { Kysely, PostgresDialect } from "kysely";
 * import { Pool } from "pg";
 * import { kyselyAdapter } from "@fundflow/kysely-adapter";
 *
 * const db = new Kysely({ dialect: new PostgresDialect({ pool: new Pool({ connectionString: process.env.DATABASE_URL }) }) });
 * const adapter = kyselyAdapter(db, { schema: "banking" });
 * ```
 */
export function kyselyAdapter<DB>(db: Kysely<DB>, options: KyselyAdapterOptions = {}): FundflowAdapter {
	const adapterOptions: FundflowAdapterOptions = {
		supportsForUpdate: true,
		dialectName: "postgres",
		schema: options.schema ?? "public",
	};
	// Read on every call: createFundflow may set the schema after construction.
	const table = (model: string) => createTableResolver(adapterOptions.schema ?? "public")(model);

	return {
		id: "kysely",
		...buildAdapterMethods(db, table),

		transaction: <T>(
			fn: (tx: FundflowTransactionAdapter) => Promise<T>,
			txOptions?: TransactionOptions,
		): Promise<T> => {
			return db
				.transaction()
				.setIsolationLevel("read committed")
				.execute(async (trx) => {
					if (txOptions?.lockTimeoutMs !== undefined) {
						await sql`SELECT set_config('lock_timeout', ${`${txOptions.lockTimeoutMs}ms`}, true)`.execute(trx);
					}
					if (txOptions?.statementTimeoutMs !== undefined) {
						await sql`SELECT set_config('statement_timeout', ${`${txOptions.statementTimeoutMs}ms`}, true)`.execute(trx);
					}
					return fn({ id: "kysely", ...buildAdapterMethods(trx, table), options: adapterOptions });
				});
		},

		options: adapterOptions,
	};
}
