// =============================================================================
// CONNECTION POOL
// =============================================================================

import {
	createPooledAdapterResult,
	type PooledAdapterResult,
	type PoolLike,
	transferPoolConfig,
} from "@fundflow/core/db";
import { Kysely, PostgresDialect } from "kysely";
import pg from "pg";
import { type KyselyAdapterOptions, kyselyAdapter } from "./adapter.js";

export type { PooledAdapterResult, PoolLike, PoolStats } from "@fundflow/core/db";
export { RECOMMENDED_POOL_CONFIG, transferPoolConfig } from "@fundflow/core/db";

export interface KyselyPooledAdapterConfig<DB> extends KyselyAdapterOptions {
	/** A pg.Pool instance (or compatible pool) */
	pool: PoolLike;
	/** A Kysely database instance created from the same pool */
	db: Kysely<DB>;
}

/**
 * Wrap a pool + Kysely instance into an adapter with pool stats and shutdown.
 *
 * @example
 * ```ts
 * const pool = new Pool({ ...RECOMMENDED_POOL_CONFIG, connectionString: process.env.DATABASE_URL });
 * const db = new Kysely<Database>({ dialect: new PostgresDialect({ pool }) });
 * const { adapter, close } = createPooledAdapter({ pool, db });
 * ```
 */
export function createPooledAdapter<DB>(config: KyselyPooledAdapterConfig<DB>): PooledAdapterResult {
	const { pool, db, schema } = config;
	return createPooledAdapterResult(kyselyAdapter(db, { schema }), pool, () => db.destroy());
}

/**
 * Open a pg pool on `connectionString` with the recommended settings and
 * return a pooled adapter over it.
 */
export function connectPostgres(
	connectionString: string,
	options: KyselyAdapterOptions & {
		max?: number;
		lockTimeoutMs?: number;
		onError?: (error: Error) => void;
	} = {},
): PooledAdapterResult {
	const pool = new pg.Pool({
		...transferPoolConfig({ max: options.max, lockTimeoutMs: options.lockTimeoutMs }),
		connectionString,
	});
	// Idle clients error when the server drops them; the next checkout reconnects.
	pool.on("error", (error) => {
		if (options.onError) options.onError(error);
		else console.error("[fundflow] idle PostgreSQL client error", error);
	});
	const db = new Kysely<Record<string, never>>({ dialect: new PostgresDialect({ pool }) });
	return createPooledAdapter({ pool, db, schema: options.schema });
}
