// =============================================================================
// CONNECTION POOL
// =============================================================================

import type { FundflowAdapter } from "./adapter.js";

/** The part of `pg.Pool` a pooled adapter reads. */
export interface PoolLike {
	end(): Promise<void>;
	totalCount: number;
	idleCount: number;
	waitingCount: number;
}

export interface PoolStats {
	totalCount: number;
	idleCount: number;
	/** Clients checked out by an in-flight unit of work */
	activeCount: number;
	/** Callers queued for a connection */
	waitingCount: number;
	/** True when every client is busy and callers are queued */
	saturated: boolean;
}

export interface PooledAdapterResult<A = FundflowAdapter> {
	adapter: A;
	/** Tear down the query builder, then drain the pool. Safe to call twice. */
	close: () => Promise<void>;
	stats: () => PoolStats;
}

/**
 * Defaults for transfer workloads. Units of work are short and hold row
 * locks, so a caller that cannot get a client within 10s gets an error.
 */
export const RECOMMENDED_POOL_CONFIG = {
	max: 20,
	idleTimeoutMillis: 30_000,
	connectionTimeoutMillis: 10_000,
	statement_timeout: 30_000,
} as const;

/**
 * Pool settings for a given lock timeout. A statement must be allowed to
 * outlive the lock wait, otherwise the server cancels it before the lock
 * timeout can be reported as a conflict.
 *
 * @example
 * ```ts
 * const pool = new Pool({ ...transferPoolConfig({ lockTimeoutMs: 5000 }), connectionString });
 * ```
 */
export function transferPoolConfig(options: { max?: number; lockTimeoutMs?: number } = {}) {
	const lockTimeout = options.lockTimeoutMs ?? 0;
	return {
		...RECOMMENDED_POOL_CONFIG,
		max: options.max ?? RECOMMENDED_POOL_CONFIG.max,
		statement_timeout: Math.max(RECOMMENDED_POOL_CONFIG.statement_timeout, lockTimeout * 2),
	};
}

export function getPoolStats(pool: PoolLike): PoolStats {
	const activeCount = pool.totalCount - pool.idleCount;
	return {
		totalCount: pool.totalCount,
		idleCount: pool.idleCount,
		activeCount,
		waitingCount: pool.waitingCount,
		saturated: pool.idleCount === 0 && pool.waitingCount > 0,
	};
}

export function createPooledAdapterResult<A = FundflowAdapter>(
	adapter: A,
	pool: PoolLike,
	destroy?: () => Promise<void>,
): PooledAdapterResult<A> {
	let closing: Promise<void> | null = null;
	const shutdown = async () => {
		// Kysely.destroy() ends the pool it was given; only end it ourselves without one.
		if (destroy) await destroy();
		else await pool.end();
	};
	return {
		adapter,
		close: () => {
			closing ??= shutdown();
			return closing;
		},
		stats: () => getPoolStats(pool),
	};
}
