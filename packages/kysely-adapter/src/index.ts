export { buildKyselySql, type KyselyAdapterOptions, kyselyAdapter } from "./adapter.js";
export {
	connectPostgres,
	createPooledAdapter,
	type KyselyPooledAdapterConfig,
	type PooledAdapterResult,
	type PoolLike,
	type PoolStats,
	RECOMMENDED_POOL_CONFIG,
	transferPoolConfig,
} from "./pool.js";
