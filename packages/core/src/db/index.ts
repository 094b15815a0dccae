export type {
	FundflowAdapter,
	FundflowAdapterOptions,
	FundflowTransactionAdapter,
	Row,
	SortBy,
	TransactionOptions,
	Where,
	WhereOperator,
} from "./adapter.js";
export {
	buildWhereClause,
	createTableResolver,
	keysToCamel,
	keysToSnake,
	quoteIdent,
	toCamelCase,
	toSnakeCase,
} from "./adapter-utils.js";
export {
	createPooledAdapterResult,
	getPoolStats,
	type PooledAdapterResult,
	type PoolLike,
	type PoolStats,
	RECOMMENDED_POOL_CONFIG,
	transferPoolConfig,
} from "./pool.js";
export { classifyStoreError, type StoreErrorKind } from "./store-errors.js";
export {
	queueAfterTransactionHook,
	runWithTransactionContext,
} from "./transaction-context.js";
