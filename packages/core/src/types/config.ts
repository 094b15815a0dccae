import type { FundflowAdapter } from "../db/adapter.js";

export interface FundflowOptions {
	/** Database adapter instance or factory function */
	database: FundflowAdapter | (() => FundflowAdapter);

	/** Currency of every account in this deployment (default: "USD") */
	currency?: string;

	/** PostgreSQL schema holding the tables (default: "public") */
	schema?: string;

	/** Timestamp source for transactions, audit and recovery entries */
	clock?: () => Date;

	/** Advanced configuration */
	advanced?: FundflowAdvancedOptions;

	/** Custom logger */
	logger?: FundflowLogger;
}

export type LockMode = "wait" | "nowait" | "optimistic";

export interface FundflowAdvancedOptions {
	/** Statement timeout in ms. Default: 5000 */
	transactionTimeoutMs?: number;
	/** Row lock wait in ms before the unit of work fails. Default: 3000 */
	lockTimeoutMs?: number;
	/** Maximum single operation amount, minor units. Default: 1_000_000_000_00 */
	maxTransactionAmount?: number;
	/** Retries after lock contention (timeout, deadlock, serialization). Default: 2 */
	lockRetryCount?: number;
	/** Base delay in ms between retries (doubled each attempt, plus jitter). Default: 50 */
	lockRetryBaseDelayMs?: number;
	/** Maximum delay in ms between retries. Default: 500 */
	lockRetryMaxDelayMs?: number;
	/**
	 * 'wait' blocks on FOR UPDATE until lockTimeoutMs; 'nowait' fails fast and
	 * retries; 'optimistic' skips FOR UPDATE and retries on version conflict.
	 * Default: 'wait'
	 */
	lockMode?: LockMode;
	/** Retries after an optimistic version conflict. Default: 3 */
	optimisticRetryCount?: number;
}

export interface FundflowLogger {
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
	debug(message: string, data?: Record<string, unknown>): void;
}
