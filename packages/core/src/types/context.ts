import type { FundflowAdapter } from "../db/adapter.js";
import type { FundflowLogger, LockMode } from "./config.js";

export interface FundflowContext {
	adapter: FundflowAdapter;
	options: ResolvedFundflowOptions;
	logger: FundflowLogger;
	clock: () => Date;
}

export interface ResolvedFundflowOptions {
	currency: string;
	schema: string;
	advanced: ResolvedAdvancedOptions;
}

export interface ResolvedAdvancedOptions {
	transactionTimeoutMs: number;
	lockTimeoutMs: number;
	maxTransactionAmount: number;
	lockRetryCount: number;
	lockRetryBaseDelayMs: number;
	lockRetryMaxDelayMs: number;
	lockMode: LockMode;
	optimisticRetryCount: number;
}
