// =============================================================================
// CONTEXT BUILDER
// =============================================================================
// Builds FundflowContext from FundflowOptions. Resolves the adapter and the
// logger, and merges advanced options over the defaults.

import type {
	FundflowAdapter,
	FundflowContext,
	FundflowOptions,
	ResolvedAdvancedOptions,
} from "@fundflow/core";
import { createConsoleLogger } from "@fundflow/core/logger";
import { validateConfig } from "../config/index.js";

export const DEFAULT_ADVANCED: ResolvedAdvancedOptions = {
	transactionTimeoutMs: 5000,
	lockTimeoutMs: 3000,
	maxTransactionAmount: 1_000_000_000_00,
	lockRetryCount: 2,
	lockRetryBaseDelayMs: 50,
	lockRetryMaxDelayMs: 500,
	lockMode: "wait",
	optimisticRetryCount: 3,
};

export async function buildContext(options: FundflowOptions): Promise<FundflowContext> {
	validateConfig(options);

	const adapter: FundflowAdapter =
		typeof options.database === "function" ? options.database() : options.database;

	const logger = options.logger ?? createConsoleLogger();

	const advanced: ResolvedAdvancedOptions = {
		...DEFAULT_ADVANCED,
		...(options.advanced ?? {}),
	};

	if (advanced.lockMode !== "optimistic" && adapter.options?.supportsForUpdate === false) {
		logger.warn("Adapter has no row locks; falling back to optimistic lock mode", {
			adapter: adapter.id,
			lockMode: advanced.lockMode,
		});
		advanced.lockMode = "optimistic";
	}

	const schema = options.schema ?? adapter.options?.schema ?? "public";
	// Adapters qualify table names from their own options.
	if (adapter.options) {
		adapter.options.schema = schema;
	}

	return {
		adapter,
		options: {
			currency: options.currency ?? "USD",
			schema,
			advanced,
		},
		logger,
		clock: options.clock ?? (() => new Date()),
	};
}
