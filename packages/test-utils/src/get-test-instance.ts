import type { FundflowAdapter, FundflowAdvancedOptions, FundflowLogger } from "@fundflow/core";
import { createNoopLogger } from "@fundflow/core/logger";
import { memoryAdapter } from "@fundflow/memory-adapter";
import { createFundflow, type Fundflow } from "fundflow";
import { getUniqueFields } from "fundflow/db";

export interface TestInstanceOptions {
	/** Database adapter. Default: a fresh memoryAdapter with the account number constraint */
	adapter?: FundflowAdapter;
	/** Currency. Default: "USD" */
	currency?: string;
	/** Advanced options. Retry delays default to 1ms so contention tests stay fast */
	advanced?: FundflowAdvancedOptions;
	/** Logger. Default: a no-op logger */
	logger?: FundflowLogger;
	/** Timestamp source. Default: a clock that advances 1ms per call */
	clock?: () => Date;
}

export interface TestInstance {
	fundflow: Fundflow;
	adapter: FundflowAdapter;
	clock: () => Date;
}

/**
 * A clock that starts at `start` and moves forward one millisecond per read,
 * so rows written in sequence never share a timestamp.
 */
export function createSteppingClock(start = new Date("2024-01-01T00:00:00.000Z")): () => Date {
	let now = start.getTime();
	return () => new Date(now++);
}

export function createTestAdapter(options: { lockTimeoutMs?: number } = {}): FundflowAdapter {
	return memoryAdapter({ lockTimeoutMs: options.lockTimeoutMs, uniqueFields: getUniqueFields() });
}

export async function getTestInstance(options: TestInstanceOptions = {}): Promise<TestInstance> {
	const adapter = options.adapter ?? createTestAdapter();
	const clock = options.clock ?? createSteppingClock();

	const fundflow = createFundflow({
		database: adapter,
		currency: options.currency ?? "USD",
		clock,
		logger: options.logger ?? createNoopLogger(),
		advanced: {
			lockRetryBaseDelayMs: 1,
			lockRetryMaxDelayMs: 5,
			...options.advanced,
		},
	});

	// Wait for initialization
	await fundflow.$context;

	return { fundflow, adapter, clock };
}
