// =============================================================================
// UNIT OF WORK
// =============================================================================
// Runs an operation inside one adapter transaction with lock and statement
// timeouts. Lock contention is retried with exponential backoff; a store that
// has gone away is reported at once.

import type { FundflowContext, FundflowTransactionAdapter } from "@fundflow/core";
import { FundflowError } from "@fundflow/core";
import {
	classifyStoreError,
	runWithTransactionContext,
	type StoreErrorKind,
} from "@fundflow/core/db";

export interface UnitOfWorkOptions {
	statementTimeoutMs?: number;
	lockTimeoutMs?: number;
}

export async function withUnitOfWork<T>(
	ctx: FundflowContext,
	operation: (tx: FundflowTransactionAdapter) => Promise<T>,
	options?: UnitOfWorkOptions,
): Promise<T> {
	const { advanced } = ctx.options;
	// Optimistic mode retries version conflicts; pessimistic modes retry lock timeouts.
	const retryCount =
		advanced.lockMode === "optimistic" ? advanced.optimisticRetryCount : advanced.lockRetryCount;
	const baseDelay = advanced.lockRetryBaseDelayMs;
	const maxDelay = advanced.lockRetryMaxDelayMs;

	for (let attempt = 0; ; attempt++) {
		try {
			return await executeUnit(ctx, operation, options);
		} catch (err) {
			const kind = classifyFailure(err);

			if (kind === "unavailable") {
				throw FundflowError.storeUnavailable(undefined, err);
			}
			if (kind !== "retryable") {
				throw err;
			}
			if (attempt >= retryCount) {
				throw FundflowError.is(err, "CONCURRENCY_CONFLICT")
					? err
					: FundflowError.concurrencyConflict(undefined, err);
			}

			const delay = Math.min(baseDelay * 2 ** attempt, maxDelay);
			const jitter = delay * (0.5 + Math.random());
			ctx.logger.debug("Unit of work retry due to lock contention", {
				attempt: attempt + 1,
				maxRetries: retryCount,
				delayMs: Math.round(jitter),
			});
			await new Promise((resolve) => setTimeout(resolve, jitter));
		}
	}
}

function executeUnit<T>(
	ctx: FundflowContext,
	operation: (tx: FundflowTransactionAdapter) => Promise<T>,
	options?: UnitOfWorkOptions,
): Promise<T> {
	const statementTimeoutMs = options?.statementTimeoutMs ?? ctx.options.advanced.transactionTimeoutMs;
	const lockTimeoutMs = options?.lockTimeoutMs ?? ctx.options.advanced.lockTimeoutMs;

	return runWithTransactionContext(
		() => ctx.adapter.transaction(operation, { statementTimeoutMs, lockTimeoutMs }),
		(error, hook) => {
			ctx.logger.error("After-commit callback failed", {
				hook,
				error: error instanceof Error ? error.message : String(error),
			});
		},
	);
}

/** Our own version conflicts are retryable; every other FundflowError is final. */
function classifyFailure(err: unknown): StoreErrorKind {
	if (err instanceof FundflowError) {
		return err.code === "CONCURRENCY_CONFLICT" ? "retryable" : "unknown";
	}
	return classifyStoreError(err);
}
