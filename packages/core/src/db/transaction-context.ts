// =============================================================================
// AFTER-COMMIT HOOKS
// =============================================================================
// Work queued from inside a unit of work runs once the outermost unit has
// committed. Hooks from a unit that throws are dropped with it.

import { AsyncLocalStorage } from "node:async_hooks";

type AfterCommitCallback = () => void | Promise<void>;

interface QueuedHook {
	label: string;
	run: AfterCommitCallback;
}

const storage = new AsyncLocalStorage<QueuedHook[]>();

/**
 * Queue `cb` to run after the current unit of work commits. Outside a unit
 * the hook is ignored.
 *
 * @param label - Names the hook when it fails.
 *
 * @example
 * ```ts
 * queueAfterTransactionHook(() => {
 *   logger.info("Transfer committed", { transactionId });
 * }, "transfer-log");
 * ```
 */
export function queueAfterTransactionHook(cb: AfterCommitCallback, label = "after-commit"): void {
	storage.getStore()?.push({ label, run: cb });
}

/**
 * Run `fn` with its own hook queue. When `fn` resolves the queue drains in
 * order, unless `fn` runs inside another unit: its hooks then wait for the
 * outer unit.
 *
 * @param onCallbackError - Receives each failing hook's error and label.
 *   Without it, failures go to stderr.
 */
export async function runWithTransactionContext<T>(
	fn: () => Promise<T>,
	onCallbackError?: (error: unknown, label: string) => void,
): Promise<T> {
	const outer = storage.getStore();
	const hooks: QueuedHook[] = [];

	const result = await storage.run(hooks, fn);

	if (outer) {
		outer.push(...hooks);
		return result;
	}

	for (const hook of hooks) {
		try {
			await hook.run();
		} catch (error) {
			if (onCallbackError) onCallbackError(error, hook.label);
			else console.error(`[fundflow] after-commit hook "${hook.label}" failed`, error);
		}
	}

	return result;
}
