// =============================================================================
// ROW LOCKS - exclusive, re-entrant per-row locks held until a unit ends
// =============================================================================
// Stands in for PostgreSQL's SELECT ... FOR UPDATE. Waiters queue FIFO and
// give up after their unit's lock timeout with SQLSTATE 55P03, the same code
// the real store raises, so callers classify both identically.

export class LockNotAvailableError extends Error {
	readonly code = "55P03";

	constructor(message: string) {
		super(message);
		this.name = "LockNotAvailableError";
	}
}

interface Waiter {
	owner: symbol;
	grant: () => void;
}

interface LockEntry {
	owner: symbol;
	queue: Waiter[];
}

export interface AcquireOptions {
	timeoutMs: number;
	/** Fail at once instead of queueing (FOR UPDATE NOWAIT) */
	noWait?: boolean;
	/** Error to reject with when `timeoutMs` passes. Default: a lock timeout (55P03) */
	timeoutError?: () => Error;
}

export interface RowLocks {
	acquire(key: string, owner: symbol, options: AcquireOptions): Promise<void>;
	releaseAll(owner: symbol): void;
	/** Keys currently held, for diagnostics and tests */
	held(): string[];
}

export function createRowLocks(): RowLocks {
	const locks = new Map<string, LockEntry>();
	const ownedKeys = new Map<symbol, Set<string>>();

	function recordOwnership(owner: symbol, key: string) {
		let keys = ownedKeys.get(owner);
		if (!keys) {
			keys = new Set();
			ownedKeys.set(owner, keys);
		}
		keys.add(key);
	}

	function handOff(key: string, entry: LockEntry) {
		const next = entry.queue.shift();
		if (!next) {
			locks.delete(key);
			return;
		}
		entry.owner = next.owner;
		recordOwnership(next.owner, key);
		next.grant();
	}

	return {
		acquire(key, owner, { timeoutMs, noWait, timeoutError }) {
			const entry = locks.get(key);
			if (!entry) {
				locks.set(key, { owner, queue: [] });
				recordOwnership(owner, key);
				return Promise.resolve();
			}
			if (entry.owner === owner) return Promise.resolve();
			if (noWait) {
				return Promise.reject(new LockNotAvailableError(`could not obtain lock on row ${key}`));
			}

			return new Promise<void>((resolve, reject) => {
				const waiter: Waiter = {
					owner,
					grant: () => {
						clearTimeout(timer);
						resolve();
					},
				};
				const timer = setTimeout(() => {
					const index = entry.queue.indexOf(waiter);
					if (index !== -1) entry.queue.splice(index, 1);
					reject(
						timeoutError
							? timeoutError()
							: new LockNotAvailableError("canceling statement due to lock timeout"),
					);
				}, timeoutMs);
				entry.queue.push(waiter);
			});
		},

		releaseAll(owner) {
			const keys = ownedKeys.get(owner);
			if (!keys) return;
			ownedKeys.delete(owner);
			for (const key of keys) {
				const entry = locks.get(key);
				if (entry && entry.owner === owner) handOff(key, entry);
			}
		},

		held() {
			return [...locks.keys()];
		},
	};
}
