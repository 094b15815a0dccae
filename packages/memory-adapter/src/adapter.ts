// =============================================================================
// MEMORY ADAPTER - FundflowAdapter backed by in-memory Maps
// =============================================================================
// For tests and demos; no external database required. Each unit of work
// writes into a private overlay that is applied on commit and dropped on
// rollback, so concurrent units never see each other's uncommitted rows.
// Reads see committed data as of each statement (read committed); row locks
// from `findOne({ forUpdate })` and `update` are held until the unit ends.
// Only a lock wait can make a statement slow here, so `statementTimeoutMs`
// bounds lock waits: past it the statement fails with 57014, as in PostgreSQL.

import type {
	FundflowAdapter,
	FundflowAdapterOptions,
	FundflowTransactionAdapter,
	Row,
	TransactionOptions,
	Where,
} from "@fundflow/core/db";
import { generateId } from "@fundflow/core/utils";
import { matchesAll, sortRows } from "./filter.js";
import { createRowLocks, type RowLocks } from "./row-locks.js";

// =============================================================================
// INTERNAL TYPES
// =============================================================================

type Table = Map<string, Row>;
type Store = Map<string, Table>;

interface UnitOfWork {
	owner: symbol;
	/** model -> id -> row written by this unit */
	writes: Map<string, Table>;
	lockTimeoutMs: number;
	statementTimeoutMs?: number;
	finished: boolean;
}

export interface MemoryAdapterOptions {
	/** Lock wait used when a unit of work does not set one. Default: 3000 */
	lockTimeoutMs?: number;
	/** Fields that must be unique per model, e.g. `{ accounts: ["accountNumber"] }` */
	uniqueFields?: Record<string, string[]>;
}

/** Same SQLSTATE PostgreSQL reports for a cancelled statement. */
class StatementTimeoutError extends Error {
	readonly code = "57014";

	constructor() {
		super("canceling statement due to statement timeout");
		this.name = "StatementTimeoutError";
	}
}

/** Same SQLSTATE PostgreSQL reports for a unique violation. */
class UniqueViolationError extends Error {
	readonly code = "23505";

	constructor(message: string) {
		super(message);
		this.name = "UniqueViolationError";
	}
}

// =============================================================================
// STORE HELPERS
// =============================================================================

function getTable(tables: Map<string, Table>, model: string): Table {
	let table = tables.get(model);
	if (!table) {
		table = new Map();
		tables.set(model, table);
	}
	return table;
}

function copy(row: Row): Row {
	return structuredClone(row);
}

function rowId(row: Row): string {
	const { id } = row;
	if (typeof id !== "string" || id.length === 0) {
		throw new TypeError("Memory adapter rows need a string id");
	}
	return id;
}

// =============================================================================
// ADAPTER METHODS BUILDER
// =============================================================================

function buildAdapterMethods(
	store: Store,
	locks: RowLocks,
	unit: UnitOfWork,
	uniqueFields: Record<string, string[]>,
): Omit<FundflowTransactionAdapter, "id" | "options"> {
	function assertOpen() {
		if (unit.finished) {
			throw new Error("Unit of work has already finished");
		}
	}

	/** Committed rows overlaid with this unit's own writes. */
	function visibleRows(model: string): Row[] {
		const base = store.get(model) ?? new Map<string, Row>();
		const own = unit.writes.get(model);
		if (!own || own.size === 0) return [...base.values()];

		const rows = [...base.values()].map((row) => own.get(rowId(row)) ?? row);
		for (const [id, row] of own) {
			if (!base.has(id)) rows.push(row);
		}
		return rows;
	}

	function readRow(model: string, id: string): Row | undefined {
		return unit.writes.get(model)?.get(id) ?? store.get(model)?.get(id);
	}

	function checkUnique(model: string, row: Row) {
		const id = rowId(row);
		for (const existing of visibleRows(model)) {
			const existingId = rowId(existing);
			if (existingId === id) {
				throw new UniqueViolationError(`duplicate key value violates primary key on ${model}: ${id}`);
			}
			for (const field of uniqueFields[model] ?? []) {
				if (row[field] !== undefined && existing[field] === row[field]) {
					throw new UniqueViolationError(
						`duplicate key value violates unique constraint on ${model}.${field}`,
					);
				}
			}
		}
	}

	/** Lock the first row matching `where`, then re-check it against the latest committed state. */
	async function lockFirstMatch(model: string, where: Where[], noWait?: boolean): Promise<Row | null> {
		const first = visibleRows(model).find((row) => matchesAll(row, where));
		if (!first) return null;

		const id = rowId(first);
		const { lockTimeoutMs, statementTimeoutMs } = unit;
		if (statementTimeoutMs !== undefined && statementTimeoutMs < lockTimeoutMs) {
			await locks.acquire(`${model}:${id}`, unit.owner, {
				timeoutMs: statementTimeoutMs,
				noWait,
				timeoutError: () => new StatementTimeoutError(),
			});
		} else {
			await locks.acquire(`${model}:${id}`, unit.owner, { timeoutMs: lockTimeoutMs, noWait });
		}
		assertOpen();

		const latest = readRow(model, id);
		if (!latest || !matchesAll(latest, where)) return null;
		return latest;
	}

	return {
		create: async ({ model, data }) => {
			assertOpen();
			const row: Row = { ...data };
			if (row.id === undefined || row.id === null) {
				row.id = generateId();
			}
			checkUnique(model, row);
			getTable(unit.writes, model).set(rowId(row), copy(row));
			return copy(row);
		},

		findOne: async ({ model, where, forUpdate, noWait }) => {
			assertOpen();
			if (forUpdate) {
				const locked = await lockFirstMatch(model, where, noWait);
				return locked ? copy(locked) : null;
			}
			const match = visibleRows(model).find((row) => matchesAll(row, where));
			return match ? copy(match) : null;
		},

		findMany: async ({ model, where, limit, offset, sortBy }) => {
			assertOpen();
			let results = visibleRows(model).filter((row) => matchesAll(row, where ?? []));

			if (sortBy) {
				results = sortRows(results, sortBy);
			}
			if (offset !== undefined) {
				results = results.slice(offset);
			}
			if (limit !== undefined) {
				results = results.slice(0, limit);
			}

			return results.map(copy);
		},

		update: async ({ model, where, update }) => {
			assertOpen();
			const locked = await lockFirstMatch(model, where);
			if (!locked) return null;

			const updated: Row = { ...locked, ...update, id: locked.id };
			getTable(unit.writes, model).set(rowId(updated), copy(updated));
			return copy(updated);
		},

		count: async ({ model, where }) => {
			assertOpen();
			return visibleRows(model).filter((row) => matchesAll(row, where ?? [])).length;
		},
	};
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Create a FundflowAdapter backed by an in-memory store.
 *
 * @example
 * ```ts
 * import { memoryAdapter } from "@fundflow/memory-adapter";
 * import { createFundflow } from "fundflow";
 *
 * const fundflow = createFundflow({ database: memoryAdapter() });
 * ```
 */
export function memoryAdapter(options: MemoryAdapterOptions = {}): FundflowAdapter {
	const store: Store = new Map();
	const locks = createRowLocks();
	const defaultLockTimeoutMs = options.lockTimeoutMs ?? 3000;
	const uniqueFields = options.uniqueFields ?? {};
	// Per instance: createFundflow writes the configured schema into it.
	const adapterOptions: FundflowAdapterOptions = { supportsForUpdate: true, dialectName: "memory" };

	function commit(unit: UnitOfWork) {
		// A concurrent unit may have committed the same unique value since this one checked.
		for (const [model, rows] of unit.writes) {
			const committed = store.get(model);
			if (!committed) continue;
			for (const [id, row] of rows) {
				for (const field of uniqueFields[model] ?? []) {
					for (const [otherId, other] of committed) {
						if (otherId !== id && row[field] !== undefined && other[field] === row[field]) {
							throw new UniqueViolationError(
								`duplicate key value violates unique constraint on ${model}.${field}`,
							);
						}
					}
				}
			}
		}

		for (const [model, rows] of unit.writes) {
			const table = getTable(store, model);
			for (const [id, row] of rows) {
				table.set(id, row);
			}
		}
	}

	async function transaction<T>(
		fn: (tx: FundflowTransactionAdapter) => Promise<T>,
		txOptions?: TransactionOptions,
	): Promise<T> {
		const unit: UnitOfWork = {
			owner: Symbol("unit-of-work"),
			writes: new Map(),
			lockTimeoutMs: txOptions?.lockTimeoutMs ?? defaultLockTimeoutMs,
			statementTimeoutMs: txOptions?.statementTimeoutMs,
			finished: false,
		};

		try {
			const result = await fn({
				id: "memory",
				...buildAdapterMethods(store, locks, unit, uniqueFields),
				options: adapterOptions,
			});
			commit(unit);
			return result;
		} finally {
			unit.finished = true;
			locks.releaseAll(unit.owner);
		}
	}

	return {
		id: "memory",
		// Outside an explicit unit, every call is its own single-statement unit.
		create: (args) => transaction((tx) => tx.create(args)),
		findOne: (args) => transaction((tx) => tx.findOne(args)),
		findMany: (args) => transaction((tx) => tx.findMany(args)),
		update: (args) => transaction((tx) => tx.update(args)),
		count: (args) => transaction((tx) => tx.count(args)),
		transaction,
		options: adapterOptions,
	};
}
