// =============================================================================
// FUNDFLOW ADAPTER INTERFACE
// =============================================================================
// Storage contract for the account store. Every adapter must offer atomic
// multi-row units of work with at least read-committed isolation and explicit
// row locks. Rows cross the boundary as plain camelCase records; managers
// narrow them into typed records.

export interface Where {
	field: string;
	operator: WhereOperator;
	value: unknown;
}

export type WhereOperator =
	| "eq"
	| "ne"
	| "gt"
	| "gte"
	| "lt"
	| "lte"
	| "in"
	| "like"
	| "is_null"
	| "is_not_null";

export interface SortBy {
	field: string;
	direction: "asc" | "desc";
}

/** A stored row, keyed by camelCase field name. */
export type Row = Record<string, unknown>;

export interface TransactionOptions {
	/** Maximum time to wait for a row lock before failing with a lock timeout. */
	lockTimeoutMs?: number;
	/** Maximum time a single statement may run. */
	statementTimeoutMs?: number;
}

export interface FundflowAdapter {
	id: string;

	create(data: { model: string; data: Row }): Promise<Row>;

	/**
	 * Find the first matching row. With `forUpdate` the row is locked until the
	 * enclosing unit of work ends; `noWait` fails immediately instead of
	 * queueing behind another holder.
	 */
	findOne(data: {
		model: string;
		where: Where[];
		forUpdate?: boolean;
		noWait?: boolean;
	}): Promise<Row | null>;

	findMany(data: {
		model: string;
		where?: Where[];
		limit?: number;
		offset?: number;
		sortBy?: SortBy;
	}): Promise<Row[]>;

	/** Update the row matching `where` (callers match on a unique key); null when nothing matched. */
	update(data: { model: string; where: Where[]; update: Row }): Promise<Row | null>;

	count(data: { model: string; where?: Where[] }): Promise<number>;

	transaction<T>(
		fn: (tx: FundflowTransactionAdapter) => Promise<T>,
		options?: TransactionOptions,
	): Promise<T>;

	options?: FundflowAdapterOptions;
}

export type FundflowTransactionAdapter = Omit<FundflowAdapter, "transaction">;

export interface FundflowAdapterOptions {
	supportsForUpdate: boolean;
	dialectName: "postgres" | "memory";
	/** PostgreSQL schema for table name qualification. */
	schema?: string;
}
