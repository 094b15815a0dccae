export interface ColumnDefinition {
	type: "text" | "integer" | "bigint" | "boolean" | "timestamp" | "jsonb" | "uuid";
	primaryKey?: boolean;
	notNull?: boolean;
	unique?: boolean;
	/** SQL default expression */
	default?: string;
	references?: { table: string; column: string };
	/** SQL CHECK expression over this column, e.g. `"balance" >= 0` */
	check?: string;
}

export interface TableDefinition {
	columns: Record<string, ColumnDefinition>;
	indexes?: Array<{
		name: string;
		columns: string[];
		unique?: boolean;
	}>;
	/** Reject UPDATE and DELETE at the database level */
	appendOnly?: boolean;
}
