// =============================================================================
// SCHEMA DEFINITIONS
// =============================================================================
// Table definitions for the account store. Keys are the SQL table names the
// adapters receive as `model`; column names are snake_case.

import type { TableDefinition } from "@fundflow/core";
import { toCamelCase } from "@fundflow/core/db";

export const MODELS = {
	accounts: "accounts",
	transactions: "transactions",
	auditLogs: "audit_logs",
	recoveryLogs: "recovery_logs",
} as const;

export type ModelName = (typeof MODELS)[keyof typeof MODELS];

const TABLES: Record<ModelName, TableDefinition> = {
	accounts: {
		columns: {
			id: { type: "uuid", primaryKey: true, notNull: true },
			account_number: { type: "text", notNull: true, unique: true },
			customer_id: { type: "text", notNull: true },
			branch_id: { type: "text" },
			account_type: {
				type: "text",
				notNull: true,
				check: `"account_type" IN ('SAVINGS', 'CHECKING')`,
			},
			balance: { type: "bigint", notNull: true, default: "0", check: `"balance" >= 0` },
			status: {
				type: "text",
				notNull: true,
				default: "'ACTIVE'",
				check: `"status" IN ('ACTIVE', 'FROZEN', 'CLOSED')`,
			},
			version: { type: "integer", notNull: true, default: "1" },
			opened_at: { type: "timestamp", notNull: true, default: "NOW()" },
			updated_at: { type: "timestamp", notNull: true, default: "NOW()" },
		},
		indexes: [{ name: "idx_accounts_customer", columns: ["customer_id"] }],
	},
	transactions: {
		columns: {
			id: { type: "uuid", primaryKey: true, notNull: true },
			type: {
				type: "text",
				notNull: true,
				check: `"type" IN ('TRANSFER', 'DEPOSIT', 'WITHDRAWAL')`,
			},
			amount: { type: "bigint", notNull: true, check: `"amount" > 0` },
			sender_account_id: { type: "uuid", references: { table: "accounts", column: "id" } },
			receiver_account_id: { type: "uuid", references: { table: "accounts", column: "id" } },
			description: { type: "text", notNull: true, default: "''" },
			status: {
				type: "text",
				notNull: true,
				default: "'COMPLETED'",
				check: `"status" IN ('COMPLETED', 'REVERSED')`,
			},
			created_at: { type: "timestamp", notNull: true, default: "NOW()" },
		},
		indexes: [
			{ name: "idx_transactions_sender", columns: ["sender_account_id", "created_at"] },
			{ name: "idx_transactions_receiver", columns: ["receiver_account_id", "created_at"] },
		],
		appendOnly: true,
	},
	audit_logs: {
		columns: {
			id: { type: "uuid", primaryKey: true, notNull: true },
			account_id: {
				type: "uuid",
				notNull: true,
				references: { table: "accounts", column: "id" },
			},
			transaction_id: {
				type: "uuid",
				notNull: true,
				references: { table: "transactions", column: "id" },
			},
			old_balance: { type: "bigint", notNull: true },
			new_balance: { type: "bigint", notNull: true },
			account_version: { type: "integer", notNull: true },
			operation_type: { type: "text", notNull: true, default: "'BALANCE_UPDATE'" },
			changed_at: { type: "timestamp", notNull: true, default: "NOW()" },
		},
		indexes: [
			{
				name: "uq_audit_logs_account_version",
				columns: ["account_id", "account_version"],
				unique: true,
			},
		],
		appendOnly: true,
	},
	recovery_logs: {
		columns: {
			id: { type: "uuid", primaryKey: true, notNull: true },
			operation_type: { type: "text", notNull: true },
			sender_account_id: { type: "uuid" },
			receiver_account_id: { type: "uuid" },
			attempted_amount: { type: "bigint", notNull: true },
			failure_reason: { type: "text", notNull: true },
			error_code: { type: "text" },
			sender_balance_at_failure: { type: "bigint" },
			details: { type: "jsonb", notNull: true, default: "'{}'" },
			failed_at: { type: "timestamp", notNull: true, default: "NOW()" },
		},
		indexes: [{ name: "idx_recovery_logs_failed_at", columns: ["failed_at"] }],
		appendOnly: true,
	},
};

/** Every table, in dependency order (referenced tables first). */
export function getFundflowTables(): Record<ModelName, TableDefinition> {
	return TABLES;
}

/** Fields the store must keep unique beyond the primary key, by model. */
export function getUniqueFields(): Record<string, string[]> {
	const result: Record<string, string[]> = {};
	for (const [model, def] of Object.entries(TABLES)) {
		const fields = Object.entries(def.columns)
			.filter(([, col]) => col.unique)
			.map(([name]) => toCamelCase(name));
		if (fields.length > 0) result[model] = fields;
	}
	return result;
}
