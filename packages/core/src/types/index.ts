export type { Account, AccountStatus, AccountType, BalanceChange } from "./account.js";
export { ACCOUNT_STATUSES, ACCOUNT_TYPES } from "./account.js";
export type {
	FundflowAdvancedOptions,
	FundflowLogger,
	FundflowOptions,
	LockMode,
} from "./config.js";
export type {
	FundflowContext,
	ResolvedAdvancedOptions,
	ResolvedFundflowOptions,
} from "./context.js";
export type {
	AuditLogEntry,
	AuditOperationType,
	RecoveryLogEntry,
	RecoveryOperationType,
} from "./log.js";
export { RECOVERY_OPERATION_TYPES } from "./log.js";
export type { ColumnDefinition, TableDefinition } from "./schema.js";
export type { TransactionRecord, TransactionStatus, TransactionType } from "./transaction.js";
export { TRANSACTION_STATUSES, TRANSACTION_TYPES } from "./transaction.js";
