export type {
	Account,
	AccountStatus,
	AccountType,
	AuditLogEntry,
	FundflowAdapter,
	FundflowAdvancedOptions,
	FundflowContext,
	FundflowLogger,
	FundflowOptions,
	LockMode,
	RecoveryLogEntry,
	RecoveryOperationType,
	TransactionRecord,
	TransactionStatus,
	TransactionType,
} from "@fundflow/core";
export { decimalToMinor, FundflowError, minorToDecimal } from "@fundflow/core";
export { validateConfig } from "./config/index.js";
export { buildContext, DEFAULT_ADVANCED } from "./context/context.js";
export { type Fundflow, createFundflow } from "./fundflow/base.js";
export { withUnitOfWork, type UnitOfWorkOptions } from "./infrastructure/unit-of-work.js";
export { generateAccountNumber } from "./managers/account-number.js";
export { checkSufficientBalance, OVERDRAFT_ALLOWED } from "./managers/balance-check.js";
export type { AuditTrailResult, IntegrityReport } from "./managers/integrity.js";
export type { RecordRecoveryParams } from "./managers/recovery-recorder.js";
export type {
	AccountSnapshot,
	BranchSummary,
	CustomerOverview,
	FundflowSummary,
} from "./managers/reporting.js";
export type { SimulatedFailureResult, TransferFundsParams } from "./managers/transfer-gateway.js";
