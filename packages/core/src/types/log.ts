export type AuditOperationType = "BALANCE_UPDATE";

export interface AuditLogEntry {
	id: string;
	accountId: string;
	/** Transaction whose unit of work produced this mutation */
	transactionId: string;
	oldBalance: number;
	newBalance: number;
	/** Account version this mutation produced; orders entries per account */
	accountVersion: number;
	operationType: AuditOperationType;
	changedAt: Date;
}

export type RecoveryOperationType = "TRANSFER" | "DEPOSIT" | "WITHDRAWAL" | "SIMULATED_FAILURE";

export const RECOVERY_OPERATION_TYPES = [
	"TRANSFER",
	"DEPOSIT",
	"WITHDRAWAL",
	"SIMULATED_FAILURE",
] as const satisfies readonly RecoveryOperationType[];

export interface RecoveryLogEntry {
	id: string;
	operationType: RecoveryOperationType;
	senderAccountId: string | null;
	receiverAccountId: string | null;
	/** Minor units */
	attemptedAmount: number;
	failureReason: string;
	/** FundflowError code of the failure, or null for foreign errors */
	errorCode: string | null;
	/** Sender balance observed when the failure happened, minor units */
	senderBalanceAtFailure: number | null;
	details: Record<string, unknown>;
	failedAt: Date;
}
