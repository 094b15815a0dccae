export type TransactionType = "TRANSFER" | "DEPOSIT" | "WITHDRAWAL";
/** `REVERSED` is part of the stored vocabulary; no operation produces it yet. */
export type TransactionStatus = "COMPLETED" | "REVERSED";

export const TRANSACTION_TYPES = ["TRANSFER", "DEPOSIT", "WITHDRAWAL"] as const satisfies readonly TransactionType[];
export const TRANSACTION_STATUSES = ["COMPLETED", "REVERSED"] as const satisfies readonly TransactionStatus[];

export interface TransactionRecord {
	id: string;
	type: TransactionType;
	/** Minor units, always > 0 */
	amount: number;
	/** Null for deposits */
	senderAccountId: string | null;
	/** Null for withdrawals */
	receiverAccountId: string | null;
	description: string;
	status: TransactionStatus;
	createdAt: Date;
}
