export type AccountStatus = "ACTIVE" | "FROZEN" | "CLOSED";
export type AccountType = "SAVINGS" | "CHECKING";

export const ACCOUNT_STATUSES = ["ACTIVE", "FROZEN", "CLOSED"] as const satisfies readonly AccountStatus[];
export const ACCOUNT_TYPES = ["SAVINGS", "CHECKING"] as const satisfies readonly AccountType[];

export interface Account {
	id: string;
	/** Customer-facing unique number, e.g. `ACC1000000001` */
	accountNumber: string;
	customerId: string;
	branchId: string | null;
	accountType: AccountType;
	/** Settled balance in minor units (cents). Never negative. */
	balance: number;
	status: AccountStatus;
	/** Incremented on every balance or status change */
	version: number;
	openedAt: Date;
	updatedAt: Date;
}

/** Result of applying a signed amount to one account's balance. */
export interface BalanceChange {
	accountId: string;
	oldBalance: number;
	newBalance: number;
	/** Account version after the change */
	version: number;
}
