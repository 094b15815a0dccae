// =============================================================================
// REPORTING -- Read-only views over committed rows
// =============================================================================

import type { Account, AuditLogEntry, FundflowContext, TransactionRecord } from "@fundflow/core";
import { FundflowError, minorToDecimal } from "@fundflow/core";
import { MODELS } from "../db/schema.js";
import { getAccount, listAccounts } from "./account-store.js";
import { toAuditLogEntry, toTransactionRecord } from "./row-mappers.js";

export interface AccountSnapshot {
	account: Account;
	/** Balance in major units, e.g. "70.00" */
	balance: string;
	currency: string;
	transactionCount: number;
}

export interface FundflowSummary {
	accounts: number;
	activeAccounts: number;
	transactions: number;
	auditEntries: number;
	recoveryEntries: number;
	/** Sum of every balance, minor units */
	totalBalance: number;
	currency: string;
}

export interface CustomerOverview {
	customerId: string;
	accounts: number;
	activeAccounts: number;
	/** Minor units */
	totalBalance: number;
}

export interface BranchSummary {
	branchId: string;
	accounts: number;
	/** Distinct transactions touching any of the branch's accounts */
	transactions: number;
	/** Minor units per transaction type */
	transferVolume: number;
	depositVolume: number;
	withdrawalVolume: number;
}

type Page = { limit?: number; offset?: number };

export async function getTransaction(
	ctx: FundflowContext,
	transactionId: string,
): Promise<TransactionRecord> {
	const row = await ctx.adapter.findOne({
		model: MODELS.transactions,
		where: [{ field: "id", operator: "eq", value: transactionId }],
	});
	if (!row) throw FundflowError.notFound(`Transaction not found: ${transactionId}`);
	return toTransactionRecord(row);
}

/** Transactions where the account is either side, newest first. */
export async function listAccountTransactions(
	ctx: FundflowContext,
	accountId: string,
	params: { limit?: number; offset?: number } = {},
): Promise<TransactionRecord[]> {
	const limit = params.limit ?? 50;
	const offset = params.offset ?? 0;

	// Two indexed lookups merged here; the adapter contract has no OR.
	const bySide = (field: "senderAccountId" | "receiverAccountId") =>
		ctx.adapter.findMany({
			model: MODELS.transactions,
			where: [{ field, operator: "eq", value: accountId }],
			sortBy: { field: "createdAt", direction: "desc" },
			limit: limit + offset,
		});
	const [sent, received] = await Promise.all([bySide("senderAccountId"), bySide("receiverAccountId")]);

	return [...sent, ...received]
		.map(toTransactionRecord)
		.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
		.slice(offset, offset + limit);
}

export async function getAccountSnapshot(
	ctx: FundflowContext,
	accountNumber: string,
): Promise<AccountSnapshot> {
	const account = await getAccount(ctx, accountNumber);
	if (!account) throw FundflowError.accountNotFound(accountNumber);

	const [sent, received] = await Promise.all([
		ctx.adapter.count({
			model: MODELS.transactions,
			where: [{ field: "senderAccountId", operator: "eq", value: account.id }],
		}),
		ctx.adapter.count({
			model: MODELS.transactions,
			where: [{ field: "receiverAccountId", operator: "eq", value: account.id }],
		}),
	]);

	return {
		account,
		balance: minorToDecimal(account.balance, ctx.options.currency),
		currency: ctx.options.currency,
		transactionCount: sent + received,
	};
}

export async function getSummary(ctx: FundflowContext): Promise<FundflowSummary> {
	const [accounts, transactions, auditEntries, recoveryEntries] = await Promise.all([
		listAccounts(ctx),
		ctx.adapter.count({ model: MODELS.transactions }),
		ctx.adapter.count({ model: MODELS.auditLogs }),
		ctx.adapter.count({ model: MODELS.recoveryLogs }),
	]);

	return {
		accounts: accounts.length,
		activeAccounts: accounts.filter((account) => account.status === "ACTIVE").length,
		transactions,
		auditEntries,
		recoveryEntries,
		totalBalance: accounts.reduce((sum, account) => sum + account.balance, 0),
		currency: ctx.options.currency,
	};
}

// =============================================================================
// PER-CUSTOMER AND PER-BRANCH VIEWS
// =============================================================================

/** Transactions where any of `accountIds` is either side, deduplicated, newest first. */
async function transactionsTouching(
	ctx: FundflowContext,
	accountIds: string[],
): Promise<TransactionRecord[]> {
	if (accountIds.length === 0) return [];

	const bySide = (field: "senderAccountId" | "receiverAccountId") =>
		ctx.adapter.findMany({
			model: MODELS.transactions,
			where: [{ field, operator: "in", value: accountIds }],
		});
	const [sent, received] = await Promise.all([bySide("senderAccountId"), bySide("receiverAccountId")]);

	const byId = new Map<string, TransactionRecord>();
	for (const row of [...sent, ...received]) {
		const record = toTransactionRecord(row);
		byId.set(record.id, record);
	}
	return [...byId.values()].sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
}

/** Every transaction across a customer's accounts, newest first. */
export async function listCustomerTransactions(
	ctx: FundflowContext,
	customerId: string,
	params: Page = {},
): Promise<TransactionRecord[]> {
	const offset = params.offset ?? 0;
	const limit = params.limit ?? 50;
	const accounts = await listAccounts(ctx, { customerId });
	const records = await transactionsTouching(
		ctx,
		accounts.map((account) => account.id),
	);
	return records.slice(offset, offset + limit);
}

/** Every audit entry across a customer's accounts, newest first. */
export async function listCustomerAuditLog(
	ctx: FundflowContext,
	customerId: string,
): Promise<AuditLogEntry[]> {
	const accounts = await listAccounts(ctx, { customerId });
	if (accounts.length === 0) return [];

	const rows = await ctx.adapter.findMany({
		model: MODELS.auditLogs,
		where: [{ field: "accountId", operator: "in", value: accounts.map((account) => account.id) }],
	});
	return rows
		.map(toAuditLogEntry)
		.sort(
			(a, b) =>
				b.changedAt.getTime() - a.changedAt.getTime() || b.accountVersion - a.accountVersion,
		);
}

/** Account count and total balance per customer, largest balance first. */
export async function getCustomerOverview(ctx: FundflowContext): Promise<CustomerOverview[]> {
	const overview = new Map<string, CustomerOverview>();
	for (const account of await listAccounts(ctx)) {
		const entry = overview.get(account.customerId) ?? {
			customerId: account.customerId,
			accounts: 0,
			activeAccounts: 0,
			totalBalance: 0,
		};
		entry.accounts += 1;
		if (account.status === "ACTIVE") entry.activeAccounts += 1;
		entry.totalBalance += account.balance;
		overview.set(account.customerId, entry);
	}
	return [...overview.values()].sort(
		(a, b) => b.totalBalance - a.totalBalance || a.customerId.localeCompare(b.customerId),
	);
}

/**
 * Accounts, transactions and volume per branch, busiest first. Accounts
 * without a branch are left out.
 */
export async function getBranchSummary(ctx: FundflowContext): Promise<BranchSummary[]> {
	const accountsByBranch = new Map<string, string[]>();
	for (const account of await listAccounts(ctx)) {
		if (account.branchId === null) continue;
		const ids = accountsByBranch.get(account.branchId) ?? [];
		ids.push(account.id);
		accountsByBranch.set(account.branchId, ids);
	}

	const summaries = await Promise.all(
		[...accountsByBranch].map(async ([branchId, accountIds]): Promise<BranchSummary> => {
			const records = await transactionsTouching(ctx, accountIds);
			const volume = (type: TransactionRecord["type"]) =>
				records.filter((record) => record.type === type).reduce((sum, record) => sum + record.amount, 0);
			return {
				branchId,
				accounts: accountIds.length,
				transactions: records.length,
				transferVolume: volume("TRANSFER"),
				depositVolume: volume("DEPOSIT"),
				withdrawalVolume: volume("WITHDRAWAL"),
			};
		}),
	);
	return summaries.sort(
		(a, b) => b.transactions - a.transactions || a.branchId.localeCompare(b.branchId),
	);
}
