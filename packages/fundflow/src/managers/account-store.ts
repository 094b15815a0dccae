// =============================================================================
// ACCOUNT STORE -- Reads, row locks and balance mutation
// =============================================================================
// Owns the accounts table. Balance changes go through `applyDelta`, which
// only the transfer engine calls, always inside its unit of work on a row it
// has already locked.

import type {
	Account,
	BalanceChange,
	FundflowAdapter,
	FundflowContext,
	FundflowTransactionAdapter,
	Row,
} from "@fundflow/core";
import { FundflowError } from "@fundflow/core";
import { MODELS } from "../db/schema.js";
import { checkSufficientBalance } from "./balance-check.js";
import { toAccount } from "./row-mappers.js";

type Reader = FundflowAdapter | FundflowTransactionAdapter;

// =============================================================================
// READS
// =============================================================================

export async function getAccount(
	ctx: FundflowContext,
	accountNumber: string,
	reader: Reader = ctx.adapter,
): Promise<Account | null> {
	const row = await reader.findOne({
		model: MODELS.accounts,
		where: [{ field: "accountNumber", operator: "eq", value: accountNumber }],
	});
	return row ? toAccount(row) : null;
}

export async function getAccountById(
	ctx: FundflowContext,
	accountId: string,
	reader: Reader = ctx.adapter,
): Promise<Account | null> {
	const row = await reader.findOne({
		model: MODELS.accounts,
		where: [{ field: "id", operator: "eq", value: accountId }],
	});
	return row ? toAccount(row) : null;
}

export async function listAccounts(
	ctx: FundflowContext,
	params: { customerId?: string; limit?: number; offset?: number } = {},
): Promise<Account[]> {
	const rows = await ctx.adapter.findMany({
		model: MODELS.accounts,
		where: params.customerId
			? [{ field: "customerId", operator: "eq", value: params.customerId }]
			: [],
		sortBy: { field: "openedAt", direction: "asc" },
		limit: params.limit,
		offset: params.offset,
	});
	return rows.map(toAccount);
}

// =============================================================================
// LOCKING
// =============================================================================

/**
 * Read `accountIds` for update in ascending id order, so two units touching
 * the same pair always queue in the same order. Ids that do not exist are
 * absent from the result.
 *
 * In optimistic mode no row lock is taken; conflicts surface at write time.
 */
export async function lockForUpdate(
	ctx: FundflowContext,
	tx: FundflowTransactionAdapter,
	accountIds: string[],
): Promise<Map<string, Account>> {
	const { lockMode } = ctx.options.advanced;
	const ordered = [...new Set(accountIds)].sort();
	const locked = new Map<string, Account>();

	for (const id of ordered) {
		const row = await tx.findOne({
			model: MODELS.accounts,
			where: [{ field: "id", operator: "eq", value: id }],
			forUpdate: lockMode !== "optimistic",
			noWait: lockMode === "nowait",
		});
		if (row) locked.set(id, toAccount(row));
	}

	return locked;
}

export function requireAccount(accounts: Map<string, Account>, accountId: string): Account {
	const account = accounts.get(accountId);
	if (!account) throw FundflowError.accountNotFound(accountId);
	return account;
}

export function assertActive(account: Account): void {
	if (account.status !== "ACTIVE") {
		throw FundflowError.accountInactive(account.accountNumber, account.status);
	}
}

// =============================================================================
// WRITES
// =============================================================================

/**
 * Write `changes` to an account read earlier in this unit, bumping its
 * version. The update matches on the version that was read, so a concurrent
 * writer (possible only in optimistic mode) turns into a conflict instead of
 * a lost update.
 */
export async function writeAccount(
	ctx: FundflowContext,
	tx: FundflowTransactionAdapter,
	account: Account,
	changes: Row,
): Promise<Account> {
	const row = await tx.update({
		model: MODELS.accounts,
		where: [
			{ field: "id", operator: "eq", value: account.id },
			{ field: "version", operator: "eq", value: account.version },
		],
		update: { ...changes, version: account.version + 1, updatedAt: ctx.clock() },
	});
	if (!row) {
		throw FundflowError.concurrencyConflict(
			`Account ${account.accountNumber} was modified concurrently`,
		);
	}
	return toAccount(row);
}

/**
 * Apply a signed amount (minor units) to an account's balance.
 *
 * @throws ACCOUNT_NOT_FOUND for unknown ids, ACCOUNT_INACTIVE when the account
 *   is not ACTIVE, INSUFFICIENT_FUNDS when a debit would take it below zero.
 */
export async function applyDelta(
	ctx: FundflowContext,
	tx: FundflowTransactionAdapter,
	accountId: string,
	signedAmount: number,
): Promise<BalanceChange> {
	const accounts = await lockForUpdate(ctx, tx, [accountId]);
	const account = requireAccount(accounts, accountId);
	assertActive(account);

	if (signedAmount < 0) {
		checkSufficientBalance({ account, amount: -signedAmount, currency: ctx.options.currency });
	}

	const updated = await writeAccount(ctx, tx, account, {
		balance: account.balance + signedAmount,
	});

	return {
		accountId,
		oldBalance: account.balance,
		newBalance: updated.balance,
		version: updated.version,
	};
}
