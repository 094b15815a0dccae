// =============================================================================
// BALANCE CHECK -- Shared non-overdraft balance validation
// =============================================================================
// Single source of truth for every debit: transfers and withdrawals.

import type { Account, AccountType } from "@fundflow/core";
import { FundflowError, minorToDecimal } from "@fundflow/core";

/** No account type may go below zero. */
export const OVERDRAFT_ALLOWED: Readonly<Record<AccountType, boolean>> = {
	SAVINGS: false,
	CHECKING: false,
};

/**
 * Check whether `account` can cover a debit of `amount` (minor units).
 *
 * @throws FundflowError INSUFFICIENT_FUNDS with available, required and
 *   shortfall amounts in both the message and the details.
 */
export function checkSufficientBalance(params: {
	account: Account;
	amount: number;
	currency: string;
}): void {
	const { account, amount, currency } = params;
	if (OVERDRAFT_ALLOWED[account.accountType] || account.balance >= amount) return;

	const shortfall = amount - account.balance;
	const fmt = (value: number) => minorToDecimal(value, currency);
	throw FundflowError.insufficientFunds(
		`Insufficient funds in account ${account.accountNumber}. Available: ${fmt(account.balance)}, Required: ${fmt(amount)}, Shortfall: ${fmt(shortfall)}`,
		{
			accountId: account.id,
			accountNumber: account.accountNumber,
			amount,
			available: account.balance,
			shortfall,
		},
	);
}
