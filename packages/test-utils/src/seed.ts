import type { Account, AccountType } from "@fundflow/core";
import type { Fundflow } from "fundflow";

export interface SeedAccount {
	customerId: string;
	accountNumber: string;
	/** Opening balance, minor units */
	balance?: number;
	accountType?: AccountType;
}

/**
 * Open accounts in order, crediting each opening balance through a regular
 * deposit so every account starts with a valid audit trail.
 * Returns the accounts keyed by account number.
 */
export async function seedAccounts(
	fundflow: Fundflow,
	accounts: SeedAccount[],
): Promise<Record<string, Account>> {
	const result: Record<string, Account> = {};
	for (const seed of accounts) {
		result[seed.accountNumber] = await fundflow.accounts.open({
			customerId: seed.customerId,
			accountNumber: seed.accountNumber,
			accountType: seed.accountType ?? "SAVINGS",
			initialDeposit: seed.balance ?? 0,
		});
	}
	return result;
}

/** Open a single account and return it. */
export async function seedAccount(fundflow: Fundflow, seed: SeedAccount): Promise<Account> {
	const seeded = await seedAccounts(fundflow, [seed]);
	const account = seeded[seed.accountNumber];
	if (!account) throw new Error(`Seeding ${seed.accountNumber} returned no account`);
	return account;
}
