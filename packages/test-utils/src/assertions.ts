import type { Fundflow } from "fundflow";

/**
 * Assert that an account, looked up by number, has the expected balance
 * in minor units.
 */
export async function assertAccountBalance(
	fundflow: Fundflow,
	accountNumber: string,
	expectedBalance: number,
): Promise<void> {
	const account = await fundflow.accounts.get(accountNumber);
	if (!account) {
		throw new Error(`Account ${accountNumber} does not exist`);
	}
	if (account.balance !== expectedBalance) {
		throw new Error(
			`Account ${accountNumber}: expected balance ${expectedBalance}, got ${account.balance}`,
		);
	}
}

/**
 * Assert that no balance is negative and every account's audit trail chains
 * from zero to its current balance.
 */
export async function assertIntegrity(fundflow: Fundflow): Promise<void> {
	const report = await fundflow.reports.verifyIntegrity();
	if (!report.valid) {
		const problems = [
			...report.negativeBalances.map((number) => `negative balance on ${number}`),
			...report.brokenTrails.flatMap((trail) => trail.errors),
		];
		throw new Error(`Integrity check failed: ${problems.join("; ")}`);
	}
}

/** Assert that the sum of every balance equals `expectedTotal` (minor units). */
export async function assertTotalBalance(fundflow: Fundflow, expectedTotal: number): Promise<void> {
	const summary = await fundflow.reports.getSummary();
	if (summary.totalBalance !== expectedTotal) {
		throw new Error(`Total balance: expected ${expectedTotal}, got ${summary.totalBalance}`);
	}
}
