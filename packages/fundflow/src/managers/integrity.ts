// =============================================================================
// INTEGRITY -- Audit trail and balance verification
// =============================================================================
// Every balance starts at zero and moves only through audited mutations, so
// an account's audit entries must chain from 0 to its current balance.

import type { FundflowContext } from "@fundflow/core";
import { FundflowError } from "@fundflow/core";
import { getAccountById, listAccounts } from "./account-store.js";
import { listAuditLog } from "./audit-recorder.js";

export interface AuditTrailResult {
	accountId: string;
	valid: boolean;
	entries: number;
	errors: string[];
}

export interface IntegrityReport {
	valid: boolean;
	accountsChecked: number;
	negativeBalances: string[];
	brokenTrails: AuditTrailResult[];
}

export async function verifyAuditTrail(
	ctx: FundflowContext,
	accountId: string,
): Promise<AuditTrailResult> {
	const account = await getAccountById(ctx, accountId);
	if (!account) throw FundflowError.accountNotFound(accountId);

	const entries = await listAuditLog(ctx, accountId);
	const errors: string[] = [];

	let expected = 0;
	for (const entry of entries) {
		if (entry.oldBalance !== expected) {
			errors.push(
				`Entry ${entry.id} (version ${entry.accountVersion}) starts at ${entry.oldBalance}, expected ${expected}`,
			);
		}
		expected = entry.newBalance;
	}

	if (expected !== account.balance) {
		errors.push(`Audit trail ends at ${expected} but the balance is ${account.balance}`);
	}

	return { accountId, valid: errors.length === 0, entries: entries.length, errors };
}

export async function verifyIntegrity(ctx: FundflowContext): Promise<IntegrityReport> {
	const accounts = await listAccounts(ctx);
	const negativeBalances: string[] = [];
	const brokenTrails: AuditTrailResult[] = [];

	for (const account of accounts) {
		if (account.balance < 0) negativeBalances.push(account.accountNumber);
		const trail = await verifyAuditTrail(ctx, account.id);
		if (!trail.valid) brokenTrails.push(trail);
	}

	const valid = negativeBalances.length === 0 && brokenTrails.length === 0;
	if (!valid) {
		ctx.logger.warn("Integrity check found violations", {
			negativeBalances: negativeBalances.length,
			brokenTrails: brokenTrails.length,
		});
	}

	return { valid, accountsChecked: accounts.length, negativeBalances, brokenTrails };
}
