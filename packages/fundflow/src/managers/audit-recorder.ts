// =============================================================================
// AUDIT RECORDER -- Append-only balance change log
// =============================================================================
// One entry per account per balance mutation, written in the same unit of
// work as the mutation so it commits or rolls back with it.

import type {
	AuditLogEntry,
	BalanceChange,
	FundflowContext,
	FundflowTransactionAdapter,
} from "@fundflow/core";
import { generateId } from "@fundflow/core";
import { MODELS } from "../db/schema.js";
import { toAuditLogEntry } from "./row-mappers.js";

export async function recordAudit(
	ctx: FundflowContext,
	tx: FundflowTransactionAdapter,
	params: BalanceChange & { transactionId: string },
): Promise<AuditLogEntry> {
	const row = await tx.create({
		model: MODELS.auditLogs,
		data: {
			id: generateId(),
			accountId: params.accountId,
			transactionId: params.transactionId,
			oldBalance: params.oldBalance,
			newBalance: params.newBalance,
			accountVersion: params.version,
			operationType: "BALANCE_UPDATE",
			changedAt: ctx.clock(),
		},
	});
	return toAuditLogEntry(row);
}

/** Every audit entry for an account, oldest first. */
export async function listAuditLog(ctx: FundflowContext, accountId: string): Promise<AuditLogEntry[]> {
	const rows = await ctx.adapter.findMany({
		model: MODELS.auditLogs,
		where: [{ field: "accountId", operator: "eq", value: accountId }],
		sortBy: { field: "accountVersion", direction: "asc" },
	});
	return rows.map(toAuditLogEntry);
}
