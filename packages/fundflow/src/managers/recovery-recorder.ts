// =============================================================================
// RECOVERY RECORDER -- Best-effort failure log
// =============================================================================
// Appends a diagnostic entry for a failed operation in its own unit of work,
// after the failed unit has rolled back. It takes no account lock and never
// throws: a failure to record is logged and reported as null.

import type { FundflowContext, RecoveryLogEntry, RecoveryOperationType } from "@fundflow/core";
import { FundflowError, generateId } from "@fundflow/core";
import { MODELS } from "../db/schema.js";
import { withUnitOfWork } from "../infrastructure/unit-of-work.js";
import { toRecoveryLogEntry } from "./row-mappers.js";

export interface RecordRecoveryParams {
	operationType: RecoveryOperationType;
	senderAccountId: string | null;
	receiverAccountId: string | null;
	/** Minor units */
	attemptedAmount: number;
	reason: string;
	errorCode?: string | null;
	/** Minor units, captured by the caller; never re-read under lock here */
	senderBalanceAtFailure: number | null;
	details?: Record<string, unknown>;
}

export async function recordRecovery(
	ctx: FundflowContext,
	params: RecordRecoveryParams,
): Promise<RecoveryLogEntry | null> {
	try {
		return await withUnitOfWork(ctx, async (tx) => {
			const row = await tx.create({
				model: MODELS.recoveryLogs,
				data: {
					id: generateId(),
					operationType: params.operationType,
					senderAccountId: params.senderAccountId,
					receiverAccountId: params.receiverAccountId,
					attemptedAmount: params.attemptedAmount,
					failureReason: params.reason,
					errorCode: params.errorCode ?? null,
					senderBalanceAtFailure: params.senderBalanceAtFailure,
					details: params.details ?? {},
					failedAt: ctx.clock(),
				},
			});
			return toRecoveryLogEntry(row);
		});
	} catch (error) {
		ctx.logger.error("Failed to write recovery log", {
			operationType: params.operationType,
			senderAccountId: params.senderAccountId,
			receiverAccountId: params.receiverAccountId,
			error: error instanceof Error ? error.message : String(error),
			code: FundflowError.is(error) ? error.code : undefined,
		});
		return null;
	}
}

/** Recovery entries, newest first. */
export async function listRecoveryLogs(
	ctx: FundflowContext,
	params: { limit?: number; offset?: number } = {},
): Promise<RecoveryLogEntry[]> {
	const rows = await ctx.adapter.findMany({
		model: MODELS.recoveryLogs,
		sortBy: { field: "failedAt", direction: "desc" },
		limit: params.limit,
		offset: params.offset,
	});
	return rows.map(toRecoveryLogEntry);
}
