// =============================================================================
// TRANSFER ENGINE -- Atomic balance movements
// =============================================================================
// transfer, deposit and withdraw each run as one unit of work: lock, check,
// mutate, append audit entries and the transaction row, commit. Any failure
// rolls every change back. The engine never writes recovery logs; that is
// the caller's policy.

import type {
	FundflowContext,
	FundflowTransactionAdapter,
	TransactionRecord,
	TransactionType,
} from "@fundflow/core";
import { FundflowError, generateId, minorToDecimal } from "@fundflow/core";
import { queueAfterTransactionHook } from "@fundflow/core/db";
import { MODELS } from "../db/schema.js";
import { withUnitOfWork } from "../infrastructure/unit-of-work.js";
import { applyDelta, assertActive, lockForUpdate, requireAccount } from "./account-store.js";
import { recordAudit } from "./audit-recorder.js";
import { toTransactionRecord } from "./row-mappers.js";

// =============================================================================
// VALIDATION
// =============================================================================

export function validateAmount(ctx: FundflowContext, amount: number): void {
	if (!Number.isSafeInteger(amount) || amount <= 0) {
		throw FundflowError.invalidAmount();
	}
	const max = ctx.options.advanced.maxTransactionAmount;
	if (amount > max) {
		throw FundflowError.invalidAmount(
			`Amount exceeds the maximum of ${minorToDecimal(max, ctx.options.currency)}`,
		);
	}
}

async function insertTransaction(
	ctx: FundflowContext,
	tx: FundflowTransactionAdapter,
	params: {
		type: TransactionType;
		amount: number;
		senderAccountId: string | null;
		receiverAccountId: string | null;
		description: string;
	},
): Promise<TransactionRecord> {
	const row = await tx.create({
		model: MODELS.transactions,
		data: {
			id: generateId(),
			...params,
			status: "COMPLETED",
			createdAt: ctx.clock(),
		},
	});
	return toTransactionRecord(row);
}

// =============================================================================
// TRANSFER
// =============================================================================

export async function transfer(
	ctx: FundflowContext,
	params: {
		senderAccountId: string;
		receiverAccountId: string;
		/** Minor units */
		amount: number;
		description?: string;
	},
): Promise<TransactionRecord> {
	const { senderAccountId, receiverAccountId, amount } = params;

	validateAmount(ctx, amount);
	if (senderAccountId === receiverAccountId) {
		throw FundflowError.sameAccount(senderAccountId);
	}

	return withUnitOfWork(ctx, async (tx) => {
		const locked = await lockForUpdate(ctx, tx, [senderAccountId, receiverAccountId]);
		const sender = requireAccount(locked, senderAccountId);
		const receiver = requireAccount(locked, receiverAccountId);
		assertActive(sender);
		assertActive(receiver);

		const debit = await applyDelta(ctx, tx, sender.id, -amount);
		const credit = await applyDelta(ctx, tx, receiver.id, amount);

		const record = await insertTransaction(ctx, tx, {
			type: "TRANSFER",
			amount,
			senderAccountId: sender.id,
			receiverAccountId: receiver.id,
			description:
				params.description ?? `Transfer from ${sender.accountNumber} to ${receiver.accountNumber}`,
		});

		await recordAudit(ctx, tx, { ...debit, transactionId: record.id });
		await recordAudit(ctx, tx, { ...credit, transactionId: record.id });

		queueAfterTransactionHook(() => {
			ctx.logger.info("Transfer committed", {
				transactionId: record.id,
				senderAccountId: sender.id,
				receiverAccountId: receiver.id,
				amount,
			});
		}, "transfer-log");

		return record;
	});
}

// =============================================================================
// DEPOSIT / WITHDRAW
// =============================================================================

interface SingleAccountChange {
	type: "DEPOSIT" | "WITHDRAWAL";
	accountId: string;
	/** Minor units, already validated */
	amount: number;
	description?: string;
}

/**
 * Credit or debit one account inside the caller's unit of work: lock the row,
 * move the balance, write the transaction and its audit row.
 */
export async function postSingleChange(
	ctx: FundflowContext,
	tx: FundflowTransactionAdapter,
	params: SingleAccountChange,
): Promise<TransactionRecord> {
	const { type, accountId, amount } = params;
	const locked = await lockForUpdate(ctx, tx, [accountId]);
	const account = requireAccount(locked, accountId);

	const change = await applyDelta(ctx, tx, account.id, type === "DEPOSIT" ? amount : -amount);

	const record = await insertTransaction(ctx, tx, {
		type,
		amount,
		senderAccountId: type === "WITHDRAWAL" ? account.id : null,
		receiverAccountId: type === "DEPOSIT" ? account.id : null,
		description:
			params.description ??
			(type === "DEPOSIT"
				? `Deposit to ${account.accountNumber}`
				: `Withdrawal from ${account.accountNumber}`),
	});

	await recordAudit(ctx, tx, { ...change, transactionId: record.id });

	queueAfterTransactionHook(() => {
		ctx.logger.info(type === "DEPOSIT" ? "Deposit committed" : "Withdrawal committed", {
			transactionId: record.id,
			accountId: account.id,
			amount,
		});
	}, "balance-change-log");

	return record;
}

function applySingle(ctx: FundflowContext, params: SingleAccountChange): Promise<TransactionRecord> {
	validateAmount(ctx, params.amount);
	return withUnitOfWork(ctx, (tx) => postSingleChange(ctx, tx, params));
}

export function deposit(
	ctx: FundflowContext,
	params: { accountId: string; amount: number; description?: string },
): Promise<TransactionRecord> {
	return applySingle(ctx, { type: "DEPOSIT", ...params });
}

export function withdraw(
	ctx: FundflowContext,
	params: { accountId: string; amount: number; description?: string },
): Promise<TransactionRecord> {
	return applySingle(ctx, { type: "WITHDRAWAL", ...params });
}
