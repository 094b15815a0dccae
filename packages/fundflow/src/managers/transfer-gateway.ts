// =============================================================================
// TRANSFER GATEWAY -- Actor-facing transfer entry point
// =============================================================================
// Checks that the actor owns the sender account, resolves the receiver by
// account number and calls the engine. When the engine fails, the failure
// is recorded in a separate unit and the original error is rethrown.
// The gateway only reads accounts; it never touches balances or audit rows.

import type { Account, FundflowContext, RecoveryLogEntry, TransactionRecord } from "@fundflow/core";
import {
	decimalToMinor,
	FundflowError,
	getInsufficientFundsDetails,
	minorToDecimal,
} from "@fundflow/core";
import { getAccount, getAccountById, listAccounts } from "./account-store.js";
import { recordRecovery } from "./recovery-recorder.js";
import { transfer } from "./transfer-engine.js";

/** Extra amount, in major units, that a simulated failure tries to move beyond the balance. */
const SIMULATED_EXCESS = "5000.00";

export interface TransferFundsParams {
	actorCustomerId: string;
	senderAccountId: string;
	receiverAccountNumber: string;
	/** Major units, e.g. "30.00" or 30 */
	amount: string | number;
	description?: string;
}

export interface SimulatedFailureResult {
	error: FundflowError;
	attemptedAmount: number;
	recoveryLog: RecoveryLogEntry | null;
}

function parseAmount(ctx: FundflowContext, amount: string | number): number {
	const minor = decimalToMinor(amount, ctx.options.currency);
	if (minor === null || minor <= 0) {
		throw FundflowError.invalidAmount("Transfer amount must be greater than zero");
	}
	return minor;
}

async function requireOwnedAccount(
	ctx: FundflowContext,
	actorCustomerId: string,
	accountId: string,
): Promise<Account> {
	const account = await getAccountById(ctx, accountId);
	if (!account || account.customerId !== actorCustomerId) {
		throw FundflowError.notAccountOwner(accountId);
	}
	return account;
}

/** Sender balance at failure: what the engine saw under lock, else a fresh read. */
async function observedSenderBalance(
	ctx: FundflowContext,
	sender: Account,
	error: unknown,
): Promise<number | null> {
	const insufficient = getInsufficientFundsDetails(error);
	if (insufficient && insufficient.accountId === sender.id) return insufficient.available;
	try {
		const fresh = await getAccountById(ctx, sender.id);
		return fresh?.balance ?? null;
	} catch (readError) {
		ctx.logger.warn("Could not read sender balance after failed transfer", {
			accountId: sender.id,
			error: readError instanceof Error ? readError.message : String(readError),
		});
		return null;
	}
}

export async function transferFunds(
	ctx: FundflowContext,
	params: TransferFundsParams,
): Promise<TransactionRecord> {
	const amount = parseAmount(ctx, params.amount);
	const sender = await requireOwnedAccount(ctx, params.actorCustomerId, params.senderAccountId);
	const receiver = await getAccount(ctx, params.receiverAccountNumber);
	if (!receiver) {
		throw FundflowError.accountNotFound(params.receiverAccountNumber);
	}

	try {
		return await transfer(ctx, {
			senderAccountId: sender.id,
			receiverAccountId: receiver.id,
			amount,
			description: params.description,
		});
	} catch (error) {
		const insufficient = getInsufficientFundsDetails(error);
		await recordRecovery(ctx, {
			operationType: "TRANSFER",
			senderAccountId: sender.id,
			receiverAccountId: receiver.id,
			attemptedAmount: amount,
			reason: error instanceof Error ? error.message : String(error),
			errorCode: FundflowError.is(error) ? error.code : null,
			senderBalanceAtFailure: await observedSenderBalance(ctx, sender, error),
			details: {
				senderAccount: sender.accountNumber,
				receiverAccount: receiver.accountNumber,
				actorCustomerId: params.actorCustomerId,
				...(insufficient
					? { deficitAmount: minorToDecimal(insufficient.shortfall, ctx.options.currency) }
					: {}),
			},
		});
		throw error;
	}
}

/**
 * Attempt a transfer of the balance plus 5000.00 from one of the actor's
 * accounts to an account owned by someone else. The engine rejects it and
 * the rejection is recorded as a SIMULATED_FAILURE recovery entry.
 */
export async function simulateFailure(
	ctx: FundflowContext,
	params: { actorCustomerId: string; senderAccountId: string },
): Promise<SimulatedFailureResult> {
	const sender = await requireOwnedAccount(ctx, params.actorCustomerId, params.senderAccountId);

	const candidates = await listAccounts(ctx);
	const receiver = candidates.find(
		(account) => account.customerId !== params.actorCustomerId && account.status === "ACTIVE",
	);
	if (!receiver) {
		throw FundflowError.notFound("No receiver account available for simulation");
	}

	const excess = decimalToMinor(SIMULATED_EXCESS, ctx.options.currency) ?? 0;
	const attemptedAmount = sender.balance + excess;

	const outcome = await transfer(ctx, {
		senderAccountId: sender.id,
		receiverAccountId: receiver.id,
		amount: attemptedAmount,
		description: "Simulated failure",
	}).then(
		(record) => ({ committed: true as const, record }),
		(error: unknown) => ({ committed: false as const, error }),
	);
	if (outcome.committed) {
		throw FundflowError.internal(
			`Simulated failure unexpectedly committed transaction ${outcome.record.id}`,
		);
	}
	if (!FundflowError.is(outcome.error)) throw outcome.error;
	const failure = outcome.error;

	const insufficient = getInsufficientFundsDetails(failure);
	const recoveryLog = await recordRecovery(ctx, {
		operationType: "SIMULATED_FAILURE",
		senderAccountId: sender.id,
		receiverAccountId: receiver.id,
		attemptedAmount,
		reason: failure.message,
		errorCode: failure.code,
		senderBalanceAtFailure: insufficient?.available ?? sender.balance,
		details: {
			senderAccount: sender.accountNumber,
			receiverAccount: receiver.accountNumber,
			actorCustomerId: params.actorCustomerId,
			deficitAmount: minorToDecimal(
				insufficient?.shortfall ?? attemptedAmount - sender.balance,
				ctx.options.currency,
			),
		},
	});

	return { error: failure, attemptedAmount, recoveryLog };
}
