// =============================================================================
// ACCOUNT MANAGER -- Account lifecycle
// =============================================================================
// Opens, freezes, unfreezes and closes accounts. Status changes lock the row
// and bump its version like any balance change. Accounts are never deleted.

import type { Account, AccountStatus, AccountType, FundflowContext } from "@fundflow/core";
import { ACCOUNT_TYPES, FundflowError, generateId } from "@fundflow/core";
import { MODELS } from "../db/schema.js";
import { withUnitOfWork } from "../infrastructure/unit-of-work.js";
import { generateAccountNumber } from "./account-number.js";
import { getAccountById, lockForUpdate, requireAccount, writeAccount } from "./account-store.js";
import { toAccount } from "./row-mappers.js";
import { postSingleChange, validateAmount } from "./transfer-engine.js";

const ACCOUNT_NUMBER_PATTERN = /^[A-Z0-9]{4,34}$/;

/** Fresh numbers tried before a clash on generated numbers is reported. */
const GENERATED_NUMBER_ATTEMPTS = 5;

function isUniqueViolation(error: unknown): boolean {
	return typeof error === "object" && error !== null && "code" in error && error.code === "23505";
}

// =============================================================================
// OPEN
// =============================================================================

export async function openAccount(
	ctx: FundflowContext,
	params: {
		customerId: string;
		accountType: AccountType;
		accountNumber?: string;
		branchId?: string | null;
		/** Minor units, credited as a DEPOSIT in the same unit of work */
		initialDeposit?: number;
	},
): Promise<Account> {
	const { customerId, accountType, initialDeposit = 0 } = params;

	if (!customerId.trim()) {
		throw FundflowError.invalidArgument("customerId must be a non-empty string");
	}
	if (!ACCOUNT_TYPES.some((type) => type === accountType)) {
		throw FundflowError.invalidArgument(
			`Unknown account type "${accountType}". Use one of ${ACCOUNT_TYPES.join(", ")}`,
		);
	}
	if (!Number.isSafeInteger(initialDeposit) || initialDeposit < 0) {
		throw FundflowError.invalidAmount("Initial deposit must be a non-negative integer");
	}

	if (initialDeposit > 0) validateAmount(ctx, initialDeposit);
	if (params.accountNumber !== undefined && !ACCOUNT_NUMBER_PATTERN.test(params.accountNumber)) {
		throw FundflowError.invalidArgument(
			`Account number "${params.accountNumber}" must be 4-34 uppercase letters or digits`,
		);
	}

	const attempts = params.accountNumber === undefined ? GENERATED_NUMBER_ATTEMPTS : 1;
	for (let attempt = 1; ; attempt++) {
		const accountNumber = params.accountNumber ?? generateAccountNumber();
		try {
			const account = await insertAccount(ctx, { ...params, accountNumber, initialDeposit });
			ctx.logger.info("Account opened", {
				accountId: account.id,
				accountNumber,
				accountType,
			});
			return account;
		} catch (error) {
			if (!isUniqueViolation(error)) throw error;
			if (attempt >= attempts) {
				throw FundflowError.duplicate(`Account number ${accountNumber} already exists`, error);
			}
			ctx.logger.debug("Generated account number taken, trying another", { attempt });
		}
	}
}

/** Create the row and credit the initial deposit in one unit of work. */
function insertAccount(
	ctx: FundflowContext,
	params: {
		customerId: string;
		accountType: AccountType;
		accountNumber: string;
		branchId?: string | null;
		initialDeposit: number;
	},
): Promise<Account> {
	const now = ctx.clock();
	return withUnitOfWork(ctx, async (tx) => {
		const row = await tx.create({
			model: MODELS.accounts,
			data: {
				id: generateId(),
				accountNumber: params.accountNumber,
				customerId: params.customerId,
				branchId: params.branchId ?? null,
				accountType: params.accountType,
				balance: 0,
				status: "ACTIVE",
				version: 1,
				openedAt: now,
				updatedAt: now,
			},
		});
		const opened = toAccount(row);
		if (params.initialDeposit === 0) return opened;

		await postSingleChange(ctx, tx, {
			type: "DEPOSIT",
			accountId: opened.id,
			amount: params.initialDeposit,
			description: "Initial deposit",
		});
		const credited = await getAccountById(ctx, opened.id, tx);
		return credited ?? opened;
	});
}

// =============================================================================
// STATUS CHANGES
// =============================================================================

async function changeStatus(
	ctx: FundflowContext,
	accountId: string,
	target: AccountStatus,
	allowedFrom: readonly AccountStatus[],
	guard?: (account: Account) => void,
): Promise<Account> {
	const updated = await withUnitOfWork(ctx, async (tx) => {
		const locked = await lockForUpdate(ctx, tx, [accountId]);
		const account = requireAccount(locked, accountId);

		if (!allowedFrom.includes(account.status)) {
			throw FundflowError.invalidArgument(
				`Cannot change account ${account.accountNumber} from ${account.status} to ${target}`,
			);
		}
		guard?.(account);

		return writeAccount(ctx, tx, account, { status: target });
	});

	ctx.logger.info("Account status changed", {
		accountId,
		accountNumber: updated.accountNumber,
		status: target,
	});
	return updated;
}

export function freezeAccount(ctx: FundflowContext, accountId: string): Promise<Account> {
	return changeStatus(ctx, accountId, "FROZEN", ["ACTIVE"]);
}

export function unfreezeAccount(ctx: FundflowContext, accountId: string): Promise<Account> {
	return changeStatus(ctx, accountId, "ACTIVE", ["FROZEN"]);
}

/** CLOSED is terminal and requires a zero balance. */
export function closeAccount(ctx: FundflowContext, accountId: string): Promise<Account> {
	return changeStatus(ctx, accountId, "CLOSED", ["ACTIVE", "FROZEN"], (account) => {
		if (account.balance !== 0) {
			throw FundflowError.invalidArgument(
				`Account ${account.accountNumber} must have a zero balance to close`,
			);
		}
	});
}
