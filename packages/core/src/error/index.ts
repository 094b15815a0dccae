import { BASE_ERROR_CODES, type BaseErrorCode } from "./codes.js";

export { BASE_ERROR_CODES, type BaseErrorCode, type RawErrorCode } from "./codes.js";

export type FundflowErrorCode = BaseErrorCode;

/** Diagnostic fields carried by an `INSUFFICIENT_FUNDS` error. Amounts are minor units. */
export interface InsufficientFundsDetails {
	accountId: string;
	accountNumber: string;
	/** Amount the operation tried to debit */
	amount: number;
	/** Balance observed under lock */
	available: number;
	shortfall: number;
}

export class FundflowError extends Error {
	readonly code: FundflowErrorCode;
	readonly status: number;
	readonly details?: Record<string, unknown>;
	/**
	 * Whether this error is transient: the condition may change and a later
	 * attempt may succeed (balance topped up, lock released, store back online).
	 */
	readonly transient: boolean;

	constructor(
		code: FundflowErrorCode,
		message: string,
		options?: {
			cause?: unknown;
			status?: number;
			transient?: boolean;
			details?: Record<string, unknown>;
		},
	) {
		super(message, { cause: options?.cause });
		this.code = code;
		this.status = options?.status ?? BASE_ERROR_CODES[code].status;
		this.transient = options?.transient ?? BASE_ERROR_CODES[code].transient;
		this.details = options?.details;
		this.name = "FundflowError";
	}

	/**
	 * Create a FundflowError from a typed error code.
	 * Uses the default message and status from BASE_ERROR_CODES.
	 */
	static fromCode(
		code: FundflowErrorCode,
		options?: { message?: string; cause?: unknown; details?: Record<string, unknown> },
	): FundflowError {
		const raw = BASE_ERROR_CODES[code];
		return new FundflowError(code, options?.message ?? raw.message, {
			cause: options?.cause,
			details: options?.details,
		});
	}

	/** Narrow an unknown thrown value to a FundflowError, optionally of a given code. */
	static is(error: unknown, code?: FundflowErrorCode): error is FundflowError {
		return error instanceof FundflowError && (code === undefined || error.code === code);
	}

	// --- Transfer failures ---

	static invalidAmount(message: string = BASE_ERROR_CODES.INVALID_AMOUNT.message) {
		return new FundflowError("INVALID_AMOUNT", message);
	}

	static sameAccount(accountId: string) {
		return new FundflowError("SAME_ACCOUNT", BASE_ERROR_CODES.SAME_ACCOUNT.message, {
			details: { accountId },
		});
	}

	static accountNotFound(reference: string) {
		return new FundflowError("ACCOUNT_NOT_FOUND", `Account not found: ${reference}`, {
			details: { reference },
		});
	}

	static accountInactive(accountNumber: string, status: string) {
		return new FundflowError("ACCOUNT_INACTIVE", `Account ${accountNumber} is ${status}`, {
			details: { accountNumber, status },
		});
	}

	static insufficientFunds(message: string, details: InsufficientFundsDetails) {
		return new FundflowError("INSUFFICIENT_FUNDS", message, { details: { ...details } });
	}

	static concurrencyConflict(message: string = BASE_ERROR_CODES.CONCURRENCY_CONFLICT.message, cause?: unknown) {
		return new FundflowError("CONCURRENCY_CONFLICT", message, { cause });
	}

	static storeUnavailable(message: string = BASE_ERROR_CODES.STORE_UNAVAILABLE.message, cause?: unknown) {
		return new FundflowError("STORE_UNAVAILABLE", message, { cause });
	}

	// --- Everything else ---

	static notAccountOwner(accountId: string) {
		return new FundflowError("NOT_ACCOUNT_OWNER", "Invalid sender account", {
			details: { accountId },
		});
	}

	static invalidArgument(message = "Invalid argument", cause?: unknown) {
		return new FundflowError("INVALID_ARGUMENT", message, { cause });
	}

	static duplicate(message = "Duplicate resource", cause?: unknown) {
		return new FundflowError("DUPLICATE", message, { cause });
	}

	static notFound(message = "Resource not found", cause?: unknown) {
		return new FundflowError("NOT_FOUND", message, { cause });
	}

	static internal(message = "Internal error", cause?: unknown) {
		return new FundflowError("INTERNAL", message, { cause });
	}
}

/**
 * Read the diagnostic fields of an `INSUFFICIENT_FUNDS` error.
 * Returns null for any other error or when the fields are missing.
 */
export function getInsufficientFundsDetails(error: unknown): InsufficientFundsDetails | null {
	if (!FundflowError.is(error, "INSUFFICIENT_FUNDS") || !error.details) return null;
	const { accountId, accountNumber, amount, available, shortfall } = error.details;
	if (
		typeof accountId !== "string" ||
		typeof accountNumber !== "string" ||
		typeof amount !== "number" ||
		typeof available !== "number" ||
		typeof shortfall !== "number"
	) {
		return null;
	}
	return { accountId, accountNumber, amount, available, shortfall };
}
