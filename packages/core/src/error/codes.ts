// =============================================================================
// TYPED ERROR CODES
// =============================================================================
// Registry of every failure kind the transfer engine and its collaborators can
// signal, with an HTTP-style status and a default message.

export type RawErrorCode = {
	message: string;
	status: number;
	/**
	 * Whether this error is transient (retrying may succeed).
	 *
	 * - `true`: Balance may increase, account may unfreeze, a lock may be released.
	 * - `false` (default): Condition is permanent, retrying will always fail.
	 */
	transient?: boolean;
};

export const BASE_ERROR_CODES = {
	// Transient errors: condition may change, caller may retry.
	INSUFFICIENT_FUNDS: { message: "Insufficient funds", status: 400, transient: true },
	ACCOUNT_INACTIVE: { message: "Account is not active", status: 403, transient: true },
	CONCURRENCY_CONFLICT: {
		message: "Could not obtain exclusive access to the accounts",
		status: 409,
		transient: true,
	},
	STORE_UNAVAILABLE: { message: "Account store is unavailable", status: 503, transient: true },

	// Deterministic errors: retrying will always fail.
	INVALID_AMOUNT: { message: "Amount must be a positive integer", status: 400, transient: false },
	SAME_ACCOUNT: {
		message: "Sender and receiver must be different accounts",
		status: 400,
		transient: false,
	},
	ACCOUNT_NOT_FOUND: { message: "Account not found", status: 404, transient: false },
	NOT_ACCOUNT_OWNER: {
		message: "Account does not belong to the requesting customer",
		status: 403,
		transient: false,
	},
	INVALID_ARGUMENT: { message: "Invalid argument", status: 400, transient: false },
	DUPLICATE: { message: "Duplicate resource", status: 409, transient: false },
	NOT_FOUND: { message: "Resource not found", status: 404, transient: false },
	INTERNAL: { message: "Internal error", status: 500, transient: false },
} as const satisfies Record<string, RawErrorCode>;

export type BaseErrorCode = keyof typeof BASE_ERROR_CODES;
