import type {
	Account,
	FundflowAdapter,
	FundflowLogger,
	FundflowTransactionAdapter,
	TransactionOptions,
} from "@fundflow/core";
import { FundflowError } from "@fundflow/core";
import {
	assertAccountBalance,
	createTestAdapter,
	getTestInstance,
	seedAccount,
} from "@fundflow/test-utils";
import { beforeEach, describe, expect, it, vi } from "vitest";
import type { Fundflow } from "../fundflow/base.js";

interface Faults {
	/** Recovery inserts throw */
	recoveryStore: boolean;
	/** Every unit of work fails as if the server refused the connection */
	unavailable: boolean;
}

function faultyAdapter(base: FundflowAdapter, faults: Faults): FundflowAdapter {
	return {
		...base,
		transaction: <T>(
			fn: (tx: FundflowTransactionAdapter) => Promise<T>,
			options?: TransactionOptions,
		): Promise<T> => {
			if (faults.unavailable) {
				return Promise.reject(
					Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:5432"), { code: "ECONNREFUSED" }),
				);
			}
			return base.transaction(
				(tx) =>
					fn({
						...tx,
						create: async (args) => {
							if (args.model === "recovery_logs" && faults.recoveryStore) {
								throw new Error("recovery store offline");
							}
							return tx.create(args);
						},
					}),
				options,
			);
		},
	};
}

async function rejection(promise: Promise<unknown>): Promise<FundflowError> {
	const error = await promise.then(
		() => undefined,
		(e: unknown) => e,
	);
	if (!(error instanceof FundflowError)) throw new Error(`expected a FundflowError, got ${String(error)}`);
	return error;
}

describe("transfer gateway", () => {
	let fundflow: Fundflow;
	let faults: Faults;
	let logger: FundflowLogger;
	let alice: Account;
	let bob: Account;

	beforeEach(async () => {
		faults = { recoveryStore: false, unavailable: false };
		logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
		({ fundflow } = await getTestInstance({
			adapter: faultyAdapter(createTestAdapter(), faults),
			logger,
		}));
		alice = await seedAccount(fundflow, {
			customerId: "alice",
			accountNumber: "ACC2000000001",
			balance: 10000,
		});
		bob = await seedAccount(fundflow, {
			customerId: "bob",
			accountNumber: "ACC2000000002",
			balance: 5000,
		});
	});

	// =========================================================================
	// TRANSFER FUNDS
	// =========================================================================

	describe("transferFunds", () => {
		it("parses major-unit amounts and transfers to the receiver by number", async () => {
			const record = await fundflow.gateway.transferFunds({
				actorCustomerId: "alice",
				senderAccountId: alice.id,
				receiverAccountNumber: "ACC2000000002",
				amount: "30.00",
			});

			expect(record.amount).toBe(3000);
			expect(record.receiverAccountId).toBe(bob.id);
			await assertAccountBalance(fundflow, "ACC2000000001", 7000);
			await assertAccountBalance(fundflow, "ACC2000000002", 8000);
			expect(await fundflow.recovery.list()).toEqual([]);
		});

		it("accepts numeric amounts", async () => {
			const record = await fundflow.gateway.transferFunds({
				actorCustomerId: "alice",
				senderAccountId: alice.id,
				receiverAccountNumber: "ACC2000000002",
				amount: 12.5,
			});
			expect(record.amount).toBe(1250);
		});

		it("rejects amounts that do not parse to a positive value", async () => {
			for (const amount of ["0", "-5.00", "abc", "1.234"]) {
				const error = await rejection(
					fundflow.gateway.transferFunds({
						actorCustomerId: "alice",
						senderAccountId: alice.id,
						receiverAccountNumber: "ACC2000000002",
						amount,
					}),
				);
				expect(error.code).toBe("INVALID_AMOUNT");
				expect(error.message).toBe("Transfer amount must be greater than zero");
			}
			expect(await fundflow.recovery.list()).toEqual([]);
		});

		it("rejects a sender account the actor does not own", async () => {
			const error = await rejection(
				fundflow.gateway.transferFunds({
					actorCustomerId: "bob",
					senderAccountId: alice.id,
					receiverAccountNumber: "ACC2000000002",
					amount: "1.00",
				}),
			);

			expect(error.code).toBe("NOT_ACCOUNT_OWNER");
			expect(error.message).toBe("Invalid sender account");
			expect(await fundflow.recovery.list()).toEqual([]);
		});

		it("rejects an unknown receiver account number", async () => {
			const error = await rejection(
				fundflow.gateway.transferFunds({
					actorCustomerId: "alice",
					senderAccountId: alice.id,
					receiverAccountNumber: "ACC9999999999",
					amount: "1.00",
				}),
			);

			expect(error.code).toBe("ACCOUNT_NOT_FOUND");
			expect(error.message).toBe("Account not found: ACC9999999999");
		});

		it("records a recovery entry for insufficient funds and rethrows", async () => {
			const error = await rejection(
				fundflow.gateway.transferFunds({
					actorCustomerId: "alice",
					senderAccountId: alice.id,
					receiverAccountNumber: "ACC2000000002",
					amount: "150.00",
				}),
			);

			expect(error.code).toBe("INSUFFICIENT_FUNDS");
			await assertAccountBalance(fundflow, "ACC2000000001", 10000);
			await assertAccountBalance(fundflow, "ACC2000000002", 5000);

			const [entry, ...rest] = await fundflow.recovery.list();
			expect(rest).toEqual([]);
			expect(entry).toMatchObject({
				operationType: "TRANSFER",
				senderAccountId: alice.id,
				receiverAccountId: bob.id,
				attemptedAmount: 15000,
				errorCode: "INSUFFICIENT_FUNDS",
				failureReason: error.message,
				senderBalanceAtFailure: 10000,
				details: {
					senderAccount: "ACC2000000001",
					receiverAccount: "ACC2000000002",
					actorCustomerId: "alice",
					deficitAmount: "50.00",
				},
			});
		});

		it("records other engine failures with a freshly read balance", async () => {
			await fundflow.accounts.freeze(bob.id);

			const error = await rejection(
				fundflow.gateway.transferFunds({
					actorCustomerId: "alice",
					senderAccountId: alice.id,
					receiverAccountNumber: "ACC2000000002",
					amount: "10.00",
				}),
			);

			expect(error.code).toBe("ACCOUNT_INACTIVE");
			const [entry] = await fundflow.recovery.list();
			expect(entry?.errorCode).toBe("ACCOUNT_INACTIVE");
			expect(entry?.senderBalanceAtFailure).toBe(10000);
			expect(entry?.details).toEqual({
				senderAccount: "ACC2000000001",
				receiverAccount: "ACC2000000002",
				actorCustomerId: "alice",
			});
		});

		it("still rethrows the original error when the recovery log cannot be written", async () => {
			faults.recoveryStore = true;

			const error = await rejection(
				fundflow.gateway.transferFunds({
					actorCustomerId: "alice",
					senderAccountId: alice.id,
					receiverAccountNumber: "ACC2000000002",
					amount: "150.00",
				}),
			);

			expect(error.code).toBe("INSUFFICIENT_FUNDS");
			expect(logger.error).toHaveBeenCalledWith("Failed to write recovery log", {
				operationType: "TRANSFER",
				senderAccountId: alice.id,
				receiverAccountId: bob.id,
				error: "recovery store offline",
				code: undefined,
			});
			faults.recoveryStore = false;
			expect(await fundflow.recovery.list()).toEqual([]);
		});

		it("surfaces STORE_UNAVAILABLE when the store refuses connections", async () => {
			faults.unavailable = true;

			const error = await rejection(
				fundflow.gateway.transferFunds({
					actorCustomerId: "alice",
					senderAccountId: alice.id,
					receiverAccountNumber: "ACC2000000002",
					amount: "10.00",
				}),
			);

			expect(error.code).toBe("STORE_UNAVAILABLE");
			expect(error.transient).toBe(true);
			faults.unavailable = false;
			await assertAccountBalance(fundflow, "ACC2000000001", 10000);
		});
	});

	// =========================================================================
	// SIMULATE FAILURE
	// =========================================================================

	describe("simulateFailure", () => {
		it("attempts balance plus 5000.00 and records a SIMULATED_FAILURE entry", async () => {
			const result = await fundflow.gateway.simulateFailure({
				actorCustomerId: "alice",
				senderAccountId: alice.id,
			});

			expect(result.attemptedAmount).toBe(510000);
			expect(result.error.code).toBe("INSUFFICIENT_FUNDS");
			expect(result.recoveryLog).toMatchObject({
				operationType: "SIMULATED_FAILURE",
				senderAccountId: alice.id,
				receiverAccountId: bob.id,
				attemptedAmount: 510000,
				errorCode: "INSUFFICIENT_FUNDS",
				senderBalanceAtFailure: 10000,
				details: { deficitAmount: "5000.00", actorCustomerId: "alice" },
			});
			await assertAccountBalance(fundflow, "ACC2000000001", 10000);
			await assertAccountBalance(fundflow, "ACC2000000002", 5000);
		});

		it("requires the actor to own the sender account", async () => {
			const error = await rejection(
				fundflow.gateway.simulateFailure({ actorCustomerId: "alice", senderAccountId: bob.id }),
			);
			expect(error.code).toBe("NOT_ACCOUNT_OWNER");
		});

		it("fails with NOT_FOUND when no other customer has an active account", async () => {
			await fundflow.accounts.freeze(bob.id);

			const error = await rejection(
				fundflow.gateway.simulateFailure({ actorCustomerId: "alice", senderAccountId: alice.id }),
			);

			expect(error.code).toBe("NOT_FOUND");
			expect(error.message).toBe("No receiver account available for simulation");
		});
	});
});
