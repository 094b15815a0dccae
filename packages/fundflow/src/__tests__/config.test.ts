import type { FundflowAdapter, FundflowAdvancedOptions } from "@fundflow/core";
import { FundflowError } from "@fundflow/core";
import { describe, expect, it, vi } from "vitest";
import { validateConfig } from "../config/index.js";

function createMockAdapter(): FundflowAdapter {
	return {
		id: "mock",
		create: vi.fn(),
		findOne: vi.fn(),
		findMany: vi.fn(),
		update: vi.fn(),
		count: vi.fn(),
		transaction: vi.fn(),
	};
}

function configError(fn: () => void): FundflowError {
	try {
		fn();
	} catch (error) {
		if (error instanceof FundflowError) return error;
		throw error;
	}
	throw new Error("expected validateConfig to throw");
}

describe("validateConfig", () => {
	const database = createMockAdapter();

	it("accepts the minimal configuration", () => {
		expect(() => validateConfig({ database })).not.toThrow();
	});

	it("accepts a fully specified configuration", () => {
		expect(() =>
			validateConfig({
				database,
				currency: "EUR",
				schema: "banking",
				advanced: {
					transactionTimeoutMs: 2000,
					lockTimeoutMs: 500,
					maxTransactionAmount: 100_000,
					lockRetryCount: 0,
					lockRetryBaseDelayMs: 10,
					lockRetryMaxDelayMs: 100,
					lockMode: "nowait",
					optimisticRetryCount: 5,
				},
			}),
		).not.toThrow();
	});

	it("rejects an unknown currency", () => {
		const error = configError(() => validateConfig({ database, currency: "ABC" }));
		expect(error.code).toBe("INVALID_ARGUMENT");
		expect(error.message).toBe(
			'fundflow config: unknown currency "ABC". Use a valid ISO 4217 code.',
		);
	});

	it("rejects a schema that is not a plain identifier", () => {
		const error = configError(() => validateConfig({ database, schema: "bank; DROP" }));
		expect(error.message).toBe(
			'fundflow config: \'schema\' must be a valid identifier, got "bank; DROP"',
		);
	});

	const nonPositive: Array<[string, FundflowAdvancedOptions]> = [
		["transactionTimeoutMs", { transactionTimeoutMs: 0 }],
		["lockTimeoutMs", { lockTimeoutMs: -1 }],
		["lockRetryBaseDelayMs", { lockRetryBaseDelayMs: Number.POSITIVE_INFINITY }],
	];
	for (const [name, advanced] of nonPositive) {
		it(`rejects a non-positive ${name}`, () => {
			const error = configError(() => validateConfig({ database, advanced }));
			expect(error.message).toBe(
				`fundflow config: 'advanced.${name}' must be a positive finite number`,
			);
		});
	}

	it("rejects a fractional retry count", () => {
		const error = configError(() => validateConfig({ database, advanced: { lockRetryCount: 1.5 } }));
		expect(error.message).toBe(
			"fundflow config: 'advanced.lockRetryCount' must be a non-negative integer",
		);
	});

	it("rejects a fractional maximum amount", () => {
		const error = configError(() =>
			validateConfig({ database, advanced: { maxTransactionAmount: 10.5 } }),
		);
		expect(error.message).toBe(
			"fundflow config: 'advanced.maxTransactionAmount' must be a positive safe integer",
		);
	});
});
