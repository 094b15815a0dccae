import type { FundflowOptions } from "@fundflow/core";
import { FundflowError } from "@fundflow/core";
import currencies from "./currencies.json" with { type: "json" };

const VALID_CURRENCIES: ReadonlySet<string> = new Set(currencies);

const LOCK_MODES = new Set(["wait", "nowait", "optimistic"]);

function positive(name: string, value: number | undefined): void {
	if (value !== undefined && (value <= 0 || !Number.isFinite(value))) {
		throw FundflowError.invalidArgument(
			`fundflow config: 'advanced.${name}' must be a positive finite number`,
		);
	}
}

function nonNegativeInteger(name: string, value: number | undefined): void {
	if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
		throw FundflowError.invalidArgument(
			`fundflow config: 'advanced.${name}' must be a non-negative integer`,
		);
	}
}

/**
 * Validate fundflow configuration options at runtime.
 * Throws FundflowError (INVALID_ARGUMENT) on the first invalid value.
 */
export function validateConfig(options: FundflowOptions): void {
	if (!options.database) {
		throw FundflowError.invalidArgument("fundflow config: 'database' adapter is required");
	}

	if (options.currency !== undefined && !VALID_CURRENCIES.has(options.currency)) {
		throw FundflowError.invalidArgument(
			`fundflow config: unknown currency "${options.currency}". Use a valid ISO 4217 code.`,
		);
	}

	if (options.schema !== undefined && !/^[a-zA-Z_][a-zA-Z0-9_]*$/.test(options.schema)) {
		throw FundflowError.invalidArgument(
			`fundflow config: 'schema' must be a valid identifier, got "${options.schema}"`,
		);
	}

	const adv = options.advanced;
	if (!adv) return;

	positive("transactionTimeoutMs", adv.transactionTimeoutMs);
	positive("lockTimeoutMs", adv.lockTimeoutMs);
	positive("lockRetryBaseDelayMs", adv.lockRetryBaseDelayMs);
	positive("lockRetryMaxDelayMs", adv.lockRetryMaxDelayMs);
	nonNegativeInteger("lockRetryCount", adv.lockRetryCount);
	nonNegativeInteger("optimisticRetryCount", adv.optimisticRetryCount);

	if (
		adv.maxTransactionAmount !== undefined &&
		(!Number.isSafeInteger(adv.maxTransactionAmount) || adv.maxTransactionAmount <= 0)
	) {
		throw FundflowError.invalidArgument(
			"fundflow config: 'advanced.maxTransactionAmount' must be a positive safe integer",
		);
	}

	if (adv.lockMode !== undefined && !LOCK_MODES.has(adv.lockMode)) {
		throw FundflowError.invalidArgument(
			`fundflow config: 'advanced.lockMode' must be one of wait, nowait, optimistic`,
		);
	}
}
