// =============================================================================
// LOG LEVELS & REDACTION -- shared by the console and JSON loggers
// =============================================================================
// Credentials never reach a log line. Account numbers are masked down to
// their last four characters, the way statements print them.

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

const DEFAULT_REDACT_KEYS = ["password", "token", "secret", "databaseUrl", "connectionString"];
const DEFAULT_MASK_KEYS = ["accountNumber", "senderAccount", "receiverAccount"];

export interface RedactionOptions {
	/** Keys whose values are replaced with "[REDACTED]". Default: credentials */
	redactKeys?: string[];
	/** Keys whose string values keep only their last four characters. Default: account number keys */
	maskKeys?: string[];
}

export interface RedactionPolicy {
	redact: ReadonlySet<string>;
	mask: ReadonlySet<string>;
}

export function buildRedactionPolicy(options: RedactionOptions = {}): RedactionPolicy {
	return {
		redact: new Set(options.redactKeys ?? DEFAULT_REDACT_KEYS),
		mask: new Set(options.maskKeys ?? DEFAULT_MASK_KEYS),
	};
}

/** `ACC0000000042` -> `*********0042` */
export function maskAccountNumber(value: string): string {
	if (value.length <= 4) return "****";
	return `${"*".repeat(value.length - 4)}${value.slice(-4)}`;
}

/** Shallow copy of `data` with the policy applied; `data` itself when nothing matched. */
export function redactData(
	data: Record<string, unknown> | undefined,
	policy: RedactionPolicy,
): Record<string, unknown> | undefined {
	if (!data) return data;

	let redacted: Record<string, unknown> | undefined;
	for (const [key, value] of Object.entries(data)) {
		let replacement: unknown;
		if (policy.redact.has(key)) replacement = "[REDACTED]";
		else if (policy.mask.has(key) && typeof value === "string") replacement = maskAccountNumber(value);
		else continue;

		redacted ??= { ...data };
		redacted[key] = replacement;
	}
	return redacted ?? data;
}
