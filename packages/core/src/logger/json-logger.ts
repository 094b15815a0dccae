// =============================================================================
// JSON LOGGER - one JSON object per line, for log aggregation
// =============================================================================

import type { FundflowLogger } from "../types/config.js";
import {
	buildRedactionPolicy,
	LEVEL_PRIORITY,
	type LogLevel,
	type RedactionOptions,
	redactData,
} from "./redact.js";

export interface JsonLoggerOptions extends RedactionOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Service name for structured output. Default: `"fundflow"` */
	service?: string;
	/** Line sink. Default: stdout for debug/info, stderr for warn/error */
	write?: (line: string, level: LogLevel) => void;
}

function defaultWrite(line: string, level: LogLevel): void {
	const stream = level === "error" || level === "warn" ? process.stderr : process.stdout;
	stream.write(`${line}\n`);
}

/** Error instances do not survive JSON.stringify; flatten them first. */
function serializeValue(_key: string, value: unknown): unknown {
	if (value instanceof Error) {
		return { name: value.name, message: value.message };
	}
	return value;
}

/**
 * Create a structured JSON logger.
 *
 * @example
 * ```ts
 * import { createJsonLogger } from "@fundflow/core/logger";
 *
 * const logger = createJsonLogger({ level: "debug", service: "transfers" });
 * ```
 */
export function createJsonLogger(options: JsonLoggerOptions = {}): FundflowLogger {
	const { level = "info", service = "fundflow", write = defaultWrite } = options;
	const minPriority = LEVEL_PRIORITY[level];
	const policy = buildRedactionPolicy(options);

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const safeData = redactData(data, policy);
		const entry: Record<string, unknown> = {
			timestamp: new Date().toISOString(),
			level: lvl,
			service,
			message,
			...safeData,
		};

		write(JSON.stringify(entry, serializeValue), lvl);
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}
