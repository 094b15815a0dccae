// =============================================================================
// CONSOLE LOGGER -- human-readable lines on console.*
// =============================================================================
// One line per call: `<time> <LEVEL> [prefix] message key=value ...`.

import type { FundflowLogger } from "../types/config.js";
import {
	buildRedactionPolicy,
	LEVEL_PRIORITY,
	type LogLevel,
	type RedactionOptions,
	redactData,
} from "./redact.js";

export interface ConsoleLoggerOptions extends RedactionOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Prefix shown before each message. Default: `"fundflow"` */
	prefix?: string;
	/** Whether to include ISO timestamps. Default: `true` */
	timestamps?: boolean;
	/** ANSI colors. Default: on for a TTY or FORCE_COLOR, off under NO_COLOR */
	colors?: boolean;
}

function colorsByDefault(): boolean {
	return !process.env.NO_COLOR && (Boolean(process.env.FORCE_COLOR) || process.stdout.isTTY === true);
}

function paint(enabled: boolean, open: number, close: number) {
	return enabled ? (s: string) => `\x1b[${open}m${s}\x1b[${close}m` : (s: string) => s;
}

function formatValue(value: unknown): string {
	if (value instanceof Error) return JSON.stringify(value.message);
	if (typeof value === "string") return /^[^\s"=]+$/.test(value) ? value : JSON.stringify(value);
	if (value instanceof Date) return value.toISOString();
	if (typeof value === "bigint") return value.toString();
	return JSON.stringify(value) ?? String(value);
}

export function formatFields(data: Record<string, unknown>): string {
	return Object.entries(data)
		.filter(([, value]) => value !== undefined)
		.map(([key, value]) => `${key}=${formatValue(value)}`)
		.join(" ");
}

/**
 * Create a console-based logger.
 *
 * @example
 * ```ts
 * import { createConsoleLogger } from "@fundflow/core/logger";
 *
 * const logger = createConsoleLogger({ level: "debug" });
 * logger.info("Transfer committed", { amount: 3000 });
 * // 2024-01-01T00:00:00.000Z INFO  [fundflow] Transfer committed amount=3000
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): FundflowLogger {
	const { level = "info", prefix = "fundflow", timestamps = true } = options;
	const minPriority = LEVEL_PRIORITY[level];
	const policy = buildRedactionPolicy(options);
	const colors = options.colors ?? colorsByDefault();
	const dim = paint(colors, 2, 22);
	const levelColor: Record<LogLevel, (s: string) => string> = {
		debug: paint(colors, 35, 39),
		info: paint(colors, 34, 39),
		warn: paint(colors, 33, 39),
		error: paint(colors, 31, 39),
	};

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const parts: string[] = [];
		if (timestamps) parts.push(dim(new Date().toISOString()));
		parts.push(levelColor[lvl](lvl.toUpperCase().padEnd(5)));
		parts.push(`[${prefix}]`);
		parts.push(message);

		const safeData = redactData(data, policy);
		const fields = safeData ? formatFields(safeData) : "";
		if (fields) parts.push(dim(fields));

		const method = lvl === "error" ? "error" : lvl === "warn" ? "warn" : "log";
		console[method](parts.join(" "));
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}
