// =============================================================================
// Config loader -- uses c12 (UnJS)
// =============================================================================
// Discovers and loads the project's fundflow config file (e.g.
// fundflow.config.ts). The CLI opens its own PostgreSQL pool, so it reads
// only plain settings from the file and never an adapter instance.

import { existsSync } from "node:fs";
import { resolve } from "node:path";
import type { FundflowAdvancedOptions, LockMode } from "@fundflow/core";
import { loadConfig } from "c12";
import { possibleConfigPaths } from "./config-paths.js";

/**
 * Settings the CLI reads from the config file.
 *
 * @example
 * ```ts
 * // fundflow.config.ts
 * export default {
 *   databaseUrl: process.env.DATABASE_URL,
 *   schema: "payments",
 *   currency: "EUR",
 *   advanced: { lockMode: "nowait" },
 * };
 * ```
 */
export interface FundflowCliConfig {
	databaseUrl?: string;
	currency?: string;
	schema?: string;
	advanced?: FundflowAdvancedOptions;
}

export interface ResolvedFundflowConfig {
	config: FundflowCliConfig;
	/** Absolute path of the config file that was loaded */
	configFile: string;
}

const NUMERIC_ADVANCED_KEYS = [
	"transactionTimeoutMs",
	"lockTimeoutMs",
	"maxTransactionAmount",
	"lockRetryCount",
	"lockRetryBaseDelayMs",
	"lockRetryMaxDelayMs",
	"optimisticRetryCount",
] as const;

const LOCK_MODES: readonly LockMode[] = ["wait", "nowait", "optimistic"];

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(source: Record<string, unknown>, key: string): string | undefined {
	const value = source[key];
	if (value === undefined) return undefined;
	if (typeof value !== "string") {
		throw new Error(`'${key}' must be a string, got ${typeof value}`);
	}
	return value;
}

function parseAdvanced(value: unknown): FundflowAdvancedOptions | undefined {
	if (value === undefined) return undefined;
	if (!isRecord(value)) throw new Error("'advanced' must be an object");

	const advanced: FundflowAdvancedOptions = {};
	for (const key of NUMERIC_ADVANCED_KEYS) {
		const raw = value[key];
		if (raw === undefined) continue;
		if (typeof raw !== "number") throw new Error(`'advanced.${key}' must be a number`);
		advanced[key] = raw;
	}

	const lockMode = LOCK_MODES.find((mode) => mode === value.lockMode);
	if (value.lockMode !== undefined && !lockMode) {
		throw new Error(`'advanced.lockMode' must be one of ${LOCK_MODES.join(", ")}`);
	}
	if (lockMode) advanced.lockMode = lockMode;

	return advanced;
}

/**
 * Read CLI settings from a loaded module.
 *
 * c12 resolves `export default X` to `{ ...X }` and named exports to
 * `{ name: X }`, so a named `fundflow` export is checked first.
 */
export function parseCliConfig(loaded: Record<string, unknown>): FundflowCliConfig {
	const source = isRecord(loaded.fundflow) ? loaded.fundflow : loaded;
	return {
		databaseUrl: optionalString(source, "databaseUrl"),
		currency: optionalString(source, "currency"),
		schema: optionalString(source, "schema"),
		advanced: parseAdvanced(source.advanced),
	};
}

/**
 * Find the config file path without loading it.
 */
export function findConfigFile(cwd: string, configPath?: string): string | null {
	if (configPath) {
		const resolved = resolve(cwd, configPath);
		return existsSync(resolved) ? resolved : null;
	}

	for (const candidate of possibleConfigPaths) {
		const fullPath = resolve(cwd, candidate);
		if (existsSync(fullPath)) return fullPath;
	}

	return null;
}

/**
 * Load and parse the fundflow config file.
 *
 * Resolution order:
 * 1. If `configPath` is provided (--config flag), use it directly.
 * 2. Otherwise, scan `possibleConfigPaths` from the working directory.
 *
 * Returns null when no file exists. A file that exists but cannot be loaded
 * or parsed is an error.
 */
export async function getConfig({
	cwd,
	configPath,
}: {
	cwd: string;
	configPath?: string;
}): Promise<ResolvedFundflowConfig | null> {
	const configFile = findConfigFile(cwd, configPath);
	if (!configFile) {
		if (configPath) throw new Error(`Config file not found: ${configPath}`);
		return null;
	}

	const { config } = await loadConfig<Record<string, unknown>>({
		configFile,
		cwd,
		dotenv: true,
		rcFile: false,
		packageJson: false,
		globalRc: false,
	});

	try {
		return { config: parseCliConfig(config ?? {}), configFile };
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new Error(`Invalid config in ${configFile}: ${message}`, { cause: error });
	}
}
