// =============================================================================
// Connection helper shared by the commands that talk to PostgreSQL
// =============================================================================

import type { Command } from "commander";
import { createConsoleLogger } from "@fundflow/core/logger";
import { connectPostgres, type PoolStats } from "@fundflow/kysely-adapter";
import { createFundflow, type Fundflow } from "fundflow";
import { type FundflowCliConfig, getConfig } from "./get-config.js";

export interface GlobalOptions {
	cwd: string;
	config?: string;
	verbose?: boolean;
}

export interface CommandContext {
	cwd: string;
	config: FundflowCliConfig;
	configFile: string | null;
	verbose: boolean;
}

export interface OpenFundflow {
	fundflow: Fundflow;
	schema: string;
	stats: () => PoolStats;
	close: () => Promise<void>;
}

/** Options of the root program, however deep `command` is nested. */
export function globalOptions(command: Command): GlobalOptions {
	let root = command;
	while (root.parent) root = root.parent;
	const opts = root.opts();
	return {
		cwd: typeof opts.cwd === "string" ? opts.cwd : process.cwd(),
		config: typeof opts.config === "string" ? opts.config : undefined,
		verbose: opts.verbose === true,
	};
}

export async function loadCommandContext(command: Command): Promise<CommandContext> {
	const { cwd, config: configPath, verbose = false } = globalOptions(command);
	const loaded = await getConfig({ cwd, configPath });
	return {
		cwd,
		config: loaded?.config ?? {},
		configFile: loaded?.configFile ?? null,
		verbose,
	};
}

/** --url, then the config file, then DATABASE_URL. */
export function resolveDatabaseUrl(ctx: CommandContext, url?: string): string {
	const resolved = url ?? ctx.config.databaseUrl ?? process.env.DATABASE_URL;
	if (!resolved) {
		throw new Error("No database URL. Set DATABASE_URL, pass --url or set databaseUrl in the config file");
	}
	return resolved;
}

export function resolveSchema(ctx: CommandContext, schema?: string): string {
	return schema ?? ctx.config.schema ?? "public";
}

/**
 * Open a small pool on the resolved database and a fundflow instance over it.
 * Callers must `close()` when done.
 */
export function openFundflow(ctx: CommandContext, url?: string): OpenFundflow {
	const schema = resolveSchema(ctx);
	const logger = createConsoleLogger({ level: ctx.verbose ? "debug" : "warn" });
	const pooled = connectPostgres(resolveDatabaseUrl(ctx, url), {
		max: 2,
		lockTimeoutMs: ctx.config.advanced?.lockTimeoutMs,
		onError: (error) => logger.error("Idle PostgreSQL client error", { error: error.message }),
	});

	const fundflow = createFundflow({
		database: pooled.adapter,
		schema,
		currency: ctx.config.currency,
		advanced: ctx.config.advanced,
		logger,
	});

	return { fundflow, schema, stats: pooled.stats, close: pooled.close };
}
