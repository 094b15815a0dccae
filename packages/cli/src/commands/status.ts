import * as p from "@clack/prompts";
import { minorToDecimal } from "@fundflow/core";
import { Command } from "commander";
import pc from "picocolors";
import { loadCommandContext, openFundflow } from "../utils/connect.js";

export const statusCommand = new Command("status")
	.description("Show configuration, account totals and recent failures")
	.option("--url <url>", "PostgreSQL connection URL (or set DATABASE_URL)")
	.option("--recent <n>", "Number of recent recovery entries to show", "5")
	.action(async (options: { url?: string; recent: string }) => {
		p.intro(pc.bgCyan(pc.black(" fundflow status ")));

		const ctx = await loadCommandContext(statusCommand);

		// ---- Configuration ----
		p.log.step(pc.bold("Configuration"));
		if (ctx.configFile) {
			p.log.success(`  Config file:   ${pc.green("found")} ${pc.dim(ctx.configFile)}`);
		} else {
			p.log.info(`  Config file:   ${pc.dim("none, using defaults")}`);
		}
		const lockMode = ctx.config.advanced?.lockMode ?? "wait";
		p.log.info(`  Lock mode:     ${pc.cyan(lockMode)}`);

		const { fundflow, schema, stats, close } = openFundflow(ctx, options.url);
		p.log.info(`  Schema:        ${pc.cyan(schema)}`);

		try {
			// ---- Totals ----
			const summary = await fundflow.reports.getSummary();
			p.log.step(pc.bold("Accounts"));
			p.log.info(`  Accounts:      ${summary.accounts} (${summary.activeAccounts} active)`);
			p.log.info(
				`  Total balance: ${pc.cyan(`${minorToDecimal(summary.totalBalance, summary.currency)} ${summary.currency}`)}`,
			);
			p.log.info(`  Transactions:  ${summary.transactions}`);
			p.log.info(`  Audit entries: ${summary.auditEntries}`);

			// ---- Failures ----
			p.log.step(pc.bold("Recovery log"));
			const limit = Number.parseInt(options.recent, 10);
			const recent = await fundflow.recovery.list({ limit: Number.isNaN(limit) ? 5 : limit });
			if (recent.length === 0) {
				p.log.success(`  ${pc.green("No failed operations recorded")}`);
			} else {
				p.log.info(`  ${summary.recoveryEntries} entr${summary.recoveryEntries === 1 ? "y" : "ies"} total`);
				for (const entry of recent) {
					const amount = minorToDecimal(entry.attemptedAmount, summary.currency);
					p.log.warn(
						`  ${pc.dim(entry.failedAt.toISOString())} ${entry.operationType} ${amount} ${pc.yellow(entry.errorCode ?? "UNKNOWN")}`,
					);
				}
			}

			// ---- Pool ----
			const pool = stats();
			p.log.step(pc.bold("Connection pool"));
			p.log.info(`  Clients:       ${pool.totalCount} total, ${pool.idleCount} idle`);
			if (pool.saturated) {
				p.log.warn(`  ${pool.waitingCount} caller(s) waiting for a connection`);
			}

			p.outro(pc.dim("Status complete."));
		} finally {
			await close();
		}
	});
