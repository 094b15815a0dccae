import * as p from "@clack/prompts";
import { Command } from "commander";
import pc from "picocolors";
import { loadCommandContext, openFundflow } from "../utils/connect.js";

export const verifyCommand = new Command("verify")
	.description("Check that no balance is negative and every audit trail matches its balance")
	.option("--account <number>", "Verify a single account by account number")
	.option("--url <url>", "PostgreSQL connection URL (or set DATABASE_URL)")
	.action(async (options: { account?: string; url?: string }) => {
		p.intro(pc.bgCyan(pc.black(" fundflow verify ")));

		const ctx = await loadCommandContext(verifyCommand);
		const { fundflow, close } = openFundflow(ctx, options.url);

		try {
			if (options.account) {
				const account = await fundflow.accounts.get(options.account);
				if (!account) {
					p.log.error(`${pc.red("FAIL")} Account ${options.account} does not exist`);
					process.exitCode = 1;
					return;
				}

				const trail = await fundflow.audit.verify(account.id);
				if (trail.valid) {
					p.log.success(`${pc.green("PASS")} ${trail.entries} audit entries chain to the balance`);
				} else {
					p.log.error(`${pc.red("FAIL")} Audit trail of ${options.account} is broken`);
					for (const problem of trail.errors) p.log.error(`  ${problem}`);
					process.exitCode = 1;
				}
				p.outro(pc.dim(`Checked account ${options.account}.`));
				return;
			}

			const s = p.spinner();
			s.start("Checking balances and audit trails...");
			const report = await fundflow.reports.verifyIntegrity();
			s.stop(`Checked ${pc.cyan(String(report.accountsChecked))} account(s)`);

			if (report.negativeBalances.length === 0) {
				p.log.success(`${pc.green("PASS")} No negative balances`);
			} else {
				p.log.error(
					`${pc.red("FAIL")} Negative balance on ${report.negativeBalances.join(", ")}`,
				);
			}

			if (report.brokenTrails.length === 0) {
				p.log.success(`${pc.green("PASS")} Every audit trail matches its balance`);
			} else {
				p.log.error(`${pc.red("FAIL")} ${report.brokenTrails.length} broken audit trail(s)`);
				for (const trail of report.brokenTrails) {
					for (const problem of trail.errors) {
						p.log.error(`  ${trail.accountId.slice(0, 8)}... ${problem}`);
					}
				}
			}

			if (!report.valid) process.exitCode = 1;
			p.outro(report.valid ? pc.green("All checks passed.") : pc.red("Integrity violations found."));
		} finally {
			await close();
		}
	});
