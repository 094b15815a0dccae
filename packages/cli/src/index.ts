#!/usr/bin/env node
import "dotenv/config";
import { FundflowError } from "@fundflow/core";
import { Command, CommanderError } from "commander";
import pc from "picocolors";
import { migrateCommand } from "./commands/migrate.js";
import { statusCommand } from "./commands/status.js";
import { transferCommand } from "./commands/transfer.js";
import { verifyCommand } from "./commands/verify.js";
import { sanitizeErrorMessage } from "./utils/errors.js";
import pkg from "../package.json" with { type: "json" };

// Ctrl-C during a prompt or a pending query exits without a stack trace.
for (const signal of ["SIGINT", "SIGTERM"] as const) {
	process.on(signal, () => process.exit(0));
}

const { version } = pkg;

const BANNER = `
  ${pc.bold(pc.cyan("fundflow"))} ${pc.dim(`v${version}`)}
  ${pc.dim("Atomic funds transfers with audit and recovery logs")}
`;

/** Commander signals help and --version output by throwing under exitOverride. */
const CLEAN_EXIT_CODES = new Set(["commander.help", "commander.helpDisplayed", "commander.version"]);

function exitCodeFor(error: unknown): number {
	if (error instanceof CommanderError && CLEAN_EXIT_CODES.has(error.code)) return 0;
	if (error instanceof CommanderError) return error.exitCode;

	const message = error instanceof Error ? error.message : String(error);
	const prefix = FundflowError.is(error) ? `${error.code}: ` : "";
	console.error(pc.red(sanitizeErrorMessage(`${prefix}${message}`)));
	return 1;
}

const program = new Command()
	.name("fundflow")
	.description("CLI for fundflow: schema migrations, integrity checks and transfers")
	.version(version, "-v, --version")
	.option("--cwd <dir>", "Working directory", process.cwd())
	.option("-c, --config <path>", "Path to fundflow config file")
	.option("--verbose", "Log engine debug output")
	.action(() => {
		console.log(BANNER);
		program.help();
	})
	.addCommand(migrateCommand)
	.addCommand(statusCommand)
	.addCommand(verifyCommand)
	.addCommand(transferCommand)
	.exitOverride();

try {
	await program.parseAsync();
} catch (error) {
	process.exit(exitCodeFor(error));
}
