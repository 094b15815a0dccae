import * as p from "@clack/prompts";
import { minorToDecimal } from "@fundflow/core";
import { Command } from "commander";
import pc from "picocolors";
import { loadCommandContext, openFundflow } from "../utils/connect.js";

export const transferCommand = new Command("transfer")
	.description("Move funds from one of a customer's accounts to another account")
	.requiredOption("--actor <customerId>", "Customer who owns the sender account")
	.requiredOption("--from <accountId>", "Sender account id")
	.requiredOption("--to <accountNumber>", "Receiver account number")
	.requiredOption("--amount <amount>", "Amount in major units, e.g. 30.00")
	.option("--description <text>", "Transaction description")
	.option("--url <url>", "PostgreSQL connection URL (or set DATABASE_URL)")
	.option("-y, --yes", "Skip confirmation prompt")
	.action(
		async (options: {
			actor: string;
			from: string;
			to: string;
			amount: string;
			description?: string;
			url?: string;
			yes?: boolean;
		}) => {
			p.intro(pc.bgCyan(pc.black(" fundflow transfer ")));

			if (!options.yes) {
				const confirmed = await p.confirm({
					message: `Transfer ${options.amount} to ${options.to}?`,
					initialValue: false,
				});
				if (p.isCancel(confirmed) || !confirmed) {
					p.cancel("Transfer cancelled.");
					return;
				}
			}

			const ctx = await loadCommandContext(transferCommand);
			const { fundflow, close } = openFundflow(ctx, options.url);

			try {
				const record = await fundflow.gateway.transferFunds({
					actorCustomerId: options.actor,
					senderAccountId: options.from,
					receiverAccountNumber: options.to,
					amount: options.amount,
					description: options.description,
				});
				const { currency } = fundflow.$options;
				p.log.success(
					`${pc.green("COMPLETED")} ${minorToDecimal(record.amount, currency ?? "USD")} ${pc.dim(record.id)}`,
				);
				p.outro(pc.dim(record.description));
			} finally {
				await close();
			}
		},
	);
