import * as p from "@clack/prompts";
import { createBankClient } from "@clearline/client";
import { Command } from "commander";
import pc from "picocolors";
import { resolveBankUrl } from "../utils/env.js";
import { describeTransfer } from "./transfer.js";

export const statusCommand = new Command("status")
	.description("Show a transfer and the balances of its local account")
	.argument("<transferId>", "Transfer id returned by `clearline transfer`")
	.option("--bank-url <url>", "Bank that initiated the transfer (CLEARLINE_BASE_URL)")
	.action(async (transferId: string, flags: { bankUrl?: string }) => {
		const baseURL = resolveBankUrl(flags.bankUrl, process.env);
		const client = createBankClient({ baseURL });

		p.intro(pc.bgCyan(pc.black(" clearline status ")));
		const info = await client.info();
		p.log.info(`Bank:         ${pc.bold(info.instanceId)} ${pc.dim(`(${info.name}, ${baseURL})`)}`);

		const transfer = await client.transfers.get(transferId);
		p.log.message(describeTransfer(transfer).join("\n"));

		const balance = await client.accounts.getBalance(transfer.sourceAccountId);
		p.log.step(pc.bold("Source account"));
		p.log.info(
			`  balance ${pc.cyan(String(balance.balance))}, reserved ${pc.cyan(String(balance.reserved))}, available ${pc.cyan(String(balance.available))}`,
		);
		p.outro(pc.dim("clearline status complete"));
	});
