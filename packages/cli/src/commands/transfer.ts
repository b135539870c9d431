import * as p from "@clack/prompts";
import { createBankClient } from "@clearline/client";
import type { Transfer } from "@clearline/core";
import { Command } from "commander";
import pc from "picocolors";
import { type Env, resolveBankUrl } from "../utils/env.js";

export interface TransferFlags {
	bankUrl?: string;
	from: string;
	toInstance: string;
	toAccount: string;
	amount: string;
	idempotencyKey?: string;
}

export function parseAmount(value: string): number {
	const amount = Number(value);
	if (!Number.isSafeInteger(amount) || amount <= 0) {
		throw new Error(`Amount must be a positive integer in minor units, got "${value}"`);
	}
	return amount;
}

const STATUS_COLOR: Record<Transfer["status"], (s: string) => string> = {
	INITIATED: pc.yellow,
	PREPARED: pc.yellow,
	COMMITTED: pc.green,
	ABORTED: pc.red,
};

/** One line per field, the way `transfer` and `status` print a transfer. */
export function describeTransfer(transfer: Transfer): string[] {
	const lines = [
		`Transfer:     ${pc.cyan(transfer.id)}`,
		`Status:       ${STATUS_COLOR[transfer.status](transfer.status)}`,
		`Amount:       ${transfer.amount}`,
		`From:         ${transfer.originInstanceId}/${transfer.sourceAccountId}`,
		`To:           ${transfer.destinationInstanceId}/${transfer.destinationAccountId}`,
	];
	if (transfer.failureReason) lines.push(`Reason:       ${pc.red(transfer.failureReason)}`);
	if (transfer.remoteReason) lines.push(`Peer reason:  ${pc.red(transfer.remoteReason)}`);
	lines.push(`Updated:      ${pc.dim(transfer.updatedAt)}`);
	return lines;
}

export async function runTransfer(
	flags: TransferFlags,
	env: Env,
	fetchFn?: typeof globalThis.fetch,
): Promise<Transfer> {
	const client = createBankClient({ baseURL: resolveBankUrl(flags.bankUrl, env), fetch: fetchFn });

	const transfer = await client.transfers.create({
		sourceAccountId: flags.from,
		destinationInstanceId: flags.toInstance,
		destinationAccountId: flags.toAccount,
		amount: parseAmount(flags.amount),
		idempotencyKey: flags.idempotencyKey,
	});

	p.note(describeTransfer(transfer).join("\n"), "transfer");
	return transfer;
}

export const transferCommand = new Command("transfer")
	.description("Submit a transfer to a bank instance")
	.requiredOption("--from <accountId>", "Source account id at the submitting bank")
	.requiredOption("--to-instance <instanceId>", "Destination instance id")
	.requiredOption("--to-account <accountId>", "Destination account id")
	.requiredOption("--amount <minorUnits>", "Amount in minor units")
	.option("--idempotency-key <uuid>", "Makes a retried submission return the same transfer")
	.option("--bank-url <url>", "Bank to submit to (CLEARLINE_BASE_URL, default http://localhost:$PORT)")
	.action(async (flags: TransferFlags) => {
		const transfer = await runTransfer(flags, process.env);
		if (transfer.status === "ABORTED") process.exitCode = 1;
	});
