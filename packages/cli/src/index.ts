#!/usr/bin/env -S node --import tsx
import "dotenv/config";
import { isClearlineClientError } from "@clearline/client";
import { Command } from "commander";
import pc from "picocolors";
import { keysCommand } from "./commands/keys.js";
import { registryCommand } from "./commands/registry.js";
import { serveCommand } from "./commands/serve.js";
import { statusCommand } from "./commands/status.js";
import { transferCommand } from "./commands/transfer.js";
import { sanitizeErrorMessage } from "./utils/env.js";

const cliVersion = "0.1.0";

const BANNER = `
  ${pc.bold(pc.cyan("clearline"))} ${pc.dim(`v${cliVersion}`)}
  ${pc.dim("Signed two-phase commit transfers between bank instances")}
`;

const program = new Command()
	.name("clearline")
	.description("CLI for clearline bank instances and the instance registry")
	.version(cliVersion, "-v, --version")
	.action(() => {
		console.log(BANNER);
		program.help();
	});

program.addCommand(keysCommand);
program.addCommand(serveCommand);
program.addCommand(registryCommand);
program.addCommand(transferCommand);
program.addCommand(statusCommand);

program.exitOverride();

try {
	await program.parseAsync();
} catch (error) {
	if (error instanceof Error && "code" in error && error.code === "commander.helpDisplayed") {
		process.exit(0);
	}
	if (error instanceof Error && "code" in error && error.code === "commander.version") {
		process.exit(0);
	}
	const message = error instanceof Error ? error.message : String(error);
	const prefix = isClearlineClientError(error) ? `${error.code}: ` : "";

	console.error(pc.red(`${prefix}${sanitizeErrorMessage(message)}`));
	process.exit(1);
}
