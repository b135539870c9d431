import { createBank, createBankHono, createHttpTransport, createRegistryDiscovery } from "@clearline/bank";
import { Command } from "commander";
import { type Env, readKeyFile, resolveServeSettings, type ServeFlags } from "../utils/env.js";
import { onShutdown, startHttpServer } from "../utils/http.js";
import { createCliLogger } from "../utils/logger.js";
import { openStorage } from "../utils/storage.js";

/**
 * Start one bank instance: open storage, publish the address and key to the
 * registry, start the background workers, serve the HTTP API.
 */
export async function runServe(flags: ServeFlags, env: Env, cwd: string): Promise<void> {
	const settings = resolveServeSettings(flags, env);
	const logger = createCliLogger({
		level: settings.logLevel,
		format: settings.logFormat,
		name: settings.instanceId,
	});

	const identity = {
		privateKey: readKeyFile(settings.privateKeyPath, cwd),
		publicKey: readKeyFile(settings.publicKeyPath, cwd),
	};
	const storage = await openStorage({ databaseUrl: settings.databaseUrl, schema: settings.schema, logger });

	const bank = createBank({
		instanceId: settings.instanceId,
		name: settings.name,
		baseUrl: settings.baseUrl,
		identity,
		database: storage.adapter,
		schema: settings.schema,
		discovery: createRegistryDiscovery({ registryUrl: settings.registryUrl }),
		transport: createHttpTransport(),
		logger,
	});

	if (settings.resetAccounts !== null) {
		const accounts = await bank.accounts.reset(settings.resetAccounts);
		logger.info("Accounts reset", { count: accounts.length });
	}

	await bank.register({ storage: storage.kind });
	bank.workers.start();

	const server = startHttpServer({
		handler: createBankHono(bank),
		port: settings.port,
		host: settings.host,
		logger,
	});

	onShutdown(logger, async () => {
		await server.close();
		await bank.workers.stop();
		await storage.close();
	});
}

export const serveCommand = new Command("serve")
	.description("Run a bank instance")
	.option("--instance-id <id>", "Instance id (CLEARLINE_INSTANCE_ID)")
	.option("--name <name>", "Display name (CLEARLINE_BANK_NAME)")
	.option("--base-url <url>", "Address peers reach this instance at (CLEARLINE_BASE_URL)")
	.option("--registry-url <url>", "Registry base URL (CLEARLINE_REGISTRY_URL)")
	.option("--private-key <path>", "PEM private key (CLEARLINE_PRIVATE_KEY_PATH)")
	.option("--public-key <path>", "PEM public key (CLEARLINE_PUBLIC_KEY_PATH)")
	.option("--database-url <url>", "PostgreSQL connection string (DATABASE_URL); memory when absent")
	.option("--schema <name>", "PostgreSQL schema (CLEARLINE_SCHEMA)")
	.option("-p, --port <port>", "Port to listen on (PORT, default 4001)")
	.option("--host <host>", "Interface to bind (HOST, default 0.0.0.0)")
	.option("--log-level <level>", "debug, info, warn or error (CLEARLINE_LOG_LEVEL)")
	.option("--log-format <format>", "pretty or json (CLEARLINE_LOG_FORMAT)")
	.option("--reset-accounts <n>", "Replace all accounts with n generated ones before serving")
	.action((flags: ServeFlags) => runServe(flags, process.env, process.cwd()));
