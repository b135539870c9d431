import { createRegistry, createRegistryFetchHandler } from "@clearline/registry";
import { Command } from "commander";
import { type Env, type RegistryFlags, resolveRegistrySettings } from "../utils/env.js";
import { onShutdown, startHttpServer } from "../utils/http.js";
import { createCliLogger } from "../utils/logger.js";
import { openStorage } from "../utils/storage.js";

export async function runRegistry(flags: RegistryFlags, env: Env): Promise<void> {
	const settings = resolveRegistrySettings(flags, env);
	const logger = createCliLogger({ level: settings.logLevel, format: settings.logFormat, name: "registry" });
	const storage = await openStorage({ databaseUrl: settings.databaseUrl, schema: settings.schema, logger });

	const registry = createRegistry({ database: storage.adapter, logger });
	const handler = createRegistryFetchHandler(registry);

	const server = startHttpServer({
		handler: (c) => handler(c.req.raw),
		port: settings.port,
		host: settings.host,
		logger,
	});

	onShutdown(logger, async () => {
		await server.close();
		await storage.close();
	});
}

export const registryCommand = new Command("registry")
	.description("Run the instance registry")
	.option("--database-url <url>", "PostgreSQL connection string (DATABASE_URL); memory when absent")
	.option("--schema <name>", "PostgreSQL schema (CLEARLINE_SCHEMA)")
	.option("-p, --port <port>", "Port to listen on (PORT, default 4000)")
	.option("--host <host>", "Interface to bind (HOST, default 0.0.0.0)")
	.option("--log-level <level>", "debug, info, warn or error (CLEARLINE_LOG_LEVEL)")
	.option("--log-format <format>", "pretty or json (CLEARLINE_LOG_FORMAT)")
	.action((flags: RegistryFlags) => runRegistry(flags, process.env));
