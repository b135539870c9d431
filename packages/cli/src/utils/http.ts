// =============================================================================
// HTTP server — mounts a fetch handler in Hono and serves it on Node
// =============================================================================

import type { ClearlineLogger } from "@clearline/core";
import { serve } from "@hono/node-server";
import { Hono } from "hono";

export interface RunningServer {
	close: () => Promise<void>;
}

export function startHttpServer(options: {
	handler: (c: { req: { raw: Request } }) => Promise<Response>;
	port: number;
	host: string;
	logger: ClearlineLogger;
}): RunningServer {
	const app = new Hono();
	app.all("*", (c) => options.handler(c));

	const server = serve({ fetch: app.fetch, port: options.port, hostname: options.host }, (info) => {
		options.logger.info("Listening", { host: options.host, port: info.port });
	});

	return {
		close: () =>
			new Promise<void>((resolve, reject) => {
				server.close((err) => (err ? reject(err) : resolve()));
			}),
	};
}

/** Run `shutdown` once on SIGINT or SIGTERM, then exit. */
export function onShutdown(logger: ClearlineLogger, shutdown: () => Promise<void>): void {
	let inProgress = false;

	const handle = (signal: string) => {
		if (inProgress) {
			logger.warn("Shutdown already in progress, forcing exit");
			process.exit(1);
		}
		inProgress = true;
		logger.info("Shutting down", { signal });
		shutdown().then(
			() => process.exit(0),
			(error: unknown) => {
				logger.error("Shutdown failed", { error: error instanceof Error ? error.message : String(error) });
				process.exit(1);
			},
		);
	};

	process.on("SIGINT", () => handle("SIGINT"));
	process.on("SIGTERM", () => handle("SIGTERM"));
}
