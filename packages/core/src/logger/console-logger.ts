// =============================================================================
// CONSOLE LOGGER — Human-readable ClearlineLogger for development
// =============================================================================

import pc from "picocolors";
import type { ClearlineLogger, LogLevel } from "../types/config.js";
import { leveledLogger } from "./levels.js";
import { buildRedactKeys, redactData } from "./redact.js";

const BADGE: Record<LogLevel, string> = {
	debug: pc.magenta(pc.bold("DEBUG")),
	info: pc.blue(pc.bold("INFO ")),
	warn: pc.yellow(pc.bold("WARN ")),
	error: pc.red(pc.bold("ERROR")),
};

const CONSOLE_METHOD: Record<LogLevel, "log" | "warn" | "error"> = {
	debug: "log",
	info: "log",
	warn: "warn",
	error: "error",
};

export interface ConsoleLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Shown in brackets before each message, usually the instance id. Default: `"clearline"` */
	prefix?: string;
	/** Default: `true` */
	timestamps?: boolean;
	/** Keys to redact from log data. Default: key material and credentials */
	redactKeys?: string[];
}

/**
 * @example
 * ```ts
 * import { createConsoleLogger } from "@clearline/core/logger";
 *
 * const logger = createConsoleLogger({ level: "debug", prefix: "BANKA" });
 * logger.info("Transfer committed", { transferId });
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): ClearlineLogger {
	const { level = "info", prefix = "clearline", timestamps = true } = options;
	const redactKeys = buildRedactKeys(options.redactKeys);

	return leveledLogger(level, (lvl, message, data) => {
		const head = timestamps ? `${pc.dim(new Date().toISOString())} ` : "";
		const line = `${head}${BADGE[lvl]} [${prefix}]: ${message}`;
		const safeData = redactData(data, redactKeys);

		if (safeData && Object.keys(safeData).length > 0) {
			console[CONSOLE_METHOD[lvl]](line, safeData);
		} else {
			console[CONSOLE_METHOD[lvl]](line);
		}
	});
}
