// =============================================================================
// JSON LOGGER — One JSON object per line, for log aggregation
// =============================================================================

import { configure } from "safe-stable-stringify";
import type { ClearlineLogger, LogLevel } from "../types/config.js";
import { leveledLogger } from "./levels.js";
import { buildRedactKeys, redactData } from "./redact.js";

export interface JsonLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Written as `service` on every line. Default: `"clearline"` */
	service?: string;
	/** Keys to redact from log data. Default: key material and credentials */
	redactKeys?: string[];
	/** Line sink. Default: stdout for debug/info, stderr for warn/error */
	write?: (line: string, level: LogLevel) => void;
}

// Circular references become "[Circular]" and bigints are written as numbers.
const stringify = configure({ circularValue: "[Circular]", bigint: true, deterministic: false });

function defaultWrite(line: string, level: LogLevel): void {
	const stream = level === "error" || level === "warn" ? process.stderr : process.stdout;
	stream.write(`${line}\n`);
}

function errorFields(value: unknown): unknown {
	return value instanceof Error ? { name: value.name, message: value.message } : value;
}

export function createJsonLogger(options: JsonLoggerOptions = {}): ClearlineLogger {
	const { level = "info", service = "clearline", write = defaultWrite } = options;
	const redactKeys = buildRedactKeys(options.redactKeys);

	return leveledLogger(level, (lvl, message, data) => {
		const fields: Record<string, unknown> = {};
		for (const [key, value] of Object.entries(redactData(data, redactKeys) ?? {})) {
			fields[key] = errorFields(value);
		}

		const line = stringify({
			timestamp: new Date().toISOString(),
			level: lvl,
			service,
			message,
			...fields,
		});
		if (line !== undefined) write(line, lvl);
	});
}
