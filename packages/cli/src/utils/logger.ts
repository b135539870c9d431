import type { ClearlineLogger, LogLevel } from "@clearline/core";
import { createConsoleLogger, createJsonLogger } from "@clearline/core/logger";

export function createCliLogger(options: {
	level: LogLevel;
	format: "pretty" | "json";
	name: string;
}): ClearlineLogger {
	return options.format === "json"
		? createJsonLogger({ level: options.level, service: options.name })
		: createConsoleLogger({ level: options.level, prefix: options.name });
}
