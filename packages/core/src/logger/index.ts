export { type ConsoleLoggerOptions, createConsoleLogger } from "./console-logger.js";
export { createJsonLogger, type JsonLoggerOptions } from "./json-logger.js";
export { buildRedactKeys, redactData } from "./redact.js";

import type { ClearlineLogger } from "../types/config.js";

/** Logger that drops everything. Used by tests and embedded instances. */
export const silentLogger: ClearlineLogger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
};
