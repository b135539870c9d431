import type { ClearlineLogger, LogLevel } from "../types/config.js";

export const LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

export type LogSink = (level: LogLevel, message: string, data?: Record<string, unknown>) => void;

/** Wrap a sink into a `ClearlineLogger` that drops entries below `minLevel`. */
export function leveledLogger(minLevel: LogLevel, sink: LogSink): ClearlineLogger {
	const threshold = LEVEL_PRIORITY[minLevel];
	const at =
		(level: LogLevel) =>
		(message: string, data?: Record<string, unknown>): void => {
			if (LEVEL_PRIORITY[level] >= threshold) sink(level, message, data);
		};

	return { debug: at("debug"), info: at("info"), warn: at("warn"), error: at("error") };
}
