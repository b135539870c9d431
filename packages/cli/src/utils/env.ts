// =============================================================================
// Environment settings — CLEARLINE_* variables with command-line overrides
// =============================================================================
// `dotenv/config` loads .env into process.env before any command runs; these
// helpers only read the resulting record, so they take it as an argument.

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { LogLevel } from "@clearline/core";

export type Env = Record<string, string | undefined>;

export interface ServeFlags {
	instanceId?: string;
	name?: string;
	baseUrl?: string;
	registryUrl?: string;
	privateKey?: string;
	publicKey?: string;
	databaseUrl?: string;
	schema?: string;
	port?: string;
	host?: string;
	logLevel?: string;
	logFormat?: string;
	resetAccounts?: string;
}

export interface ServeSettings {
	instanceId: string;
	name: string;
	baseUrl: string;
	registryUrl: string;
	privateKeyPath: string;
	publicKeyPath: string;
	databaseUrl: string | null;
	schema: string;
	port: number;
	host: string;
	logLevel: LogLevel;
	logFormat: "pretty" | "json";
	resetAccounts: number | null;
}

export interface RegistryFlags {
	databaseUrl?: string;
	schema?: string;
	port?: string;
	host?: string;
	logLevel?: string;
	logFormat?: string;
}

export interface RegistrySettings {
	databaseUrl: string | null;
	schema: string;
	port: number;
	host: string;
	logLevel: LogLevel;
	logFormat: "pretty" | "json";
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function pick(flag: string | undefined, envValue: string | undefined): string | undefined {
	const value = flag ?? envValue;
	return value === undefined || value.trim() === "" ? undefined : value.trim();
}

function required(value: string | undefined, flag: string, envName: string): string {
	if (value === undefined) {
		throw new Error(`Missing ${flag} (or ${envName})`);
	}
	return value;
}

export function parsePort(value: string | undefined, fallback: number): number {
	if (value === undefined) return fallback;
	const port = Number(value);
	if (!Number.isInteger(port) || port < 1 || port > 65_535) {
		throw new Error(`Port must be an integer between 1 and 65535, got "${value}"`);
	}
	return port;
}

export function parseCount(value: string | undefined): number | null {
	if (value === undefined) return null;
	const count = Number(value);
	if (!Number.isInteger(count) || count < 0) {
		throw new Error(`--reset-accounts must be a non-negative integer, got "${value}"`);
	}
	return count;
}

function parseLogLevel(value: string | undefined): LogLevel {
	if (value === undefined) return "info";
	const level = LOG_LEVELS.find((l) => l === value);
	if (!level) {
		throw new Error(`Log level must be one of ${LOG_LEVELS.join(", ")}, got "${value}"`);
	}
	return level;
}

function parseLogFormat(value: string | undefined): "pretty" | "json" {
	if (value === undefined || value === "pretty") return "pretty";
	if (value === "json") return "json";
	throw new Error(`Log format must be "pretty" or "json", got "${value}"`);
}

export function resolveServeSettings(flags: ServeFlags, env: Env): ServeSettings {
	const port = parsePort(pick(flags.port, env.PORT), 4001);
	const host = pick(flags.host, env.HOST) ?? "0.0.0.0";
	const instanceId = required(
		pick(flags.instanceId, env.CLEARLINE_INSTANCE_ID),
		"--instance-id",
		"CLEARLINE_INSTANCE_ID",
	);

	return {
		instanceId,
		name: pick(flags.name, env.CLEARLINE_BANK_NAME) ?? instanceId,
		baseUrl: pick(flags.baseUrl, env.CLEARLINE_BASE_URL) ?? `http://localhost:${port}`,
		registryUrl: required(
			pick(flags.registryUrl, env.CLEARLINE_REGISTRY_URL),
			"--registry-url",
			"CLEARLINE_REGISTRY_URL",
		),
		privateKeyPath: required(
			pick(flags.privateKey, env.CLEARLINE_PRIVATE_KEY_PATH),
			"--private-key",
			"CLEARLINE_PRIVATE_KEY_PATH",
		),
		publicKeyPath: required(
			pick(flags.publicKey, env.CLEARLINE_PUBLIC_KEY_PATH),
			"--public-key",
			"CLEARLINE_PUBLIC_KEY_PATH",
		),
		databaseUrl: pick(flags.databaseUrl, env.DATABASE_URL) ?? null,
		schema: pick(flags.schema, env.CLEARLINE_SCHEMA) ?? "public",
		port,
		host,
		logLevel: parseLogLevel(pick(flags.logLevel, env.CLEARLINE_LOG_LEVEL)),
		logFormat: parseLogFormat(pick(flags.logFormat, env.CLEARLINE_LOG_FORMAT)),
		resetAccounts: parseCount(flags.resetAccounts),
	};
}

export function resolveRegistrySettings(flags: RegistryFlags, env: Env): RegistrySettings {
	return {
		databaseUrl: pick(flags.databaseUrl, env.DATABASE_URL) ?? null,
		schema: pick(flags.schema, env.CLEARLINE_SCHEMA) ?? "public",
		port: parsePort(pick(flags.port, env.PORT), 4000),
		host: pick(flags.host, env.HOST) ?? "0.0.0.0",
		logLevel: parseLogLevel(pick(flags.logLevel, env.CLEARLINE_LOG_LEVEL)),
		logFormat: parseLogFormat(pick(flags.logFormat, env.CLEARLINE_LOG_FORMAT)),
	};
}

/** Read a PEM file, resolved against `cwd`. */
export function readKeyFile(path: string, cwd: string): string {
	const fullPath = resolve(cwd, path);
	try {
		return readFileSync(fullPath, "utf-8");
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new Error(`Cannot read key file ${fullPath}: ${reason}`, { cause: error });
	}
}

/** Base URL of the bank that `transfer` and `status` talk to. */
export function resolveBankUrl(flag: string | undefined, env: Env): string {
	const explicit = pick(flag, env.CLEARLINE_BASE_URL);
	if (explicit) return explicit;
	return `http://localhost:${parsePort(pick(undefined, env.PORT), 4001)}`;
}

/** Hide connection strings and credentials before printing an error. */
export function sanitizeErrorMessage(message: string): string {
	return message
		.replace(/postgres(ql)?:\/\/[^\s]+/gi, "postgres://***")
		.replace(/(password|token|secret|key)[=:]\s*\S+/gi, "$1=***");
}
