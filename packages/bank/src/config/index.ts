import type { BankOptions, ProtocolOptions } from "@clearline/core";
import { ClearlineError, isInstanceId } from "@clearline/core";

const POSITIVE_PROTOCOL_FIELDS = [
	"prepareTimeoutMs",
	"commitTimeoutMs",
	"retryBackoffMs",
	"maxRetryBackoffMs",
	"reservationTtlMs",
	"replayWindowMs",
	"maxTransferAmount",
	"recoveryAfterMs",
] as const satisfies readonly (keyof ProtocolOptions)[];

/**
 * Validate bank configuration options at runtime.
 * Throws ClearlineError with clear messages on invalid configuration.
 */
export function validateConfig(options: BankOptions): void {
	if (!options.database) {
		throw ClearlineError.invalidArgument("Bank config: 'database' adapter is required");
	}

	if (!options.discovery) {
		throw ClearlineError.invalidArgument("Bank config: 'discovery' client is required");
	}

	if (!isInstanceId(options.instanceId)) {
		throw ClearlineError.invalidArgument(
			`Bank config: 'instanceId' must be 2-64 letters, digits, '-' or '_', got "${String(options.instanceId)}"`,
		);
	}

	if (!options.identity?.privateKey || !options.identity.publicKey) {
		throw ClearlineError.invalidArgument(
			"Bank config: 'identity.privateKey' and 'identity.publicKey' are required",
		);
	}

	if (options.baseUrl !== undefined) {
		try {
			new URL(options.baseUrl);
		} catch (error) {
			throw ClearlineError.invalidArgument(
				`Bank config: 'baseUrl' must be an absolute URL, got "${options.baseUrl}"`,
				error,
			);
		}
	}

	const protocol = options.protocol;
	if (protocol) {
		for (const field of POSITIVE_PROTOCOL_FIELDS) {
			const value = protocol[field];
			if (value !== undefined && (value <= 0 || !Number.isFinite(value))) {
				throw ClearlineError.invalidArgument(
					`Bank config: 'protocol.${field}' must be a positive finite number`,
				);
			}
		}
		if (
			protocol.retryBudget !== undefined &&
			(protocol.retryBudget < 0 || !Number.isInteger(protocol.retryBudget))
		) {
			throw ClearlineError.invalidArgument(
				"Bank config: 'protocol.retryBudget' must be a non-negative integer",
			);
		}
		if (protocol.maxTransferAmount !== undefined && !Number.isSafeInteger(protocol.maxTransferAmount)) {
			throw ClearlineError.invalidArgument(
				"Bank config: 'protocol.maxTransferAmount' must be a safe integer",
			);
		}
	}

	if (options.schema !== undefined) {
		if (typeof options.schema !== "string" || options.schema.length === 0) {
			throw ClearlineError.invalidArgument("Bank config: 'schema' must be a non-empty string");
		}
		if (!/^[a-zA-Z_][a-zA-Z0-9_]*$/.test(options.schema)) {
			throw ClearlineError.invalidArgument(
				`Bank config: 'schema' must contain only alphanumeric characters and underscores, got "${options.schema}"`,
			);
		}
	}
}

/**
 * Identity function for defining bank configuration with autocomplete support.
 * Validates configuration at runtime before returning.
 *
 * @example
 * ```ts
 * import { defineBankConfig } from "@clearline/bank";
 *
 * export default defineBankConfig({
 *   instanceId: "BANKGB01",
 *   identity: { privateKey, publicKey },
 *   database: memoryAdapter(),
 *   discovery: createRegistryDiscovery({ registryUrl: "http://localhost:4000" }),
 * });
 * ```
 */
export function defineBankConfig(options: BankOptions): BankOptions {
	validateConfig(options);
	return options;
}
