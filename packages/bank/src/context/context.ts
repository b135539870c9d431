// =============================================================================
// CONTEXT BUILDER
// =============================================================================
// Builds BankContext from BankOptions. Resolves adapter, logger, identity and
// transport, and merges protocol defaults.

import type {
	BankOptions,
	ClearlineAdapter,
	ClearlineLogger,
	DiscoveryClient,
	KeyedLock,
	ParticipantTransport,
	ResolvedBankOptions,
	ResolvedProtocolOptions,
} from "@clearline/core";
import { ClearlineError, createKeyedLock } from "@clearline/core";
import { createConsoleLogger } from "@clearline/core/logger";
import { validateConfig } from "../config/index.js";
import { createIdentity, createSigner, type Identity, keyPairMatches } from "../identity/index.js";
import { createHttpTransport } from "../protocol/transport.js";

export interface BankContext {
	adapter: ClearlineAdapter;
	options: ResolvedBankOptions;
	logger: ClearlineLogger;
	identity: Identity;
	discovery: DiscoveryClient;
	transport: ParticipantTransport;
	clock: () => Date;
	sleep: (ms: number) => Promise<void>;
	/** Serializes participant handling per transfer id */
	participantLocks: KeyedLock;
	/** Transfer ids with a protocol run in progress on this instance */
	activeRuns: Set<string>;
}

// =============================================================================
// DEFAULT CONFIG VALUES
// =============================================================================

export const DEFAULT_PROTOCOL: ResolvedProtocolOptions = {
	prepareTimeoutMs: 5_000,
	commitTimeoutMs: 5_000,
	retryBudget: 3,
	retryBackoffMs: 200,
	maxRetryBackoffMs: 2_000,
	reservationTtlMs: 60_000,
	replayWindowMs: 24 * 60 * 60 * 1000, // 24 hours in ms
	maxTransferAmount: 100_000_000_00,
	recoveryAfterMs: 30_000,
};

const timerSleep = (ms: number): Promise<void> =>
	new Promise((resolve) => {
		setTimeout(resolve, ms);
	});

// =============================================================================
// BUILD CONTEXT
// =============================================================================

export function buildContext(options: BankOptions): BankContext {
	validateConfig(options);

	const adapter: ClearlineAdapter =
		typeof options.database === "function" ? options.database() : options.database;

	const logger = options.logger ?? createConsoleLogger({ prefix: options.instanceId });

	const p = options.protocol ?? {};
	const protocol: ResolvedProtocolOptions = {
		prepareTimeoutMs: p.prepareTimeoutMs ?? DEFAULT_PROTOCOL.prepareTimeoutMs,
		commitTimeoutMs: p.commitTimeoutMs ?? DEFAULT_PROTOCOL.commitTimeoutMs,
		retryBudget: p.retryBudget ?? DEFAULT_PROTOCOL.retryBudget,
		retryBackoffMs: p.retryBackoffMs ?? DEFAULT_PROTOCOL.retryBackoffMs,
		maxRetryBackoffMs: p.maxRetryBackoffMs ?? DEFAULT_PROTOCOL.maxRetryBackoffMs,
		reservationTtlMs: p.reservationTtlMs ?? DEFAULT_PROTOCOL.reservationTtlMs,
		replayWindowMs: p.replayWindowMs ?? DEFAULT_PROTOCOL.replayWindowMs,
		maxTransferAmount: p.maxTransferAmount ?? DEFAULT_PROTOCOL.maxTransferAmount,
		recoveryAfterMs: p.recoveryAfterMs ?? DEFAULT_PROTOCOL.recoveryAfterMs,
	};

	const schema = options.schema ?? "public";
	const resolvedOptions: ResolvedBankOptions = {
		instanceId: options.instanceId,
		name: options.name ?? options.instanceId,
		baseUrl: options.baseUrl ?? null,
		schema,
		protocol,
		coreWorkers: options.coreWorkers ?? {},
	};

	// Propagate schema to adapter options for table qualification
	adapter.options.schema = schema;

	const signer = createSigner({
		instanceId: options.instanceId,
		privateKey: options.identity.privateKey,
		publicKey: options.identity.publicKey,
	});
	if (!keyPairMatches(signer, options.identity.publicKey)) {
		throw ClearlineError.invalidArgument(
			"Bank config: 'identity.publicKey' does not match 'identity.privateKey'",
		);
	}

	if (protocol.reservationTtlMs <= protocol.commitTimeoutMs) {
		logger.warn(
			"reservationTtlMs is not longer than commitTimeoutMs. Credit reservations may expire before a retried COMMIT arrives.",
			{ reservationTtlMs: protocol.reservationTtlMs, commitTimeoutMs: protocol.commitTimeoutMs },
		);
	}

	return {
		adapter,
		options: resolvedOptions,
		logger,
		identity: createIdentity({ signer, discovery: options.discovery }),
		discovery: options.discovery,
		transport: options.transport ?? createHttpTransport(),
		clock: options.clock ?? (() => new Date()),
		sleep: options.sleep ?? timerSleep,
		participantLocks: createKeyedLock(),
		activeRuns: new Set(),
	};
}

/** Current time of the context clock as an ISO string. */
export function nowIso(ctx: Pick<BankContext, "clock">): string {
	return ctx.clock().toISOString();
}
