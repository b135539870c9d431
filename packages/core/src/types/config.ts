import type { ClearlineAdapter } from "../db/adapter.js";
import type { ParticipantTransport } from "./protocol.js";
import type { DiscoveryClient } from "./registry.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface ClearlineLogger {
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
	debug(message: string, data?: Record<string, unknown>): void;
}

export interface CoreWorkerOptions {
	/** Releases participant reservations past their deadline. Default: enabled, 5s interval */
	reservationExpiry?: boolean | { interval?: string };
	/** Removes replay-guard records older than the replay window. Default: enabled, 1h interval */
	replayCleanup?: boolean | { interval?: string };
	/** Resumes transfers left INITIATED or PREPARED by a crash or an unreachable peer. Default: enabled, 30s interval */
	transferRecovery?: boolean | { interval?: string };
}

export interface ProtocolOptions {
	/** Timeout of one PREPARE attempt in ms. Default: 5000 */
	prepareTimeoutMs?: number;
	/** Timeout of one COMMIT/ABORT/QUERY attempt in ms. Default: 5000 */
	commitTimeoutMs?: number;
	/** Retries after the first attempt of each phase. Default: 3 */
	retryBudget?: number;
	/** Backoff before the first retry, doubled each time. Default: 200 */
	retryBackoffMs?: number;
	/** Upper bound for the backoff. Default: 2000 */
	maxRetryBackoffMs?: number;
	/** Lifetime of a participant's credit reservation in ms. Default: 60000 */
	reservationTtlMs?: number;
	/** How long processed (sender, nonce, transfer) triples are remembered. Default: 24h */
	replayWindowMs?: number;
	/** Largest accepted transfer amount in minor units. Default: 100_000_000_00 */
	maxTransferAmount?: number;
	/** Age after which an unfinished transfer is picked up by recovery. Default: 30000 */
	recoveryAfterMs?: number;
}

export interface BankIdentityOptions {
	/** PEM-encoded private key (PKCS#8) */
	privateKey: string;
	/** PEM-encoded public key (SPKI) */
	publicKey: string;
}

export interface BankOptions {
	/** Instance id (SWIFT-like code) under which this bank is registered */
	instanceId: string;

	/** Display name. Default: the instance id */
	name?: string;

	/** Base URL other instances use to reach this one. Required to register. */
	baseUrl?: string;

	/** Signing key pair */
	identity: BankIdentityOptions;

	/** Database adapter instance or factory function */
	database: ClearlineAdapter | (() => ClearlineAdapter);

	/** Resolves peer addresses and public keys */
	discovery: DiscoveryClient;

	/** Delivers protocol messages to peers. Default: HTTP transport */
	transport?: ParticipantTransport;

	/** Protocol timings and limits */
	protocol?: ProtocolOptions;

	/** Core background workers. All enabled by default. */
	coreWorkers?: CoreWorkerOptions;

	/** Custom logger */
	logger?: ClearlineLogger;

	/** PostgreSQL schema for all tables. Default: "public" */
	schema?: string;

	/** Clock. Default: the system clock */
	clock?: () => Date;

	/** Sleep used between retries. Default: a timer */
	sleep?: (ms: number) => Promise<void>;
}

export interface ResolvedProtocolOptions {
	prepareTimeoutMs: number;
	commitTimeoutMs: number;
	retryBudget: number;
	retryBackoffMs: number;
	maxRetryBackoffMs: number;
	reservationTtlMs: number;
	replayWindowMs: number;
	maxTransferAmount: number;
	recoveryAfterMs: number;
}

export interface ResolvedBankOptions {
	instanceId: string;
	name: string;
	baseUrl: string | null;
	schema: string;
	protocol: ResolvedProtocolOptions;
	coreWorkers: CoreWorkerOptions;
}
