// =============================================================================
// BANK -- Main entry point
// =============================================================================
// Creates a bank instance: its ledger, both sides of the transfer protocol,
// and the background workers.

import type {
	Account,
	AccountBalance,
	AccountEntry,
	AccountStatus,
	AccountRef,
	BankOptions,
	ParticipantDecision,
	ReplyEnvelope,
	Reservation,
	ReservationDirection,
	Transfer,
	TransferStatus,
} from "@clearline/core";
import { ClearlineError } from "@clearline/core";
import { type BankContext, buildContext } from "../context/context.js";
import { cancelTransfer, initiateTransfer, recoverTransfers } from "../coordinator/coordinator.js";
import { type BankWorkerRunner, createWorkerRunner } from "../infrastructure/worker-runner.js";
import * as accounts from "../managers/account-manager.js";
import { getDecision } from "../managers/decision-store.js";
import { getReservation } from "../managers/reservation-manager.js";
import { getTransfer, listTransfers } from "../managers/transfer-store.js";
import { expireParticipantReservations, handleMessage } from "../participant/participant.js";
import { cleanupProcessedMessages } from "../protocol/replay-guard.js";

export interface BankInfo {
	instanceId: string;
	name: string;
	baseUrl: string | null;
	publicKey: string;
}

export interface Bank {
	accounts: {
		create: (params: {
			ownerId: string;
			ownerName: string;
			initialDeposit?: number;
			status?: AccountStatus;
		}) => Promise<Account>;
		get: (accountId: string) => Promise<Account>;
		getByNumber: (accountNumber: string) => Promise<Account>;
		getBalance: (accountId: string) => Promise<AccountBalance>;
		deposit: (params: { accountId: string; amount: number; description?: string }) => Promise<Account>;
		cancel: (accountId: string) => Promise<Account>;
		list: (params?: {
			page?: number;
			perPage?: number;
			status?: AccountStatus;
			ownerId?: string;
		}) => Promise<{ accounts: Account[]; hasMore: boolean; total: number }>;
		listEntries: (
			accountId: string,
			params?: { page?: number; perPage?: number },
		) => Promise<{ entries: AccountEntry[]; hasMore: boolean; total: number }>;
		/** Replace every account with `count` generated ones. Demo and test setups only. */
		reset: (count: number) => Promise<Account[]>;
	};
	transfers: {
		initiate: (params: {
			sourceAccountId: string;
			destination: AccountRef;
			amount: number;
			idempotencyKey?: string;
		}) => Promise<Transfer>;
		get: (transferId: string) => Promise<Transfer>;
		cancel: (transferId: string) => Promise<Transfer>;
		list: (params?: {
			page?: number;
			perPage?: number;
			status?: TransferStatus;
			sourceAccountId?: string;
		}) => Promise<{ transfers: Transfer[]; hasMore: boolean; total: number }>;
		/** Debit hold (origin side) or credit hold (participant side), null if none. */
		getReservation: (transferId: string, direction: ReservationDirection) => Promise<Reservation | null>;
		/** Resume stale INITIATED and PREPARED transfers now. */
		recover: () => Promise<{ recovered: number }>;
	};
	protocol: {
		/** Process one inbound protocol request and return the signed reply. */
		handle: (raw: unknown) => Promise<ReplyEnvelope>;
		/** Participant-side decision for a transfer, null if never seen. */
		getDecision: (transferId: string) => Promise<ParticipantDecision | null>;
		/** Release overdue credit reservations now. */
		expireReservations: () => Promise<{ expired: number }>;
		/** Forget processed messages older than the replay window now. */
		cleanupProcessed: () => Promise<{ deleted: number }>;
	};
	/** Publish this instance's address and public key to the registry. */
	register: (metadata?: Record<string, unknown>) => Promise<void>;
	info: () => BankInfo;
	workers: {
		start: () => void;
		stop: () => Promise<void>;
	};
	$context: BankContext;
	$options: BankOptions;
}

export function createBank(options: BankOptions): Bank {
	const ctx = buildContext(options);
	let workerRunner: BankWorkerRunner | null = null;

	const info = (): BankInfo => ({
		instanceId: ctx.options.instanceId,
		name: ctx.options.name,
		baseUrl: ctx.options.baseUrl,
		publicKey: ctx.identity.publicKey,
	});

	return {
		accounts: {
			create: (params) => accounts.createAccount(ctx, params),
			get: (accountId) => accounts.getAccount(ctx, accountId),
			getByNumber: (accountNumber) => accounts.getAccountByNumber(ctx, accountNumber),
			getBalance: (accountId) => accounts.getBalance(ctx, accountId),
			deposit: (params) => accounts.deposit(ctx, params),
			cancel: (accountId) => accounts.cancelAccount(ctx, accountId),
			list: async (params) => {
				const result = await accounts.listAccounts(ctx, params);
				return { accounts: result.data, hasMore: result.hasMore, total: result.total };
			},
			listEntries: async (accountId, params) => {
				const result = await accounts.listEntries(ctx, accountId, params);
				return { entries: result.data, hasMore: result.hasMore, total: result.total };
			},
			reset: (count) => accounts.resetAccounts(ctx, count),
		},
		transfers: {
			initiate: (params) => initiateTransfer(ctx, params),
			get: (transferId) => getTransfer(ctx, transferId),
			cancel: (transferId) => cancelTransfer(ctx, transferId),
			list: async (params) => {
				const result = await listTransfers(ctx, params);
				return { transfers: result.data, hasMore: result.hasMore, total: result.total };
			},
			getReservation: (transferId, direction) => getReservation(ctx, transferId, direction),
			recover: () => recoverTransfers(ctx),
		},
		protocol: {
			handle: (raw) => handleMessage(ctx, raw),
			getDecision: (transferId) => getDecision(ctx, transferId),
			expireReservations: () => expireParticipantReservations(ctx),
			cleanupProcessed: () => cleanupProcessedMessages(ctx),
		},
		register: async (metadata) => {
			const { baseUrl, instanceId, name } = ctx.options;
			if (!baseUrl) {
				throw ClearlineError.invalidArgument("Bank config: 'baseUrl' is required to register");
			}
			await ctx.discovery.register({
				instanceId,
				name,
				address: baseUrl,
				publicKey: ctx.identity.publicKey,
				metadata,
			});
			ctx.logger.info("Registered with discovery", { instanceId, address: baseUrl });
		},
		info,
		workers: {
			start: () => {
				if (workerRunner) return;
				workerRunner = createWorkerRunner(ctx);
				workerRunner.start();
			},
			stop: async () => {
				if (workerRunner) {
					await workerRunner.stop();
					workerRunner = null;
				}
			},
		},
		$context: ctx,
		$options: options,
	};
}
