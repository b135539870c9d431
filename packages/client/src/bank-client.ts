// =============================================================================
// BANK CLIENT — Typed HTTP client for a bank instance's API
// =============================================================================

import type {
	Account,
	AccountBalance,
	AccountEntry,
	AccountStatus,
	RequestEnvelope,
	Transfer,
	TransferStatus,
} from "@clearline/core";
import { createFetchClient } from "./fetch.js";
import type { ClearlineClientOptions, RequestOptions } from "./types.js";

// =============================================================================
// CLIENT INTERFACE
// =============================================================================

export interface BankInfo {
	instanceId: string;
	name: string;
	baseUrl: string | null;
	publicKey: string;
}

export interface Page {
	page?: number;
	perPage?: number;
}

export interface BankClient {
	ok(): Promise<{ ok: true }>;

	info(): Promise<BankInfo>;

	accounts: {
		create(params: { ownerId: string; ownerName: string; initialDeposit?: number }): Promise<Account>;

		get(accountId: string): Promise<Account>;

		getBalance(accountId: string): Promise<AccountBalance>;

		listEntries(
			accountId: string,
			params?: Page,
		): Promise<{ entries: AccountEntry[]; hasMore: boolean; total: number }>;

		deposit(accountId: string, params: { amount: number }): Promise<Account>;

		cancel(accountId: string): Promise<Account>;

		list(
			params?: Page & { ownerId?: string; status?: AccountStatus },
		): Promise<{ accounts: Account[]; hasMore: boolean; total: number }>;
	};

	transfers: {
		create(params: {
			sourceAccountId: string;
			destinationInstanceId: string;
			destinationAccountId: string;
			amount: number;
			idempotencyKey?: string;
		}): Promise<Transfer>;

		get(transferId: string): Promise<Transfer>;

		cancel(transferId: string): Promise<Transfer>;

		list(
			params?: Page & { status?: TransferStatus; sourceAccountId?: string },
		): Promise<{ transfers: Transfer[]; hasMore: boolean; total: number }>;
	};

	protocol: {
		/** Deliver a signed request; resolves with the raw reply body. */
		send(envelope: RequestEnvelope, options?: RequestOptions): Promise<unknown>;
	};
}

function pageQuery(params?: Page): Record<string, string | undefined> {
	return {
		page: params?.page?.toString(),
		perPage: params?.perPage?.toString(),
	};
}

// =============================================================================
// FACTORY
// =============================================================================

export function createBankClient(options: ClearlineClientOptions): BankClient {
	const f = createFetchClient(options);
	const enc = encodeURIComponent;

	return {
		ok: () => f.get("/ok"),

		info: () => f.get("/info"),

		accounts: {
			create: (params) => f.post("/accounts", params),
			get: (accountId) => f.get(`/accounts/${enc(accountId)}`),
			getBalance: (accountId) => f.get(`/accounts/${enc(accountId)}/balance`),
			listEntries: (accountId, params) => f.get(`/accounts/${enc(accountId)}/entries`, pageQuery(params)),
			deposit: (accountId, params) => f.post(`/accounts/${enc(accountId)}/deposit`, params),
			cancel: (accountId) => f.post(`/accounts/${enc(accountId)}/cancel`),
			list: (params) =>
				f.get("/accounts", {
					...pageQuery(params),
					ownerId: params?.ownerId,
					status: params?.status,
				}),
		},

		transfers: {
			create: (params) => f.post("/transfers", params),
			get: (transferId) => f.get(`/transfers/${enc(transferId)}`),
			cancel: (transferId) => f.post(`/transfers/${enc(transferId)}/cancel`),
			list: (params) =>
				f.get("/transfers", {
					...pageQuery(params),
					status: params?.status,
					sourceAccountId: params?.sourceAccountId,
				}),
		},

		protocol: {
			send: (envelope, requestOptions) => f.post<unknown>("/protocol/messages", envelope, requestOptions),
		},
	};
}
