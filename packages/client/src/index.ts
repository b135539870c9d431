export { type BankClient, type BankInfo, createBankClient, type Page } from "./bank-client.js";
export { ClearlineClientError, isClearlineClientError } from "./error.js";
export { createFetchClient, type FetchClient } from "./fetch.js";
export { createRegistryClient, type RegistryClient } from "./registry-client.js";
export type {
	ClearlineClientOptions,
	RequestInterceptor,
	RequestOptions,
	ResponseInterceptor,
} from "./types.js";
