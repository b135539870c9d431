// =============================================================================
// REGISTRY CLIENT — Typed HTTP client for the instance registry
// =============================================================================

import type { RegistrationInput, RegistryRecord } from "@clearline/core";
import { createFetchClient } from "./fetch.js";
import type { ClearlineClientOptions } from "./types.js";

export interface RegistryClient {
	/** Idempotent upsert by instance id. */
	register(input: RegistrationInput): Promise<RegistryRecord>;
	/** Rejects with a NOT_FOUND ClearlineClientError when unregistered. */
	lookup(instanceId: string): Promise<RegistryRecord>;
	list(): Promise<{ banks: RegistryRecord[] }>;
	remove(instanceId: string): Promise<{ removed: boolean }>;
}

export function createRegistryClient(options: ClearlineClientOptions): RegistryClient {
	const f = createFetchClient(options);
	const enc = encodeURIComponent;

	return {
		register: (input) => f.post("/banks", input),
		lookup: (instanceId) => f.get(`/banks/${enc(instanceId)}`),
		list: () => f.get("/banks"),
		remove: (instanceId) => f.del(`/banks/${enc(instanceId)}`),
	};
}
