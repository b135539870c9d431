// =============================================================================
// REGISTRY DISCOVERY -- Resolves peers through the registry's HTTP API
// =============================================================================

import { createRegistryClient, isClearlineClientError } from "@clearline/client";
import type { DiscoveryClient, RegistrationInput, ResolvedInstance } from "@clearline/core";
import { ClearlineError } from "@clearline/core";

export interface RegistryDiscoveryOptions {
	/** Base URL of the registry (e.g., "http://localhost:4000") */
	registryUrl: string;
	/** How long a resolved record is reused. Default: 30000 */
	cacheTtlMs?: number;
	/** Timeout of one registry request. Default: 5000 */
	timeoutMs?: number;
	fetch?: typeof globalThis.fetch;
	clock?: () => Date;
}

export interface RegistryDiscovery extends DiscoveryClient {
	/** Drop cached records, all of them when no id is given. */
	invalidate(instanceId?: string): void;
}

interface CacheEntry {
	value: ResolvedInstance;
	expiresAt: number;
}

function toDiscoveryError(instanceId: string, error: unknown): ClearlineError {
	if (isClearlineClientError(error) && error.code === "NOT_FOUND") {
		return ClearlineError.notFound(`Instance ${instanceId} is not registered`, error);
	}
	const reason = error instanceof Error ? error.message : String(error);
	return ClearlineError.remoteUnreachable(`Registry lookup of ${instanceId} failed: ${reason}`, error);
}

export function createRegistryDiscovery(options: RegistryDiscoveryOptions): RegistryDiscovery {
	const client = createRegistryClient({
		baseURL: options.registryUrl,
		fetch: options.fetch,
		timeout: options.timeoutMs ?? 5_000,
	});
	const ttl = options.cacheTtlMs ?? 30_000;
	const now = () => (options.clock ?? (() => new Date()))().getTime();
	const cache = new Map<string, CacheEntry>();

	return {
		async resolve(instanceId) {
			const cached = cache.get(instanceId);
			if (cached && cached.expiresAt > now()) return cached.value;

			try {
				const record = await client.lookup(instanceId);
				const value = {
					instanceId: record.instanceId,
					address: record.address,
					publicKey: record.publicKey,
				};
				cache.set(instanceId, { value, expiresAt: now() + ttl });
				return value;
			} catch (error) {
				cache.delete(instanceId);
				throw toDiscoveryError(instanceId, error);
			}
		},

		async register(input: RegistrationInput) {
			try {
				await client.register(input);
			} catch (error) {
				if (isClearlineClientError(error) && error.status >= 400 && error.status < 500) {
					throw new ClearlineError(error.code, error.message, { cause: error });
				}
				throw toDiscoveryError(input.instanceId, error);
			}
			cache.delete(input.instanceId);
		},

		invalidate(instanceId) {
			if (instanceId === undefined) cache.clear();
			else cache.delete(instanceId);
		},
	};
}
