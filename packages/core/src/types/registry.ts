export interface RegistryRecord {
	/** SWIFT-like code identifying the instance */
	instanceId: string;
	name: string;
	/** Base URL of the instance's HTTP API */
	address: string;
	/** PEM-encoded public key (SPKI) */
	publicKey: string;
	metadata: Record<string, unknown>;
	registeredAt: string;
	updatedAt: string;
}

export type RegistrationInput = Pick<RegistryRecord, "instanceId" | "name" | "address" | "publicKey"> & {
	metadata?: Record<string, unknown>;
};

export interface ResolvedInstance {
	instanceId: string;
	address: string;
	publicKey: string;
}

export interface DiscoveryClient {
	/**
	 * Resolve an instance's address and public key.
	 * Rejects with NOT_FOUND when unregistered, REMOTE_UNREACHABLE when the
	 * registry cannot be reached.
	 */
	resolve(instanceId: string): Promise<ResolvedInstance>;
	/** Idempotent upsert of this instance's record. */
	register(input: RegistrationInput): Promise<void>;
}
