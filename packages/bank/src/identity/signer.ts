import { createPrivateKey, createPublicKey, type KeyObject, sign, verify } from "node:crypto";
import type { DiscoveryClient } from "@clearline/core";
import { ClearlineError, canonicalJson } from "@clearline/core";

// =============================================================================
// SIGNING INPUT
// =============================================================================
// canonical(payload) ‖ nonce ‖ transferId, newline separated. Canonical JSON
// never contains a raw newline, so the three parts cannot bleed into each other.

export function signingInput(payload: unknown, nonce: string, transferId: string): Buffer {
	return Buffer.from(`${canonicalJson(payload)}\n${nonce}\n${transferId}`, "utf8");
}

/** Ed25519 signs the message itself; RSA keys sign its SHA-256. */
function digestFor(key: KeyObject): string | null {
	return key.asymmetricKeyType === "rsa" ? "sha256" : null;
}

// =============================================================================
// SIGNER
// =============================================================================

export interface Signer {
	instanceId: string;
	publicKey: string;
	/** Base64 signature over the signing input. */
	sign(payload: unknown, nonce: string, transferId: string): string;
}

export function createSigner(options: {
	instanceId: string;
	privateKey: string;
	publicKey: string;
}): Signer {
	let key: KeyObject;
	try {
		key = createPrivateKey(options.privateKey);
	} catch (error) {
		throw ClearlineError.invalidArgument("Bank config: 'identity.privateKey' is not a valid PEM key", error);
	}
	const algorithm = digestFor(key);

	return {
		instanceId: options.instanceId,
		publicKey: options.publicKey,
		sign(payload, nonce, transferId) {
			return sign(algorithm, signingInput(payload, nonce, transferId), key).toString("base64");
		},
	};
}

/**
 * Verify a base64 signature against a PEM public key. A malformed key or
 * signature verifies as `false`.
 */
export function verifySignature(
	publicKey: string,
	payload: unknown,
	nonce: string,
	transferId: string,
	signature: string,
): boolean {
	try {
		const key = createPublicKey(publicKey);
		return verify(
			digestFor(key),
			signingInput(payload, nonce, transferId),
			key,
			Buffer.from(signature, "base64"),
		);
	} catch {
		return false;
	}
}

// =============================================================================
// IDENTITY
// =============================================================================

export interface Identity {
	instanceId: string;
	publicKey: string;
	sign(payload: unknown, nonce: string, transferId: string): string;
	/**
	 * Verify a message from `senderId` against the public key the registry
	 * holds for it. An unregistered sender verifies as `false`; a registry
	 * outage rejects with REMOTE_UNREACHABLE.
	 */
	verify(
		senderId: string,
		payload: unknown,
		nonce: string,
		transferId: string,
		signature: string,
	): Promise<boolean>;
}

export function createIdentity(options: { signer: Signer; discovery: DiscoveryClient }): Identity {
	const { signer, discovery } = options;

	return {
		instanceId: signer.instanceId,
		publicKey: signer.publicKey,
		sign: (payload, nonce, transferId) => signer.sign(payload, nonce, transferId),

		async verify(senderId, payload, nonce, transferId, signature) {
			let publicKey: string;
			try {
				publicKey = (await discovery.resolve(senderId)).publicKey;
			} catch (error) {
				if (error instanceof ClearlineError && error.code === "NOT_FOUND") return false;
				throw error;
			}
			return verifySignature(publicKey, payload, nonce, transferId, signature);
		},
	};
}

/** True when `publicKey` verifies what `signer` signs. */
export function keyPairMatches(signer: Signer, publicKey: string): boolean {
	const probe = { probe: signer.instanceId };
	return verifySignature(publicKey, probe, "probe", "probe", signer.sign(probe, "probe", "probe"));
}
