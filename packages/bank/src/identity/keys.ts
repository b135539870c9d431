import { createPrivateKey, createPublicKey, generateKeyPairSync } from "node:crypto";
import type { ED25519KeyPairOptions } from "node:crypto";
import { ClearlineError } from "@clearline/core";

export type KeyType = "ed25519" | "rsa";

export interface KeyPair {
	type: KeyType;
	/** PKCS#8 PEM */
	privateKey: string;
	/** SPKI PEM */
	publicKey: string;
}

/** Generate a PEM key pair. Ed25519 unless `rsa` is asked for (2048-bit). */
export function generateKeyPair(options: { type?: KeyType } = {}): KeyPair {
	const type = options.type ?? "ed25519";
	const encoding: ED25519KeyPairOptions<"pem", "pem"> = {
		publicKeyEncoding: { type: "spki", format: "pem" },
		privateKeyEncoding: { type: "pkcs8", format: "pem" },
	} as const;

	const pair =
		type === "rsa"
			? generateKeyPairSync("rsa", { modulusLength: 2048, ...encoding })
			: generateKeyPairSync("ed25519", encoding);

	return { type, privateKey: pair.privateKey, publicKey: pair.publicKey };
}

/** Derive the SPKI PEM public key from a PEM private key. */
export function publicKeyFromPrivate(privateKey: string): string {
	try {
		return createPublicKey(createPrivateKey(privateKey)).export({ type: "spki", format: "pem" }).toString();
	} catch (error) {
		throw ClearlineError.invalidArgument("Private key is not a valid PEM key", error);
	}
}

/** Detect the key type of a PEM key (private or public). */
export function keyTypeOf(pem: string): KeyType {
	const key = pem.includes("PRIVATE KEY") ? createPrivateKey(pem) : createPublicKey(pem);
	switch (key.asymmetricKeyType) {
		case "ed25519":
			return "ed25519";
		case "rsa":
			return "rsa";
		default:
			throw ClearlineError.invalidArgument(
				`Unsupported key type "${String(key.asymmetricKeyType)}". Use ed25519 or rsa.`,
			);
	}
}
