import { createHash } from "node:crypto";
import stringify from "safe-stable-stringify";

const deterministicStringify = stringify.configure({ deterministic: true, bigint: false });

/**
 * Deterministic (sorted-key) JSON serialization. Two structurally equal values
 * always produce the same string, whatever their key order, which makes the
 * output safe to sign and to hash after a JSON round-trip over the wire.
 */
export function canonicalJson(value: unknown): string {
	const out = deterministicStringify(value);
	// `undefined` at the top level serializes to nothing
	return out ?? "null";
}

/** Hex SHA-256 of a string. */
export function sha256Hex(payload: string): string {
	return createHash("sha256").update(payload).digest("hex");
}

/** Hex SHA-256 of the canonical form of a value. */
export function computeDigest(value: unknown): string {
	return sha256Hex(canonicalJson(value));
}
