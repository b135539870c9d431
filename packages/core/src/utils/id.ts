import { randomBytes, randomInt, randomUUID } from "node:crypto";

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[1-8][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;
const INSTANCE_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]{1,63}$/;

export function generateId(): string {
	return randomUUID();
}

export function isUuid(value: string): boolean {
	return UUID_PATTERN.test(value);
}

/** 2-64 letters, digits, '-' or '_', starting with a letter or digit. */
export function isInstanceId(value: unknown): value is string {
	return typeof value === "string" && INSTANCE_ID_PATTERN.test(value);
}

/** 128-bit random nonce, hex encoded. */
export function generateNonce(): string {
	return randomBytes(16).toString("hex");
}

/** Random 16-digit account number with a non-zero leading digit. */
export function generateAccountNumber(): string {
	let digits = String(randomInt(1, 10));
	for (let i = 0; i < 15; i++) {
		digits += String(randomInt(0, 10));
	}
	return digits;
}
