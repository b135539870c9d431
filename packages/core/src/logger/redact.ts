// =============================================================================
// REDACTION — Masks key material and credentials in log data
// =============================================================================
// Envelopes and peer replies are often logged whole, so matching keys are
// masked at any depth (up to MAX_DEPTH). Key names compare case-insensitively.

const DEFAULT_REDACT_KEYS = ["privateKey", "signature", "password", "token", "secret"];
const MAX_DEPTH = 6;

export const REDACTED = "[REDACTED]";

/** Redaction key set from user-provided keys, or the defaults. */
export function buildRedactKeys(userKeys?: string[]): Set<string> {
	return new Set((userKeys ?? DEFAULT_REDACT_KEYS).map((key) => key.toLowerCase()));
}

function redactValue(value: unknown, keys: Set<string>, depth: number): unknown {
	if (depth >= MAX_DEPTH || typeof value !== "object" || value === null) return value;

	if (Array.isArray(value)) {
		const items: unknown[] = value.map((item: unknown) => redactValue(item, keys, depth + 1));
		return items.some((item, i) => item !== value[i]) ? items : value;
	}

	let copy: Record<string, unknown> | undefined;
	for (const [key, inner] of Object.entries(value)) {
		const next: unknown = keys.has(key.toLowerCase()) ? REDACTED : redactValue(inner, keys, depth + 1);
		if (next === inner) continue;
		copy ??= Object.fromEntries(Object.entries(value));
		copy[key] = next;
	}
	return copy ?? value;
}

/**
 * Copy of `data` with every matching key masked. Returns `data` itself when
 * nothing matched.
 */
export function redactData(
	data: Record<string, unknown> | undefined,
	keys: Set<string>,
): Record<string, unknown> | undefined {
	if (!data || keys.size === 0) return data;

	let copy: Record<string, unknown> | undefined;
	for (const [key, inner] of Object.entries(data)) {
		const next = keys.has(key.toLowerCase()) ? REDACTED : redactValue(inner, keys, 1);
		if (next === inner) continue;
		copy ??= { ...data };
		copy[key] = next;
	}
	return copy ?? data;
}
