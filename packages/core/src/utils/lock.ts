/** Deterministic 32-bit hash for pg_advisory_xact_lock key */
export function hashLockKey(input: string): number {
	let hash = 0;
	for (let i = 0; i < input.length; i++) {
		const char = input.charCodeAt(i);
		hash = ((hash << 5) - hash + char) | 0;
	}
	return hash;
}

export const lockKeys = {
	account: (accountId: string) => hashLockKey(`account:${accountId}`),
	transfer: (transferId: string) => hashLockKey(`transfer:${transferId}`),
} as const;

export interface KeyedLock {
	/** Run `fn` once every earlier holder of `key` has finished. */
	run<T>(key: string, fn: () => Promise<T>): Promise<T>;
	/** Number of keys with a holder or waiters. */
	size(): number;
}

/**
 * In-process mutual exclusion per key. Callers of the same key run one at a
 * time in arrival order; different keys never wait on each other.
 */
export function createKeyedLock(): KeyedLock {
	const tails = new Map<string, Promise<void>>();

	return {
		async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
			const previous = tails.get(key) ?? Promise.resolve();
			let release: () => void = () => {};
			const current = new Promise<void>((resolve) => {
				release = resolve;
			});
			const tail = previous.then(() => current);
			tails.set(key, tail);

			await previous;
			try {
				return await fn();
			} finally {
				release();
				if (tails.get(key) === tail) {
					tails.delete(key);
				}
			}
		},

		size() {
			return tails.size;
		},
	};
}
