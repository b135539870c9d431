import type { DiscoveryClient, RegistrationInput, ResolvedInstance } from "@clearline/core";
import { ClearlineError } from "@clearline/core";

/** Fixed peer table. `register` adds or replaces an entry. */
export function createStaticDiscovery(records: ResolvedInstance[] = []): DiscoveryClient {
	const table = new Map(records.map((r) => [r.instanceId, r]));

	return {
		async resolve(instanceId) {
			const record = table.get(instanceId);
			if (!record) throw ClearlineError.notFound(`Instance ${instanceId} is not registered`);
			return record;
		},

		async register(input: RegistrationInput) {
			table.set(input.instanceId, {
				instanceId: input.instanceId,
				address: input.address,
				publicKey: input.publicKey,
			});
		},
	};
}
