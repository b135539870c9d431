import { type Bank, createBank, createStaticDiscovery, generateKeyPair } from "@clearline/bank";
import type { BankOptions, ResolvedInstance } from "@clearline/core";
import { silentLogger } from "@clearline/core/logger";
import { memoryAdapter } from "@clearline/memory-adapter";

export interface TestInstanceOptions {
	/** Default: "BANKA" */
	instanceId?: string;
	/** Peers known to the bank's static discovery */
	peers?: ResolvedInstance[];
	/** Any other bank option */
	overrides?: Partial<Omit<BankOptions, "instanceId">>;
}

export interface TestInstance {
	bank: Bank;
	/** Cleanup function -- call in afterEach/afterAll */
	cleanup: () => Promise<void>;
}

/** A single bank on the memory adapter with static discovery and no logging. */
export function getTestInstance(options: TestInstanceOptions = {}): TestInstance {
	const bank = createBank({
		instanceId: options.instanceId ?? "BANKA",
		identity: generateKeyPair(),
		database: memoryAdapter(),
		discovery: createStaticDiscovery(options.peers),
		logger: silentLogger,
		sleep: async () => {},
		...options.overrides,
	});

	return {
		bank,
		cleanup: async () => {
			await bank.workers.stop();
		},
	};
}
