// =============================================================================
// TEST NETWORK -- Registry plus N bank instances wired in-process
// =============================================================================

import { type Bank, createBank, generateKeyPair } from "@clearline/bank";
import type { BankOptions, ClearlineLogger, DiscoveryClient, ProtocolOptions } from "@clearline/core";
import { silentLogger } from "@clearline/core/logger";
import { memoryAdapter } from "@clearline/memory-adapter";
import { createRegistry, type Registry } from "@clearline/registry";
import { createTestClock, type TestClock } from "./clock.js";
import { createLoopbackTransport, type LoopbackTransport } from "./loopback-transport.js";

export interface TestNetworkOptions {
	/** Instance ids of the banks to create. Default: ["BANKA", "BANKB"] */
	banks?: string[];
	/** Protocol overrides applied to every bank */
	protocol?: ProtocolOptions;
	/** Shared clock. Default: a fresh TestClock */
	clock?: TestClock;
	/** Default: a logger that drops everything */
	logger?: ClearlineLogger;
}

export interface TestNetwork {
	registry: Registry;
	/** Discovery over the in-process registry, shared by every bank */
	discovery: DiscoveryClient;
	transport: LoopbackTransport;
	clock: TestClock;
	/** The bank registered as `instanceId`. Throws for unknown ids. */
	bank(instanceId: string): Bank;
	banks: Bank[];
	cleanup(): Promise<void>;
}

/** Base URL under which a test bank is registered. */
export function testAddress(instanceId: string): string {
	return `http://${instanceId.toLowerCase()}.test`;
}

/** Discovery that reads the registry directly instead of over HTTP. */
export function registryDiscovery(registry: Registry): DiscoveryClient {
	return {
		async resolve(instanceId) {
			const record = await registry.lookup(instanceId);
			return { instanceId: record.instanceId, address: record.address, publicKey: record.publicKey };
		},
		async register(input) {
			await registry.register(input);
		},
	};
}

export async function createTestNetwork(options: TestNetworkOptions = {}): Promise<TestNetwork> {
	const logger = options.logger ?? silentLogger;
	const clock = options.clock ?? createTestClock();
	const registry = createRegistry({ database: memoryAdapter(), logger, clock });
	const discovery = registryDiscovery(registry);
	const transport = createLoopbackTransport();

	const banks = new Map<string, Bank>();
	for (const instanceId of options.banks ?? ["BANKA", "BANKB"]) {
		const bankOptions: BankOptions = {
			instanceId,
			baseUrl: testAddress(instanceId),
			identity: generateKeyPair(),
			database: memoryAdapter(),
			discovery,
			transport,
			logger,
			clock,
			sleep: async () => {},
			protocol: options.protocol,
		};
		const bank = createBank(bankOptions);
		await bank.register();
		transport.attach(testAddress(instanceId), bank);
		banks.set(instanceId, bank);
	}

	return {
		registry,
		discovery,
		transport,
		clock,
		bank(instanceId) {
			const bank = banks.get(instanceId);
			if (!bank) throw new Error(`No bank "${instanceId}" in this test network`);
			return bank;
		},
		banks: [...banks.values()],
		async cleanup() {
			for (const bank of banks.values()) {
				await bank.workers.stop();
			}
		},
	};
}
