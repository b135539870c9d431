// =============================================================================
// REGISTRY -- Main entry point
// =============================================================================

import type { ClearlineAdapter, ClearlineLogger, RegistrationInput, RegistryRecord } from "@clearline/core";
import { createConsoleLogger } from "@clearline/core/logger";
import {
	listInstances,
	lookupInstance,
	type RegistryContext,
	registerInstance,
	removeInstance,
	resetInstances,
} from "../managers/instance-store.js";

export interface RegistryOptions {
	/** Database adapter instance or factory function */
	database: ClearlineAdapter | (() => ClearlineAdapter);
	/** Custom logger */
	logger?: ClearlineLogger;
	/** Clock. Default: the system clock */
	clock?: () => Date;
}

export interface Registry {
	/** Idempotent upsert by instance id. `created` is false when the record existed. */
	register: (input: RegistrationInput) => Promise<{ record: RegistryRecord; created: boolean }>;
	/** Rejects with NOT_FOUND when the instance is not registered. */
	lookup: (instanceId: string) => Promise<RegistryRecord>;
	list: () => Promise<RegistryRecord[]>;
	remove: (instanceId: string) => Promise<boolean>;
	/** Remove every record. */
	reset: () => Promise<number>;
	$context: RegistryContext;
}

export function createRegistry(options: RegistryOptions): Registry {
	const ctx: RegistryContext = {
		adapter: typeof options.database === "function" ? options.database() : options.database,
		logger: options.logger ?? createConsoleLogger({ prefix: "registry" }),
		clock: options.clock ?? (() => new Date()),
	};

	return {
		register: (input) => registerInstance(ctx, input),
		lookup: (instanceId) => lookupInstance(ctx, instanceId),
		list: () => listInstances(ctx),
		remove: (instanceId) => removeInstance(ctx, instanceId),
		reset: () => resetInstances(ctx),
		$context: ctx,
	};
}
