// =============================================================================
// INSTANCE STORE -- Registered instances, keyed by instance id
// =============================================================================

import { createPublicKey } from "node:crypto";
import type { ClearlineAdapter, ClearlineLogger, RegistrationInput, RegistryRecord } from "@clearline/core";
import { ClearlineError, errorMessage, isInstanceId, MODELS } from "@clearline/core";

export interface RegistryContext {
	adapter: ClearlineAdapter;
	logger: ClearlineLogger;
	clock: () => Date;
}

interface InstanceRow {
	id: string;
	name: string;
	address: string;
	publicKey: string;
	metadata: Record<string, unknown>;
	registeredAt: string;
	updatedAt: string;
}

function toRecord(row: InstanceRow): RegistryRecord {
	return {
		instanceId: row.id,
		name: row.name,
		address: row.address,
		publicKey: row.publicKey,
		metadata: row.metadata,
		registeredAt: row.registeredAt,
		updatedAt: row.updatedAt,
	};
}

async function storage<T>(ctx: RegistryContext, operation: string, fn: () => Promise<T>): Promise<T> {
	try {
		return await fn();
	} catch (error) {
		if (error instanceof ClearlineError) throw error;
		ctx.logger.error("Registry storage failure", { operation, error: errorMessage(error) });
		throw ClearlineError.storageUnavailable(`Registry storage failed during ${operation}`, error);
	}
}

/** Throws INVALID_ARGUMENT naming the first bad field. */
export function validateRegistration(input: RegistrationInput): void {
	if (!isInstanceId(input.instanceId)) {
		throw ClearlineError.invalidArgument(
			"instanceId must be 2-64 letters, digits, '-' or '_', starting with a letter or digit",
		);
	}
	if (typeof input.name !== "string" || input.name.trim().length === 0) {
		throw ClearlineError.invalidArgument("name must be a non-empty string");
	}
	let url: URL;
	try {
		url = new URL(input.address);
	} catch (error) {
		throw ClearlineError.invalidArgument(`address must be an absolute URL, got "${input.address}"`, error);
	}
	if (url.protocol !== "http:" && url.protocol !== "https:") {
		throw ClearlineError.invalidArgument(`address must use http or https, got "${url.protocol}"`);
	}
	try {
		createPublicKey(input.publicKey);
	} catch (error) {
		throw ClearlineError.invalidArgument("publicKey must be a PEM-encoded public key", error);
	}
}

/** Insert or replace the record of `input.instanceId`. Keeps the first registration time. */
export async function registerInstance(
	ctx: RegistryContext,
	input: RegistrationInput,
): Promise<{ record: RegistryRecord; created: boolean }> {
	validateRegistration(input);
	const now = ctx.clock().toISOString();
	const fields = {
		name: input.name,
		address: input.address,
		publicKey: input.publicKey,
		metadata: input.metadata ?? {},
	};

	const result = await storage(ctx, "registerInstance", () =>
		ctx.adapter.transaction(async (tx) => {
			const existing = await tx.findOne<InstanceRow>({
				model: MODELS.registryInstance,
				where: [{ field: "id", operator: "eq", value: input.instanceId }],
				forUpdate: true,
			});
			if (existing) {
				const updated = await tx.update<InstanceRow>({
					model: MODELS.registryInstance,
					where: [{ field: "id", operator: "eq", value: input.instanceId }],
					update: { ...fields, updatedAt: now },
				});
				if (!updated) throw ClearlineError.conflict(`Instance ${input.instanceId} was removed concurrently`);
				return { row: updated, created: false };
			}
			const row = await tx.create<InstanceRow>({
				model: MODELS.registryInstance,
				data: { id: input.instanceId, ...fields, registeredAt: now, updatedAt: now },
			});
			return { row, created: true };
		}),
	);

	ctx.logger.info(result.created ? "Instance registered" : "Instance registration updated", {
		instanceId: input.instanceId,
		address: input.address,
	});
	return { record: toRecord(result.row), created: result.created };
}

export async function lookupInstance(ctx: RegistryContext, instanceId: string): Promise<RegistryRecord> {
	const row = await storage(ctx, "lookupInstance", () =>
		ctx.adapter.findOne<InstanceRow>({
			model: MODELS.registryInstance,
			where: [{ field: "id", operator: "eq", value: instanceId }],
		}),
	);
	if (!row) throw ClearlineError.notFound(`Instance ${instanceId} is not registered`);
	return toRecord(row);
}

export async function listInstances(ctx: RegistryContext): Promise<RegistryRecord[]> {
	const rows = await storage(ctx, "listInstances", () =>
		ctx.adapter.findMany<InstanceRow>({
			model: MODELS.registryInstance,
			sortBy: { field: "id", direction: "asc" },
		}),
	);
	return rows.map(toRecord);
}

export async function removeInstance(ctx: RegistryContext, instanceId: string): Promise<boolean> {
	const deleted = await storage(ctx, "removeInstance", () =>
		ctx.adapter.delete({
			model: MODELS.registryInstance,
			where: [{ field: "id", operator: "eq", value: instanceId }],
		}),
	);
	if (deleted > 0) ctx.logger.info("Instance removed", { instanceId });
	return deleted > 0;
}

export async function resetInstances(ctx: RegistryContext): Promise<number> {
	const deleted = await storage(ctx, "resetInstances", () =>
		ctx.adapter.delete({ model: MODELS.registryInstance, where: [] }),
	);
	ctx.logger.info("Registry reset", { count: deleted });
	return deleted;
}
