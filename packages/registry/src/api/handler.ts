// =============================================================================
// API HANDLER — The registry's HTTP API
// =============================================================================
//   POST   /banks              register or replace (201 created, 200 replaced)
//   GET    /banks              list
//   GET    /banks/:instanceId  lookup
//   DELETE /banks/:instanceId  remove

import type { RegistrationInput } from "@clearline/core";
import { ClearlineError } from "@clearline/core";
import {
	type ApiRequest,
	type ApiResponse,
	defineRoute,
	dispatchRequest,
	isRecord,
	json,
	type Route,
	validateBody,
} from "@clearline/core/http";
import type { Registry } from "../registry/base.js";

/** An ApiRequest whose query string is optional; the registry reads none. */
export type RegistryApiRequest = Omit<ApiRequest, "query"> & { query?: ApiRequest["query"] };

function readRegistration(body: unknown): RegistrationInput {
	const parsed = validateBody(body, {
		instanceId: "string",
		name: "string",
		address: "string",
		publicKey: "string",
	});
	if ("error" in parsed) throw ClearlineError.invalidArgument(parsed.error);

	const metadata = isRecord(body) ? body.metadata : undefined;
	if (metadata === undefined) return parsed.body;
	if (!isRecord(metadata)) throw ClearlineError.invalidArgument('Field "metadata" must be object');
	return { ...parsed.body, metadata };
}

const routes: Route<Registry>[] = [
	defineRoute<Registry>("GET", "/ok", async () => json(200, { ok: true })),

	defineRoute<Registry>("POST", "/banks", async (req, registry) => {
		const { record, created } = await registry.register(readRegistration(req.body));
		return json(created ? 201 : 200, record, {
			Location: `/banks/${encodeURIComponent(record.instanceId)}`,
		});
	}),

	defineRoute<Registry>("GET", "/banks", async (_req, registry) => json(200, { banks: await registry.list() })),

	defineRoute<Registry>("GET", "/banks/:instanceId", async (_req, registry, params) =>
		json(200, await registry.lookup(params.instanceId ?? "")),
	),

	defineRoute<Registry>("DELETE", "/banks/:instanceId", async (_req, registry, params) => {
		const removed = await registry.remove(params.instanceId ?? "");
		if (!removed) throw ClearlineError.notFound(`Instance ${params.instanceId} is not registered`);
		return json(200, { removed });
	}),
];

export function handleRegistryRequest(registry: Registry, req: RegistryApiRequest): Promise<ApiResponse> {
	return dispatchRequest(registry, routes, { ...req, query: req.query ?? {} }, { logger: registry.$context.logger });
}
