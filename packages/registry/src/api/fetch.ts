import { createFetchHandler } from "@clearline/core/http";
import type { Registry } from "../registry/base.js";
import { handleRegistryRequest } from "./handler.js";

export function createRegistryFetchHandler(
	registry: Registry,
	options: { basePath?: string } = {},
): (request: Request) => Promise<Response> {
	return createFetchHandler((req) => handleRegistryRequest(registry, req), options.basePath);
}
