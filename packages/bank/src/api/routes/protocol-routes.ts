// =============================================================================
// PROTOCOL & INSTANCE ROUTES
// =============================================================================
// `POST /protocol/messages` is the participant endpoint other instances call.

import { defineRoute, json, type Route } from "@clearline/core/http";
import type { Bank } from "../../bank/base.js";

export const instanceRoutes: Route<Bank>[] = [
	defineRoute<Bank>("GET", "/ok", async () => json(200, { ok: true })),

	defineRoute<Bank>("GET", "/info", async (_req, bank) => json(200, bank.info())),
];

export const protocolRoutes: Route<Bank>[] = [
	defineRoute<Bank>("POST", "/protocol/messages", async (req, bank) => {
		const reply = await bank.protocol.handle(req.body);
		return json(200, reply);
	}),
];
