// =============================================================================
// ACCOUNT ROUTES
// =============================================================================

import {
	badRequest,
	defineRoute,
	enumValue,
	json,
	pageParams,
	type Route,
	VALID_ACCOUNT_STATUSES,
	validateBody,
	validateEnum,
	validatePositiveIntegerAmount,
} from "@clearline/core/http";
import type { Bank } from "../../bank/base.js";

export const accountRoutes: Route<Bank>[] = [
	defineRoute<Bank>("GET", "/accounts", async (req, bank) => {
		const statusErr = validateEnum(req.query.status, VALID_ACCOUNT_STATUSES, "status");
		if (statusErr) return statusErr;
		const result = await bank.accounts.list({
			...pageParams(req.query),
			status: enumValue(req.query.status, VALID_ACCOUNT_STATUSES),
			ownerId: req.query.ownerId,
		});
		return json(200, result);
	}),

	defineRoute<Bank>("POST", "/accounts", async (req, bank) => {
		const parsed = validateBody(req.body, {
			ownerId: "string",
			ownerName: "string",
			initialDeposit: "number?",
		});
		if ("error" in parsed) return badRequest(parsed.error);
		const { ownerId, ownerName, initialDeposit } = parsed.body;
		if (initialDeposit !== undefined && (!Number.isInteger(initialDeposit) || initialDeposit < 0)) {
			return badRequest("initialDeposit must be a non-negative integer (in smallest currency units)");
		}
		const result = await bank.accounts.create({ ownerId, ownerName, initialDeposit });
		return json(201, result);
	}),

	defineRoute<Bank>("GET", "/accounts/:accountId/balance", async (_req, bank, params) => {
		const result = await bank.accounts.getBalance(params.accountId ?? "");
		return json(200, result);
	}),

	defineRoute<Bank>("GET", "/accounts/:accountId/entries", async (req, bank, params) => {
		const result = await bank.accounts.listEntries(params.accountId ?? "", pageParams(req.query));
		return json(200, result);
	}),

	defineRoute<Bank>("POST", "/accounts/:accountId/deposit", async (req, bank, params) => {
		const parsed = validateBody(req.body, { amount: "number", description: "string?" });
		if ("error" in parsed) return badRequest(parsed.error);
		const amtErr = validatePositiveIntegerAmount(parsed.body.amount);
		if (amtErr) return badRequest(amtErr.error);
		const result = await bank.accounts.deposit({ accountId: params.accountId ?? "", ...parsed.body });
		return json(200, result);
	}),

	defineRoute<Bank>("POST", "/accounts/:accountId/cancel", async (_req, bank, params) => {
		const result = await bank.accounts.cancel(params.accountId ?? "");
		return json(200, result);
	}),

	defineRoute<Bank>("GET", "/accounts/:accountId", async (_req, bank, params) => {
		const result = await bank.accounts.get(params.accountId ?? "");
		return json(200, result);
	}),
];
