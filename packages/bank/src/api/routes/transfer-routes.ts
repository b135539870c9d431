// =============================================================================
// TRANSFER ROUTES — Client-facing transfer API
// =============================================================================

import {
	badRequest,
	defineRoute,
	enumValue,
	json,
	pageParams,
	type Route,
	VALID_TRANSFER_STATUSES,
	validateBody,
	validateEnum,
	validatePositiveIntegerAmount,
} from "@clearline/core/http";
import type { Bank } from "../../bank/base.js";

export const transferRoutes: Route<Bank>[] = [
	defineRoute<Bank>("GET", "/transfers", async (req, bank) => {
		const statusErr = validateEnum(req.query.status, VALID_TRANSFER_STATUSES, "status");
		if (statusErr) return statusErr;
		const result = await bank.transfers.list({
			...pageParams(req.query),
			status: enumValue(req.query.status, VALID_TRANSFER_STATUSES),
			sourceAccountId: req.query.sourceAccountId,
		});
		return json(200, result);
	}),

	defineRoute<Bank>("POST", "/transfers", async (req, bank) => {
		const parsed = validateBody(req.body, {
			sourceAccountId: "string",
			destinationInstanceId: "string",
			destinationAccountId: "string",
			amount: "number",
			idempotencyKey: "string?",
		});
		if ("error" in parsed) return badRequest(parsed.error);
		const { sourceAccountId, destinationInstanceId, destinationAccountId, amount, idempotencyKey } =
			parsed.body;
		const amtErr = validatePositiveIntegerAmount(amount);
		if (amtErr) return badRequest(amtErr.error);

		const result = await bank.transfers.initiate({
			sourceAccountId,
			destination: { instanceId: destinationInstanceId, accountId: destinationAccountId },
			amount,
			idempotencyKey,
		});
		return json(201, result);
	}),

	defineRoute<Bank>("POST", "/transfers/:transferId/cancel", async (_req, bank, params) => {
		const result = await bank.transfers.cancel(params.transferId ?? "");
		return json(200, result);
	}),

	defineRoute<Bank>("GET", "/transfers/:transferId", async (_req, bank, params) => {
		const result = await bank.transfers.get(params.transferId ?? "");
		return json(200, result);
	}),
];
