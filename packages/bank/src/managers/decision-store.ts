// =============================================================================
// DECISION STORE -- Participant-side record of what was decided per transfer
// =============================================================================
// Absence of a row is the NONE state.

import type { ClearlineTransactionAdapter, DecisionState, ParticipantDecision } from "@clearline/core";
import { isUuid, MODELS } from "@clearline/core";
import type { BankContext } from "../context/context.js";
import { nowIso } from "../context/context.js";
import { withStorage } from "../infrastructure/storage.js";

export async function findDecision(
	tx: Pick<ClearlineTransactionAdapter, "findOne">,
	transferId: string,
): Promise<ParticipantDecision | null> {
	if (!isUuid(transferId)) return null;
	return tx.findOne<ParticipantDecision>({
		model: MODELS.participantDecision,
		where: [{ field: "id", operator: "eq", value: transferId }],
	});
}

export async function getDecision(
	ctx: BankContext,
	transferId: string,
): Promise<ParticipantDecision | null> {
	return withStorage(ctx, "getDecision", (adapter) => findDecision(adapter, transferId));
}

export function decisionState(decision: ParticipantDecision | null): DecisionState {
	return decision?.state ?? "NONE";
}

/** Insert or overwrite the decision for a transfer. */
export async function recordDecision(
	ctx: BankContext,
	tx: ClearlineTransactionAdapter,
	params: Pick<
		ParticipantDecision,
		"id" | "originInstanceId" | "sourceAccountId" | "destinationAccountId" | "amount" | "state"
	> & { reason?: string | null },
): Promise<ParticipantDecision> {
	const now = nowIso(ctx);
	const existing = await findDecision(tx, params.id);

	if (existing) {
		const updated = await tx.update<ParticipantDecision>({
			model: MODELS.participantDecision,
			where: [{ field: "id", operator: "eq", value: params.id }],
			update: { state: params.state, reason: params.reason ?? null, updatedAt: now },
		});
		if (updated) {
			ctx.logger.info("Participant decision changed", {
				transferId: params.id,
				from: existing.state,
				to: params.state,
			});
			return updated;
		}
	}

	const created = await tx.create<ParticipantDecision>({
		model: MODELS.participantDecision,
		data: { ...params, reason: params.reason ?? null, createdAt: now, updatedAt: now },
	});
	ctx.logger.info("Participant decision recorded", { transferId: params.id, state: params.state });
	return created;
}
