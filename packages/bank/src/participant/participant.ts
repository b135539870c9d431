// =============================================================================
// PARTICIPANT -- Destination side of the two-phase commit
// =============================================================================
// Every accepted request is processed once: the decision change and the
// replay-guard record are written in the same transaction, and re-deliveries
// of the same envelope get the recorded reply back.

import type {
	AbortPayload,
	ClearlineTransactionAdapter,
	DecisionState,
	ParticipantDecision,
	PreparePayload,
	ReplyEnvelope,
	RequestEnvelope,
	SignedMessageOf,
} from "@clearline/core";
import { ClearlineError, lockKeys } from "@clearline/core";
import type { BankContext } from "../context/context.js";
import { withTransaction } from "../infrastructure/storage.js";
import { findAccount } from "../managers/account-manager.js";
import { decisionState, findDecision, recordDecision } from "../managers/decision-store.js";
import {
	applyReservation,
	expireReservations,
	findReservation,
	releaseReservation,
	reserveCredit,
} from "../managers/reservation-manager.js";
import { isRequest, messageDigest, parseEnvelope, sealReply, verifyEnvelope } from "../protocol/messages.js";
import { checkReplay, recordProcessed } from "../protocol/replay-guard.js";

interface Outcome {
	reply: ReplyEnvelope;
	/** Whether the reply is remembered by the replay guard */
	record: boolean;
}

/**
 * Verify and process one inbound protocol request and return the signed
 * reply. Throws INVALID_ARGUMENT for malformed envelopes, SIGNATURE_INVALID
 * for forged ones and REPLAY_DETECTED for a reused nonce.
 */
export async function handleMessage(ctx: BankContext, raw: unknown): Promise<ReplyEnvelope> {
	let envelope: RequestEnvelope | null = null;
	try {
		const parsed = parseEnvelope(raw);
		if (!isRequest(parsed)) {
			throw ClearlineError.invalidArgument(`Participants accept requests only, got ${parsed.type}`);
		}
		envelope = parsed;

		if (!(await verifyEnvelope(ctx.identity, parsed))) {
			throw ClearlineError.signatureInvalid(
				`Signature of ${parsed.type} from ${parsed.senderId} does not verify`,
			);
		}

		const request = parsed;
		const digest = messageDigest(request);
		return await ctx.participantLocks.run(request.transferId, () =>
			withTransaction(ctx, "handleProtocolMessage", async (tx) => {
				await tx.advisoryLock(lockKeys.transfer(request.transferId));
				const cached = await checkReplay(tx, request, digest);
				if (cached) {
					ctx.logger.debug("Re-delivered protocol message", {
						transferId: request.transferId,
						senderId: request.senderId,
						nonce: request.nonce,
					});
					return cached;
				}

				const outcome = await dispatch(ctx, tx, request);
				if (outcome.record) {
					await recordProcessed(ctx, tx, request, digest, outcome.reply);
				}
				return outcome.reply;
			}),
		);
	} catch (error) {
		if (error instanceof ClearlineError && error.status < 500) {
			ctx.logger.warn("Rejected protocol message", {
				senderId: envelope?.senderId,
				transferId: envelope?.transferId,
				nonce: envelope?.nonce,
				code: error.code,
				error: error.message,
			});
		}
		throw error;
	}
}

function dispatch(
	ctx: BankContext,
	tx: ClearlineTransactionAdapter,
	request: RequestEnvelope,
): Promise<Outcome> {
	switch (request.type) {
		case "PREPARE":
			return handlePrepare(ctx, tx, request);
		case "COMMIT":
			return handleCommit(ctx, tx, request);
		case "ABORT":
			return handleAbort(ctx, tx, request);
		case "QUERY":
			return handleQuery(ctx, tx, request);
	}
}

function ack(ctx: BankContext, request: RequestEnvelope, decision: DecisionState): Outcome {
	return { reply: sealReply(ctx.identity, request, "ACK", decision), record: true };
}

function nack(
	ctx: BankContext,
	request: RequestEnvelope,
	decision: DecisionState,
	reason: string,
	record = true,
): Outcome {
	return { reply: sealReply(ctx.identity, request, "NACK", decision, reason), record };
}

function sameTransfer(decision: ParticipantDecision, origin: string, payload: PreparePayload): boolean {
	return (
		decision.originInstanceId === origin &&
		decision.sourceAccountId === payload.sourceAccountId &&
		decision.destinationAccountId === payload.destinationAccountId &&
		decision.amount === payload.amount
	);
}

// =============================================================================
// PREPARE
// =============================================================================

async function handlePrepare(
	ctx: BankContext,
	tx: ClearlineTransactionAdapter,
	request: SignedMessageOf<"PREPARE">,
): Promise<Outcome> {
	const { transferId, senderId, payload } = request;
	if (payload.destinationInstanceId !== ctx.options.instanceId) {
		return nack(ctx, request, "NONE", "WRONG_INSTANCE", false);
	}

	const existing = await findDecision(tx, transferId);
	if (existing) {
		if (existing.state === "RELEASED") {
			return nack(ctx, request, "RELEASED", existing.reason ?? "RELEASED");
		}
		if (!sameTransfer(existing, senderId, payload)) {
			return nack(ctx, request, existing.state, "CONFLICT");
		}
		return ack(ctx, request, existing.state);
	}

	const decision = {
		id: transferId,
		originInstanceId: senderId,
		sourceAccountId: payload.sourceAccountId,
		destinationAccountId: payload.destinationAccountId,
		amount: payload.amount,
	};

	const account = await findAccount(tx, payload.destinationAccountId, true);
	const refusal = !account ? "ACCOUNT_NOT_FOUND" : account.status !== "active" ? "ACCOUNT_INACTIVE" : null;
	if (refusal) {
		await recordDecision(ctx, tx, { ...decision, state: "RELEASED", reason: refusal });
		return nack(ctx, request, "RELEASED", refusal);
	}

	const expiresAt = new Date(ctx.clock().getTime() + ctx.options.protocol.reservationTtlMs).toISOString();
	await reserveCredit(ctx, tx, {
		transferId,
		accountId: payload.destinationAccountId,
		amount: payload.amount,
		expiresAt,
	});
	await recordDecision(ctx, tx, { ...decision, state: "RESERVED" });
	return ack(ctx, request, "RESERVED");
}

// =============================================================================
// COMMIT
// =============================================================================

async function handleCommit(
	ctx: BankContext,
	tx: ClearlineTransactionAdapter,
	request: SignedMessageOf<"COMMIT">,
): Promise<Outcome> {
	const existing = await findDecision(tx, request.transferId);
	if (!existing || existing.state === "RELEASED") {
		return nack(ctx, request, decisionState(existing), existing?.reason ?? "CONFLICT");
	}
	if (existing.originInstanceId !== request.senderId) {
		return nack(ctx, request, existing.state, "CONFLICT");
	}
	if (existing.state === "APPLIED") {
		return ack(ctx, request, "APPLIED");
	}

	const reservation = await findReservation(tx, request.transferId, "credit");
	if (reservation?.status !== "held") {
		ctx.logger.warn("COMMIT without a held credit reservation", {
			transferId: request.transferId,
			senderId: request.senderId,
			reservationStatus: reservation?.status ?? null,
		});
		await recordDecision(ctx, tx, { ...existing, state: "RELEASED", reason: "CONFLICT" });
		return nack(ctx, request, "RELEASED", "CONFLICT");
	}
	if (reservation.expiresAt !== null && reservation.expiresAt <= ctx.clock().toISOString()) {
		await releaseReservation(ctx, tx, reservation, "expired");
		await recordDecision(ctx, tx, { ...existing, state: "RELEASED", reason: "RESERVATION_EXPIRED" });
		return nack(ctx, request, "RELEASED", "RESERVATION_EXPIRED");
	}

	await applyReservation(ctx, tx, reservation);
	await recordDecision(ctx, tx, { ...existing, state: "APPLIED" });
	return ack(ctx, request, "APPLIED");
}

// =============================================================================
// ABORT / QUERY
// =============================================================================

async function handleAbort(
	ctx: BankContext,
	tx: ClearlineTransactionAdapter,
	request: SignedMessageOf<"ABORT">,
): Promise<Outcome> {
	const { transferId, senderId } = request;
	const existing = await findDecision(tx, transferId);

	if (!existing) {
		// Remembered so that a PREPARE arriving after the ABORT is refused.
		await recordDecision(ctx, tx, {
			id: transferId,
			originInstanceId: senderId,
			sourceAccountId: "",
			destinationAccountId: "",
			amount: 0,
			state: "RELEASED",
			reason: abortReason(request.payload),
		});
		return ack(ctx, request, "RELEASED");
	}
	if (existing.originInstanceId !== senderId) {
		return nack(ctx, request, existing.state, "CONFLICT");
	}

	switch (existing.state) {
		case "RELEASED":
			return ack(ctx, request, "RELEASED");
		case "APPLIED":
			return nack(ctx, request, "APPLIED", "ALREADY_APPLIED");
		case "RESERVED": {
			const reservation = await findReservation(tx, transferId, "credit");
			if (reservation?.status === "held") {
				await releaseReservation(ctx, tx, reservation);
			}
			await recordDecision(ctx, tx, {
				...existing,
				state: "RELEASED",
				reason: abortReason(request.payload),
			});
			return ack(ctx, request, "RELEASED");
		}
	}
}

function abortReason(payload: AbortPayload): string {
	return payload.reason ?? "ABORTED";
}

async function handleQuery(
	ctx: BankContext,
	tx: ClearlineTransactionAdapter,
	request: SignedMessageOf<"QUERY">,
): Promise<Outcome> {
	const existing = await findDecision(tx, request.transferId);
	if (existing && existing.originInstanceId !== request.senderId) {
		return nack(ctx, request, existing.state, "CONFLICT");
	}
	return ack(ctx, request, decisionState(existing));
}

// =============================================================================
// EXPIRY
// =============================================================================

/** Release overdue credit reservations and mark their decisions RELEASED. */
export function expireParticipantReservations(ctx: BankContext): Promise<{ expired: number }> {
	return expireReservations(ctx, async (tx, reservation) => {
		const decision = await findDecision(tx, reservation.transferId);
		if (decision?.state === "RESERVED") {
			await recordDecision(ctx, tx, { ...decision, state: "RELEASED", reason: "RESERVATION_EXPIRED" });
		}
	});
}
