// =============================================================================
// PROTOCOL MESSAGES — Build, sign, parse and verify wire envelopes
// =============================================================================
// The signed content is { type, senderId, payload }. COMMIT and ABORT share an
// empty payload shape, so the type must be covered for one not to pass as the
// other; covering the sender binds the message to the key that signed it.

import type {
	DecisionState,
	PayloadByType,
	ReplyEnvelope,
	ReplyPayload,
	ReplyType,
	RequestEnvelope,
	MessageType,
	SignedEnvelope,
	SignedMessageOf,
} from "@clearline/core";
import { ClearlineError, computeDigest, generateNonce, isUuid, REQUEST_TYPES } from "@clearline/core";
import type { Identity } from "../identity/index.js";

type SigningIdentity = Pick<Identity, "instanceId" | "sign">;

const DECISIONS: ReadonlySet<string> = new Set(["NONE", "RESERVED", "APPLIED", "RELEASED"]);
const MAX_ID_LENGTH = 128;

/** The part of an envelope the signature covers, besides nonce and transfer id. */
export function signedContent(message: Pick<SignedEnvelope, "type" | "senderId" | "payload">) {
	return { type: message.type, senderId: message.senderId, payload: message.payload };
}

// =============================================================================
// SEAL
// =============================================================================

export function sealMessage<K extends MessageType>(
	identity: SigningIdentity,
	type: K,
	transferId: string,
	payload: PayloadByType[K],
	nonce: string = generateNonce(),
): SignedMessageOf<K> {
	const senderId = identity.instanceId;
	return {
		type,
		transferId,
		senderId,
		nonce,
		payload,
		signature: identity.sign({ type, senderId, payload }, nonce, transferId),
	};
}

/** Signed ACK/NACK bound to `request` through its nonce. */
export function sealReply(
	identity: SigningIdentity,
	request: Pick<RequestEnvelope, "transferId" | "nonce">,
	type: ReplyType,
	decision: DecisionState,
	reason?: string,
): ReplyEnvelope {
	const payload: ReplyPayload = { inReplyTo: request.nonce, decision };
	if (reason !== undefined) payload.reason = reason;
	return sealMessage(identity, type, request.transferId, payload);
}

/** SHA-256 over the canonical envelope, signature included. */
export function messageDigest(envelope: SignedEnvelope): string {
	return computeDigest(envelope);
}

/** Check the envelope's signature against the sender's registered key. */
export function verifyEnvelope(identity: Pick<Identity, "verify">, envelope: SignedEnvelope) {
	return identity.verify(
		envelope.senderId,
		signedContent(envelope),
		envelope.nonce,
		envelope.transferId,
		envelope.signature,
	);
}

// =============================================================================
// PARSE
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function malformed(message: string): ClearlineError {
	return ClearlineError.invalidArgument(`Malformed protocol message: ${message}`);
}

function requireString(obj: Record<string, unknown>, key: string, where: string): string {
	const value = obj[key];
	if (typeof value !== "string" || value.length === 0 || value.length > MAX_ID_LENGTH) {
		throw malformed(`${where}.${key} must be a non-empty string`);
	}
	return value;
}

function optionalReason(obj: Record<string, unknown>): { reason?: string } {
	const value = obj.reason;
	if (value === undefined) return {};
	if (typeof value !== "string") throw malformed("payload.reason must be a string");
	return { reason: value };
}

function parseReplyPayload(payload: Record<string, unknown>): ReplyPayload {
	const decision = payload.decision;
	if (typeof decision !== "string" || !DECISIONS.has(decision)) {
		throw malformed(`payload.decision must be one of ${[...DECISIONS].join(", ")}`);
	}
	return {
		inReplyTo: requireString(payload, "inReplyTo", "payload"),
		decision: toDecision(decision),
		...optionalReason(payload),
	};
}

function toDecision(value: string): DecisionState {
	switch (value) {
		case "RESERVED":
		case "APPLIED":
		case "RELEASED":
			return value;
		default:
			return "NONE";
	}
}

/**
 * Validate the shape of a wire envelope. Throws INVALID_ARGUMENT naming the
 * first offending field. Says nothing about the signature.
 */
export function parseEnvelope(raw: unknown): SignedEnvelope {
	if (!isRecord(raw)) throw malformed("envelope must be a JSON object");

	const type = raw.type;
	const transferId = requireString(raw, "transferId", "envelope");
	if (!isUuid(transferId)) throw malformed("envelope.transferId must be a UUID");
	const senderId = requireString(raw, "senderId", "envelope");
	const nonce = requireString(raw, "nonce", "envelope");
	const signature = raw.signature;
	if (typeof signature !== "string" || signature.length === 0) {
		throw malformed("envelope.signature must be a non-empty string");
	}
	const payload = raw.payload;
	if (!isRecord(payload)) throw malformed("envelope.payload must be a JSON object");

	const base = { transferId, senderId, nonce, signature };

	switch (type) {
		case "PREPARE": {
			const amount = payload.amount;
			if (typeof amount !== "number" || !Number.isSafeInteger(amount) || amount <= 0) {
				throw malformed("payload.amount must be a positive integer");
			}
			return {
				...base,
				type,
				payload: {
					sourceAccountId: requireString(payload, "sourceAccountId", "payload"),
					destinationInstanceId: requireString(payload, "destinationInstanceId", "payload"),
					destinationAccountId: requireString(payload, "destinationAccountId", "payload"),
					amount,
				},
			};
		}
		case "COMMIT":
		case "ABORT":
			return { ...base, type, payload: optionalReason(payload) };
		case "QUERY":
			return { ...base, type, payload: {} };
		case "ACK":
		case "NACK":
			return { ...base, type, payload: parseReplyPayload(payload) };
		default:
			throw malformed(
				`envelope.type must be one of PREPARE, COMMIT, ABORT, QUERY, ACK, NACK, got "${String(type)}"`,
			);
	}
}

export function isRequest(envelope: SignedEnvelope): envelope is RequestEnvelope {
	return REQUEST_TYPES.has(envelope.type);
}

export function isReply(envelope: SignedEnvelope): envelope is ReplyEnvelope {
	return envelope.type === "ACK" || envelope.type === "NACK";
}
