// =============================================================================
// PROTOCOL TYPES — Signed envelope exchanged between coordinator and participant
// =============================================================================

export type RequestType = "PREPARE" | "COMMIT" | "ABORT" | "QUERY";
export type ReplyType = "ACK" | "NACK";
export type MessageType = RequestType | ReplyType;

export const REQUEST_TYPES: ReadonlySet<string> = new Set(["PREPARE", "COMMIT", "ABORT", "QUERY"]);
export const REPLY_TYPES: ReadonlySet<string> = new Set(["ACK", "NACK"]);

/** Participant-side view of a transfer. `NONE` means never seen. */
export type DecisionState = "NONE" | "RESERVED" | "APPLIED" | "RELEASED";

export interface PreparePayload {
	sourceAccountId: string;
	destinationInstanceId: string;
	destinationAccountId: string;
	amount: number;
}

export interface CommitPayload {
	reason?: string;
}

export interface AbortPayload {
	reason?: string;
}

export type QueryPayload = Record<string, never>;

export interface ReplyPayload {
	/** Nonce of the request this reply answers */
	inReplyTo: string;
	decision: DecisionState;
	reason?: string;
}

export interface PayloadByType {
	PREPARE: PreparePayload;
	COMMIT: CommitPayload;
	ABORT: AbortPayload;
	QUERY: QueryPayload;
	ACK: ReplyPayload;
	NACK: ReplyPayload;
}

/** One message of a single type. */
export interface MessageOf<K extends MessageType> {
	type: K;
	transferId: string;
	senderId: string;
	/** Fresh per attempt; retries of one transfer reuse the transfer id only */
	nonce: string;
	payload: PayloadByType[K];
}

/** Signed message of a single type. */
export interface SignedMessageOf<K extends MessageType> extends MessageOf<K> {
	/** Base64 signature over the canonical message, the nonce and the transfer id */
	signature: string;
}

/** Discriminated union over `type`. */
export type ProtocolMessage<T extends MessageType = MessageType> = {
	[K in T]: MessageOf<K>;
}[T];

export type SignedEnvelope<T extends MessageType = MessageType> = {
	[K in T]: SignedMessageOf<K>;
}[T];

export type RequestEnvelope = SignedEnvelope<RequestType>;
export type ReplyEnvelope = SignedEnvelope<ReplyType>;

export interface ParticipantDecision {
	/** Same as the transfer id */
	id: string;
	originInstanceId: string;
	sourceAccountId: string;
	destinationAccountId: string;
	amount: number;
	state: Exclude<DecisionState, "NONE">;
	reason: string | null;
	createdAt: string;
	updatedAt: string;
}

/** Replay-guard record keyed by (senderId, nonce, transferId). */
export interface ProcessedMessage {
	id: string;
	senderId: string;
	nonce: string;
	transferId: string;
	digest: string;
	reply: ReplyEnvelope;
	expiresAt: string;
	createdAt: string;
}

export interface ParticipantTransport {
	/**
	 * Deliver a request to the participant at `address` and return the raw
	 * reply body. Rejects with REMOTE_UNREACHABLE on network failure or timeout.
	 */
	send(address: string, envelope: RequestEnvelope, options: { timeoutMs: number }): Promise<unknown>;
}
