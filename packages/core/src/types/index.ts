export type { Account, AccountBalance, AccountEntry, AccountStatus } from "./account.js";
export type {
	BankIdentityOptions,
	BankOptions,
	ClearlineLogger,
	CoreWorkerOptions,
	LogLevel,
	ProtocolOptions,
	ResolvedBankOptions,
	ResolvedProtocolOptions,
} from "./config.js";
export type { PaginatedResult, PaginationParams } from "./pagination.js";
export { DEFAULT_PER_PAGE, MAX_PER_PAGE, resolvePagination } from "./pagination.js";
export type {
	AbortPayload,
	CommitPayload,
	DecisionState,
	MessageOf,
	MessageType,
	ParticipantDecision,
	ParticipantTransport,
	PayloadByType,
	PreparePayload,
	ProcessedMessage,
	ProtocolMessage,
	QueryPayload,
	ReplyEnvelope,
	ReplyPayload,
	ReplyType,
	RequestEnvelope,
	RequestType,
	SignedEnvelope,
	SignedMessageOf,
} from "./protocol.js";
export { REPLY_TYPES, REQUEST_TYPES } from "./protocol.js";
export type {
	DiscoveryClient,
	RegistrationInput,
	RegistryRecord,
	ResolvedInstance,
} from "./registry.js";
export type { Reservation, ReservationDirection, ReservationStatus } from "./reservation.js";
export type { AccountRef, Transfer, TransferFailureReason, TransferStatus } from "./transfer.js";
export { TERMINAL_TRANSFER_STATUSES, TRANSFER_TRANSITIONS } from "./transfer.js";
