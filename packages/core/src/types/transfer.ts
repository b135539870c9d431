export type TransferStatus = "INITIATED" | "PREPARED" | "COMMITTED" | "ABORTED";

export const TERMINAL_TRANSFER_STATUSES: ReadonlySet<TransferStatus> = new Set([
	"COMMITTED",
	"ABORTED",
]);

/** Allowed transitions of the coordinator-side state machine. */
export const TRANSFER_TRANSITIONS: Readonly<Record<TransferStatus, readonly TransferStatus[]>> = {
	INITIATED: ["PREPARED", "ABORTED"],
	PREPARED: ["COMMITTED", "ABORTED"],
	COMMITTED: [],
	ABORTED: [],
};

export type TransferFailureReason =
	| "INSUFFICIENT_FUNDS"
	| "REMOTE_UNREACHABLE"
	| "PREPARE_REJECTED"
	| "COMMIT_REJECTED"
	| "CANCELLED"
	| "RESOLVED_NOT_APPLIED";

/** Address of an account anywhere in the network. */
export interface AccountRef {
	instanceId: string;
	accountId: string;
}

export interface Transfer {
	/** Global transaction id (UUID), unique across the network */
	id: string;
	originInstanceId: string;
	destinationInstanceId: string;
	sourceAccountId: string;
	destinationAccountId: string;
	amount: number;
	status: TransferStatus;
	failureReason: TransferFailureReason | null;
	/** Participant's reason when it refused, if any */
	remoteReason: string | null;
	cancelRequested: boolean;
	version: number;
	createdAt: string;
	updatedAt: string;
}
