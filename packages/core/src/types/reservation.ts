export type ReservationDirection = "debit" | "credit";

/** Only `held` reservations exist from the protocol's point of view. */
export type ReservationStatus = "held" | "applied" | "released" | "expired";

export interface Reservation {
	id: string;
	transferId: string;
	accountId: string;
	direction: ReservationDirection;
	amount: number;
	status: ReservationStatus;
	/** Null for coordinator-side holds, which the coordinator resolves itself */
	expiresAt: string | null;
	createdAt: string;
	updatedAt: string;
}
