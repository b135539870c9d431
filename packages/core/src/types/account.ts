export type AccountStatus = "active" | "canceled";

export interface Account {
	id: string;
	ownerId: string;
	ownerName: string;
	/** 16-digit account number, unique within the instance */
	accountNumber: string;
	status: AccountStatus;
	/** Settled balance in minor currency units. Never negative. */
	balance: number;
	/** Sum of outgoing holds (debit reservations) not yet applied or released */
	reserved: number;
	/** Sum of incoming holds (credit reservations) not yet applied or released */
	pendingCredit: number;
	/** Incremented on every successful mutation */
	version: number;
	createdAt: string;
	updatedAt: string;
}

export interface AccountBalance {
	accountId: string;
	balance: number;
	reserved: number;
	pendingCredit: number;
	/** `balance - reserved` */
	available: number;
	version: number;
}

/** One row of the per-account transaction log. */
export interface AccountEntry {
	id: string;
	accountId: string;
	transferId: string | null;
	/** Signed amount: negative for debits */
	amount: number;
	description: string;
	balanceAfter: number;
	createdAt: string;
}
