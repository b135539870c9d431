import type { Bank } from "@clearline/bank";

/**
 * Assert that a specific account has the expected settled balance.
 */
export async function assertAccountBalance(bank: Bank, accountId: string, expectedBalance: number): Promise<void> {
	const balance = await bank.accounts.getBalance(accountId);
	if (balance.balance !== expectedBalance) {
		throw new Error(`Account ${accountId}: expected balance ${expectedBalance}, got ${balance.balance}`);
	}
}

/** Sum of settled balances over every account of every bank. */
export async function totalBalance(banks: Bank[]): Promise<number> {
	let total = 0;
	for (const bank of banks) {
		let page = 1;
		for (;;) {
			const result = await bank.accounts.list({ page, perPage: 100 });
			for (const account of result.accounts) total += account.balance;
			if (!result.hasMore) break;
			page++;
		}
	}
	return total;
}

/**
 * Assert that money was neither created nor destroyed: the settled balances
 * of all banks add up to `expectedTotal`.
 */
export async function assertConservation(banks: Bank[], expectedTotal: number): Promise<void> {
	const total = await totalBalance(banks);
	if (total !== expectedTotal) {
		throw new Error(`Conservation violated: balances add up to ${total}, expected ${expectedTotal}`);
	}
}

/** Assert that no account of `bank` still holds reserved or pending amounts. */
export async function assertNoOpenHolds(bank: Bank): Promise<void> {
	const { accounts } = await bank.accounts.list({ perPage: 100 });
	for (const account of accounts) {
		if (account.reserved !== 0 || account.pendingCredit !== 0) {
			throw new Error(
				`Account ${account.id} still holds reserved=${account.reserved} pendingCredit=${account.pendingCredit}`,
			);
		}
	}
}
