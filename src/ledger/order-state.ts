import { OrderState, type UserAccount } from "./types.js";

/**
 * Classify an account in the order lifecycle:
 * no_order → idle (order set, nothing pending) ⇄ pending (order set, pending > 0).
 * Converting a pending balance returns the account to idle.
 */
export function orderState(account: UserAccount): OrderState {
	if (account.targetPrice === null) return OrderState.NoOrder;
	return account.pendingToConvert > 0n ? OrderState.Pending : OrderState.Idle;
}

/** Strict threshold: the price must exceed the target, equality does not trigger. */
export function priceExceedsTarget(account: UserAccount, price: bigint): boolean {
	return account.targetPrice !== null && price > account.targetPrice;
}

/** Eligible for conversion right now: threshold exceeded and something to convert. */
export function isConvertible(account: UserAccount, price: bigint): boolean {
	return priceExceedsTarget(account, price) && account.pendingToConvert > 0n;
}
