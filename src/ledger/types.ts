/**
 * Account records and order parameters.
 */

import type { UserId } from "../shared/identifiers.js";

/** One depositor's bookkeeping. Records are frozen; every update replaces the record. */
export interface UserAccount {
	readonly user: UserId;
	/** Cumulative deposits, base units. Only grows. */
	readonly depositTotal: bigint;
	/** Monitored balance as of the last accrual pass (or registration). */
	readonly lastObservedBalance: bigint;
	/** Base units accrued and awaiting conversion. */
	readonly pendingToConvert: bigint;
	/** Threshold in the oracle's fixed-point scale; null until an order is configured. */
	readonly targetPrice: bigint | null;
	/** Share of each accrual delta routed to pendingToConvert, 0–100. */
	readonly conversionPercentage: number;
	/** Cumulative stable-asset output credited by conversions. */
	readonly convertedBalance: bigint;
}

/**
 * Order parameters as accepted from callers.
 *
 * `targetPrice` is either a bigint already in the oracle's scale or a decimal
 * string in quote units ("3000.25") that the ledger normalises.
 */
export interface OrderRequest {
	readonly targetPrice: bigint | string;
	readonly conversionPercentage: number;
}

/** Per-user position in the order lifecycle. */
export const OrderState = {
	NoOrder: "no_order",
	Idle: "idle",
	Pending: "pending",
} as const;

export type OrderState = (typeof OrderState)[keyof typeof OrderState];

export interface LedgerTotals {
	readonly depositTotal: bigint;
	readonly pendingToConvert: bigint;
	readonly convertedBalance: bigint;
}

/** JSON-safe account record; amounts are decimal strings. */
export interface AccountRecord {
	readonly user: string;
	readonly depositTotal: string;
	readonly lastObservedBalance: string;
	readonly pendingToConvert: string;
	readonly targetPrice: string | null;
	readonly conversionPercentage: number;
	readonly convertedBalance: string;
}

/** Serialised ledger. `accounts` is in watchlist order. */
export interface LedgerSnapshot {
	readonly version: 1;
	readonly oracleDecimals: number;
	readonly accounts: readonly AccountRecord[];
}
