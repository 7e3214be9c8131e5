import type { AccrualReport } from "../accrual/types.js";
import type { ConversionFailure, ConversionFill } from "../conversion/types.js";
import type { UserId } from "../shared/identifiers.js";

/** Events emitted by HarvestService after each committed step. */
export interface HarvestEvents {
	deposited: {
		readonly user: UserId;
		readonly amount: bigint;
		readonly depositTotal: bigint;
		/** True when this deposit put the user on the watchlist. */
		readonly registered: boolean;
	};
	orderConfigured: {
		readonly user: UserId;
		readonly targetPrice: bigint;
		readonly conversionPercentage: number;
	};
	accrued: AccrualReport;
	converted: ConversionFill & { readonly price: bigint };
	conversionFailed: ConversionFailure & { readonly price: bigint };
}

export type HarvestEventName = keyof HarvestEvents;
