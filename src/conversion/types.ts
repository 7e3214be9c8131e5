import type { HarvestError } from "../shared/errors.js";
import type { UserId } from "../shared/identifiers.js";

/**
 * `noop`: no user was eligible. `failed`: every attempted conversion failed.
 * `partial`: some succeeded and some failed.
 */
export type ConversionStatus = "noop" | "applied" | "partial" | "failed";

export interface ConversionFill {
	readonly user: UserId;
	readonly amountIn: bigint;
	readonly amountOut: bigint;
}

export interface ConversionFailure {
	readonly user: UserId;
	readonly amountIn: bigint;
	readonly error: HarvestError;
}

export interface ConversionReport {
	readonly status: ConversionStatus;
	/** Oracle price the whole pass was evaluated against. */
	readonly price: bigint;
	readonly conversions: readonly ConversionFill[];
	readonly failures: readonly ConversionFailure[];
}
