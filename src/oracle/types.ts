/**
 * Price source consulted by conversion passes and upkeep checks.
 */

import type { HarvestError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";

export interface PriceOracle {
	/** Fixed-point decimals of every price this oracle returns. */
	readonly decimals: number;
	/** Latest base/stable price, scaled by 10^decimals. Always positive on success. */
	getPrice(): Promise<Result<bigint, HarvestError>>;
}

/** One AggregatorV3 round as returned by `latestRoundData`. */
export interface RoundData {
	readonly roundId: bigint;
	readonly answer: bigint;
	readonly startedAt: bigint;
	/** Seconds since epoch. */
	readonly updatedAt: bigint;
	readonly answeredInRound: bigint;
}
