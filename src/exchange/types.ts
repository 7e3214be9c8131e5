/**
 * The conversion capability and its retry settings.
 *
 * ExchangeRouter abstracts the base → stable swap so live (Uniswap V2) and
 * paper implementations sit behind one interface.
 */

import type { HarvestError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";

/** Swap `amountIn` base units for the stable asset; resolves to the output amount. */
export interface ExchangeRouter {
	convert(amountIn: bigint): Promise<Result<bigint, HarvestError>>;
}

/** Exponential backoff settings for {@link ExchangeRouter} retries. */
export interface RetryConfig {
	readonly maxAttempts: number;
	readonly baseDelayMs: number;
	readonly maxDelayMs: number;
	readonly jitterFactor: number;
}

/** 3 attempts, 100ms base delay, 5s max, 10% jitter. */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
	maxAttempts: 3,
	baseDelayMs: 100,
	maxDelayMs: 5000,
	jitterFactor: 0.1,
};
