/**
 * Retry decorator for ExchangeRouter with exponential backoff and jitter.
 *
 * Only errors with `isRetryable` are retried. Liquidity and slippage
 * failures are non-retryable and return on the first attempt.
 * Wrapped routers must report failures after a possible broadcast as
 * non-retryable, as UniswapV2Router does with SWAP_OUTCOME_UNKNOWN.
 */

import { type HarvestError, RateLimitError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import { DEFAULT_RETRY_CONFIG, type ExchangeRouter, type RetryConfig } from "./types.js";

function resolveConfig(overrides?: Partial<RetryConfig>): RetryConfig {
	return { ...DEFAULT_RETRY_CONFIG, ...overrides };
}

/** @internal Exported for testing only. */
export function computeDelay(attempt: number, config: RetryConfig, error: HarvestError): number {
	let delay = Math.min(config.baseDelayMs * 2 ** attempt, config.maxDelayMs);
	if (error instanceof RateLimitError) {
		delay = Math.max(delay, error.retryAfterMs);
	}
	const jitter = 1 + (Math.random() - 0.5) * 2 * config.jitterFactor;
	return delay * jitter;
}

function sleep(ms: number): Promise<void> {
	if (ms <= 0) return Promise.resolve();
	return new Promise((resolve) => {
		setTimeout(resolve, ms);
	});
}

/**
 * @example
 * ```ts
 * const router = withRetry(uniswap, { maxAttempts: 4 });
 * ```
 */
export function withRetry(router: ExchangeRouter, config?: Partial<RetryConfig>): ExchangeRouter {
	const resolved = resolveConfig(config);

	return {
		async convert(amountIn: bigint): Promise<Result<bigint, HarvestError>> {
			let last = await router.convert(amountIn);
			for (let attempt = 1; attempt < resolved.maxAttempts; attempt++) {
				if (last.ok || !last.error.isRetryable) return last;
				await sleep(computeDelay(attempt - 1, resolved, last.error));
				last = await router.convert(amountIn);
			}
			return last;
		},
	};
}
