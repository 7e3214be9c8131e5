/**
 * Simulated conversion at a fixed rate.
 *
 * No network calls. Output is `amountIn * numerator / denominator`
 * (truncating); an optional liquidity cap bounds cumulative output.
 */

import {
	ConfigError,
	type HarvestError,
	InsufficientLiquidityError,
	InvalidParameterError,
} from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import type { ExchangeRouter } from "./types.js";

export interface PaperRouterConfig {
	readonly rateNumerator: bigint;
	readonly rateDenominator: bigint;
	/** Total stable output available; unset means unlimited. */
	readonly liquidity?: bigint;
	readonly clock?: Clock;
	readonly maxFillHistory?: number;
}

export interface PaperFill {
	readonly amountIn: bigint;
	readonly amountOut: bigint;
	readonly timestampMs: number;
}

export class PaperRouter implements ExchangeRouter {
	private numerator: bigint;
	private denominator: bigint;
	private remaining: bigint | undefined;
	private failure: HarvestError | null = null;
	private readonly clock: Clock;
	private readonly maxFillHistory: number;
	private readonly history: PaperFill[] = [];

	constructor(config: PaperRouterConfig) {
		PaperRouter.checkRate(config.rateNumerator, config.rateDenominator);
		this.numerator = config.rateNumerator;
		this.denominator = config.rateDenominator;
		this.remaining = config.liquidity;
		this.clock = config.clock ?? SystemClock;
		this.maxFillHistory = config.maxFillHistory ?? 10_000;
	}

	private static checkRate(numerator: bigint, denominator: bigint): void {
		if (numerator < 0n || denominator <= 0n) {
			throw new ConfigError("Paper rate must be non-negative with a positive denominator", {
				numerator,
				denominator,
			});
		}
	}

	async convert(amountIn: bigint): Promise<Result<bigint, HarvestError>> {
		if (this.failure) return err(this.failure);
		if (amountIn <= 0n) {
			return err(new InvalidParameterError("Swap amount must be positive", { amountIn }));
		}
		const amountOut = (amountIn * this.numerator) / this.denominator;
		if (this.remaining !== undefined) {
			if (amountOut > this.remaining) {
				return err(
					new InsufficientLiquidityError("Paper pool cannot fill the swap", {
						amountOut,
						available: this.remaining,
					}),
				);
			}
			this.remaining -= amountOut;
		}

		this.history.push({ amountIn, amountOut, timestampMs: this.clock.now() });
		if (this.history.length > this.maxFillHistory) {
			this.history.splice(0, this.history.length - this.maxFillHistory);
		}
		return ok(amountOut);
	}

	setRate(numerator: bigint, denominator: bigint): void {
		PaperRouter.checkRate(numerator, denominator);
		this.numerator = numerator;
		this.denominator = denominator;
	}

	get fills(): readonly PaperFill[] {
		return [...this.history];
	}

	get remainingLiquidity(): bigint | undefined {
		return this.remaining;
	}

	/** Fail every conversion with `error` until {@link recover}. */
	fail(error: HarvestError): void {
		this.failure = error;
	}

	recover(): void {
		this.failure = null;
	}
}
