/**
 * UniswapV2Router — native → stable swaps through IUniswapV2Router02.
 *
 * Each conversion quotes with `getAmountsOut`, derives `amountOutMin` from
 * the slippage budget, then submits `swapExactETHForTokens` along
 * `[weth, stable]`. The reported output is the simulated swap result.
 *
 * Quote failures keep their retry category. A transient failure on the swap
 * itself may have come after broadcast, so it is reported as
 * SWAP_OUTCOME_UNKNOWN and never retried.
 */

import type { ContractReader, ContractWriter } from "../lib/ethereum/index.js";
import { z } from "../lib/validation/index.js";
import {
	ErrorCategory,
	ExternalFailureError,
	type HarvestError,
	InvalidParameterError,
	SlippageExceededError,
} from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import type { ExchangeRouter } from "./types.js";

const BPS = 10_000n;
const AmountsSchema = z.array(z.bigint()).min(2);

export interface UniswapV2RouterConfig {
	/** Wrapped native token, first hop of the path. */
	readonly weth: string;
	/** Stable asset received. */
	readonly stable: string;
	/** Receiver of swap output; defaults to the writer's account. */
	readonly recipient?: string;
	readonly maxSlippageBps: number;
	readonly deadlineSeconds: number;
	readonly clock?: Clock;
}

/** Receipt of the most recent successful swap. */
export interface SwapReceipt {
	readonly hash: string;
	readonly amountIn: bigint;
	readonly amountOutMin: bigint;
	readonly amountOut: bigint;
}

/** `quoted * (10000 - bps) / 10000`, truncating. */
export function minimumOutput(quoted: bigint, maxSlippageBps: number): bigint {
	return (quoted * (BPS - BigInt(maxSlippageBps))) / BPS;
}

export class UniswapV2Router implements ExchangeRouter {
	private readonly reader: ContractReader;
	private readonly writer: ContractWriter;
	private readonly config: UniswapV2RouterConfig;
	private readonly clock: Clock;
	private last: SwapReceipt | null = null;

	constructor(reader: ContractReader, writer: ContractWriter, config: UniswapV2RouterConfig) {
		if (
			!Number.isInteger(config.maxSlippageBps) ||
			config.maxSlippageBps < 0 ||
			config.maxSlippageBps > 10_000
		) {
			throw new InvalidParameterError("maxSlippageBps must be an integer in [0, 10000]", {
				maxSlippageBps: config.maxSlippageBps,
			});
		}
		this.reader = reader;
		this.writer = writer;
		this.config = config;
		this.clock = config.clock ?? SystemClock;
	}

	get lastSwap(): SwapReceipt | null {
		return this.last;
	}

	get path(): readonly [string, string] {
		return [this.config.weth, this.config.stable];
	}

	/** Expected output for `amountIn` at the pool's current reserves. */
	async quote(amountIn: bigint): Promise<Result<bigint, HarvestError>> {
		const amounts = await this.reader.read({
			functionName: "getAmountsOut",
			args: [amountIn, this.path],
			schema: AmountsSchema,
		});
		if (!amounts.ok) return amounts;
		return lastAmount(amounts.value);
	}

	async convert(amountIn: bigint): Promise<Result<bigint, HarvestError>> {
		if (amountIn <= 0n) {
			return err(new InvalidParameterError("Swap amount must be positive", { amountIn }));
		}
		const quoted = await this.quote(amountIn);
		if (!quoted.ok) return quoted;

		const amountOutMin = minimumOutput(quoted.value, this.config.maxSlippageBps);
		const deadline = BigInt(Math.floor(this.clock.now() / 1_000) + this.config.deadlineSeconds);
		const receipt = await this.writer.write({
			functionName: "swapExactETHForTokens",
			args: [amountOutMin, this.path, this.config.recipient ?? this.writer.account, deadline],
			value: amountIn,
			schema: AmountsSchema,
		});
		if (!receipt.ok) return err(unknownOutcome(receipt.error, amountIn));

		const out = lastAmount(receipt.value.result);
		if (!out.ok) return out;
		if (out.value < amountOutMin) {
			return err(
				new SlippageExceededError("Swap output below minimum", {
					amountOut: out.value,
					amountOutMin,
				}),
			);
		}
		this.last = { hash: receipt.value.hash, amountIn, amountOutMin, amountOut: out.value };
		return ok(out.value);
	}
}

function unknownOutcome(error: HarvestError, amountIn: bigint): HarvestError {
	if (!error.isRetryable) return error;
	return new ExternalFailureError(
		`Swap outcome unknown: ${error.message}`,
		{ amountIn, cause: error },
		"SWAP_OUTCOME_UNKNOWN",
		ErrorCategory.NonRetryable,
	);
}

function lastAmount(amounts: readonly bigint[]): Result<bigint, ExternalFailureError> {
	const out = amounts.at(-1);
	return out === undefined
		? err(new ExternalFailureError("Router returned no amounts", {}, "MALFORMED_ROUTER_RESPONSE"))
		: ok(out);
}
