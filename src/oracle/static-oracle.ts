import type { HarvestError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import type { PriceOracle } from "./types.js";

/** Settable price for paper runs and tests. */
export class StaticPriceOracle implements PriceOracle {
	readonly decimals: number;
	private price: bigint;
	private failure: HarvestError | null = null;

	constructor(price: bigint, decimals = 8) {
		this.price = price;
		this.decimals = decimals;
	}

	async getPrice(): Promise<Result<bigint, HarvestError>> {
		return this.failure ? err(this.failure) : ok(this.price);
	}

	set(price: bigint): void {
		this.price = price;
	}

	/** Fail every read with `error` until {@link recover}. */
	fail(error: HarvestError): void {
		this.failure = error;
	}

	recover(): void {
		this.failure = null;
	}
}
