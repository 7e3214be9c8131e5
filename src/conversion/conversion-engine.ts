/**
 * ConversionEngine — swaps pending amounts for users whose target is exceeded.
 *
 * The oracle is read once per pass and every eligibility decision uses that
 * price. Each user settles independently: a router failure leaves that
 * account as it was and later users are still processed.
 */

import type { ExchangeRouter } from "../exchange/types.js";
import { isConvertible, priceExceedsTarget } from "../ledger/order-state.js";
import type { UserAccount } from "../ledger/types.js";
import type { UserLedger } from "../ledger/user-ledger.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import type { PriceOracle } from "../oracle/types.js";
import {
	ExternalFailureError,
	type HarvestError,
	captureAsync,
	isExternalFailure,
} from "../shared/errors.js";
import type { UserId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type {
	ConversionFailure,
	ConversionFill,
	ConversionReport,
	ConversionStatus,
} from "./types.js";

export class ConversionEngine {
	private readonly ledger: UserLedger;
	private readonly oracle: PriceOracle;
	private readonly router: ExchangeRouter;
	private readonly logger: Logger;

	constructor(
		ledger: UserLedger,
		oracle: PriceOracle,
		router: ExchangeRouter,
		logger: Logger = silentLogger(),
	) {
		this.ledger = ledger;
		this.oracle = oracle;
		this.router = router;
		this.logger = logger.child({ component: "conversion" });
	}

	/** Strict threshold: `price > targetPrice`, never on equality. */
	isEligible(account: UserAccount, price: bigint): boolean {
		return priceExceedsTarget(account, price);
	}

	/** Current oracle price; non-external oracle errors are reported as external failures. */
	async readPrice(): Promise<Result<bigint, HarvestError>> {
		const price = await captureAsync(() => this.oracle.getPrice());
		if (price.ok || isExternalFailure(price.error)) return price;
		return err(
			new ExternalFailureError(
				`Price oracle failed: ${price.error.message}`,
				{ cause: price.error },
				"ORACLE_FAILURE",
			),
		);
	}

	/** Users whose order is triggered at `price`, in watchlist order. */
	triggered(price: bigint): readonly UserId[] {
		return this.ledger.list().filter((a) => this.isEligible(a, price)).map((a) => a.user);
	}

	/** @returns err only when the oracle cannot be read, in which case nothing was mutated */
	async run(): Promise<Result<ConversionReport, HarvestError>> {
		const price = await this.readPrice();
		if (!price.ok) {
			this.logger.warn({ error: price.error.toJSON() }, "conversion pass skipped, no price");
			return price;
		}
		return ok(await this.runAt(price.value));
	}

	private async runAt(price: bigint): Promise<ConversionReport> {
		const conversions: ConversionFill[] = [];
		const failures: ConversionFailure[] = [];

		for (const user of this.ledger.watchlist) {
			const account = this.ledger.account(user);
			if (!account || !isConvertible(account, price)) continue;

			const amountIn = account.pendingToConvert;
			const out = await captureAsync(() => this.router.convert(amountIn));
			if (!out.ok) {
				this.logger.warn({ user, amountIn, error: out.error.toJSON() }, "conversion failed");
				failures.push({ user, amountIn, error: out.error });
				continue;
			}

			const settled = this.ledger.settleConversion(user, out.value);
			if (!settled.ok) {
				failures.push({ user, amountIn, error: settled.error });
				continue;
			}
			this.logger.info({ user, amountIn, amountOut: out.value, price }, "converted");
			conversions.push({ user, amountIn, amountOut: out.value });
		}

		return { status: conversionStatus(conversions, failures), price, conversions, failures };
	}
}

function conversionStatus(
	conversions: readonly ConversionFill[],
	failures: readonly ConversionFailure[],
): ConversionStatus {
	if (failures.length === 0) return conversions.length === 0 ? "noop" : "applied";
	return conversions.length === 0 ? "failed" : "partial";
}
