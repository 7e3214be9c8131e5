/**
 * AccrualEngine — turns monitored-balance growth into pending conversions.
 *
 * For each watched user, in watchlist order:
 *   delta        = observed - lastObserved
 *   contribution = max(delta, 0) * pct / 100   (truncating)
 * pending grows by the contribution and the baseline always advances, so a
 * drop in balance is never recovered as reward later. A failed balance read
 * leaves that user untouched and the pass moves on.
 */

import type { UserLedger } from "../ledger/user-ledger.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import type { BalanceReader } from "../monitor/types.js";
import { captureAsync } from "../shared/errors.js";
import type { AccrualEntry, AccrualFailure, AccrualReport, AccrualStatus } from "./types.js";

/** Share of a balance delta owed to conversion. Non-positive deltas owe nothing. */
export function accrualContribution(delta: bigint, conversionPercentage: number): bigint {
	if (delta <= 0n) return 0n;
	return (delta * BigInt(conversionPercentage)) / 100n;
}

export class AccrualEngine {
	private readonly ledger: UserLedger;
	private readonly balances: BalanceReader;
	private readonly logger: Logger;

	constructor(ledger: UserLedger, balances: BalanceReader, logger: Logger = silentLogger()) {
		this.ledger = ledger;
		this.balances = balances;
		this.logger = logger.child({ component: "accrual" });
	}

	async run(): Promise<AccrualReport> {
		const entries: AccrualEntry[] = [];
		const failures: AccrualFailure[] = [];

		for (const user of this.ledger.watchlist) {
			const account = this.ledger.account(user);
			if (!account) continue;

			const observed = await captureAsync(() => this.balances.balanceOf(user));
			if (!observed.ok) {
				this.logger.warn({ user, error: observed.error.toJSON() }, "balance read failed");
				failures.push({ user, error: observed.error });
				continue;
			}

			const delta = observed.value - account.lastObservedBalance;
			const contribution = accrualContribution(delta, account.conversionPercentage);
			const updated = this.ledger.recordAccrual(user, observed.value, contribution);
			if (!updated.ok) {
				failures.push({ user, error: updated.error });
				continue;
			}

			entries.push({
				user,
				previousBalance: account.lastObservedBalance,
				observedBalance: observed.value,
				delta,
				contribution,
				pendingToConvert: updated.value.pendingToConvert,
			});
		}

		const status = accrualStatus(entries, failures);
		this.logger.debug(
			{ status, users: entries.length, failures: failures.length },
			"accrual pass complete",
		);
		return { status, entries, failures };
	}
}

function accrualStatus(
	entries: readonly AccrualEntry[],
	failures: readonly AccrualFailure[],
): AccrualStatus {
	if (failures.length > 0) return "partial";
	return entries.some((e) => e.delta !== 0n) ? "applied" : "noop";
}
