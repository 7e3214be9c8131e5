/**
 * UpkeepRunner — in-process stand-in for an external automation scheduler.
 *
 * Lifecycle: construct → start() → ticks every checkIntervalMs → stop().
 * Each tick runs an accrual pass once accrualIntervalMs has elapsed since the
 * previous one, then asks checkNeeded() and performs the conversion when it
 * reports work. A tick that starts while another is in flight is skipped.
 */

import type { AccrualReport } from "../accrual/types.js";
import type { UpkeepCheck } from "../automation/types.js";
import type { ConversionReport } from "../conversion/types.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { ConfigError, type HarvestError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import type { HarvestService } from "./harvest-service.js";

export type UpkeepTarget = Pick<HarvestService, "runAccrual" | "checkNeeded" | "performAction">;

export interface UpkeepRunnerOptions {
	readonly accrualIntervalMs: number;
	readonly checkIntervalMs: number;
	readonly clock?: Clock;
	readonly logger?: Logger;
	/** Called with the outcome of every tick started by the interval timer. */
	readonly onTick?: (outcome: TickOutcome) => void;
}

export type TickOutcome =
	| { readonly skipped: true; readonly reason: "busy" }
	| {
			readonly skipped: false;
			/** null when the accrual interval had not yet elapsed */
			readonly accrual: AccrualReport | null;
			readonly check: Result<UpkeepCheck, HarvestError>;
			/** null when no conversion was needed or the check failed */
			readonly conversion: Result<ConversionReport, HarvestError> | null;
	  };

export class UpkeepRunner {
	private readonly target: UpkeepTarget;
	private readonly accrualIntervalMs: number;
	private readonly checkIntervalMs: number;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly onTick: ((outcome: TickOutcome) => void) | null;
	private lastAccrualMs: number | null = null;
	private inFlight = false;
	private timer: ReturnType<typeof setInterval> | null = null;

	constructor(target: UpkeepTarget, options: UpkeepRunnerOptions) {
		if (!Number.isInteger(options.accrualIntervalMs) || options.accrualIntervalMs <= 0) {
			throw new ConfigError("accrualIntervalMs must be a positive integer", {
				accrualIntervalMs: options.accrualIntervalMs,
			});
		}
		if (!Number.isInteger(options.checkIntervalMs) || options.checkIntervalMs <= 0) {
			throw new ConfigError("checkIntervalMs must be a positive integer", {
				checkIntervalMs: options.checkIntervalMs,
			});
		}
		this.target = target;
		this.accrualIntervalMs = options.accrualIntervalMs;
		this.checkIntervalMs = options.checkIntervalMs;
		this.clock = options.clock ?? SystemClock;
		this.logger = (options.logger ?? silentLogger()).child({ component: "upkeep" });
		this.onTick = options.onTick ?? null;
	}

	get running(): boolean {
		return this.timer !== null;
	}

	/** Whether an accrual pass is due; always true before the first one. */
	accrualDue(): boolean {
		return (
			this.lastAccrualMs === null ||
			this.clock.now() - this.lastAccrualMs >= this.accrualIntervalMs
		);
	}

	async tick(): Promise<TickOutcome> {
		if (this.inFlight) {
			this.logger.debug("tick skipped, previous tick still running");
			return { skipped: true, reason: "busy" };
		}
		this.inFlight = true;
		try {
			let accrual: AccrualReport | null = null;
			if (this.accrualDue()) {
				this.lastAccrualMs = this.clock.now();
				accrual = await this.target.runAccrual();
			}

			const check = await this.target.checkNeeded();
			if (!check.ok) {
				this.logger.warn({ error: check.error.toJSON() }, "upkeep check failed");
				return { skipped: false, accrual, check, conversion: null };
			}
			if (!check.value.needed) {
				return { skipped: false, accrual, check, conversion: null };
			}

			const conversion = await this.target.performAction(check.value.context);
			return { skipped: false, accrual, check, conversion };
		} finally {
			this.inFlight = false;
		}
	}

	start(): void {
		if (this.timer !== null) return;
		this.logger.info(
			{ accrualIntervalMs: this.accrualIntervalMs, checkIntervalMs: this.checkIntervalMs },
			"upkeep runner started",
		);
		this.timer = setInterval(() => {
			this.tick().then(
				(outcome) => this.notify(outcome),
				(e: unknown) => this.logger.error({ err: e }, "upkeep tick threw"),
			);
		}, this.checkIntervalMs);
	}

	/** Observer errors are logged; they never stop the timer. */
	private notify(outcome: TickOutcome): void {
		try {
			this.onTick?.(outcome);
		} catch (e: unknown) {
			this.logger.error({ err: e }, "onTick handler threw");
		}
	}

	stop(): void {
		if (this.timer === null) return;
		clearInterval(this.timer);
		this.timer = null;
		this.logger.info("upkeep runner stopped");
	}
}
