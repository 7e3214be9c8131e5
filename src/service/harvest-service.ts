/**
 * HarvestService — the engine's public surface.
 *
 * Composes the ledger, both engines and the automation interface with the
 * injected collaborators. deposit, configureOrder, runAccrual, checkNeeded
 * and performAction each run as one step on a FIFO queue. Every committed
 * change is logged, journaled and emitted.
 */

import { AccrualEngine } from "../accrual/accrual-engine.js";
import type { AccrualReport } from "../accrual/types.js";
import { ConversionAutomation } from "../automation/conversion-automation.js";
import type { AutomationInterface, UpkeepCheck } from "../automation/types.js";
import { ConversionEngine } from "../conversion/conversion-engine.js";
import type { ConversionReport } from "../conversion/types.js";
import type { ExchangeRouter } from "../exchange/types.js";
import { orderState } from "../ledger/order-state.js";
import type { LedgerSnapshot, LedgerTotals, OrderState, UserAccount } from "../ledger/types.js";
import { UserLedger } from "../ledger/user-ledger.js";
import { TypedEmitter } from "../lib/events/index.js";
import { type Logger, createLogger } from "../lib/logger/index.js";
import type { BalanceReader } from "../monitor/types.js";
import type { PriceOracle } from "../oracle/types.js";
import type { Journal, JournalEntry } from "../persistence/journal.js";
import { MemoryJournal } from "../persistence/memory-journal.js";
import { type EngineConfig, resolveConfig } from "../shared/config.js";
import {
	ConfigError,
	type HarvestError,
	InvalidParameterError,
	captureAsync,
} from "../shared/errors.js";
import { type UserId, parseUserId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { parseAmount } from "../shared/units.js";
import type { HarvestEvents } from "./events.js";
import { StepQueue } from "./step-queue.js";

export interface HarvestServiceDeps {
	readonly oracle: PriceOracle;
	readonly router: ExchangeRouter;
	readonly balances: BalanceReader;
	/** Existing ledger, e.g. from UserLedger.restore(); a fresh one otherwise. */
	readonly ledger?: UserLedger;
	readonly config?: Partial<EngineConfig>;
	readonly logger?: Logger;
	readonly journal?: Journal;
	readonly clock?: Clock;
}

export class HarvestService implements AutomationInterface {
	readonly config: EngineConfig;
	readonly events: TypedEmitter<HarvestEvents>;
	private readonly ledger: UserLedger;
	private readonly balances: BalanceReader;
	private readonly accrual: AccrualEngine;
	private readonly conversion: ConversionEngine;
	private readonly automation: ConversionAutomation;
	private readonly journal: Journal;
	private readonly logger: Logger;
	private readonly clock: Clock;
	private readonly queue = new StepQueue();

	private constructor(deps: HarvestServiceDeps, config: EngineConfig, ledger: UserLedger) {
		this.config = config;
		this.ledger = ledger;
		this.balances = deps.balances;
		this.clock = deps.clock ?? SystemClock;
		this.logger = (deps.logger ?? createLogger({ level: config.logLevel })).child({
			service: "harvest",
		});
		this.journal = deps.journal ?? new MemoryJournal({ maxEntries: config.maxJournalEntries });
		this.events = new TypedEmitter<HarvestEvents>((error, event) => {
			this.logger.error({ err: error, event }, "event handler threw");
		});
		this.accrual = new AccrualEngine(ledger, deps.balances, this.logger);
		this.conversion = new ConversionEngine(ledger, deps.oracle, deps.router, this.logger);
		this.automation = new ConversionAutomation(this.conversion, this.logger);
	}

	/**
	 * Oracle decimals default to the oracle's own; a ledger, config or oracle
	 * that disagree on the price scale is a ConfigError.
	 */
	static create(deps: HarvestServiceDeps): Result<HarvestService, ConfigError> {
		const config = resolveConfig({
			oracleDecimals: deps.ledger?.oracleDecimals ?? deps.oracle.decimals,
			...deps.config,
		});
		if (!config.ok) return config;

		const decimals = config.value.oracleDecimals;
		if (deps.oracle.decimals !== decimals) {
			return err(
				new ConfigError("Oracle decimals do not match the configured price scale", {
					oracleDecimals: deps.oracle.decimals,
					configured: decimals,
				}),
			);
		}
		if (deps.ledger && deps.ledger.oracleDecimals !== decimals) {
			return err(
				new ConfigError("Ledger price scale does not match the oracle", {
					ledgerDecimals: deps.ledger.oracleDecimals,
					configured: decimals,
				}),
			);
		}
		const ledger = deps.ledger ?? UserLedger.create({ oracleDecimals: decimals });
		return ok(new HarvestService(deps, config.value, ledger));
	}

	// ── Steps ──────────────────────────────────────────────────

	/**
	 * Credit a deposit. A first deposit reads the monitored balance to set the
	 * accrual baseline; if that read fails nothing is recorded.
	 * @param amount - base units, or a decimal string in whole base-asset units
	 */
	deposit(user: string, amount: bigint | string): Promise<Result<UserAccount, HarvestError>> {
		return this.queue.run(async (): Promise<Result<UserAccount, HarvestError>> => {
			const id = parseUserId(user);
			if (!id.ok) return this.reject("deposit", id.error);
			const value = typeof amount === "bigint" ? ok(amount) : parseAmount(amount);
			if (!value.ok) return this.reject("deposit", value.error);
			if (value.value <= 0n) {
				return this.reject(
					"deposit",
					new InvalidParameterError("Deposit amount must be positive", { amount: value.value }),
				);
			}

			const existing = this.ledger.account(id.value);
			let observed = existing?.lastObservedBalance ?? 0n;
			if (!existing) {
				const balance = await captureAsync(() => this.balances.balanceOf(id.value));
				if (!balance.ok) return this.fail("deposit", balance.error);
				observed = balance.value;
			}

			const account = this.ledger.deposit(id.value, value.value, observed);
			if (!account.ok) return this.reject("deposit", account.error);

			const registered = existing === undefined;
			this.logger.info(
				{
					user: id.value,
					amount: value.value,
					depositTotal: account.value.depositTotal,
					registered,
				},
				"deposit recorded",
			);
			await this.record({
				type: "deposit",
				user: id.value,
				amount: value.value.toString(),
				depositTotal: account.value.depositTotal.toString(),
				timestamp: this.clock.now(),
			});
			this.events.emit("deposited", {
				user: id.value,
				amount: value.value,
				depositTotal: account.value.depositTotal,
				registered,
			});
			return account;
		});
	}

	/**
	 * Set or replace the user's order.
	 * @param targetPrice - oracle-scale integer, or a decimal price string such as "3000.5"
	 */
	configureOrder(
		user: string,
		targetPrice: bigint | string,
		conversionPercentage: number,
	): Promise<Result<UserAccount, HarvestError>> {
		return this.queue.run(async (): Promise<Result<UserAccount, HarvestError>> => {
			const id = parseUserId(user);
			if (!id.ok) return this.reject("configureOrder", id.error);
			const account = this.ledger.configureOrder(id.value, { targetPrice, conversionPercentage });
			if (!account.ok) return this.reject("configureOrder", account.error);

			const target = account.value.targetPrice ?? 0n;
			this.logger.info(
				{ user: id.value, targetPrice: target, conversionPercentage },
				"order configured",
			);
			await this.record({
				type: "order_configured",
				user: id.value,
				targetPrice: target.toString(),
				conversionPercentage,
				timestamp: this.clock.now(),
			});
			this.events.emit("orderConfigured", {
				user: id.value,
				targetPrice: target,
				conversionPercentage,
			});
			return account;
		});
	}

	/** One accrual pass over the watchlist. */
	runAccrual(): Promise<AccrualReport> {
		return this.queue.run(async () => {
			const report = await this.accrual.run();
			const contributed = report.entries.reduce((sum, e) => sum + e.contribution, 0n);
			await this.record({
				type: "accrual_pass",
				status: report.status,
				users: report.entries.length,
				contributed: contributed.toString(),
				failures: report.failures.length,
				timestamp: this.clock.now(),
			});
			for (const failure of report.failures) {
				await this.record(this.errorEntry("runAccrual", failure.error));
			}
			this.events.emit("accrued", report);
			return report;
		});
	}

	/** Read-only upkeep check; see {@link ConversionAutomation.checkNeeded}. */
	checkNeeded(): Promise<Result<UpkeepCheck, HarvestError>> {
		return this.queue.run(() => this.automation.checkNeeded());
	}

	/** Conversion pass. `context` from checkNeeded is a hint only. */
	performAction(context?: string): Promise<Result<ConversionReport, HarvestError>> {
		return this.queue.run(async (): Promise<Result<ConversionReport, HarvestError>> => {
			const outcome = await this.automation.performAction(context);
			if (!outcome.ok) return this.fail("performAction", outcome.error);

			const { price } = outcome.value;
			for (const fill of outcome.value.conversions) {
				await this.record({
					type: "conversion",
					user: fill.user,
					amountIn: fill.amountIn.toString(),
					amountOut: fill.amountOut.toString(),
					price: price.toString(),
					timestamp: this.clock.now(),
				});
				this.events.emit("converted", { ...fill, price });
			}
			for (const failure of outcome.value.failures) {
				await this.record({
					type: "conversion_failed",
					user: failure.user,
					amountIn: failure.amountIn.toString(),
					code: failure.error.code,
					message: failure.error.message,
					timestamp: this.clock.now(),
				});
				this.events.emit("conversionFailed", { ...failure, price });
			}
			return outcome;
		});
	}

	/** Alias of {@link performAction} without a context. */
	checkConditionsAndPerformSwap(): Promise<Result<ConversionReport, HarvestError>> {
		return this.performAction();
	}

	// ── Queries ────────────────────────────────────────────────

	getPrice(): Promise<Result<bigint, HarvestError>> {
		return this.conversion.readPrice();
	}

	/** 0n for unknown users and malformed addresses. */
	getDepositBalance(user: string): bigint {
		const id = parseUserId(user);
		return id.ok ? this.ledger.depositBalance(id.value) : 0n;
	}

	account(user: string): UserAccount | undefined {
		const id = parseUserId(user);
		return id.ok ? this.ledger.account(id.value) : undefined;
	}

	orderState(user: string): OrderState | undefined {
		const account = this.account(user);
		return account ? orderState(account) : undefined;
	}

	watchlistAt(index: number): UserId | undefined {
		return this.ledger.watchlist.at(index);
	}

	get watchlistSize(): number {
		return this.ledger.watchlist.size;
	}

	totals(): LedgerTotals {
		return this.ledger.totals();
	}

	snapshot(): LedgerSnapshot {
		return this.ledger.snapshot();
	}

	/** Resolves once every queued step has finished, then flushes the journal. */
	async drain(): Promise<void> {
		await this.queue.idle();
		await this.journal.flush();
	}

	// ── Internal ───────────────────────────────────────────────

	/** Caller mistakes: logged, not journaled, nothing changed. */
	private reject(operation: string, error: HarvestError): Result<never, HarvestError> {
		this.logger.warn({ operation, error: error.toJSON() }, "step rejected");
		return err(error);
	}

	/** Collaborator failures: logged and journaled. */
	private async fail(operation: string, error: HarvestError): Promise<Result<never, HarvestError>> {
		this.logger.error({ operation, error: error.toJSON() }, "step failed");
		await this.record(this.errorEntry(operation, error));
		return err(error);
	}

	private errorEntry(operation: string, error: HarvestError): JournalEntry {
		return {
			type: "error",
			operation,
			code: error.code,
			message: error.message,
			timestamp: this.clock.now(),
		};
	}

	/** Journal failures are logged; the ledger change they describe stands. */
	private async record(entry: JournalEntry): Promise<void> {
		try {
			await this.journal.record(entry);
		} catch (e: unknown) {
			this.logger.error({ err: e, entryType: entry.type }, "journal write failed");
		}
	}
}
