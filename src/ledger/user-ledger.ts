/**
 * UserLedger — per-user accounts plus the watchlist that orders them.
 *
 * Public operations (deposit, configureOrder) validate their input and
 * return a Result; a failed operation leaves the ledger untouched.
 * recordAccrual and settleConversion are the single-writer entry points
 * for the accrual and conversion engines: pending is written only by
 * accrual (grow) and conversion (zero), convertedBalance only by conversion.
 */

import { type ValidationError, bigintString, validate, z } from "../lib/validation/index.js";
import { InvalidParameterError, PreconditionViolationError } from "../shared/errors.js";
import { type UserId, parseUserId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { toFixedPoint } from "../shared/units.js";
import type {
	AccountRecord,
	LedgerSnapshot,
	LedgerTotals,
	OrderRequest,
	UserAccount,
} from "./types.js";
import { type ReadonlyWatchlist, Watchlist } from "./watchlist.js";

const DEFAULT_ORACLE_DECIMALS = 8;

export interface UserLedgerOptions {
	/** Scale applied to decimal-string target prices. */
	readonly oracleDecimals?: number;
}

const amount = bigintString.refine((v) => v >= 0n, "must not be negative");

const AccountRecordSchema = z.object({
	user: z.string(),
	depositTotal: bigintString.refine((v) => v > 0n, "must be positive"),
	lastObservedBalance: amount,
	pendingToConvert: amount,
	targetPrice: bigintString.refine((v) => v > 0n, "must be positive").nullable(),
	conversionPercentage: z.number().int().min(0).max(100),
	convertedBalance: amount,
});

const LedgerSnapshotSchema = z.object({
	version: z.literal(1),
	oracleDecimals: z.number().int().min(0),
	accounts: z.array(AccountRecordSchema),
});

function freeze(account: UserAccount): UserAccount {
	return Object.freeze({ ...account });
}

export class UserLedger {
	private readonly accounts = new Map<UserId, UserAccount>();
	private readonly order = new Watchlist();
	readonly oracleDecimals: number;

	private constructor(oracleDecimals: number) {
		this.oracleDecimals = oracleDecimals;
	}

	static create(options: UserLedgerOptions = {}): UserLedger {
		return new UserLedger(options.oracleDecimals ?? DEFAULT_ORACLE_DECIMALS);
	}

	/**
	 * Rebuild a ledger from {@link snapshot} output. Watchlist order follows
	 * the order of `accounts`.
	 */
	static restore(snapshot: unknown): Result<UserLedger, ValidationError | InvalidParameterError> {
		const parsed = validate(LedgerSnapshotSchema, snapshot, "ledger snapshot");
		if (!parsed.ok) return parsed;

		const ledger = new UserLedger(parsed.value.oracleDecimals);
		for (const record of parsed.value.accounts) {
			const user = parseUserId(record.user);
			if (!user.ok) return user;
			if (ledger.accounts.has(user.value)) {
				return err(new InvalidParameterError("Duplicate account in snapshot", { user: record.user }));
			}
			ledger.order.add(user.value);
			ledger.accounts.set(user.value, freeze({ ...record, user: user.value }));
		}
		return ok(ledger);
	}

	// ── Public operations ──────────────────────────────────────

	/**
	 * Credit a deposit. A first deposit registers the user on the watchlist
	 * with `observedBalance` as the accrual baseline; later deposits only
	 * raise depositTotal.
	 */
	deposit(
		user: UserId,
		amount: bigint,
		observedBalance: bigint,
	): Result<UserAccount, InvalidParameterError> {
		if (amount <= 0n) {
			return err(new InvalidParameterError("Deposit amount must be positive", { user, amount }));
		}
		const existing = this.accounts.get(user);
		if (existing) {
			return ok(this.replace({ ...existing, depositTotal: existing.depositTotal + amount }));
		}
		if (observedBalance < 0n) {
			return err(
				new InvalidParameterError("Observed balance must not be negative", {
					user,
					observedBalance,
				}),
			);
		}
		this.order.add(user);
		return ok(
			this.replace({
				user,
				depositTotal: amount,
				lastObservedBalance: observedBalance,
				pendingToConvert: 0n,
				targetPrice: null,
				conversionPercentage: 0,
				convertedBalance: 0n,
			}),
		);
	}

	/** Set or replace the user's order. Pending and converted amounts are kept. */
	configureOrder(
		user: UserId,
		order: OrderRequest,
	): Result<UserAccount, PreconditionViolationError | InvalidParameterError> {
		const existing = this.accounts.get(user);
		if (!existing || existing.depositTotal <= 0n) {
			return err(
				new PreconditionViolationError("A deposit is required before configuring an order", {
					user,
				}),
			);
		}
		const pct = order.conversionPercentage;
		if (!Number.isInteger(pct) || pct < 0 || pct > 100) {
			return err(
				new InvalidParameterError("Conversion percentage must be an integer between 0 and 100", {
					user,
					conversionPercentage: pct,
				}),
			);
		}
		const target = this.normalizeTarget(order.targetPrice);
		if (!target.ok) return target;

		return ok(
			this.replace({ ...existing, targetPrice: target.value, conversionPercentage: pct }),
		);
	}

	// ── Engine writers ─────────────────────────────────────────

	/** Advance the accrual baseline and add `contribution` to pending. */
	recordAccrual(
		user: UserId,
		observedBalance: bigint,
		contribution: bigint,
	): Result<UserAccount, PreconditionViolationError | InvalidParameterError> {
		const existing = this.accounts.get(user);
		if (!existing) {
			return err(new PreconditionViolationError("Unknown user", { user }));
		}
		if (contribution < 0n) {
			return err(
				new InvalidParameterError("Accrual contribution must not be negative", {
					user,
					contribution,
				}),
			);
		}
		return ok(
			this.replace({
				...existing,
				lastObservedBalance: observedBalance,
				pendingToConvert: existing.pendingToConvert + contribution,
			}),
		);
	}

	/** Zero pending and credit the router output. The order stays in place. */
	settleConversion(
		user: UserId,
		outputAmount: bigint,
	): Result<UserAccount, PreconditionViolationError | InvalidParameterError> {
		const existing = this.accounts.get(user);
		if (!existing) {
			return err(new PreconditionViolationError("Unknown user", { user }));
		}
		if (outputAmount < 0n) {
			return err(
				new InvalidParameterError("Conversion output must not be negative", {
					user,
					outputAmount,
				}),
			);
		}
		return ok(
			this.replace({
				...existing,
				pendingToConvert: 0n,
				convertedBalance: existing.convertedBalance + outputAmount,
			}),
		);
	}

	// ── Queries ────────────────────────────────────────────────

	account(user: UserId): UserAccount | undefined {
		return this.accounts.get(user);
	}

	/** 0n for users that never deposited. */
	depositBalance(user: UserId): bigint {
		return this.accounts.get(user)?.depositTotal ?? 0n;
	}

	get watchlist(): ReadonlyWatchlist {
		return this.order;
	}

	/** Accounts in watchlist order. */
	list(): readonly UserAccount[] {
		const out: UserAccount[] = [];
		for (const user of this.order) {
			const account = this.accounts.get(user);
			if (account) out.push(account);
		}
		return out;
	}

	totals(): LedgerTotals {
		let depositTotal = 0n;
		let pendingToConvert = 0n;
		let convertedBalance = 0n;
		for (const account of this.accounts.values()) {
			depositTotal += account.depositTotal;
			pendingToConvert += account.pendingToConvert;
			convertedBalance += account.convertedBalance;
		}
		return { depositTotal, pendingToConvert, convertedBalance };
	}

	snapshot(): LedgerSnapshot {
		const accounts: AccountRecord[] = this.list().map((a) => ({
			user: a.user,
			depositTotal: a.depositTotal.toString(),
			lastObservedBalance: a.lastObservedBalance.toString(),
			pendingToConvert: a.pendingToConvert.toString(),
			targetPrice: a.targetPrice === null ? null : a.targetPrice.toString(),
			conversionPercentage: a.conversionPercentage,
			convertedBalance: a.convertedBalance.toString(),
		}));
		return { version: 1, oracleDecimals: this.oracleDecimals, accounts };
	}

	// ── Private ────────────────────────────────────────────────

	private replace(account: UserAccount): UserAccount {
		const frozen = freeze(account);
		this.accounts.set(account.user, frozen);
		return frozen;
	}

	private normalizeTarget(raw: bigint | string): Result<bigint, InvalidParameterError> {
		const scaled = typeof raw === "bigint" ? ok(raw) : toFixedPoint(raw, this.oracleDecimals);
		if (!scaled.ok) return scaled;
		if (scaled.value <= 0n) {
			return err(
				new InvalidParameterError("Target price must be positive", { targetPrice: raw }),
			);
		}
		return ok(scaled.value);
	}
}
