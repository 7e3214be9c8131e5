import { describe, expect, it } from "vitest";
import { ValidationError } from "../lib/validation/index.js";
import { InvalidParameterError, PreconditionViolationError } from "../shared/errors.js";
import { userId } from "../shared/identifiers.js";
import { isErr, unwrap } from "../shared/result.js";
import { UserLedger } from "./user-ledger.js";

const ALICE = userId(`0x${"a".repeat(40)}`);
const BOB = userId(`0x${"b".repeat(40)}`);
const ONE = 10n ** 18n;

function ledgerWithAlice(): UserLedger {
	const ledger = UserLedger.create();
	unwrap(ledger.deposit(ALICE, 10n ** 16n, 5n * ONE));
	return ledger;
}

describe("UserLedger", () => {
	describe("deposit", () => {
		it("registers a first-time depositor with the observed balance as baseline", () => {
			const ledger = ledgerWithAlice();
			expect(ledger.account(ALICE)).toEqual({
				user: ALICE,
				depositTotal: 10n ** 16n,
				lastObservedBalance: 5n * ONE,
				pendingToConvert: 0n,
				targetPrice: null,
				conversionPercentage: 0,
				convertedBalance: 0n,
			});
			expect(ledger.watchlist.size).toBe(1);
			expect(ledger.watchlist.at(0)).toBe(ALICE);
		});

		it("only raises depositTotal on later deposits", () => {
			const ledger = ledgerWithAlice();
			unwrap(ledger.deposit(ALICE, 5n, 99n * ONE));

			const account = ledger.account(ALICE);
			expect(account?.depositTotal).toBe(10n ** 16n + 5n);
			expect(account?.lastObservedBalance).toBe(5n * ONE);
			expect(ledger.watchlist.size).toBe(1);
		});

		it("rejects zero and negative amounts without mutating", () => {
			const ledger = UserLedger.create();
			for (const amount of [0n, -1n]) {
				const r = ledger.deposit(ALICE, amount, 0n);
				expect(isErr(r)).toBe(true);
				if (!r.ok) expect(r.error).toBeInstanceOf(InvalidParameterError);
			}
			expect(ledger.account(ALICE)).toBeUndefined();
			expect(ledger.watchlist.size).toBe(0);
		});

		it("orders the watchlist by first deposit", () => {
			const ledger = UserLedger.create();
			unwrap(ledger.deposit(BOB, 1n, 0n));
			unwrap(ledger.deposit(ALICE, 1n, 0n));
			unwrap(ledger.deposit(BOB, 1n, 0n));
			expect(ledger.watchlist.toArray()).toEqual([BOB, ALICE]);
		});

		it("returns frozen account records", () => {
			const account = unwrap(UserLedger.create().deposit(ALICE, 1n, 0n));
			expect(Object.isFrozen(account)).toBe(true);
		});
	});

	describe("configureOrder", () => {
		it("requires a prior deposit", () => {
			const ledger = UserLedger.create();
			const r = ledger.configureOrder(ALICE, { targetPrice: 100n, conversionPercentage: 40 });
			expect(r.ok).toBe(false);
			if (!r.ok) expect(r.error).toBeInstanceOf(PreconditionViolationError);
			expect(ledger.account(ALICE)).toBeUndefined();
		});

		it.each([101, -1, 12.5, Number.NaN])("rejects percentage %s", (pct) => {
			const ledger = ledgerWithAlice();
			const before = ledger.account(ALICE);
			const r = ledger.configureOrder(ALICE, { targetPrice: 100n, conversionPercentage: pct });
			expect(r.ok).toBe(false);
			if (!r.ok) expect(r.error).toBeInstanceOf(InvalidParameterError);
			expect(ledger.account(ALICE)).toBe(before);
		});

		it("accepts the 0 and 100 bounds", () => {
			const ledger = ledgerWithAlice();
			expect(ledger.configureOrder(ALICE, { targetPrice: 1n, conversionPercentage: 0 }).ok).toBe(
				true,
			);
			expect(
				ledger.configureOrder(ALICE, { targetPrice: 1n, conversionPercentage: 100 }).ok,
			).toBe(true);
		});

		it("normalises decimal-string prices into the oracle scale", () => {
			const ledger = ledgerWithAlice();
			const account = unwrap(
				ledger.configureOrder(ALICE, { targetPrice: "3000.25", conversionPercentage: 40 }),
			);
			expect(account.targetPrice).toBe(300_025_000_000n);
		});

		it("honours a custom oracle scale", () => {
			const ledger = UserLedger.create({ oracleDecimals: 2 });
			unwrap(ledger.deposit(ALICE, 1n, 0n));
			const account = unwrap(
				ledger.configureOrder(ALICE, { targetPrice: "12.5", conversionPercentage: 10 }),
			);
			expect(account.targetPrice).toBe(1_250n);
		});

		it.each([0n, -5n, "0", "abc", "1.123456789"])("rejects target price %s", (targetPrice) => {
			const ledger = ledgerWithAlice();
			const r = ledger.configureOrder(ALICE, { targetPrice, conversionPercentage: 40 });
			expect(r.ok).toBe(false);
			if (!r.ok) expect(r.error).toBeInstanceOf(InvalidParameterError);
			expect(ledger.account(ALICE)?.targetPrice).toBeNull();
		});

		it("replaces the previous order and keeps balances", () => {
			const ledger = ledgerWithAlice();
			unwrap(ledger.configureOrder(ALICE, { targetPrice: 100n, conversionPercentage: 40 }));
			unwrap(ledger.recordAccrual(ALICE, 6n * ONE, 7n));
			const account = unwrap(
				ledger.configureOrder(ALICE, { targetPrice: 250n, conversionPercentage: 10 }),
			);
			expect(account.targetPrice).toBe(250n);
			expect(account.conversionPercentage).toBe(10);
			expect(account.pendingToConvert).toBe(7n);
		});
	});

	describe("engine writers", () => {
		it("recordAccrual advances the baseline and grows pending", () => {
			const ledger = ledgerWithAlice();
			unwrap(ledger.recordAccrual(ALICE, 6n * ONE, 4n));
			const account = unwrap(ledger.recordAccrual(ALICE, 4n * ONE, 0n));
			expect(account.lastObservedBalance).toBe(4n * ONE);
			expect(account.pendingToConvert).toBe(4n);
		});

		it("settleConversion zeroes pending, credits output and keeps the order", () => {
			const ledger = ledgerWithAlice();
			unwrap(ledger.configureOrder(ALICE, { targetPrice: 100n, conversionPercentage: 40 }));
			unwrap(ledger.recordAccrual(ALICE, 6n * ONE, 9n));
			unwrap(ledger.settleConversion(ALICE, 30n));
			const account = unwrap(ledger.settleConversion(ALICE, 12n));
			expect(account.pendingToConvert).toBe(0n);
			expect(account.convertedBalance).toBe(42n);
			expect(account.targetPrice).toBe(100n);
			expect(account.conversionPercentage).toBe(40);
		});

		it("reject unknown users and negative amounts", () => {
			const ledger = ledgerWithAlice();
			const unknown = ledger.recordAccrual(BOB, 1n, 1n);
			expect(!unknown.ok && unknown.error instanceof PreconditionViolationError).toBe(true);
			const negative = ledger.recordAccrual(ALICE, 1n, -1n);
			expect(!negative.ok && negative.error instanceof InvalidParameterError).toBe(true);
			const settle = ledger.settleConversion(BOB, 1n);
			expect(!settle.ok && settle.error instanceof PreconditionViolationError).toBe(true);
		});
	});

	describe("queries", () => {
		it("depositBalance is 0n for unknown users", () => {
			expect(ledgerWithAlice().depositBalance(BOB)).toBe(0n);
		});

		it("totals sums every account", () => {
			const ledger = ledgerWithAlice();
			unwrap(ledger.deposit(BOB, 3n, 0n));
			unwrap(ledger.recordAccrual(ALICE, 6n * ONE, 10n));
			unwrap(ledger.recordAccrual(BOB, 1n, 2n));
			unwrap(ledger.settleConversion(BOB, 50n));
			expect(ledger.totals()).toEqual({
				depositTotal: 10n ** 16n + 3n,
				pendingToConvert: 10n,
				convertedBalance: 50n,
			});
		});
	});

	describe("snapshot / restore", () => {
		it("round-trips accounts and watchlist order through JSON", () => {
			const ledger = UserLedger.create();
			unwrap(ledger.deposit(BOB, 3n, 1n));
			unwrap(ledger.deposit(ALICE, 10n ** 16n, 5n * ONE));
			unwrap(ledger.configureOrder(ALICE, { targetPrice: 100n, conversionPercentage: 40 }));

			const json = JSON.parse(JSON.stringify(ledger.snapshot()));
			const restored = unwrap(UserLedger.restore(json));

			expect(restored.watchlist.toArray()).toEqual([BOB, ALICE]);
			expect(restored.account(ALICE)).toEqual(ledger.account(ALICE));
			expect(restored.account(BOB)).toEqual(ledger.account(BOB));
			expect(restored.oracleDecimals).toBe(8);
		});

		it("serialises amounts as decimal strings", () => {
			const ledger = ledgerWithAlice();
			expect(ledger.snapshot().accounts[0]).toEqual({
				user: ALICE,
				depositTotal: "10000000000000000",
				lastObservedBalance: "5000000000000000000",
				pendingToConvert: "0",
				targetPrice: null,
				conversionPercentage: 0,
				convertedBalance: "0",
			});
		});

		it("rejects malformed snapshots", () => {
			const r = UserLedger.restore({ version: 2, oracleDecimals: 8, accounts: [] });
			expect(r.ok).toBe(false);
			if (!r.ok) expect(r.error).toBeInstanceOf(ValidationError);
		});

		it.each([
			["negative pending", { pendingToConvert: "-100" }],
			["negative converted balance", { convertedBalance: "-7" }],
			["negative baseline", { lastObservedBalance: "-5" }],
			["zero target price", { targetPrice: "0" }],
			["negative target price", { targetPrice: "-1" }],
			["zero deposit", { depositTotal: "0" }],
		])("rejects a record with %s", (_label, override) => {
			const record = { ...ledgerWithAlice().snapshot().accounts[0], ...override };
			const r = UserLedger.restore({ version: 1, oracleDecimals: 8, accounts: [record] });
			expect(r.ok).toBe(false);
			if (!r.ok) expect(r.error).toBeInstanceOf(ValidationError);
		});

		it("accepts a record at the bounds", () => {
			const record = {
				...ledgerWithAlice().snapshot().accounts[0],
				lastObservedBalance: "0",
				targetPrice: "1",
			};
			const restored = unwrap(
				UserLedger.restore({ version: 1, oracleDecimals: 8, accounts: [record] }),
			);
			expect(restored.account(ALICE)?.targetPrice).toBe(1n);
		});

		it("rejects duplicate users", () => {
			const record = ledgerWithAlice().snapshot().accounts[0];
			const r = UserLedger.restore({ version: 1, oracleDecimals: 8, accounts: [record, record] });
			expect(r.ok).toBe(false);
			if (!r.ok) expect(r.error.message).toBe("Duplicate account in snapshot");
		});
	});
});
