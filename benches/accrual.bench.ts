import { bench, describe } from "vitest";
import { AccrualEngine } from "../src/accrual/accrual-engine.js";
import { ConversionEngine } from "../src/conversion/conversion-engine.js";
import { PaperRouter } from "../src/exchange/paper-router.js";
import { UserLedger } from "../src/ledger/user-ledger.js";
import { MemoryBalanceReader } from "../src/monitor/memory-balance-reader.js";
import { StaticPriceOracle } from "../src/oracle/static-oracle.js";
import { type UserId, userId } from "../src/shared/identifiers.js";
import { unwrap } from "../src/shared/result.js";

const PRICE = 300_000_000_000n;

function buildLedger(users: number) {
	const ledger = UserLedger.create();
	const balances = new MemoryBalanceReader();
	const ids: UserId[] = [];
	for (let i = 0; i < users; i++) {
		const id = userId(`0x${i.toString(16).padStart(40, "0")}`);
		ids.push(id);
		unwrap(ledger.deposit(id, 10n ** 16n, 0n));
		unwrap(ledger.configureOrder(id, { targetPrice: PRICE - 1n, conversionPercentage: 40 }));
	}
	return { ledger, balances, ids };
}

const small = buildLedger(100);
const large = buildLedger(1_000);

describe("accrual pass", () => {
	bench("100 users", async () => {
		for (const id of small.ids) small.balances.credit(id, 10n ** 18n);
		await new AccrualEngine(small.ledger, small.balances).run();
	});

	bench("1000 users", async () => {
		for (const id of large.ids) large.balances.credit(id, 10n ** 18n);
		await new AccrualEngine(large.ledger, large.balances).run();
	});
});

describe("conversion pass", () => {
	const oracle = new StaticPriceOracle(PRICE);
	const router = new PaperRouter({ rateNumerator: 3_000n, rateDenominator: 10n ** 12n });

	bench("accrue then convert 100 users", async () => {
		for (const id of small.ids) small.balances.credit(id, 10n ** 18n);
		await new AccrualEngine(small.ledger, small.balances).run();
		await new ConversionEngine(small.ledger, oracle, router).run();
	});
});
