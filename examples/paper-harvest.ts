/**
 * Paper Harvest Example
 *
 * Runs the engine against in-memory collaborators:
 * - two depositors with different targets and percentages
 * - reward growth simulated on the monitored balances
 * - the oracle price rising through one user's target
 * - one UpkeepRunner tick per simulated period
 */

import {
	FakeClock,
	HarvestService,
	MemoryBalanceReader,
	PaperRouter,
	StaticPriceOracle,
	UpkeepRunner,
	createLogger,
	formatAmount,
	formatFixedPoint,
	unwrap,
	userId,
} from "../src/index.js";

const ALICE = "0x00000000000000000000000000000000000a11ce";
const BOB = "0x0000000000000000000000000000000000000b0b";

const clock = new FakeClock(Date.now());
const oracle = new StaticPriceOracle(290_000_000_000n);
const balances = new MemoryBalanceReader();
const router = new PaperRouter({ rateNumerator: 3_000n, rateDenominator: 10n ** 12n, clock });

const service = unwrap(
	HarvestService.create({
		oracle,
		router,
		balances,
		clock,
		logger: createLogger({ level: "warn" }),
	}),
);

service.events.on("converted", (e) => {
	console.log(
		`converted ${formatAmount(e.amountIn)} for ${e.user} -> ${formatFixedPoint(e.amountOut, 6)} stable at ${formatFixedPoint(e.price, 8)}`,
	);
});

const runner = new UpkeepRunner(service, {
	accrualIntervalMs: service.config.accrualIntervalMs,
	checkIntervalMs: service.config.checkIntervalMs,
	clock,
});

const prices = [290_000_000_000n, 295_000_000_000n, 301_000_000_000n, 312_000_000_000n];

async function main() {
	balances.set(userId(ALICE), 32n * 10n ** 18n);
	balances.set(userId(BOB), 64n * 10n ** 18n);
	unwrap(await service.deposit(ALICE, "0.01"));
	unwrap(await service.deposit(BOB, "1.5"));
	unwrap(await service.configureOrder(ALICE, "3000", 40));
	unwrap(await service.configureOrder(BOB, "3100", 100));

	for (const [i, price] of prices.entries()) {
		oracle.set(price);
		balances.credit(userId(ALICE), 10n ** 17n);
		balances.credit(userId(BOB), 2n * 10n ** 17n);
		clock.advance(service.config.accrualIntervalMs);

		const outcome = await runner.tick();
		const conversion = outcome.skipped ? null : outcome.conversion;
		const converted = conversion?.ok ? conversion.value.conversions.length : 0;
		console.log(`period ${i + 1}: price ${formatFixedPoint(price, 8)}, ${converted} conversions`);
	}

	for (const user of [ALICE, BOB]) {
		const account = service.account(user);
		if (!account) continue;
		console.log(
			`${user}: pending ${formatAmount(account.pendingToConvert)}, converted ${formatFixedPoint(account.convertedBalance, 6)}`,
		);
	}
	await service.drain();
}

main().catch((err) => {
	console.error("Error:", err);
	process.exit(1);
});
