import { describe, expect, it } from "vitest";
import { ConfigError, InsufficientLiquidityError, NetworkError } from "../shared/errors.js";
import { FakeClock } from "../shared/time.js";
import { PaperRouter } from "./paper-router.js";

describe("PaperRouter", () => {
	it("converts at the configured rate, truncating", async () => {
		const router = new PaperRouter({ rateNumerator: 3n, rateDenominator: 2n });
		expect(await router.convert(5n)).toEqual({ ok: true, value: 7n });
	});

	it("records fills with timestamps", async () => {
		const clock = new FakeClock(1_000);
		const router = new PaperRouter({ rateNumerator: 2n, rateDenominator: 1n, clock });
		await router.convert(4n);
		clock.advance(500);
		await router.convert(1n);
		expect(router.fills).toEqual([
			{ amountIn: 4n, amountOut: 8n, timestampMs: 1_000 },
			{ amountIn: 1n, amountOut: 2n, timestampMs: 1_500 },
		]);
	});

	it("bounds fill history", async () => {
		const router = new PaperRouter({ rateNumerator: 1n, rateDenominator: 1n, maxFillHistory: 2 });
		for (const amount of [1n, 2n, 3n]) await router.convert(amount);
		expect(router.fills.map((f) => f.amountIn)).toEqual([2n, 3n]);
	});

	it("draws down liquidity and refuses what it cannot fill", async () => {
		const router = new PaperRouter({ rateNumerator: 1n, rateDenominator: 1n, liquidity: 10n });
		expect((await router.convert(6n)).ok).toBe(true);
		expect(router.remainingLiquidity).toBe(4n);

		const r = await router.convert(5n);
		expect(r.ok).toBe(false);
		if (!r.ok) expect(r.error).toBeInstanceOf(InsufficientLiquidityError);
		expect(router.remainingLiquidity).toBe(4n);
		expect(router.fills).toHaveLength(1);
	});

	it("rejects non-positive amounts", async () => {
		const router = new PaperRouter({ rateNumerator: 1n, rateDenominator: 1n });
		expect((await router.convert(0n)).ok).toBe(false);
	});

	it("validates the rate", () => {
		expect(() => new PaperRouter({ rateNumerator: 1n, rateDenominator: 0n })).toThrow(ConfigError);
		const router = new PaperRouter({ rateNumerator: 1n, rateDenominator: 1n });
		expect(() => router.setRate(-1n, 1n)).toThrow(ConfigError);
	});

	it("uses an updated rate", async () => {
		const router = new PaperRouter({ rateNumerator: 1n, rateDenominator: 1n });
		router.setRate(1n, 4n);
		expect(await router.convert(10n)).toEqual({ ok: true, value: 2n });
	});

	it("fails until recovered", async () => {
		const router = new PaperRouter({ rateNumerator: 1n, rateDenominator: 1n });
		const failure = new NetworkError("down");
		router.fail(failure);
		expect(await router.convert(1n)).toEqual({ ok: false, error: failure });
		router.recover();
		expect(await router.convert(1n)).toEqual({ ok: true, value: 1n });
	});
});
