import { afterEach, describe, expect, it, vi } from "vitest";
import {
	type HarvestError,
	InsufficientLiquidityError,
	NetworkError,
	RateLimitError,
} from "../shared/errors.js";
import { type Result, err, isErr, isOk, ok } from "../shared/result.js";
import { computeDelay, withRetry } from "./retry.js";
import type { ExchangeRouter } from "./types.js";

function mockRouter(
	results: Result<bigint, HarvestError>[],
): ExchangeRouter & { callCount: number } {
	let index = 0;
	const mock = {
		callCount: 0,
		convert: async () => {
			mock.callCount++;
			const result = results[index];
			index++;
			return result ?? err(new NetworkError("ran out of mock results"));
		},
	};
	return mock;
}

describe("withRetry", () => {
	it("passes through on first success", async () => {
		const inner = mockRouter([ok(5n)]);
		const result = await withRetry(inner, { baseDelayMs: 0 }).convert(10n);
		expect(result).toEqual({ ok: true, value: 5n });
		expect(inner.callCount).toBe(1);
	});

	it("retries retryable errors then succeeds", async () => {
		const inner = mockRouter([err(new NetworkError("reset")), ok(7n)]);
		const result = await withRetry(inner, { maxAttempts: 3, baseDelayMs: 0 }).convert(10n);
		expect(result).toEqual({ ok: true, value: 7n });
		expect(inner.callCount).toBe(2);
	});

	it("does not retry liquidity failures", async () => {
		const inner = mockRouter([err(new InsufficientLiquidityError("dry")), ok(1n)]);
		const result = await withRetry(inner, { maxAttempts: 3, baseDelayMs: 0 }).convert(10n);
		expect(isErr(result)).toBe(true);
		expect(inner.callCount).toBe(1);
	});

	it("returns the last error after maxAttempts", async () => {
		const inner = mockRouter([
			err(new NetworkError("fail 1")),
			err(new NetworkError("fail 2")),
			err(new NetworkError("fail 3")),
			ok(1n),
		]);
		const result = await withRetry(inner, { maxAttempts: 3, baseDelayMs: 0 }).convert(10n);
		expect(isErr(result)).toBe(true);
		if (!result.ok) expect(result.error.message).toBe("fail 3");
		expect(inner.callCount).toBe(3);
	});

	it("retries rate limits", async () => {
		const inner = mockRouter([err(new RateLimitError("slow", 0)), ok(2n)]);
		const result = await withRetry(inner, { baseDelayMs: 0 }).convert(10n);
		expect(isOk(result)).toBe(true);
		expect(inner.callCount).toBe(2);
	});

	it("maxAttempts 1 means no retries", async () => {
		const inner = mockRouter([err(new NetworkError("once")), ok(2n)]);
		const result = await withRetry(inner, { maxAttempts: 1, baseDelayMs: 0 }).convert(10n);
		expect(isErr(result)).toBe(true);
		expect(inner.callCount).toBe(1);
	});
});

describe("computeDelay", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	const config = { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1_000, jitterFactor: 0.5 };

	it("doubles per attempt and caps at maxDelayMs", () => {
		vi.spyOn(Math, "random").mockReturnValue(0.5);
		expect(computeDelay(0, config, new NetworkError("x"))).toBe(100);
		expect(computeDelay(2, config, new NetworkError("x"))).toBe(400);
		expect(computeDelay(5, config, new NetworkError("x"))).toBe(1_000);
	});

	it("applies jitter in both directions", () => {
		vi.spyOn(Math, "random").mockReturnValue(0);
		expect(computeDelay(0, config, new NetworkError("x"))).toBe(50);
		vi.spyOn(Math, "random").mockReturnValue(1);
		expect(computeDelay(0, config, new NetworkError("x"))).toBe(150);
	});

	it("waits at least retryAfterMs on rate limits", () => {
		vi.spyOn(Math, "random").mockReturnValue(0.5);
		expect(computeDelay(0, config, new RateLimitError("x", 700))).toBe(700);
	});
});
