import { describe, expect, it } from "vitest";
import { userId } from "../shared/identifiers.js";
import { isConvertible, orderState, priceExceedsTarget } from "./order-state.js";
import type { UserAccount } from "./types.js";

const base: UserAccount = {
	user: userId(`0x${"1".repeat(40)}`),
	depositTotal: 10n,
	lastObservedBalance: 0n,
	pendingToConvert: 0n,
	targetPrice: null,
	conversionPercentage: 0,
	convertedBalance: 0n,
};

describe("orderState", () => {
	it("is no_order until a target is configured", () => {
		expect(orderState(base)).toBe("no_order");
		expect(orderState({ ...base, pendingToConvert: 5n })).toBe("no_order");
	});

	it("is idle with an order and nothing pending", () => {
		expect(orderState({ ...base, targetPrice: 100n })).toBe("idle");
	});

	it("is pending with an order and a positive pending amount", () => {
		expect(orderState({ ...base, targetPrice: 100n, pendingToConvert: 1n })).toBe("pending");
	});
});

describe("price threshold", () => {
	const ordered = { ...base, targetPrice: 100n, pendingToConvert: 7n };

	it("requires the price to strictly exceed the target", () => {
		expect(priceExceedsTarget(ordered, 101n)).toBe(true);
		expect(priceExceedsTarget(ordered, 100n)).toBe(false);
		expect(priceExceedsTarget(ordered, 99n)).toBe(false);
	});

	it("never triggers without an order", () => {
		expect(priceExceedsTarget(base, 10n ** 30n)).toBe(false);
	});

	it("needs something pending to be convertible", () => {
		expect(isConvertible(ordered, 101n)).toBe(true);
		expect(isConvertible({ ...ordered, pendingToConvert: 0n }, 101n)).toBe(false);
	});
});
