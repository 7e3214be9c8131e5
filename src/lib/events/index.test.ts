import { describe, expect, it, vi } from "vitest";
import { TypedEmitter } from "./index.js";

interface TestEvents {
	deposited: { readonly amount: bigint };
	converted: { readonly amountOut: bigint };
}

describe("TypedEmitter", () => {
	it("delivers payloads to subscribers of that event only", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const onDeposit = vi.fn();
		const onConvert = vi.fn();
		emitter.on("deposited", onDeposit);
		emitter.on("converted", onConvert);

		emitter.emit("deposited", { amount: 5n });

		expect(onDeposit).toHaveBeenCalledWith({ amount: 5n });
		expect(onConvert).not.toHaveBeenCalled();
	});

	it("returns an unsubscribe function", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const handler = vi.fn();
		const off = emitter.on("deposited", handler);
		off();
		expect(emitter.emit("deposited", { amount: 1n })).toBe(false);
		expect(handler).not.toHaveBeenCalled();
		expect(emitter.listenerCount("deposited")).toBe(0);
	});

	it("once handlers fire a single time", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const handler = vi.fn();
		emitter.once("converted", handler);
		emitter.emit("converted", { amountOut: 1n });
		emitter.emit("converted", { amountOut: 2n });
		expect(handler).toHaveBeenCalledTimes(1);
	});

	it("isolates throwing handlers and reports them", () => {
		const reported: Array<[unknown, string]> = [];
		const emitter = new TypedEmitter<TestEvents>((error, event) => reported.push([error, event]));
		const boom = new Error("handler bug");
		const after = vi.fn();
		emitter.on("deposited", () => {
			throw boom;
		});
		emitter.on("deposited", after);

		expect(() => emitter.emit("deposited", { amount: 1n })).not.toThrow();
		expect(after).toHaveBeenCalledTimes(1);
		expect(reported).toEqual([[boom, "deposited"]]);
	});

	it("removeAllListeners clears one or every event", () => {
		const emitter = new TypedEmitter<TestEvents>();
		emitter.on("deposited", vi.fn());
		emitter.on("converted", vi.fn());
		emitter.removeAllListeners("deposited");
		expect(emitter.listenerCount("deposited")).toBe(0);
		expect(emitter.listenerCount("converted")).toBe(1);
		emitter.removeAllListeners();
		expect(emitter.listenerCount("converted")).toBe(0);
	});
});
