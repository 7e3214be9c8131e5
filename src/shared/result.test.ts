import { describe, expect, it } from "vitest";
import {
	err,
	flatMap,
	isErr,
	isOk,
	map,
	mapErr,
	ok,
	tryCatch,
	tryCatchAsync,
	unwrap,
	unwrapOr,
} from "./result.js";

describe("Result", () => {
	it("ok and err carry their payloads", () => {
		const good = ok(10n);
		const bad = err("no deposit");
		expect(good).toEqual({ ok: true, value: 10n });
		expect(bad).toEqual({ ok: false, error: "no deposit" });
		expect(isOk(good)).toBe(true);
		expect(isErr(bad)).toBe(true);
	});

	describe("combinators", () => {
		it("map transforms only successes", () => {
			expect(map(ok(2n), (x) => x * 3n)).toEqual(ok(6n));
			expect(map(err("x"), (x: bigint) => x * 3n)).toEqual(err("x"));
		});

		it("mapErr transforms only failures", () => {
			expect(mapErr(err("x"), (e) => `wrapped ${e}`)).toEqual(err("wrapped x"));
			expect(mapErr(ok(1), (e: string) => `wrapped ${e}`)).toEqual(ok(1));
		});

		it("flatMap short-circuits on the first failure", () => {
			expect(flatMap(ok(5), (x) => ok(x + 1))).toEqual(ok(6));
			expect(flatMap(ok(5), () => err("later"))).toEqual(err("later"));
			expect(flatMap(err("first"), () => ok(1))).toEqual(err("first"));
		});
	});

	describe("unwrap / unwrapOr", () => {
		it("unwrap returns the value or throws the error", () => {
			expect(unwrap(ok("v"))).toBe("v");
			expect(() => unwrap(err(new Error("boom")))).toThrow("boom");
			expect(() => unwrap(err("plain"))).toThrow("plain");
		});

		it("unwrapOr falls back on failure", () => {
			expect(unwrapOr(ok(3), 0)).toBe(3);
			expect(unwrapOr(err("x"), 0)).toBe(0);
		});
	});

	describe("tryCatch", () => {
		it("captures thrown errors and non-errors", () => {
			expect(tryCatch(() => 1)).toEqual(ok(1));
			const thrown = tryCatch(() => {
				throw "text";
			});
			expect(thrown.ok).toBe(false);
			if (!thrown.ok) expect(thrown.error.message).toBe("text");
		});

		it("captures async rejections", async () => {
			const r = await tryCatchAsync(async () => {
				throw new Error("rejected");
			});
			expect(r.ok).toBe(false);
			if (!r.ok) expect(r.error.message).toBe("rejected");
			expect(await tryCatchAsync(async () => 7)).toEqual(ok(7));
		});
	});
});
