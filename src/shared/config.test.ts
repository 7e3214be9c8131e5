import { describe, expect, it } from "vitest";
import { DEFAULT_ENGINE_CONFIG, configFromEnv, loadConfig, resolveConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("EngineConfig", () => {
	describe("DEFAULT_ENGINE_CONFIG", () => {
		it("uses an 8-decimal oracle scale and a three minute accrual interval", () => {
			expect(DEFAULT_ENGINE_CONFIG.oracleDecimals).toBe(8);
			expect(DEFAULT_ENGINE_CONFIG.accrualIntervalMs).toBe(180_000);
			expect(DEFAULT_ENGINE_CONFIG.checkIntervalMs).toBe(15_000);
			expect(DEFAULT_ENGINE_CONFIG.maxSlippageBps).toBe(50);
		});

		it("passes its own validation", () => {
			expect(resolveConfig()).toEqual({ ok: true, value: DEFAULT_ENGINE_CONFIG });
		});
	});

	describe("configFromEnv", () => {
		it("returns nothing when no HARVEST_ variables are set", () => {
			expect(configFromEnv({ PATH: "/usr/bin" })).toEqual({});
		});

		it("reads numeric overrides and the log level", () => {
			expect(
				configFromEnv({
					HARVEST_ORACLE_DECIMALS: "18",
					HARVEST_ACCRUAL_INTERVAL_MS: "60000",
					HARVEST_CHECK_INTERVAL_MS: "5000",
					HARVEST_MAX_SLIPPAGE_BPS: "0",
					HARVEST_SWAP_DEADLINE_SECONDS: "120",
					HARVEST_LOG_LEVEL: "debug",
				}),
			).toEqual({
				oracleDecimals: 18,
				accrualIntervalMs: 60_000,
				checkIntervalMs: 5_000,
				maxSlippageBps: 0,
				swapDeadlineSeconds: 120,
				logLevel: "debug",
			});
		});

		it("ignores empty values", () => {
			expect(configFromEnv({ HARVEST_CHECK_INTERVAL_MS: "" })).toEqual({});
		});

		it.each([
			["HARVEST_ACCRUAL_INTERVAL_MS", "0"],
			["HARVEST_ACCRUAL_INTERVAL_MS", "12abc"],
			["HARVEST_MAX_SLIPPAGE_BPS", "-1"],
			["HARVEST_ORACLE_DECIMALS", "8.5"],
			["HARVEST_LOG_LEVEL", "verbose"],
		])("rejects %s=%s", (key, value) => {
			expect(() => configFromEnv({ [key]: value })).toThrow(ConfigError);
		});
	});

	describe("resolveConfig", () => {
		it("merges overrides onto defaults", () => {
			const r = resolveConfig({ maxSlippageBps: 100 });
			expect(r.ok).toBe(true);
			if (r.ok) {
				expect(r.value.maxSlippageBps).toBe(100);
				expect(r.value.oracleDecimals).toBe(8);
			}
		});

		it("fails with ConfigError on out-of-range values", () => {
			const r = resolveConfig({ maxSlippageBps: 20_000 });
			expect(r.ok).toBe(false);
			if (!r.ok) {
				expect(r.error).toBeInstanceOf(ConfigError);
				expect(r.error.message).toBe("Invalid engine config");
			}
		});
	});

	describe("loadConfig", () => {
		it("lets explicit overrides win over the environment", () => {
			const r = loadConfig({ checkIntervalMs: 1_000 }, { HARVEST_CHECK_INTERVAL_MS: "9000" });
			expect(r.ok).toBe(true);
			if (r.ok) expect(r.value.checkIntervalMs).toBe(1_000);
		});

		it("returns env parsing failures as errors", () => {
			const r = loadConfig({}, { HARVEST_LOG_LEVEL: "loud" });
			expect(r.ok).toBe(false);
			if (!r.ok) expect(r.error.message).toBe('Invalid HARVEST_LOG_LEVEL: "loud"');
		});
	});
});
