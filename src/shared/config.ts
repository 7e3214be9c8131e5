/**
 * Engine configuration with environment overrides.
 *
 * Values are resolved as DEFAULT_ENGINE_CONFIG ← env ← explicit overrides
 * and then checked against a zod schema.
 */

import type { LogLevel } from "../lib/logger/index.js";
import { validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";
import { type Result, err, ok } from "./result.js";
import { Duration } from "./time.js";

export interface EngineConfig {
	/** Fixed-point decimals of oracle prices and stored target prices */
	readonly oracleDecimals: number;
	/** Minimum time between accrual passes run by the upkeep runner */
	readonly accrualIntervalMs: number;
	/** How often the upkeep runner polls checkNeeded() */
	readonly checkIntervalMs: number;
	/** Slippage tolerance applied to router quotes, in basis points */
	readonly maxSlippageBps: number;
	/** Deadline handed to the exchange router for each swap */
	readonly swapDeadlineSeconds: number;
	readonly logLevel: LogLevel;
	/** Upper bound on in-memory journal entries */
	readonly maxJournalEntries: number;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
	oracleDecimals: 8,
	accrualIntervalMs: Duration.minutes(3),
	checkIntervalMs: Duration.seconds(15),
	maxSlippageBps: 50,
	swapDeadlineSeconds: 300,
	logLevel: "info",
	maxJournalEntries: 10_000,
};

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

const EngineConfigSchema = z.object({
	oracleDecimals: z.number().int().min(0).max(36),
	accrualIntervalMs: z.number().int().positive(),
	checkIntervalMs: z.number().int().positive(),
	maxSlippageBps: z.number().int().min(0).max(10_000),
	swapDeadlineSeconds: z.number().int().positive(),
	logLevel: z.enum(LOG_LEVELS),
	maxJournalEntries: z.number().int().positive(),
});

type Env = Readonly<Record<string, string | undefined>>;

/** Mutable builder so env parsing can fill fields one at a time. */
interface MutableEngineConfig {
	oracleDecimals?: number;
	accrualIntervalMs?: number;
	checkIntervalMs?: number;
	maxSlippageBps?: number;
	swapDeadlineSeconds?: number;
	logLevel?: LogLevel;
}

type NumericKey = Exclude<keyof MutableEngineConfig, "logLevel">;

const NUMERIC_ENV: ReadonlyArray<readonly [string, NumericKey, "positive" | "non_negative"]> = [
	["HARVEST_ORACLE_DECIMALS", "oracleDecimals", "non_negative"],
	["HARVEST_ACCRUAL_INTERVAL_MS", "accrualIntervalMs", "positive"],
	["HARVEST_CHECK_INTERVAL_MS", "checkIntervalMs", "positive"],
	["HARVEST_MAX_SLIPPAGE_BPS", "maxSlippageBps", "non_negative"],
	["HARVEST_SWAP_DEADLINE_SECONDS", "swapDeadlineSeconds", "positive"],
];

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

/**
 * Reads HARVEST_* overrides from the environment.
 * @throws ConfigError when a variable is present but malformed
 */
export function configFromEnv(env: Env = process.env): Partial<EngineConfig> {
	const result: MutableEngineConfig = {};

	for (const [envKey, configKey, kind] of NUMERIC_ENV) {
		const raw = env[envKey];
		if (!raw) continue;
		const parsed = strictParseInt(raw);
		const valid = kind === "positive" ? parsed > 0 : parsed >= 0;
		if (Number.isNaN(parsed) || !valid) {
			const expected = kind === "positive" ? "a positive" : "a non-negative";
			throw new ConfigError(`Invalid ${envKey}: "${raw}" must be ${expected} integer`);
		}
		result[configKey] = parsed;
	}

	// biome-ignore lint/complexity/useLiteralKeys: index signature access
	const level = env["HARVEST_LOG_LEVEL"];
	if (level) {
		if (!isLogLevel(level)) {
			throw new ConfigError(`Invalid HARVEST_LOG_LEVEL: "${level}"`);
		}
		result.logLevel = level;
	}

	return result;
}

/** Merge overrides onto the defaults and validate the outcome. */
export function resolveConfig(
	overrides: Partial<EngineConfig> = {},
): Result<EngineConfig, ConfigError> {
	const merged = { ...DEFAULT_ENGINE_CONFIG, ...overrides };
	const parsed = validate(EngineConfigSchema, merged, "engine config");
	if (!parsed.ok) {
		return err(new ConfigError(parsed.error.message, { ...parsed.error.context }));
	}
	return ok(parsed.value);
}

/** Defaults ← environment ← explicit overrides, validated. */
export function loadConfig(
	overrides: Partial<EngineConfig> = {},
	env: Env = process.env,
): Result<EngineConfig, ConfigError> {
	let fromEnv: Partial<EngineConfig>;
	try {
		fromEnv = configFromEnv(env);
	} catch (e) {
		if (e instanceof ConfigError) return err(e);
		throw e;
	}
	return resolveConfig({ ...fromEnv, ...overrides });
}
