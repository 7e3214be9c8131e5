/**
 * Structured logging backed by pino.
 *
 * Ledger amounts are bigint; they are rendered as decimal strings before
 * reaching pino so log lines stay valid JSON and keep full precision.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
	/** Static fields added to every line, e.g. `{ service: "harvester" }` */
	readonly base?: Record<string, unknown>;
}

export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

// ── Field normalisation ─────────────────────────────────────────────

const MAX_DEPTH = 4;

function normalizeValue(value: unknown, depth: number, seen: WeakSet<object>): unknown {
	if (typeof value === "bigint") return value.toString();
	if (value === null || typeof value !== "object") return value;
	if (value instanceof Error) return value;
	if (seen.has(value) || depth >= MAX_DEPTH) return "[Truncated]";
	seen.add(value);
	if (Array.isArray(value)) {
		return value.map((item) => normalizeValue(item, depth + 1, seen));
	}
	const out: Record<string, unknown> = {};
	for (const [key, inner] of Object.entries(value)) {
		out[key] = normalizeValue(inner, depth + 1, seen);
	}
	return out;
}

/** @internal Exported for testing only. */
export function normalizeFields(obj: Record<string, unknown>): Record<string, unknown> {
	const seen = new WeakSet<object>();
	seen.add(obj);
	const out: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		out[key] = normalizeValue(value, 1, seen);
	}
	return out;
}

// ── Factory ─────────────────────────────────────────────────────────

type LevelMethod = "info" | "warn" | "error" | "debug";

function wrapPino(pinoLogger: pino.Logger): Logger {
	const emit =
		(level: LevelMethod) =>
		(msgOrObj: unknown, msg?: string): void => {
			if (typeof msgOrObj === "string" || msgOrObj === undefined || msgOrObj === null) {
				pinoLogger[level](String(msgOrObj ?? ""));
				return;
			}
			if (typeof msgOrObj === "object") {
				pinoLogger[level](normalizeFields({ ...msgOrObj }), msg ?? "");
				return;
			}
			pinoLogger[level](String(msgOrObj));
		};

	return {
		info: emit("info"),
		warn: emit("warn"),
		error: emit("error"),
		debug: emit("debug"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(normalizeFields(bindings)));
		},
	};
}

/**
 * Creates a pino-backed Logger.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * logger.info({ user, pendingToConvert: 4n * 10n ** 17n }, "accrued");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (config.base !== undefined) {
		pinoOptions.base = normalizeFields(config.base);
	}

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	const destination = config.destination;
	if (destination) {
		const stream: pino.DestinationStream = {
			write(chunk: string): void {
				destination.write(chunk);
			},
		};
		return wrapPino(pino(pinoOptions, stream));
	}
	return wrapPino(pino(pinoOptions));
}

/** Logger that drops everything; the default when none is injected. */
export function silentLogger(): Logger {
	return createLogger({ level: "silent" });
}
