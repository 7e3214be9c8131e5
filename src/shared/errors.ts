/**
 * Structured error hierarchy shared by the engines and their adapters.
 *
 * Every error carries a category. Caller-side mistakes (missing deposit,
 * out-of-range percentage) are non-retryable; collaborator outages are
 * retryable and surface in batch reports so the scheduler can try again.
 */

import { type Result, err } from "./result.js";

export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

type ErrorContext = Record<string, unknown> & { readonly cause?: unknown };

/** Base class for every error produced by the engine and its adapters. */
export class HarvestError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: ErrorContext = {},
	) {
		const { cause, ...rest } = context;
		super(message);
		this.name = "HarvestError";
		this.category = category;
		this.code = code;
		this.context = rest;
		if (cause !== undefined) this.cause = cause;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Caller errors ────────────────────────────────────────────────────

/** An operation was attempted before its prerequisite (e.g. an order before any deposit). */
export class PreconditionViolationError extends HarvestError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "PRECONDITION_VIOLATION", ErrorCategory.NonRetryable, context);
		this.name = "PreconditionViolationError";
	}
}

/** A parameter is outside its accepted domain. */
export class InvalidParameterError extends HarvestError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "INVALID_PARAMETER", ErrorCategory.NonRetryable, context);
		this.name = "InvalidParameterError";
	}
}

// ── Collaborator errors ──────────────────────────────────────────────

/** Failure reported by an oracle, router or balance source. Retryable unless a subclass says otherwise. */
export class ExternalFailureError extends HarvestError {
	constructor(
		message: string,
		context: ErrorContext = {},
		code = "EXTERNAL_FAILURE",
		category: ErrorCategory = ErrorCategory.Retryable,
	) {
		super(message, code, category, context);
		this.name = "ExternalFailureError";
	}
}

export class NetworkError extends ExternalFailureError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, context, "NETWORK_ERROR");
		this.name = "NetworkError";
	}
}

export class TimeoutError extends ExternalFailureError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, context, "TIMEOUT_ERROR");
		this.name = "TimeoutError";
	}
}

export class RateLimitError extends ExternalFailureError {
	readonly retryAfterMs: number;

	constructor(message: string, retryAfterMs: number, context: ErrorContext = {}) {
		super(message, context, "RATE_LIMIT_ERROR");
		this.name = "RateLimitError";
		this.retryAfterMs = retryAfterMs;
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), retryAfterMs: this.retryAfterMs };
	}
}

/** The exchange cannot fill the requested amount. Retrying the same amount will not help. */
export class InsufficientLiquidityError extends ExternalFailureError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, context, "INSUFFICIENT_LIQUIDITY", ErrorCategory.NonRetryable);
		this.name = "InsufficientLiquidityError";
	}
}

/** The exchange would return less than the minimum acceptable output. */
export class SlippageExceededError extends ExternalFailureError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, context, "SLIPPAGE_EXCEEDED", ErrorCategory.NonRetryable);
		this.name = "SlippageExceededError";
	}
}

// ── Fatal errors ─────────────────────────────────────────────────────

export class ConfigError extends HarvestError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, context);
		this.name = "ConfigError";
	}
}

export class SystemError extends HarvestError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, context);
		this.name = "SystemError";
	}
}

// ── Classification ───────────────────────────────────────────────────

function errorCode(error: Error): string | undefined {
	if ("code" in error) {
		const code: unknown = error.code;
		if (typeof code === "string" || typeof code === "number") return String(code);
	}
	return undefined;
}

/**
 * Map an arbitrary thrown value onto the hierarchy.
 *
 * Used at adapter boundaries (viem calls, user-supplied collaborators) so the
 * engines only ever see HarvestError.
 */
export function classifyError(error: unknown): HarvestError {
	if (error instanceof HarvestError) return error;
	if (!(error instanceof Error)) {
		return new SystemError(String(error), { cause: error });
	}

	const msg = error.message.toLowerCase();
	const code = errorCode(error);

	if (code === "ETIMEDOUT" || msg.includes("timeout") || msg.includes("timed out")) {
		return new TimeoutError(error.message, { cause: error });
	}
	if (
		code === "ECONNREFUSED" ||
		code === "ENOTFOUND" ||
		code === "ECONNRESET" ||
		msg.includes("econnrefused") ||
		msg.includes("fetch failed")
	) {
		return new NetworkError(error.message, { cause: error });
	}
	if (code === "429" || msg.includes("rate limit") || msg.includes("429")) {
		return new RateLimitError(error.message, 1_000, { cause: error });
	}
	if (msg.includes("insufficient_liquidity") || msg.includes("insufficient liquidity")) {
		return new InsufficientLiquidityError(error.message, { cause: error });
	}
	if (msg.includes("insufficient_output_amount") || msg.includes("slippage")) {
		return new SlippageExceededError(error.message, { cause: error });
	}
	if (msg.includes("execution reverted")) {
		return new ExternalFailureError(error.message, { cause: error }, "EXECUTION_REVERTED");
	}
	return new SystemError(error.message, { cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

export function isPreconditionViolation(e: unknown): e is PreconditionViolationError {
	return e instanceof PreconditionViolationError;
}

export function isInvalidParameter(e: unknown): e is InvalidParameterError {
	return e instanceof InvalidParameterError;
}

export function isExternalFailure(e: unknown): e is ExternalFailureError {
	return e instanceof ExternalFailureError;
}

// ── Boundary helpers ─────────────────────────────────────────────────

/**
 * Call a Result-returning collaborator; anything it throws or rejects with
 * is classified instead of escaping into a batch pass.
 */
export async function captureAsync<T>(
	fn: () => Promise<Result<T, HarvestError>>,
): Promise<Result<T, HarvestError>> {
	try {
		return await fn();
	} catch (e) {
		return err(classifyError(e));
	}
}
