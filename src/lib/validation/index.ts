/**
 * Validation wrapper — zod behind a Result-returning `validate`.
 *
 * Domain modules import `z` from here rather than from "zod" so schema
 * definitions and parsing share one dependency point.
 */

import { z } from "zod";
import { InvalidParameterError } from "../../shared/errors.js";
import { type Result, err, ok } from "../../shared/result.js";

export { z };

export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Non-retryable error listing every schema violation found. */
export class ValidationError extends InvalidParameterError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, { issues: issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`) });
		this.name = "ValidationError";
		this.issues = issues;
	}
}

/** Parse `data` against `schema` without throwing. */
export function validate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
	label = "value",
): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path,
		message: i.message,
	}));
	return err(new ValidationError(`Invalid ${label}`, issues));
}

/** Decimal-string encoded bigint, as written by ledger snapshots and journals. */
export const bigintString = z
	.string()
	.regex(/^-?\d+$/, "expected an integer string")
	.transform((s) => BigInt(s));
