/**
 * Fixed-point conversion between human decimal strings and integer units.
 *
 * Prices are stored in the oracle's scale (8 decimals by default) and
 * amounts in base units (18 decimals for the native asset).
 */

import { LibDecimal } from "../lib/decimal/index.js";
import { InvalidParameterError } from "./errors.js";
import { type Result, err, ok } from "./result.js";

/** Decimals of the native base asset (wei per ether). */
export const BASE_ASSET_DECIMALS = 18;

/**
 * Scale a decimal string into an integer with `decimals` fractional digits.
 * Rejects negatives and values with more precision than the scale holds.
 *
 * @example toFixedPoint("3000.5", 8) // ok(300050000000n)
 */
export function toFixedPoint(
	value: string,
	decimals: number,
): Result<bigint, InvalidParameterError> {
	if (!Number.isInteger(decimals) || decimals < 0) {
		return err(new InvalidParameterError("decimals must be a non-negative integer", { decimals }));
	}
	let parsed: LibDecimal;
	try {
		parsed = LibDecimal.from(value);
	} catch (cause) {
		return err(new InvalidParameterError(`"${value}" is not a decimal number`, { value, cause }));
	}
	if (parsed.isNegative()) {
		return err(new InvalidParameterError("value must not be negative", { value }));
	}
	if (parsed.decimalPlaces() > decimals) {
		return err(
			new InvalidParameterError(`"${value}" has more than ${decimals} fractional digits`, {
				value,
				decimals,
			}),
		);
	}
	return ok(parsed.shift(decimals).toBigInt());
}

/**
 * Render a scaled integer as a trimmed decimal string.
 *
 * @example formatFixedPoint(400000000000000000n, 18) // "0.4"
 */
export function formatFixedPoint(raw: bigint, decimals: number): string {
	return LibDecimal.from(raw).shift(-decimals).toString();
}

/** Shorthand for base-asset amounts: `parseAmount("0.01")` → 10^16. */
export function parseAmount(value: string): Result<bigint, InvalidParameterError> {
	return toFixedPoint(value, BASE_ASSET_DECIMALS);
}

export function formatAmount(raw: bigint): string {
	return formatFixedPoint(raw, BASE_ASSET_DECIMALS);
}
