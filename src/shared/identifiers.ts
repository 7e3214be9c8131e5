/**
 * Branded domain identifiers.
 *
 * A UserId is the account address that owns a deposit. Branding keeps raw
 * strings (tx hashes, token addresses) from being used as ledger keys.
 */

import { InvalidParameterError } from "./errors.js";
import { type Result, err, ok } from "./result.js";

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** Lower-cased 0x-prefixed 20-byte hex address identifying a depositor. */
export type UserId = Brand<string, "UserId">;

const ADDRESS_RE = /^0x[0-9a-f]{40}$/;

/** Validate and normalise a raw address into a UserId. */
export function parseUserId(value: string): Result<UserId, InvalidParameterError> {
	const normalized = value.trim().toLowerCase();
	if (!ADDRESS_RE.test(normalized)) {
		return err(
			new InvalidParameterError("UserId must be a 0x-prefixed 20-byte hex address", {
				value,
			}),
		);
	}
	return ok(normalized as UserId);
}

/** Throwing variant of {@link parseUserId} for fixtures and configuration. */
export function userId(value: string): UserId {
	const parsed = parseUserId(value);
	if (!parsed.ok) throw parsed.error;
	return parsed.value;
}

export function idToString(id: UserId): string {
	return id;
}
