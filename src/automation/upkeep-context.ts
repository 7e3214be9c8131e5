/**
 * Opaque payload passed from checkNeeded to performAction.
 *
 * Hex-encoded JSON of the triggered users and the price they were checked
 * against. `0x` means nothing to do. performAction treats the decoded value
 * as a hint for logging only and re-validates against live state.
 */

import { type Hex, decodeUtf8Hex, encodeUtf8Hex } from "../lib/ethereum/index.js";
import { type ValidationError, bigintString, validate, z } from "../lib/validation/index.js";
import { InvalidParameterError } from "../shared/errors.js";
import { type UserId, parseUserId } from "../shared/identifiers.js";
import { type Result, err, ok, tryCatch } from "../shared/result.js";

export const EMPTY_CONTEXT: Hex = "0x";

export interface UpkeepContext {
	readonly users: readonly UserId[];
	readonly price: bigint;
}

const ContextSchema = z.object({
	users: z.array(z.string()),
	price: bigintString,
});

export function encodeUpkeepContext(context: UpkeepContext): Hex {
	return encodeUtf8Hex(JSON.stringify({ users: context.users, price: context.price.toString() }));
}

/** @returns ok(null) for the empty context */
export function decodeUpkeepContext(
	raw: string,
): Result<UpkeepContext | null, InvalidParameterError | ValidationError> {
	if (raw === EMPTY_CONTEXT) return ok(null);
	const text = decodeUtf8Hex(raw);
	if (!text.ok) return text;

	const json = tryCatch((): unknown => JSON.parse(text.value));
	if (!json.ok) {
		return err(new InvalidParameterError("Upkeep context is not JSON", { cause: json.error }));
	}
	const parsed = validate(ContextSchema, json.value, "upkeep context");
	if (!parsed.ok) return parsed;

	const users: UserId[] = [];
	for (const entry of parsed.value.users) {
		const user = parseUserId(entry);
		if (!user.ok) return user;
		users.push(user.value);
	}
	return ok({ users, price: parsed.value.price });
}
