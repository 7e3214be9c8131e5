import { hexToString, isHex, stringToHex } from "viem";
import { InvalidParameterError } from "../../shared/errors.js";
import { type Result, err, ok } from "../../shared/result.js";
import type { Hex } from "./types.js";

/** UTF-8 text → 0x-prefixed hex. */
export function encodeUtf8Hex(text: string): Hex {
	return stringToHex(text);
}

/** 0x-prefixed hex → UTF-8 text. */
export function decodeUtf8Hex(raw: string): Result<string, InvalidParameterError> {
	if (!isHex(raw, { strict: true }) || raw.length % 2 !== 0) {
		return err(new InvalidParameterError("Expected 0x-prefixed hex data", { value: raw }));
	}
	return ok(hexToString(raw));
}
