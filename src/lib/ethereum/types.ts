/**
 * Chain-access types shared by the viem adapters.
 *
 * Domain code depends on these interfaces only; viem stays inside
 * lib/ethereum.
 */

import type { Abi } from "viem";
import type { HarvestError } from "../../shared/errors.js";
import type { Result } from "../../shared/result.js";
import type { z } from "../validation/index.js";

/** 0x-prefixed hex string as produced and accepted by viem. */
export type Hex = `0x${string}`;

export interface ContractTarget {
	readonly address: string;
	readonly abi: Abi;
}

export interface ReadCall<T> {
	readonly functionName: string;
	readonly args?: readonly unknown[];
	/** Decoded return values are checked against this schema before use. */
	readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export interface WriteCall<T> extends ReadCall<T> {
	/** Native value attached to the call, in wei. */
	readonly value?: bigint;
}

export interface WriteReceipt<T> {
	readonly hash: Hex;
	/** Return value of the call as simulated immediately before submission. */
	readonly result: T;
}

/**
 * Read-only contract access.
 * @example
 * const decimals = await reader.read({ functionName: "decimals", schema: z.number() });
 */
export interface ContractReader {
	read<T>(call: ReadCall<T>): Promise<Result<T, HarvestError>>;
}

/** Simulate-then-submit contract access. */
export interface ContractWriter {
	readonly account: string;
	write<T>(call: WriteCall<T>): Promise<Result<WriteReceipt<T>, HarvestError>>;
}

/** Native-asset balance lookup by address. */
export interface NativeBalanceReader {
	balanceOf(address: string): Promise<Result<bigint, HarvestError>>;
}
