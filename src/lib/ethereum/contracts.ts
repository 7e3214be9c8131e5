/**
 * viem implementations of ContractReader, ContractWriter and
 * NativeBalanceReader.
 *
 * Every viem failure is mapped through classifyError and every decoded
 * return value is validated, so callers only ever see Result values.
 */

import { type PublicClient, type WalletClient, isAddress } from "viem";
import {
	ConfigError,
	type HarvestError,
	InvalidParameterError,
	classifyError,
} from "../../shared/errors.js";
import { type Result, err, ok } from "../../shared/result.js";
import { validate } from "../validation/index.js";
import type {
	ContractReader,
	ContractTarget,
	ContractWriter,
	Hex,
	NativeBalanceReader,
	ReadCall,
	WriteCall,
	WriteReceipt,
} from "./types.js";

function checkedAddress(raw: string, label: string): Result<Hex, InvalidParameterError> {
	return isAddress(raw, { strict: false })
		? ok(raw)
		: err(new InvalidParameterError(`${label} is not a valid address`, { address: raw }));
}

function decode<T>(call: ReadCall<T>, raw: unknown): Result<T, HarvestError> {
	return validate(call.schema, raw, `${call.functionName} result`);
}

/**
 * Creates a ContractReader bound to one deployed contract.
 * @throws ConfigError if the target address is malformed
 */
export function createViemReader(client: PublicClient, target: ContractTarget): ContractReader {
	const address = checkedAddress(target.address, "Contract");
	if (!address.ok) throw new ConfigError(address.error.message, { address: target.address });
	const to = address.value;

	return {
		async read<T>(call: ReadCall<T>): Promise<Result<T, HarvestError>> {
			let raw: unknown;
			try {
				raw = await client.readContract({
					address: to,
					abi: target.abi,
					functionName: call.functionName,
					args: call.args ?? [],
				});
			} catch (e) {
				return err(classifyError(e));
			}
			return decode(call, raw);
		},
	};
}

/**
 * Creates a ContractWriter that simulates each call against the public
 * client, then submits the simulated request through the wallet client.
 * @throws ConfigError if the wallet client has no account or the target address is malformed
 */
export function createViemWriter(
	publicClient: PublicClient,
	walletClient: WalletClient,
	target: ContractTarget,
): ContractWriter {
	const account = walletClient.account;
	if (account === undefined) {
		throw new ConfigError("Wallet client has no account attached");
	}
	const address = checkedAddress(target.address, "Contract");
	if (!address.ok) throw new ConfigError(address.error.message, { address: target.address });
	const to = address.value;

	return {
		account: account.address,

		async write<T>(call: WriteCall<T>): Promise<Result<WriteReceipt<T>, HarvestError>> {
			let simulated: unknown;
			let hash: Hex;
			try {
				const { result } = await publicClient.simulateContract({
					account,
					address: to,
					abi: target.abi,
					functionName: call.functionName,
					args: call.args ?? [],
					value: call.value,
				});
				simulated = result;
				hash = await walletClient.writeContract({
					account,
					chain: walletClient.chain ?? null,
					address: to,
					abi: target.abi,
					functionName: call.functionName,
					args: call.args ?? [],
					value: call.value,
				});
			} catch (e) {
				return err(classifyError(e));
			}
			const decoded = decode(call, simulated);
			return decoded.ok ? ok({ hash, result: decoded.value }) : decoded;
		},
	};
}

/** Native balance reads through `eth_getBalance`. */
export function createViemBalanceReader(client: PublicClient): NativeBalanceReader {
	return {
		async balanceOf(raw: string): Promise<Result<bigint, HarvestError>> {
			const address = checkedAddress(raw, "Account");
			if (!address.ok) return address;
			try {
				return ok(await client.getBalance({ address: address.value }));
			} catch (e) {
				return err(classifyError(e));
			}
		},
	};
}
