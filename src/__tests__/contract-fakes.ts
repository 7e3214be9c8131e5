/**
 * In-process ContractReader / ContractWriter stand-ins.
 *
 * Each function name maps to a responder. Its return value passes through
 * the call's own schema and anything it throws goes through classifyError,
 * matching what the viem-backed adapters do.
 */

import type {
	ContractReader,
	ContractWriter,
	Hex,
	ReadCall,
	WriteCall,
	WriteReceipt,
} from "../lib/ethereum/index.js";
import { validate } from "../lib/validation/index.js";
import { type HarvestError, SystemError, classifyError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";

export type Responder = (args: readonly unknown[]) => unknown;

export const FAKE_TX_HASH: Hex = `0x${"ab".repeat(32)}`;

function resolve<T>(
	responders: Readonly<Record<string, Responder>>,
	call: ReadCall<T>,
): Result<T, HarvestError> {
	const responder = responders[call.functionName];
	if (!responder) return err(new SystemError(`unexpected call ${call.functionName}`));
	let raw: unknown;
	try {
		raw = responder(call.args ?? []);
	} catch (e) {
		return err(classifyError(e));
	}
	return validate(call.schema, raw, call.functionName);
}

export function fakeReader(
	responders: Readonly<Record<string, Responder>>,
): ContractReader & { readonly calls: ReadCall<unknown>[] } {
	const calls: ReadCall<unknown>[] = [];
	return {
		calls,
		async read<T>(call: ReadCall<T>): Promise<Result<T, HarvestError>> {
			calls.push(call);
			return resolve(responders, call);
		},
	};
}

export function fakeWriter(
	account: string,
	responders: Readonly<Record<string, Responder>>,
): ContractWriter & { readonly calls: WriteCall<unknown>[] } {
	const calls: WriteCall<unknown>[] = [];
	return {
		account,
		calls,
		async write<T>(call: WriteCall<T>): Promise<Result<WriteReceipt<T>, HarvestError>> {
			calls.push(call);
			const result = resolve(responders, call);
			return result.ok ? ok({ hash: FAKE_TX_HASH, result: result.value }) : result;
		},
	};
}
