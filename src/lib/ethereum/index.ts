export type {
	ContractReader,
	ContractTarget,
	ContractWriter,
	Hex,
	NativeBalanceReader,
	ReadCall,
	WriteCall,
	WriteReceipt,
} from "./types.js";
export { createViemBalanceReader, createViemReader, createViemWriter } from "./contracts.js";
export { AGGREGATOR_V3_ABI, UNISWAP_V2_ROUTER_ABI } from "./abis.js";
export { decodeUtf8Hex, encodeUtf8Hex } from "./hex.js";
