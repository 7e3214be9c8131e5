export type { BalanceReader } from "./types.js";
export { MemoryBalanceReader } from "./memory-balance-reader.js";
