export type { PriceOracle, RoundData } from "./types.js";
export { type ChainlinkOracleOptions, ChainlinkPriceOracle } from "./chainlink-oracle.js";
export { StaticPriceOracle } from "./static-oracle.js";
