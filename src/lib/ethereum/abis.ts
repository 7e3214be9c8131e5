/**
 * Human-readable ABIs of the external contracts the adapters talk to.
 */

import { parseAbi } from "viem";

/** Chainlink AggregatorV3Interface (read side). */
export const AGGREGATOR_V3_ABI = parseAbi([
	"function decimals() view returns (uint8)",
	"function description() view returns (string)",
	"function latestRoundData() view returns (uint80 roundId, int256 answer, uint256 startedAt, uint256 updatedAt, uint80 answeredInRound)",
]);

/** The slice of IUniswapV2Router02 used for native → token swaps. */
export const UNISWAP_V2_ROUTER_ABI = parseAbi([
	"function WETH() pure returns (address)",
	"function getAmountsOut(uint256 amountIn, address[] path) view returns (uint256[] amounts)",
	"function swapExactETHForTokens(uint256 amountOutMin, address[] path, address to, uint256 deadline) payable returns (uint256[] amounts)",
]);
