export { type ExchangeRouter, type RetryConfig, DEFAULT_RETRY_CONFIG } from "./types.js";
export { withRetry } from "./retry.js";
export {
	type SwapReceipt,
	type UniswapV2RouterConfig,
	UniswapV2Router,
	minimumOutput,
} from "./uniswap-v2-router.js";
export { type PaperFill, type PaperRouterConfig, PaperRouter } from "./paper-router.js";
