export {
	type UserId,
	parseUserId,
	userId,
	idToString,
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	map,
	mapErr,
	flatMap,
	unwrap,
	unwrapOr,
	isOk,
	isErr,
	tryCatch,
	tryCatchAsync,
} from "./result.js";

export {
	ErrorCategory,
	HarvestError,
	PreconditionViolationError,
	InvalidParameterError,
	ExternalFailureError,
	NetworkError,
	TimeoutError,
	RateLimitError,
	InsufficientLiquidityError,
	SlippageExceededError,
	ConfigError,
	SystemError,
	classifyError,
	captureAsync,
	isPreconditionViolation,
	isInvalidParameter,
	isExternalFailure,
} from "./errors.js";

export {
	BASE_ASSET_DECIMALS,
	toFixedPoint,
	formatFixedPoint,
	parseAmount,
	formatAmount,
} from "./units.js";
export { type Clock, SystemClock, FakeClock, Duration } from "./time.js";
export {
	type EngineConfig,
	DEFAULT_ENGINE_CONFIG,
	configFromEnv,
	resolveConfig,
	loadConfig,
} from "./config.js";
