// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type UserId,
	parseUserId,
	userId,
	idToString,
	type Result,
	ok,
	err,
	map,
	mapErr,
	flatMap,
	isOk,
	isErr,
	unwrap,
	unwrapOr,
	tryCatch,
	tryCatchAsync,
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
	BASE_ASSET_DECIMALS,
	toFixedPoint,
	formatFixedPoint,
	parseAmount,
	formatAmount,
	type Clock,
	SystemClock,
	FakeClock,
	Duration,
	type EngineConfig,
	DEFAULT_ENGINE_CONFIG,
	configFromEnv,
	resolveConfig,
	loadConfig,
} from "./shared/index.js";

// ── Ledger ───────────────────────────────────────────────────────────
export {
	type AccountRecord,
	type LedgerSnapshot,
	type LedgerTotals,
	type OrderRequest,
	type UserAccount,
	OrderState,
	type ReadonlyWatchlist,
	Watchlist,
	type UserLedgerOptions,
	UserLedger,
	isConvertible,
	orderState,
	priceExceedsTarget,
} from "./ledger/index.js";

// ── Collaborators ────────────────────────────────────────────────────
export { type BalanceReader, MemoryBalanceReader } from "./monitor/index.js";
export {
	type PriceOracle,
	type RoundData,
	type ChainlinkOracleOptions,
	ChainlinkPriceOracle,
	StaticPriceOracle,
} from "./oracle/index.js";
export {
	type ExchangeRouter,
	type RetryConfig,
	DEFAULT_RETRY_CONFIG,
	withRetry,
	type SwapReceipt,
	type UniswapV2RouterConfig,
	UniswapV2Router,
	minimumOutput,
	type PaperFill,
	type PaperRouterConfig,
	PaperRouter,
} from "./exchange/index.js";

// ── Engines ──────────────────────────────────────────────────────────
export {
	type AccrualEntry,
	type AccrualFailure,
	type AccrualReport,
	type AccrualStatus,
	AccrualEngine,
	accrualContribution,
} from "./accrual/index.js";
export {
	type ConversionFailure,
	type ConversionFill,
	type ConversionReport,
	type ConversionStatus,
	ConversionEngine,
} from "./conversion/index.js";

// ── Automation ───────────────────────────────────────────────────────
export {
	type AutomationInterface,
	type UpkeepCheck,
	EMPTY_CONTEXT,
	type UpkeepContext,
	decodeUpkeepContext,
	encodeUpkeepContext,
	ConversionAutomation,
} from "./automation/index.js";

// ── Persistence ──────────────────────────────────────────────────────
export {
	type Journal,
	type JournalEntry,
	type JournalEntryType,
	JournalEntrySchema,
	FileJournal,
	type CorruptLine,
	type FileJournalConfig,
	type RestoreResult,
	type MemoryJournalConfig,
	MemoryJournal,
} from "./persistence/index.js";

// ── Service ──────────────────────────────────────────────────────────
export {
	type HarvestEventName,
	type HarvestEvents,
	HarvestService,
	type HarvestServiceDeps,
	StepQueue,
	type TickOutcome,
	type UpkeepRunnerOptions,
	type UpkeepTarget,
	UpkeepRunner,
} from "./service/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export {
	type ContractReader,
	type ContractTarget,
	type ContractWriter,
	type Hex,
	type NativeBalanceReader,
	type ReadCall,
	type WriteCall,
	type WriteReceipt,
	createViemBalanceReader,
	createViemReader,
	createViemWriter,
	AGGREGATOR_V3_ABI,
	UNISWAP_V2_ROUTER_ABI,
} from "./lib/ethereum/index.js";
export {
	type Logger,
	type LogLevel,
	type LoggerConfig,
	createLogger,
	silentLogger,
} from "./lib/logger/index.js";
export { TypedEmitter } from "./lib/events/index.js";
export { ValidationError, validate } from "./lib/validation/index.js";
