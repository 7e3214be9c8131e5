export type {
	AccountRecord,
	LedgerSnapshot,
	LedgerTotals,
	OrderRequest,
	UserAccount,
} from "./types.js";
export { OrderState } from "./types.js";
export { type ReadonlyWatchlist, Watchlist } from "./watchlist.js";
export { type UserLedgerOptions, UserLedger } from "./user-ledger.js";
export { isConvertible, orderState, priceExceedsTarget } from "./order-state.js";
