/**
 * Monitored-balance source consumed by the accrual engine.
 *
 * The viem-backed native balance reader from lib/ethereum satisfies this
 * interface as-is.
 */

import type { HarvestError } from "../shared/errors.js";
import type { UserId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";

export interface BalanceReader {
	balanceOf(user: UserId): Promise<Result<bigint, HarvestError>>;
}
