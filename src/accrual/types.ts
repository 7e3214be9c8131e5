import type { HarvestError } from "../shared/errors.js";
import type { UserId } from "../shared/identifiers.js";

/**
 * Outcome of a batch pass. `noop` means no baseline moved and nothing
 * failed; `applied` means some balance changed, even if only downwards.
 */
export type AccrualStatus = "noop" | "applied" | "partial";

export interface AccrualEntry {
	readonly user: UserId;
	readonly previousBalance: bigint;
	readonly observedBalance: bigint;
	/** `observedBalance - previousBalance`; negative when the balance fell. */
	readonly delta: bigint;
	readonly contribution: bigint;
	readonly pendingToConvert: bigint;
}

export interface AccrualFailure {
	readonly user: UserId;
	readonly error: HarvestError;
}

export interface AccrualReport {
	readonly status: AccrualStatus;
	readonly entries: readonly AccrualEntry[];
	readonly failures: readonly AccrualFailure[];
}
