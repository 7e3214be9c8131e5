import type { ConversionReport } from "../conversion/types.js";
import type { Hex } from "../lib/ethereum/index.js";
import type { HarvestError } from "../shared/errors.js";
import type { UserId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";

export interface UpkeepCheck {
	/** True when at least one watched user's target is strictly below the price. */
	readonly needed: boolean;
	/** Opaque payload for performAction; `0x` when not needed. */
	readonly context: Hex;
	readonly price: bigint;
	readonly triggered: readonly UserId[];
}

/**
 * Surface for an external keeper: poll checkNeeded without side effects,
 * then call performAction. performAction never trusts its context.
 */
export interface AutomationInterface {
	checkNeeded(): Promise<Result<UpkeepCheck, HarvestError>>;
	performAction(context?: string): Promise<Result<ConversionReport, HarvestError>>;
}
