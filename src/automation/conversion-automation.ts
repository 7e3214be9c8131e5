import type { ConversionEngine } from "../conversion/conversion-engine.js";
import type { ConversionReport } from "../conversion/types.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import type { HarvestError } from "../shared/errors.js";
import { type Result, ok } from "../shared/result.js";
import type { AutomationInterface, UpkeepCheck } from "./types.js";
import { EMPTY_CONTEXT, decodeUpkeepContext, encodeUpkeepContext } from "./upkeep-context.js";

/** AutomationInterface over a ConversionEngine. */
export class ConversionAutomation implements AutomationInterface {
	private readonly engine: ConversionEngine;
	private readonly logger: Logger;

	constructor(engine: ConversionEngine, logger: Logger = silentLogger()) {
		this.engine = engine;
		this.logger = logger.child({ component: "automation" });
	}

	/** Read-only. Oracle failures come back as err with nothing decided. */
	async checkNeeded(): Promise<Result<UpkeepCheck, HarvestError>> {
		const price = await this.engine.readPrice();
		if (!price.ok) return price;

		const triggered = this.engine.triggered(price.value);
		const needed = triggered.length > 0;
		return ok({
			needed,
			context: needed ? encodeUpkeepContext({ users: triggered, price: price.value }) : EMPTY_CONTEXT,
			price: price.value,
			triggered,
		});
	}

	/** Runs a full conversion pass; the context is only decoded for the log line. */
	async performAction(context?: string): Promise<Result<ConversionReport, HarvestError>> {
		if (context !== undefined) {
			const hint = decodeUpkeepContext(context);
			if (hint.ok) {
				this.logger.debug(
					{ hintedUsers: hint.value?.users.length ?? 0, hintedPrice: hint.value?.price },
					"performing upkeep",
				);
			} else {
				this.logger.warn({ error: hint.error.toJSON() }, "ignoring undecodable upkeep context");
			}
		}
		return this.engine.run();
	}
}
