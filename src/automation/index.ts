export type { AutomationInterface, UpkeepCheck } from "./types.js";
export {
	EMPTY_CONTEXT,
	type UpkeepContext,
	decodeUpkeepContext,
	encodeUpkeepContext,
} from "./upkeep-context.js";
export { ConversionAutomation } from "./conversion-automation.js";
