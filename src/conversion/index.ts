export type {
	ConversionFailure,
	ConversionFill,
	ConversionReport,
	ConversionStatus,
} from "./types.js";
export { ConversionEngine } from "./conversion-engine.js";
