export type { AccrualEntry, AccrualFailure, AccrualReport, AccrualStatus } from "./types.js";
export { AccrualEngine, accrualContribution } from "./accrual-engine.js";
