export type { HarvestEventName, HarvestEvents } from "./events.js";
export { HarvestService, type HarvestServiceDeps } from "./harvest-service.js";
export { StepQueue } from "./step-queue.js";
export {
	type TickOutcome,
	type UpkeepRunnerOptions,
	type UpkeepTarget,
	UpkeepRunner,
} from "./upkeep-runner.js";
