/**
 * Execution module exports
 *
 * Plan execution, unit materialization, and progress tracking.
 *
 * @module execution
 */

export { RunExecutor } from "./run-executor.js";
export type { RunExecutorConfig } from "./run-executor.js";
export { UnitExecutor, toTable } from "./unit-executor.js";
export { StoreSession } from "./store-session.js";
export { ProgressTracker } from "./progress-tracker.js";
export {
	createRunState,
	recordOutcome,
	blockingFailure,
	buildReport,
} from "./run-state.js";
