/**
 * Core type definitions shared by the engine and the executors
 *
 * These represent the internal state maintained while a run executes.
 *
 * @module shared/types
 */

import type { FailurePolicy, UnitOutcome } from "../../types.js";

// ============================================================================
// RUN STATE
// ============================================================================

/**
 * Internal state maintained throughout a run
 */
export interface RunState {
	/** Unique run identifier (UUID v4) */
	id: string;

	/** Run start timestamp (milliseconds since epoch) */
	startTime: number;

	failurePolicy: FailurePolicy;

	namespace: string;

	/** Outcomes so far, in plan order */
	outcomes: UnitOutcome[];

	/** Units that will not run, with the failed unit responsible */
	doomed: Map<string, string>;

	/** Set once a failure stops a fail-fast run */
	stoppedBy?: string;
}
