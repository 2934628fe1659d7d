/**
 * Run state utilities
 *
 * Factory function and utilities for managing run state.
 * State is a plain object - direct access is encouraged.
 *
 * @module execution/run-state
 */

import crypto from "node:crypto";
import type { FailurePolicy, RunReport, UnitOutcome } from "../../types.js";
import type { RunState } from "../shared/types.js";
import { countByStatus } from "../shared/utils.js";

/**
 * Creates a new run state
 *
 * @example
 * ```typescript
 * const state = createRunState("fail-fast", "main");
 * console.log(state.id);
 * ```
 */
export function createRunState(
	failurePolicy: FailurePolicy,
	namespace: string,
	now: number = Date.now(),
): RunState {
	return {
		id: crypto.randomUUID(),
		startTime: now,
		failurePolicy,
		namespace,
		outcomes: [],
		doomed: new Map(),
	};
}

/**
 * Append an outcome; outcomes are kept in the order they are recorded
 */
export function recordOutcome(state: RunState, outcome: UnitOutcome): void {
	state.outcomes.push(Object.freeze(outcome));
}

/**
 * Failed unit that prevents `unit` from running, if any
 */
export function blockingFailure(
	state: RunState,
	unit: string,
): string | undefined {
	return state.stoppedBy ?? state.doomed.get(unit);
}

/**
 * Summarize the run
 */
export function buildReport(
	state: RunState,
	now: number = Date.now(),
): RunReport {
	const outcomes = [...state.outcomes];
	const failed = countByStatus(outcomes, "failed");

	return {
		runId: state.id,
		startedAt: new Date(state.startTime),
		durationMs: now - state.startTime,
		failurePolicy: state.failurePolicy,
		namespace: state.namespace,
		outcomes,
		succeeded: countByStatus(outcomes, "succeeded"),
		failed,
		skipped: countByStatus(outcomes, "skipped"),
		ok: failed === 0,
	};
}
