/**
 * Sequential execution of a plan
 *
 * @module execution/run-executor
 */

import type { DependencyGraph } from "../analysis/graph-manager.js";
import type { UnitRegistry } from "../registry/unit-registry.js";
import { HookExecutor } from "../lifecycle/hook-executor.js";
import { SKIP_REASONS } from "../shared/constants.js";
import { normalizeError } from "../shared/errors.js";
import type { RunState } from "../shared/types.js";
import type { Store } from "../../store/types.js";
import type {
	ExecutionPlan,
	FailurePolicy,
	Logger,
	RunOptions,
	RunReport,
	TransformationUnit,
	UnitOutcome,
} from "../../types.js";
import { ProgressTracker } from "./progress-tracker.js";
import {
	blockingFailure,
	buildReport,
	createRunState,
	recordOutcome,
} from "./run-state.js";
import { UnitExecutor } from "./unit-executor.js";

export interface RunExecutorConfig {
	namespace: string;
	failurePolicy: FailurePolicy;
	logger: Logger;
	/** Clock, in milliseconds */
	now?: () => number;
}

/**
 * Walks an execution plan one unit at a time
 *
 * Each unit's outcome is recorded in plan order. After a failure, a
 * fail-fast run skips everything still pending, while a continue-on-error
 * run skips only the units that depend on the failed one.
 */
export class RunExecutor {
	private readonly now: () => number;

	constructor(private readonly config: RunExecutorConfig) {
		this.now = config.now ?? Date.now;
	}

	async execute(
		plan: ExecutionPlan,
		registry: UnitRegistry,
		graph: DependencyGraph,
		store: Store,
		options: RunOptions = {},
	): Promise<RunReport> {
		const { namespace, failurePolicy, logger } = this.config;
		const state = createRunState(failurePolicy, namespace, this.now());
		const hooks = new HookExecutor(options, logger);
		const tracker = new ProgressTracker(plan.order.length, {
			onProgress: (progress) => hooks.emitProgress(progress),
			now: this.now,
		});
		const unitExecutor = new UnitExecutor(store, namespace);

		await hooks.executeOnPlan(plan);
		await store.ensureNamespace(namespace);

		for (const name of plan.order) {
			const unit = registry.get(name);
			let outcome: UnitOutcome;

			const blocker = blockingFailure(state, name);
			if (blocker !== undefined) {
				outcome = {
					name,
					status: "skipped",
					skippedBecause: blocker,
					skipReason:
						state.stoppedBy === undefined
							? SKIP_REASONS.FAILED_DEPENDENCY
							: SKIP_REASONS.FAIL_FAST,
					durationMs: 0,
				};
				logger.debug(`${name} skipped (${blocker} failed)`);
			} else {
				await hooks.executeOnUnitStart(unit);
				outcome = await this.executeUnit(unitExecutor, unit, state, graph, hooks);
			}

			recordOutcome(state, outcome);
			tracker.record(outcome);
			await hooks.executeOnUnitComplete(outcome);
		}

		return buildReport(state, this.now());
	}

	private async executeUnit(
		unitExecutor: UnitExecutor,
		unit: TransformationUnit,
		state: RunState,
		graph: DependencyGraph,
		hooks: HookExecutor,
	): Promise<UnitOutcome> {
		const { name } = unit;
		const started = this.now();
		try {
			await unitExecutor.execute(unit);
			return { name, status: "succeeded", durationMs: this.now() - started };
		} catch (error) {
			const err = normalizeError(error);
			this.config.logger.error(`${name} failed: ${err.message}`);
			hooks.reportError(name, err);
			this.markFailure(state, graph, name);
			return {
				name,
				status: "failed",
				error: err,
				durationMs: this.now() - started,
			};
		}
	}

	private markFailure(
		state: RunState,
		graph: DependencyGraph,
		name: string,
	): void {
		if (state.failurePolicy === "fail-fast") {
			state.stoppedBy = name;
			return;
		}
		for (const dependent of graph.transitiveDependentsOf(name)) {
			if (!state.doomed.has(dependent)) {
				state.doomed.set(dependent, name);
			}
		}
	}
}
