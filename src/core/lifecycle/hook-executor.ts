import type {
	ExecutionPlan,
	Logger,
	ProgressUpdate,
	RunOptions,
	TransformationUnit,
	UnitOutcome,
} from "../../types.js";
import { normalizeError } from "../shared/errors.js";

/**
 * Runs the caller's lifecycle callbacks
 *
 * A callback that throws is logged and reported through `onError`; it never
 * changes the outcome of a unit or of the run.
 */
export class HookExecutor {
	constructor(
		private readonly options: RunOptions,
		private readonly logger: Pick<Logger, "error">,
	) {}

	async executeOnPlan(plan: ExecutionPlan): Promise<void> {
		const { onPlan } = this.options;
		if (!onPlan) return;

		await this.invoke("onPlan", () => onPlan(plan));
	}

	async executeOnUnitStart(unit: TransformationUnit): Promise<void> {
		const { onUnitStart } = this.options;
		if (!onUnitStart) return;

		await this.invoke(`onUnitStart for ${unit.name}`, () => onUnitStart(unit));
	}

	async executeOnUnitComplete(outcome: UnitOutcome): Promise<void> {
		const { onUnitComplete } = this.options;
		if (!onUnitComplete) return;

		await this.invoke(`onUnitComplete for ${outcome.name}`, () =>
			onUnitComplete(outcome),
		);
	}

	emitProgress(progress: ProgressUpdate): void {
		const { onProgress } = this.options;
		if (!onProgress) return;

		try {
			onProgress(progress);
		} catch (error) {
			this.handleCallbackError("onProgress", error);
		}
	}

	/**
	 * Forward a unit failure to `onError`
	 */
	reportError(context: string, error: Error): void {
		const { onError } = this.options;
		if (!onError) return;

		try {
			onError(context, error);
		} catch (callbackError) {
			this.logError("onError", callbackError);
		}
	}

	private async invoke(
		context: string,
		callback: () => void | Promise<void>,
	): Promise<void> {
		try {
			await callback();
		} catch (error) {
			this.handleCallbackError(context, error);
		}
	}

	private handleCallbackError(context: string, error: unknown): void {
		const err = normalizeError(error);
		this.logError(context, err);
		this.reportError(context, err);
	}

	private logError(context: string, error: unknown): void {
		const err = normalizeError(error);
		this.logger.error(`Error in ${context}:`, err.message);
	}
}
