import type { ProgressUpdate, UnitOutcome } from "../../types.js";

interface ProgressTrackerOptions {
	onProgress?: (progress: ProgressUpdate) => void;
	/** Clock, in milliseconds */
	now?: () => number;
}

export class ProgressTracker {
	private readonly startTime: number;
	private readonly total: number;
	private readonly callback?: (p: ProgressUpdate) => void;
	private readonly now: () => number;

	private succeeded = 0;
	private failed = 0;
	private skipped = 0;
	private currentUnit = "";
	private readonly durations: number[] = [];

	constructor(totalUnits: number, options: ProgressTrackerOptions = {}) {
		this.now = options.now ?? Date.now;
		this.startTime = this.now();
		this.total = totalUnits;
		this.callback = options.onProgress;
	}

	/**
	 * Record one unit outcome
	 */
	record(outcome: UnitOutcome): void {
		this.currentUnit = outcome.name;

		if (outcome.status === "succeeded") {
			this.succeeded++;
		} else if (outcome.status === "failed") {
			this.failed++;
		} else {
			this.skipped++;
		}

		// Skipped units take no time and would drag the estimate down
		if (outcome.status !== "skipped") {
			this.durations.push(outcome.durationMs);
			if (this.durations.length > 50) {
				this.durations.shift();
			}
		}

		if (this.callback) {
			this.callback(this.buildUpdate());
		}
	}

	/**
	 * Get current progress (for polling)
	 */
	getProgress(): ProgressUpdate {
		return this.buildUpdate();
	}

	private get completed(): number {
		return this.succeeded + this.failed + this.skipped;
	}

	private buildUpdate(): ProgressUpdate {
		const elapsed = (this.now() - this.startTime) / 1000;
		const percent = this.total > 0 ? (this.completed / this.total) * 100 : 0;

		const remaining = this.total - this.completed;
		const etaSeconds = (remaining * this.average(this.durations)) / 1000;

		return {
			completed: this.completed,
			total: this.total,
			percent: Math.round(percent * 10) / 10,
			succeeded: this.succeeded,
			failed: this.failed,
			skipped: this.skipped,
			currentUnit: this.currentUnit,
			elapsedSeconds: Math.round(elapsed),
			etaSeconds: Math.round(etaSeconds),
		};
	}

	private average(numbers: number[]): number {
		if (numbers.length === 0) return 0;
		return numbers.reduce((a, b) => a + b, 0) / numbers.length;
	}
}
