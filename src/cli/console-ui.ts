/**
 * Terminal rendering for the sqldag CLI
 *
 * @module cli/console-ui
 */

import boxen from "boxen";
import chalk from "chalk";
import Table from "cli-table3";
import gradient from "gradient-string";
import ora, { type Ora } from "ora";
import type { GraphAnalytics } from "../core/analysis/graph-types.js";
import { formatDuration } from "../core/shared/utils.js";
import type {
	ExecutionPlan,
	RunReport,
	UnitOutcome,
	UnitStatus,
} from "../types.js";

/**
 * Where the CLI writes; `process.stdout` / `process.stderr` by default
 */
export interface CliIO {
	stdout: (text: string) => void;
	stderr: (text: string) => void;
	/** Show a spinner while units run */
	interactive?: boolean;
}

const RULE_WIDTH = 60;

const STATUS_LABELS: Record<UnitStatus, string> = {
	succeeded: chalk.green("✓ succeeded"),
	failed: chalk.red("✗ failed"),
	skipped: chalk.yellow("○ skipped"),
};

export class ConsoleUI {
	constructor(private readonly io: CliIO) {}

	/**
	 * Spinner on stderr, only when the session is interactive
	 */
	spinner(text: string): Ora | undefined {
		if (!this.io.interactive) {
			return undefined;
		}
		return ora({
			text: chalk.cyan(text),
			spinner: "dots12",
			stream: process.stderr,
		}).start();
	}

	rule(): void {
		this.io.stdout(gradient(["cyan", "magenta"])("═".repeat(RULE_WIDTH)) + "\n");
	}

	showSection(title: string): void {
		this.io.stdout("\n" + chalk.bold.cyan(title) + "\n");
		this.io.stdout(chalk.dim("─".repeat(RULE_WIDTH)) + "\n");
	}

	// ============================================================================
	// RUN REPORT
	// ============================================================================

	renderReport(report: RunReport): void {
		const table = new Table({
			head: [chalk.bold.cyan("UNIT"), chalk.bold.cyan("STATUS"), chalk.bold.cyan("TIME"), chalk.bold.cyan("DETAIL")],
			style: {
				head: [],
				border: ["cyan"],
			},
			chars: {
				top: "═", "top-mid": "╤", "top-left": "╔", "top-right": "╗",
				bottom: "═", "bottom-mid": "╧", "bottom-left": "╚", "bottom-right": "╝",
				left: "║", "left-mid": "╟", mid: "─", "mid-mid": "┼",
				right: "║", "right-mid": "╢", middle: "│",
			},
		});

		for (const outcome of report.outcomes) {
			table.push([
				chalk.bold(outcome.name),
				STATUS_LABELS[outcome.status],
				chalk.dim(formatDuration(outcome.durationMs)),
				this.detail(outcome),
			]);
		}

		this.io.stdout(table.toString() + "\n");
		this.showSummary(report);
	}

	showSummary(report: RunReport): void {
		const lines = [
			`${chalk.green.bold(String(report.succeeded))} succeeded`,
			`${chalk.red.bold(String(report.failed))} failed`,
			`${chalk.yellow.bold(String(report.skipped))} skipped`,
			chalk.dim(`in ${formatDuration(report.durationMs)} (namespace ${report.namespace})`),
		];

		this.io.stdout(
			boxen(lines.join("\n"), {
				padding: { top: 0, bottom: 0, left: 1, right: 1 },
				borderStyle: "round",
				borderColor: report.ok ? "green" : "red",
				title: report.ok ? "run complete" : "run failed",
			}) + "\n",
		);
	}

	showError(error: unknown): void {
		const message = error instanceof Error ? error.message : String(error);
		this.io.stderr(
			boxen(chalk.red.bold("✗ Error\n\n") + chalk.white(message), {
				padding: 1,
				borderStyle: "round",
				borderColor: "red",
			}) + "\n",
		);
	}

	// ============================================================================
	// PLAN
	// ============================================================================

	renderPlan(plan: ExecutionPlan, analytics: GraphAnalytics): void {
		this.showSection("Execution order");
		plan.order.forEach((name, index) => {
			const deps = plan.dependencies[name] ?? [];
			const suffix = deps.length > 0 ? chalk.dim(` ← ${deps.join(", ")}`) : "";
			this.io.stdout(`${chalk.cyan(String(index + 1).padStart(3))}. ${name}${suffix}\n`);
		});

		this.showSection("Graph");
		const stats: Array<[string, string]> = [
			["units", String(analytics.totalUnits)],
			["dependencies", String(analytics.totalDependencies)],
			["max depth", String(analytics.maxDepth)],
			["roots", analytics.roots.join(", ") || "-"],
			["leaves", analytics.leaves.join(", ") || "-"],
			["critical path", analytics.criticalPath.join(" → ") || "-"],
			["bottlenecks", analytics.bottlenecks.join(", ") || "-"],
		];
		for (const [key, value] of stats) {
			this.io.stdout(`  ${chalk.dim(key.padEnd(14))}${value}\n`);
		}
		this.rule();
	}

	private detail(outcome: UnitOutcome): string {
		if (outcome.error) {
			return chalk.red(outcome.error.message);
		}
		if (outcome.skippedBecause) {
			return chalk.dim(`${outcome.skippedBecause} failed`);
		}
		return "";
	}
}
