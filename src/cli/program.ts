/**
 * Command-line interface: `sqldag run | plan | lineage`
 *
 * @module cli/program
 */

import { readFileSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import { format } from "node:util";
import {
	Command,
	CommanderError,
	InvalidArgumentError,
	Option,
} from "commander";
import type { LineageFormat } from "../core/analysis/graph-types.js";
import type { EngineConfig } from "../core/engine/engine-config.js";
import { SqlDag } from "../core/engine/sql-dag.js";
import { DEFAULT_ENGINE_CONFIG } from "../core/shared/constants.js";
import { getErrorMessage } from "../core/shared/errors.js";
import type { Logger, RunReport } from "../types.js";
import { type CliIO, ConsoleUI } from "./console-ui.js";

export type { CliIO } from "./console-ui.js";

const LINEAGE_FORMATS: readonly LineageFormat[] = ["mermaid", "dot", "json"];

interface ProjectOptions {
	namespace?: string;
	dialect?: string;
	envFile?: string;
	var: Record<string, string>;
	verbose?: boolean;
	quiet?: boolean;
}

interface RunCommandOptions extends ProjectOptions {
	db: string;
	keepGoing?: boolean;
	json?: boolean;
}

interface PlanCommandOptions extends ProjectOptions {
	json?: boolean;
}

interface LineageCommandOptions extends ProjectOptions {
	format: string;
	output?: string;
}

const defaultIo: CliIO = {
	stdout: (text: string) => process.stdout.write(text),
	stderr: (text: string) => process.stderr.write(text),
	interactive: process.stderr.isTTY === true,
};

/**
 * Parse `argv` (without the node and script entries), run the command and
 * resolve to the process exit code
 */
export async function runCli(argv: string[], io: CliIO = defaultIo): Promise<number> {
	const ui = new ConsoleUI(io);
	let exitCode = 0;

	const program = new Command("sqldag")
		.description("Run SQL and routine transformations in dependency order")
		.version(readVersion())
		.exitOverride()
		.configureOutput({
			writeOut: (text) => io.stdout(text),
			writeErr: (text) => io.stderr(text),
		});

	withProjectOptions(
		program
			.command("run")
			.description("materialize every unit in dependency order")
			.argument("<definitions>", "directory of .sql and routine files")
			.option("--db <path>", "SQLite database file, or :memory:", DEFAULT_ENGINE_CONFIG.CLI_DATABASE)
			.option("-k, --keep-going", "keep running units that do not depend on a failed one")
			.option("--json", "print the run report as JSON"),
	).action(async (definitions: string, options: RunCommandOptions) => {
		exitCode = await runCommand(definitions, options, io, ui);
	});

	withProjectOptions(
		program
			.command("plan")
			.description("print the execution order and graph analytics")
			.argument("<definitions>", "directory of .sql and routine files")
			.option("--json", "print the plan as JSON"),
	).action(async (definitions: string, options: PlanCommandOptions) => {
		exitCode = await planCommand(definitions, options, io, ui);
	});

	withProjectOptions(
		program
			.command("lineage")
			.description("export the dependency diagram")
			.argument("<definitions>", "directory of .sql and routine files")
			.addOption(
				new Option("--format <format>", "diagram format")
					.choices(LINEAGE_FORMATS)
					.default("mermaid"),
			)
			.option("-o, --output <file>", "write the diagram to a file"),
	).action(async (definitions: string, options: LineageCommandOptions) => {
		exitCode = await lineageCommand(definitions, options, io);
	});

	try {
		await program.parseAsync(argv, { from: "user" });
		return exitCode;
	} catch (error) {
		if (error instanceof CommanderError) {
			return error.exitCode;
		}
		ui.showError(error);
		return 1;
	}
}

// ============================================================================
// COMMANDS
// ============================================================================

async function runCommand(
	definitions: string,
	options: RunCommandOptions,
	io: CliIO,
	ui: ConsoleUI,
): Promise<number> {
	const dag = new SqlDag({
		...projectConfig(definitions, options, io),
		database: options.db,
		execution: {
			failurePolicy: options.keepGoing ? "continue-on-error" : "fail-fast",
		},
	});

	const spinner = options.json || options.quiet ? undefined : ui.spinner("Loading definitions");
	let report: RunReport;
	try {
		report = await dag.run({
			onUnitStart: (unit) => {
				if (spinner) {
					spinner.text = `Running ${unit.name}`;
				}
			},
		});
	} catch (error) {
		spinner?.fail(getErrorMessage(error));
		throw error;
	}
	spinner?.stop();

	if (options.json) {
		io.stdout(JSON.stringify(serializeReport(report), null, 2) + "\n");
	} else if (!options.quiet) {
		ui.renderReport(report);
	}

	return report.ok ? 0 : 1;
}

async function planCommand(
	definitions: string,
	options: PlanCommandOptions,
	io: CliIO,
	ui: ConsoleUI,
): Promise<number> {
	const dag = new SqlDag(projectConfig(definitions, options, io));
	const plan = await dag.plan();
	const analytics = await dag.getGraphAnalytics();

	if (options.json) {
		io.stdout(JSON.stringify({ ...plan, analytics }, null, 2) + "\n");
	} else {
		ui.renderPlan(plan, analytics);
	}
	return 0;
}

async function lineageCommand(
	definitions: string,
	options: LineageCommandOptions,
	io: CliIO,
): Promise<number> {
	const dag = new SqlDag(projectConfig(definitions, options, io));
	const diagram = await renderLineage(dag, toLineageFormat(options.format));

	if (options.output) {
		await writeFile(options.output, diagram, "utf8");
		if (!options.quiet) {
			io.stdout(`Wrote lineage to ${options.output}\n`);
		}
	} else {
		io.stdout(diagram);
	}
	return 0;
}

// ============================================================================
// HELPERS
// ============================================================================

function withProjectOptions(command: Command): Command {
	return command
		.option("--namespace <name>", "namespace units are materialized into")
		.option("--dialect <dialect>", "SQL dialect used to parse definitions")
		.option("--env-file <path>", "dotenv file with placeholder values")
		.option("--var <assignment>", "placeholder value as KEY=VALUE (repeatable)", collectVariable, {})
		.option("-v, --verbose", "log debug output")
		.option("-q, --quiet", "only report errors");
}

/**
 * Commander argument parser accumulating `--var KEY=VALUE` pairs
 */
export function collectVariable(
	assignment: string,
	previous: Record<string, string>,
): Record<string, string> {
	const separator = assignment.indexOf("=");
	if (separator <= 0) {
		throw new InvalidArgumentError(`Expected KEY=VALUE, got "${assignment}".`);
	}
	return {
		...previous,
		[assignment.slice(0, separator)]: assignment.slice(separator + 1),
	};
}

function projectConfig(
	definitions: string,
	options: ProjectOptions,
	io: CliIO,
): EngineConfig {
	return {
		definitions: resolve(definitions),
		namespace: options.namespace,
		dialect: options.dialect,
		templating: {
			variables: options.var,
			envFile: options.envFile,
		},
		logger: createLogger(io, options),
	};
}

/**
 * Logger writing to stderr, so stdout stays machine-readable
 */
export function createLogger(
	io: CliIO,
	options: { verbose?: boolean; quiet?: boolean } = {},
): Logger {
	const write = (args: unknown[]) => io.stderr(format(...args) + "\n");
	const ignore = () => undefined;
	return {
		debug: options.verbose ? write : ignore,
		info: options.quiet ? ignore : write,
		warn: options.quiet ? ignore : write,
		error: write,
	};
}

async function renderLineage(dag: SqlDag, lineageFormat: LineageFormat): Promise<string> {
	switch (lineageFormat) {
		case "mermaid":
			return dag.exportGraphMermaid();
		case "dot":
			return dag.exportGraphDOT();
		case "json":
			return JSON.stringify(await dag.exportGraphJSON(), null, 2) + "\n";
	}
}

function toLineageFormat(value: string): LineageFormat {
	const match = LINEAGE_FORMATS.find((candidate) => candidate === value);
	if (!match) {
		throw new InvalidArgumentError(`Unknown lineage format "${value}".`);
	}
	return match;
}

/**
 * JSON-friendly view of a run report
 */
export function serializeReport(report: RunReport) {
	return {
		runId: report.runId,
		startedAt: report.startedAt.toISOString(),
		durationMs: report.durationMs,
		failurePolicy: report.failurePolicy,
		namespace: report.namespace,
		ok: report.ok,
		succeeded: report.succeeded,
		failed: report.failed,
		skipped: report.skipped,
		outcomes: report.outcomes.map((outcome) => ({
			name: outcome.name,
			status: outcome.status,
			durationMs: outcome.durationMs,
			...(outcome.error ? { error: outcome.error.message } : {}),
			...(outcome.skippedBecause ? { skippedBecause: outcome.skippedBecause } : {}),
		})),
	};
}

function readVersion(): string {
	const manifest: unknown = JSON.parse(
		readFileSync(new URL("../../package.json", import.meta.url), "utf8"),
	);
	if (
		typeof manifest === "object" &&
		manifest !== null &&
		"version" in manifest &&
		typeof manifest.version === "string"
	) {
		return manifest.version;
	}
	return "0.0.0";
}
