/**
 * SqlDag - dependency-ordered SQL transformations
 *
 * Main entry point. Loads a set of transformation definitions, infers the
 * dependencies between them from their queries, rejects inconsistent sets,
 * and materializes every unit in dependency order.
 *
 * @module engine/sql-dag
 *
 * @example Basic Usage
 * ```typescript
 * const dag = new SqlDag({
 *   definitions: "./transformations",
 *   database: "warehouse.sqlite",
 * });
 *
 * const report = await dag.run();
 * console.log(report.ok, report.outcomes);
 * ```
 *
 * @example Keep independent branches running after a failure
 * ```typescript
 * const dag = new SqlDag({
 *   definitions: "./transformations",
 *   execution: { failurePolicy: "continue-on-error" },
 * });
 *
 * const report = await dag.run({
 *   onUnitStart: (unit) => console.log(`Starting ${unit.name}`),
 *   onUnitComplete: (outcome) => console.log(`${outcome.name}: ${outcome.status}`),
 * });
 * ```
 */

import { SqlParser } from "../../parsing/sql-parser.js";
import type { QueryParser } from "../../parsing/types.js";
import { openSqliteStore } from "../../store/sqlite-store.js";
import type { Store } from "../../store/types.js";
import type {
	ExecutionPlan,
	RunOptions,
	RunReport,
	UnitDefinition,
} from "../../types.js";
import {
	buildGraph,
	schedule,
	type DependencyGraph,
} from "../analysis/graph-manager.js";
import type { GraphAnalytics, GraphExport } from "../analysis/graph-types.js";
import { RunExecutor } from "../execution/run-executor.js";
import { StoreSession } from "../execution/store-session.js";
import {
	definitionsFromMemory,
	loadDefinitionsFromDirectory,
} from "../registry/definition-loader.js";
import { TemplateRenderer } from "../registry/templating.js";
import { UnitRegistry } from "../registry/unit-registry.js";
import { ConfigValidator } from "../validation/config-validator.js";
import { DependencyValidator } from "../validation/dependency-validator.js";
import {
	type EngineConfig,
	type ExecutionConfig,
	type NormalizedEngineConfig,
	normalizeEngineConfig,
} from "./engine-config.js";

/**
 * A validated, scheduled set of units
 */
export interface LoadedProject {
	registry: UnitRegistry;
	graph: DependencyGraph;
	plan: ExecutionPlan;
}

export class SqlDag {
	private readonly config: NormalizedEngineConfig;
	private readonly parser: QueryParser;
	private loaded?: LoadedProject;

	/**
	 * Creates a new SqlDag instance
	 *
	 * @throws {ConfigurationError} If required configuration is missing
	 * @throws {ValidationError} If a configuration value is invalid
	 */
	constructor(config: EngineConfig) {
		ConfigValidator.validate(config);
		this.config = normalizeEngineConfig(config);
		this.parser = config.parser ?? new SqlParser(this.config.dialect);
	}

	// ============================================================================
	// LOADING
	// ============================================================================

	/**
	 * Load, validate and schedule the definitions
	 *
	 * The result is cached; call {@link reload} to pick up changes.
	 *
	 * @throws {DuplicateNameError} When two definitions share a unit name
	 * @throws {UndefinedVariableError} When a placeholder has no value
	 * @throws {ParseError} When a query does not parse
	 * @throws {CircularDependencyError} When units depend on each other in a cycle
	 */
	async load(): Promise<LoadedProject> {
		if (this.loaded) {
			return this.loaded;
		}

		const { logger, namespace } = this.config;
		const definitions = await this.resolveDefinitions();

		const registry = UnitRegistry.load(definitions, {
			parser: this.parser,
			templating: new TemplateRenderer(this.config.templating),
		});
		logger.debug(`Loaded ${registry.size} units`);

		const graph = buildGraph(registry, this.parser, { namespace, logger });
		DependencyValidator.validate(graph);

		const plan = schedule(graph);
		logger.debug(`Execution order: ${plan.order.join(" → ")}`);

		this.loaded = { registry, graph, plan };
		return this.loaded;
	}

	/**
	 * Discard the cached project and load again
	 */
	async reload(): Promise<LoadedProject> {
		this.loaded = undefined;
		return this.load();
	}

	async plan(): Promise<ExecutionPlan> {
		return (await this.load()).plan;
	}

	// ============================================================================
	// EXECUTION
	// ============================================================================

	/**
	 * Materialize every unit in plan order
	 *
	 * Load-time errors are thrown before the store is opened. Unit failures
	 * are recorded in the report instead of being thrown.
	 *
	 * A store the engine opened itself is closed when the run ends; a store
	 * passed in through the configuration is left open.
	 */
	async run(options: RunOptions = {}): Promise<RunReport> {
		const { registry, graph, plan } = await this.load();
		const { namespace, execution, logger } = this.config;

		const store: Store = this.config.store ?? openSqliteStore(this.config.database);
		const session = new StoreSession(store);

		try {
			const executor = new RunExecutor({
				namespace,
				failurePolicy: execution.failurePolicy,
				logger,
			});
			return await executor.execute(plan, registry, graph, session, options);
		} finally {
			if (this.config.store) {
				await session.drain();
			} else {
				await session.close();
			}
		}
	}

	// ============================================================================
	// ANALYTICS & EXPORT API
	// ============================================================================

	/**
	 * Gets structural analytics for the dependency graph
	 *
	 * @example
	 * ```typescript
	 * const analytics = await dag.getGraphAnalytics();
	 * console.log('Critical path:', analytics.criticalPath.join(' → '));
	 * ```
	 */
	async getGraphAnalytics(): Promise<GraphAnalytics> {
		return (await this.load()).graph.getAnalytics();
	}

	async exportGraphDOT(): Promise<string> {
		return (await this.load()).graph.exportDOT();
	}

	async exportGraphJSON(): Promise<GraphExport> {
		return (await this.load()).graph.exportJSON();
	}

	/**
	 * Lineage diagram as a Mermaid flowchart
	 */
	async exportGraphMermaid(): Promise<string> {
		return (await this.load()).graph.exportMermaid();
	}

	// ============================================================================
	// CONFIGURATION API
	// ============================================================================

	getExecutionConfig(): Required<ExecutionConfig> {
		return { ...this.config.execution };
	}

	getNamespace(): string {
		return this.config.namespace;
	}

	getParser(): QueryParser {
		return this.parser;
	}

	// ============================================================================
	// PRIVATE
	// ============================================================================

	private async resolveDefinitions(): Promise<UnitDefinition[]> {
		const { definitions, routines } = this.config;

		let base: UnitDefinition[];
		if (typeof definitions === "string") {
			base = await loadDefinitionsFromDirectory(definitions);
		} else if (Array.isArray(definitions)) {
			base = definitions;
		} else {
			base = definitionsFromMemory(definitions);
		}

		return routines ? [...base, ...routines.toDefinitions()] : base;
	}
}
