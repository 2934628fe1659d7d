/**
 * Dependency graph manager
 *
 * Builds the unit dependency graph, schedules it, and provides analytics
 * and exports.
 *
 * @module analysis/graph-manager
 */

import graphlib, { type Graph } from "@dagrejs/graphlib";
import type { QueryParser } from "../../parsing/types.js";
import type { ExecutionPlan, Logger } from "../../types.js";
import type { UnitRegistry } from "../registry/unit-registry.js";
import { BOTTLENECK_MIN_DEPENDENTS } from "../shared/constants.js";
import { ExecutionOrderError } from "../shared/errors.js";
import { compareNames, insertSorted } from "../shared/utils.js";
import { extractReferences } from "./reference-extractor.js";
import type {
	GraphAnalytics,
	GraphExport,
	UnitKind,
} from "./graph-types.js";

export interface BuildGraphOptions {
	namespace?: string;
	logger?: Pick<Logger, "debug">;
}

/**
 * Directed graph of units; an edge runs from a dependency to the unit
 * that reads it
 */
export class DependencyGraph {
	private readonly graph: Graph;
	private readonly kinds = new Map<string, UnitKind>();

	constructor() {
		this.graph = new graphlib.Graph();
	}

	addUnit(name: string, kind: UnitKind = "declarative"): void {
		this.graph.setNode(name);
		this.kinds.set(name, kind);
	}

	/**
	 * Record that `dependent` reads from `dependency`; both become nodes
	 */
	addDependency(dependency: string, dependent: string): void {
		if (!this.graph.hasNode(dependency)) this.addUnit(dependency);
		if (!this.graph.hasNode(dependent)) this.addUnit(dependent);
		this.graph.setEdge(dependency, dependent);
	}

	hasUnit(name: string): boolean {
		return this.graph.hasNode(name);
	}

	kindOf(name: string): UnitKind | undefined {
		return this.kinds.get(name);
	}

	/** Node names, sorted */
	nodes(): string[] {
		return this.graph.nodes().sort(compareNames);
	}

	/** `[dependency, dependent]` pairs, sorted */
	edges(): Array<[string, string]> {
		return this.graph
			.edges()
			.map((edge): [string, string] => [edge.v, edge.w])
			.sort((a, b) => compareNames(a[0], b[0]) || compareNames(a[1], b[1]));
	}

	/** Units `name` reads from directly, sorted */
	dependenciesOf(name: string): string[] {
		return (this.graph.predecessors(name) ?? []).sort(compareNames);
	}

	/** Units reading `name` directly, sorted */
	dependentsOf(name: string): string[] {
		return (this.graph.successors(name) ?? []).sort(compareNames);
	}

	/**
	 * Every unit reading `name` directly or through other units
	 */
	transitiveDependentsOf(name: string): Set<string> {
		const found = new Set<string>();
		const pending = this.dependentsOf(name);

		let next: string | undefined;
		while ((next = pending.pop()) !== undefined) {
			if (found.has(next)) continue;
			found.add(next);
			pending.push(...this.dependentsOf(next));
		}
		return found;
	}

	/**
	 * Get structural analytics
	 *
	 * @throws {ExecutionOrderError} If the graph has a cycle
	 */
	getAnalytics(): GraphAnalytics {
		const nodes = this.nodes();
		const { maxDepth, criticalPath } = this.findCriticalPath();

		return {
			totalUnits: nodes.length,
			totalDependencies: this.graph.edgeCount(),
			roots: nodes.filter((name) => this.dependenciesOf(name).length === 0),
			leaves: nodes.filter((name) => this.dependentsOf(name).length === 0),
			maxDepth,
			criticalPath,
			bottlenecks: this.findBottlenecks(nodes),
		};
	}

	/**
	 * Export graph as DOT format for visualization
	 */
	exportDOT(): string {
		let dot = "digraph sqldag {\n";
		dot += "  rankdir=LR;\n";
		dot += "  node [shape=box, style=rounded];\n\n";

		for (const name of this.nodes()) {
			const isRoutine = this.kindOf(name) === "routine";
			const color = isRoutine ? "lightgreen" : "lightblue";
			const shape = isRoutine ? "ellipse" : "box";
			dot += `  "${name}" [fillcolor="${color}", style="filled", shape="${shape}"];\n`;
		}

		dot += "\n";

		for (const [dependency, dependent] of this.edges()) {
			dot += `  "${dependency}" -> "${dependent}";\n`;
		}

		dot += "}\n";
		return dot;
	}

	/**
	 * Export graph as JSON for programmatic use
	 */
	exportJSON(): GraphExport {
		const nodes = this.nodes().map((name) => ({
			id: name,
			label: name,
			type: this.kindOf(name) ?? ("declarative" as const),
			metadata: {
				dependencyCount: this.dependenciesOf(name).length,
				dependentCount: this.dependentsOf(name).length,
			},
		}));

		const links = this.edges().map(([source, target]) => ({ source, target }));

		return { nodes, links };
	}

	/**
	 * Export graph as a Mermaid flowchart
	 *
	 * @example
	 * ```
	 * flowchart LR
	 *   orders(orders)
	 *   stg_orders --> orders
	 * ```
	 */
	exportMermaid(): string {
		let diagram = "flowchart LR\n";
		for (const name of this.nodes()) {
			diagram += `  ${name}(${name})\n`;
			for (const dependency of this.dependenciesOf(name)) {
				diagram += `  ${dependency} --> ${name}\n`;
			}
		}
		return diagram;
	}

	// ===== Private Helper Methods =====

	private findCriticalPath(): { maxDepth: number; criticalPath: string[] } {
		const depth = new Map<string, number>();
		const previous = new Map<string, string>();

		for (const name of schedule(this).order) {
			let best = 0;
			for (const dependency of this.dependenciesOf(name)) {
				const candidate = depth.get(dependency) ?? 0;
				if (candidate > best) {
					best = candidate;
					previous.set(name, dependency);
				}
			}
			depth.set(name, best + 1);
		}

		let end: string | undefined;
		let maxDepth = 0;
		for (const [name, value] of depth) {
			const tiesEarlier =
				value === maxDepth && end !== undefined && compareNames(name, end) < 0;
			if (value > maxDepth || tiesEarlier) {
				maxDepth = value;
				end = name;
			}
		}

		const criticalPath: string[] = [];
		while (end !== undefined) {
			criticalPath.unshift(end);
			end = previous.get(end);
		}
		return { maxDepth, criticalPath };
	}

	private findBottlenecks(nodes: string[]): string[] {
		return nodes
			.map((name) => ({ name, dependents: this.dependentsOf(name).length }))
			.filter((entry) => entry.dependents >= BOTTLENECK_MIN_DEPENDENTS)
			.sort((a, b) => b.dependents - a.dependents || compareNames(a.name, b.name))
			.map((entry) => entry.name);
	}
}

// ============================================================================
// GRAPH CONSTRUCTION
// ============================================================================

/**
 * One node per unit, one edge per reference between units
 *
 * @throws {ParseError} If a unit's query does not parse
 */
export function buildGraph(
	registry: UnitRegistry,
	parser: QueryParser,
	options: BuildGraphOptions = {},
): DependencyGraph {
	const graph = new DependencyGraph();
	const knownNames = new Set(registry.names());

	for (const name of [...knownNames].sort(compareNames)) {
		graph.addUnit(name, registry.get(name).kind);
	}

	for (const unit of registry.allUnits) {
		const references = extractReferences(unit, knownNames, parser, options);
		for (const dependency of references) {
			graph.addDependency(dependency, unit.name);
		}
	}

	return graph;
}

// ============================================================================
// SCHEDULING
// ============================================================================

/**
 * Order every unit after all of its dependencies
 *
 * Kahn's algorithm; whenever several units are ready, the smallest name
 * (code-unit order) goes first, so the same graph always yields the same
 * plan.
 *
 * @throws {ExecutionOrderError} If the graph has a cycle
 */
export function schedule(graph: DependencyGraph): ExecutionPlan {
	const nodes = graph.nodes();
	const remaining = new Map<string, number>();
	const ready: string[] = [];

	for (const name of nodes) {
		const count = graph.dependenciesOf(name).length;
		remaining.set(name, count);
		if (count === 0) ready.push(name);
	}

	const order: string[] = [];
	let next: string | undefined;
	while ((next = ready.shift()) !== undefined) {
		order.push(next);
		for (const dependent of graph.dependentsOf(next)) {
			const count = (remaining.get(dependent) ?? 0) - 1;
			remaining.set(dependent, count);
			if (count === 0) insertSorted(ready, dependent);
		}
	}

	if (order.length !== nodes.length) {
		const placed = new Set(order);
		throw new ExecutionOrderError(
			nodes.filter((name) => !placed.has(name)),
			{ placed: order },
		);
	}

	const dependencies: Record<string, readonly string[]> = {};
	for (const name of order) {
		dependencies[name] = Object.freeze(graph.dependenciesOf(name));
	}

	return Object.freeze({
		order: Object.freeze(order),
		dependencies: Object.freeze(dependencies),
	});
}
