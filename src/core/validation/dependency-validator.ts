/**
 * Dependency graph validator
 *
 * Validates dependency graphs for cycles before anything is scheduled.
 *
 * @module validation/dependency-validator
 */

import type { DependencyGraph } from "../analysis/graph-manager.js";
import { CircularDependencyError } from "../shared/errors.js";

/**
 * Dependency graph validator
 */
export class DependencyValidator {
	/**
	 * Validates a dependency graph
	 *
	 * Depth-first search from every node in name order, following edges from
	 * a dependency to the units that read it. The first node reached while
	 * still on the search path closes a cycle.
	 *
	 * @throws {CircularDependencyError} With the cycle in discovery order,
	 *   starting at the node that was reached twice
	 *
	 * @example
	 * ```typescript
	 * try {
	 *   DependencyValidator.validate(graph);
	 * } catch (error) {
	 *   if (error instanceof CircularDependencyError) {
	 *     console.error('Cycle detected:', error.cycle);
	 *   }
	 * }
	 * ```
	 */
	static validate(graph: DependencyGraph): void {
		const cycle = DependencyValidator.findFirstCycle(graph);
		if (cycle) {
			throw new CircularDependencyError(cycle);
		}
	}

	/**
	 * Every cycle reachable by the validator's search, each in discovery order
	 *
	 * @returns Array of cycles, where each cycle is an array of unit names
	 */
	static findAllCycles(graph: DependencyGraph): string[][] {
		const cycles: string[][] = [];
		DependencyValidator.search(graph, (cycle) => {
			cycles.push(cycle);
			return false;
		});
		return cycles;
	}

	/**
	 * Gets all dependencies for a unit (direct and transitive)
	 */
	static getAllDependencies(unit: string, graph: DependencyGraph): Set<string> {
		const allDeps = new Set<string>();

		const traverse = (node: string): void => {
			for (const dep of graph.dependenciesOf(node)) {
				if (allDeps.has(dep)) continue;
				allDeps.add(dep);
				traverse(dep);
			}
		};

		traverse(unit);
		return allDeps;
	}

	/**
	 * Checks if one unit depends on another (directly or transitively)
	 */
	static dependsOn(
		unit: string,
		dependency: string,
		graph: DependencyGraph,
	): boolean {
		return DependencyValidator.getAllDependencies(unit, graph).has(dependency);
	}

	// ============================================================================
	// PRIVATE
	// ============================================================================

	private static findFirstCycle(graph: DependencyGraph): string[] | undefined {
		let found: string[] | undefined;
		DependencyValidator.search(graph, (cycle) => {
			found = cycle;
			return true;
		});
		return found;
	}

	/**
	 * Shared DFS; `onCycle` returns true to stop the search
	 */
	private static search(
		graph: DependencyGraph,
		onCycle: (cycle: string[]) => boolean,
	): void {
		const visited = new Set<string>();
		const inProgress = new Set<string>();
		const path: string[] = [];
		let stopped = false;

		const visit = (node: string): void => {
			visited.add(node);
			inProgress.add(node);
			path.push(node);

			for (const dependent of graph.dependentsOf(node)) {
				if (stopped) return;
				if (inProgress.has(dependent)) {
					stopped = onCycle(path.slice(path.indexOf(dependent)));
				} else if (!visited.has(dependent)) {
					visit(dependent);
				}
			}

			inProgress.delete(node);
			path.pop();
		};

		for (const node of graph.nodes()) {
			if (stopped) return;
			if (!visited.has(node)) {
				visit(node);
			}
		}
	}
}
