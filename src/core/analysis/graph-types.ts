/**
 * Graph analytics types
 *
 * Type definitions for dependency graph analysis and export formats.
 *
 * @module analysis/graph-types
 */

import type { TransformationUnit } from "../../types.js";

export type UnitKind = TransformationUnit["kind"];

// ============================================================================
// GRAPH ANALYTICS
// ============================================================================

/**
 * Structural summary of a dependency graph
 *
 * @example
 * ```typescript
 * const analytics = dag.getAnalytics();
 *
 * console.log('Max depth:', analytics.maxDepth);
 * console.log('Critical path:', analytics.criticalPath.join(' → '));
 * ```
 */
export interface GraphAnalytics {
	totalUnits: number;

	/** Number of edges */
	totalDependencies: number;

	/** Units that read from no other unit */
	roots: string[];

	/** Units no other unit reads from */
	leaves: string[];

	/**
	 * Number of units on the longest dependency chain
	 */
	maxDepth: number;

	/**
	 * The longest dependency chain, first dependency first
	 *
	 * @example ['stg_orders', 'orders', 'customer_lifetime_value']
	 */
	criticalPath: string[];

	/**
	 * Units read by many other units, most-read first
	 */
	bottlenecks: string[];
}

// ============================================================================
// GRAPH EXPORT FORMATS
// ============================================================================

export interface GraphNode {
	/** Unit name */
	id: string;
	label: string;
	type: UnitKind;
	metadata: {
		dependencyCount: number;
		dependentCount: number;
	};
}

/**
 * Edge from a dependency (`source`) to the unit reading it (`target`)
 */
export interface GraphLink {
	source: string;
	target: string;
}

/**
 * Complete graph export in JSON format
 *
 * Compatible with visualization libraries like D3.js, vis.js, Cytoscape, etc.
 */
export interface GraphExport {
	nodes: GraphNode[];
	links: GraphLink[];
}

export type LineageFormat = "mermaid" | "dot" | "json";
