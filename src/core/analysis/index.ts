/**
 * Analysis module exports
 *
 * Reference extraction, graph construction, scheduling, analytics and export.
 *
 * @module analysis
 */

export { DependencyGraph, buildGraph, schedule } from "./graph-manager.js";
export type { BuildGraphOptions } from "./graph-manager.js";
export { extractReferences } from "./reference-extractor.js";
export type { ReferenceExtractionOptions } from "./reference-extractor.js";

export type {
	GraphAnalytics,
	GraphExport,
	GraphNode,
	GraphLink,
	LineageFormat,
	UnitKind,
} from "./graph-types.js";
