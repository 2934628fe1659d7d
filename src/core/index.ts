/**
 * @module sqldag/core
 *
 * Engine, registry, graph analysis, validation and execution.
 *
 * @example Basic Usage
 * ```typescript
 * import { SqlDag } from 'sqldag';
 *
 * const dag = new SqlDag({
 *   definitions: './transformations',
 *   database: 'warehouse.sqlite',
 *   namespace: 'analytics',
 * });
 *
 * const report = await dag.run();
 * ```
 */

// ============================================================================
// MAIN ENGINE
// ============================================================================

export { SqlDag } from "./engine/index.js";
export type { LoadedProject } from "./engine/index.js";

// ============================================================================
// CONFIGURATION
// ============================================================================

export type {
	DefinitionSource,
	EngineConfig,
	ExecutionConfig,
	NormalizedEngineConfig,
} from "./engine/index.js";

export {
	DEFAULT_EXECUTION_CONFIG,
	mergeExecutionConfig,
	normalizeEngineConfig,
} from "./engine/index.js";

// ============================================================================
// CORE TYPES
// ============================================================================

export type { RunState } from "./shared/index.js";

// ============================================================================
// ERROR CLASSES
// ============================================================================

export {
	// Base
	SqlDagError,
	// Configuration
	ConfigurationError,
	UndefinedVariableError,
	// Registry
	DuplicateNameError,
	UnitNotFoundError,
	// Dependencies
	CircularDependencyError,
	ExecutionOrderError,
	ParseError,
	// Execution
	ExecutionError,
	RoutineError,
	// Validation
	ValidationError,
	// Utilities
	isSqlDagError,
	normalizeError,
	getErrorMessage,
} from "./shared/index.js";

// ============================================================================
// CONSTANTS
// ============================================================================

export {
	DEFAULT_ENGINE_CONFIG,
	DEFINITION_EXTENSIONS,
	SUPPORTED_DIALECTS,
	SKIP_REASONS,
} from "./shared/index.js";

export type { SkipReason, SupportedDialect } from "./shared/index.js";

// ============================================================================
// REGISTRY
// ============================================================================

export {
	UnitRegistry,
	unitNameFromLabel,
	loadDefinitionsFromDirectory,
	definitionsFromMemory,
	TemplateRenderer,
	listVariables,
} from "./registry/index.js";

export type { RegistryLoadOptions, TemplatingOptions } from "./registry/index.js";

// ============================================================================
// ANALYSIS & ANALYTICS
// ============================================================================

export {
	DependencyGraph,
	buildGraph,
	schedule,
	extractReferences,
} from "./analysis/index.js";

export type {
	BuildGraphOptions,
	ReferenceExtractionOptions,
	GraphAnalytics,
	GraphExport,
	GraphNode,
	GraphLink,
	LineageFormat,
	UnitKind,
} from "./analysis/index.js";

// ============================================================================
// EXECUTION (Advanced Usage)
// ============================================================================

export {
	RunExecutor,
	UnitExecutor,
	StoreSession,
	ProgressTracker,
} from "./execution/index.js";

export type { RunExecutorConfig } from "./execution/index.js";

// ============================================================================
// LIFECYCLE HOOKS (Advanced Usage)
// ============================================================================

export { HookExecutor } from "./lifecycle/index.js";

// ============================================================================
// VALIDATION (Advanced Usage)
// ============================================================================

export { ConfigValidator, DependencyValidator } from "./validation/index.js";

// ============================================================================
// UTILITIES (Advanced Usage)
// ============================================================================

export { compareNames, formatDuration } from "./shared/index.js";
