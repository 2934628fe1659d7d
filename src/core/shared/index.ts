/**
 * Shared module exports
 *
 * Core types, errors, constants, and utilities used throughout the engine.
 *
 * @module shared
 */

// Types
export type { RunState } from "./types.js";

// Errors
export {
	SqlDagError,
	ConfigurationError,
	UndefinedVariableError,
	DuplicateNameError,
	UnitNotFoundError,
	CircularDependencyError,
	ExecutionOrderError,
	ParseError,
	ExecutionError,
	RoutineError,
	ValidationError,
	isSqlDagError,
	normalizeError,
	getErrorMessage,
} from "./errors.js";

// Constants
export {
	DEFAULT_ENGINE_CONFIG,
	DEFINITION_EXTENSIONS,
	SUPPORTED_DIALECTS,
	SKIP_REASONS,
	BOTTLENECK_MIN_DEPENDENTS,
} from "./constants.js";

export type { SkipReason, SupportedDialect } from "./constants.js";

export {
	compareNames,
	insertSorted,
	countByStatus,
	formatDuration,
	toCellValue,
} from "./utils.js";
