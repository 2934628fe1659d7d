/**
 * Custom error classes for sqldag
 *
 * Provides structured error handling with error codes and typed details.
 * All errors extend SqlDagError for consistent error handling.
 *
 * Load-time errors (duplicate names, cycles, parse failures, undefined
 * template variables) abort a run before any unit executes. Run-time errors
 * (store or routine failures) are caught per unit and land in the RunReport.
 *
 * @module shared/errors
 *
 * @example Catching specific errors
 * ```typescript
 * try {
 *   await engine.run();
 * } catch (error) {
 *   if (error instanceof CircularDependencyError) {
 *     console.log('Cycle:', error.cycle);
 *   } else if (error instanceof DuplicateNameError) {
 *     console.log('Duplicate:', error.unitName);
 *   }
 * }
 * ```
 */

// ============================================================================
// BASE ERROR
// ============================================================================

/**
 * Base error class for all sqldag errors
 */
export class SqlDagError extends Error {
	/** Error code for programmatic handling */
	public readonly code: string;

	/** Optional additional error details */
	public readonly details?: unknown;

	constructor(message: string, code: string, details?: unknown) {
		super(message);
		this.name = "SqlDagError";
		this.code = code;
		this.details = details;

		// Maintains proper stack trace for where our error was thrown (V8 only)
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

/**
 * Error thrown when engine configuration is invalid
 *
 * @example
 * ```typescript
 * throw new ConfigurationError('SqlDag requires a definitions source');
 * ```
 */
export class ConfigurationError extends SqlDagError {
	constructor(message: string, details?: unknown) {
		super(message, "CONFIGURATION_ERROR", details);
		this.name = "ConfigurationError";
	}
}

/**
 * Error thrown when a template placeholder has no value and no default
 */
export class UndefinedVariableError extends SqlDagError {
	/** Name of the unresolved variable */
	public readonly variable: string;

	/** Definition in which the placeholder appears */
	public readonly origin?: string;

	constructor(variable: string, origin?: string) {
		super(
			origin
				? `Variable "${variable}" is not set (referenced in ${origin})`
				: `Variable "${variable}" is not set`,
			"UNDEFINED_VARIABLE",
			{ variable, origin },
		);
		this.name = "UndefinedVariableError";
		this.variable = variable;
		if (origin !== undefined) {
			this.origin = origin;
		}
	}
}

// ============================================================================
// REGISTRY ERRORS
// ============================================================================

/**
 * Error thrown when two definitions normalize to the same unit name
 *
 * @example
 * ```typescript
 * // staging/orders.sql and marts/orders.sql
 * throw new DuplicateNameError('orders', ['staging/orders.sql', 'marts/orders.sql']);
 * ```
 */
export class DuplicateNameError extends SqlDagError {
	/** The colliding unit name */
	public readonly unitName: string;

	/** Labels of the colliding definitions */
	public readonly origins: string[];

	constructor(unitName: string, origins: string[]) {
		super(
			`Duplicate unit name "${unitName}" defined by: ${origins.join(", ")}`,
			"DUPLICATE_NAME",
			{ unitName, origins },
		);
		this.name = "DuplicateNameError";
		this.unitName = unitName;
		this.origins = origins;
	}
}

/**
 * Error thrown when a unit is looked up by a name the registry does not hold
 */
export class UnitNotFoundError extends SqlDagError {
	/** The unit that was requested */
	public readonly unitName: string;

	constructor(unitName: string, available: string[]) {
		super(
			`Unit "${unitName}" not found. Available units: ${available.join(", ")}`,
			"UNIT_NOT_FOUND",
			{ unitName, available },
		);
		this.name = "UnitNotFoundError";
		this.unitName = unitName;
	}
}

// ============================================================================
// DEPENDENCY ERRORS
// ============================================================================

/**
 * Error thrown when circular dependencies are detected
 *
 * `cycle` lists each unit on the cycle once, in discovery order, starting
 * from the unit that was reached a second time.
 *
 * @example
 * ```typescript
 * // Detected cycle: X → Y → X
 * throw new CircularDependencyError(['X', 'Y']);
 * ```
 */
export class CircularDependencyError extends SqlDagError {
	/** The units forming the cycle */
	public readonly cycle: string[];

	constructor(cycle: string[]) {
		const closed = cycle.length > 0 ? [...cycle, cycle[0]] : [];
		super(
			`Circular dependency detected: ${closed.join(" → ")}\n` +
				"Each unit may only read from units that do not read from it.",
			"CIRCULAR_DEPENDENCY",
			{ cycle },
		);
		this.name = "CircularDependencyError";
		this.cycle = cycle;
	}
}

/**
 * Error thrown when an execution order cannot be produced
 *
 * This indicates the graph handed to the scheduler was never validated.
 */
export class ExecutionOrderError extends SqlDagError {
	/** Units that could not be placed */
	public readonly stuck: string[];

	constructor(stuck: string[], details?: unknown) {
		super(
			"Unable to create an execution order. " +
				`Stuck units: ${stuck.join(", ")}. ` +
				"This indicates a circular dependency.",
			"EXECUTION_ORDER_ERROR",
			details,
		);
		this.name = "ExecutionOrderError";
		this.stuck = stuck;
	}
}

// ============================================================================
// PARSE ERRORS
// ============================================================================

/**
 * Error thrown when SQL text cannot be parsed
 */
export class ParseError extends SqlDagError {
	/** Definition the text came from, when known */
	public readonly origin?: string;

	constructor(message: string, origin?: string, cause?: unknown) {
		super(
			origin ? `Failed to parse ${origin}: ${message}` : message,
			"PARSE_ERROR",
			{ origin, cause: cause instanceof Error ? cause.message : cause },
		);
		this.name = "ParseError";
		if (origin !== undefined) {
			this.origin = origin;
		}
	}
}

// ============================================================================
// EXECUTION ERRORS
// ============================================================================

/**
 * Error thrown when the store rejects a statement
 */
export class ExecutionError extends SqlDagError {
	/** Unit being materialized */
	public readonly unitName: string;

	/** Statement the store rejected */
	public readonly statement?: string;

	constructor(unitName: string, cause: unknown, statement?: string) {
		super(
			`Unit "${unitName}" failed: ${getErrorMessage(cause)}`,
			"EXECUTION_ERROR",
			{ unitName, statement, cause: getErrorMessage(cause) },
		);
		this.name = "ExecutionError";
		this.unitName = unitName;
		if (statement !== undefined) {
			this.statement = statement;
		}
	}
}

/**
 * Error thrown when a routine raises or returns an unusable table
 */
export class RoutineError extends SqlDagError {
	/** Routine unit that failed */
	public readonly unitName: string;

	constructor(unitName: string, cause: unknown) {
		super(
			`Routine "${unitName}" failed: ${getErrorMessage(cause)}`,
			"ROUTINE_ERROR",
			{ unitName, cause: getErrorMessage(cause) },
		);
		this.name = "RoutineError";
		this.unitName = unitName;
	}
}

// ============================================================================
// VALIDATION ERRORS
// ============================================================================

/**
 * Error thrown when validation fails
 */
export class ValidationError extends SqlDagError {
	/** The field that failed validation */
	public readonly field?: string;

	constructor(message: string, field?: string, details?: unknown) {
		super(
			message,
			"VALIDATION_ERROR",
			ValidationError.buildDetails(field, details),
		);
		this.name = "ValidationError";
		if (field !== undefined) {
			this.field = field;
		}
	}

	private static buildDetails(
		field?: string,
		details?: unknown,
	): Record<string, unknown> {
		const result: Record<string, unknown> = {};

		if (field !== undefined) {
			result.field = field;
		}

		if (details !== undefined) {
			if (typeof details === "object" && details !== null) {
				Object.assign(result, details);
			} else {
				result.details = details;
			}
		}

		return result;
	}
}

// ============================================================================
// UTILITY FUNCTIONS
// ============================================================================

/**
 * Type guard to check if an error is a SqlDagError
 */
export function isSqlDagError(error: unknown): error is SqlDagError {
	return error instanceof SqlDagError;
}

/**
 * Normalize any error to a proper Error instance
 */
export function normalizeError(error: unknown): Error {
	if (error instanceof Error) {
		return error;
	}

	if (typeof error === "string") {
		return new Error(error);
	}

	return new Error(String(error));
}

/**
 * Extract error message safely from any error type
 */
export function getErrorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}

	if (typeof error === "string") {
		return error;
	}

	return String(error);
}
