import type { SkipReason } from "./core/shared/constants.js";
import type { Routine } from "./routine.js";

// ============================================================================
// TABLES
// ============================================================================

/**
 * Scalar value a table cell may hold
 */
export type CellValue = string | number | bigint | boolean | null | Buffer;

/**
 * In-memory relation exchanged between the store and routines
 */
export interface Table {
	columns: string[];
	rows: Array<Record<string, CellValue>>;
}

// ============================================================================
// DEFINITIONS & UNITS
// ============================================================================

/**
 * Raw transformation definition, before templating and parsing.
 *
 * `label` identifies the definition (usually its path relative to the
 * definitions directory); the unit name is its base name without extension.
 */
export type UnitDefinition =
	| {
			kind: "declarative";
			label: string;
			text: string;
	  }
	| {
			kind: "routine";
			label: string;
			routine: Routine;
	  };

/**
 * One statement of a declarative unit
 */
export interface SqlStatement {
	text: string;
	/** True for the single statement whose result is materialized */
	producing: boolean;
}

interface UnitBase {
	/** Unique, case-sensitive unit name */
	readonly name: string;
	/** Label of the definition the unit was loaded from */
	readonly origin: string;
}

export interface DeclarativeUnit extends UnitBase {
	readonly kind: "declarative";
	/** Templated query text as written */
	readonly declarativeText: string;
	/** Statements in file order; exactly one of them is producing */
	readonly statements: readonly SqlStatement[];
}

export interface RoutineUnit extends UnitBase {
	readonly kind: "routine";
	/** Templated source query, used for dependency inference and getSource() */
	readonly declarativeText?: string;
	readonly routine: Routine;
}

export type TransformationUnit = DeclarativeUnit | RoutineUnit;

// ============================================================================
// RUN RESULTS
// ============================================================================

export type FailurePolicy = "fail-fast" | "continue-on-error";

export type UnitStatus = "succeeded" | "failed" | "skipped";

export interface UnitOutcome {
	name: string;
	status: UnitStatus;
	/** Present iff status is "failed" */
	error?: Error;
	/** Failed unit that caused this one to be skipped */
	skippedBecause?: string;
	/** Present iff status is "skipped" */
	skipReason?: SkipReason;
	durationMs: number;
}

export interface RunReport {
	runId: string;
	startedAt: Date;
	durationMs: number;
	failurePolicy: FailurePolicy;
	namespace: string;
	outcomes: UnitOutcome[];
	succeeded: number;
	failed: number;
	skipped: number;
	/** True when no unit failed */
	ok: boolean;
}

/**
 * Ordered, immutable sequence of unit names to execute
 */
export interface ExecutionPlan {
	readonly order: readonly string[];
	/** Unit name → names of the units it reads from */
	readonly dependencies: Readonly<Record<string, readonly string[]>>;
}

// ============================================================================
// PROGRESS & CALLBACKS
// ============================================================================

export interface ProgressUpdate {
	completed: number;
	total: number;
	percent: number;
	succeeded: number;
	failed: number;
	skipped: number;
	currentUnit: string;
	elapsedSeconds: number;
	etaSeconds: number;
}

export interface RunOptions {
	/** Called once the execution order is known, before any unit runs */
	onPlan?: (plan: ExecutionPlan) => void | Promise<void>;
	onUnitStart?: (unit: TransformationUnit) => void | Promise<void>;
	onUnitComplete?: (outcome: UnitOutcome) => void | Promise<void>;
	onProgress?: (progress: ProgressUpdate) => void;
	/** Receives failed units and failing callbacks */
	onError?: (context: string, error: Error) => void;
}

// ============================================================================
// LOGGING
// ============================================================================

/**
 * Minimal logger contract; `console` satisfies it
 */
export interface Logger {
	debug(...args: unknown[]): void;
	info(...args: unknown[]): void;
	warn(...args: unknown[]): void;
	error(...args: unknown[]): void;
}
