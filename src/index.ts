/**
 * @module sqldag
 *
 * Dependency-ordered SQL and routine transformations on an embedded
 * SQLite database.
 *
 * @example Basic Usage
 * ```typescript
 * import { SqlDag } from 'sqldag';
 *
 * const dag = new SqlDag({ definitions: './transformations' });
 * const report = await dag.run();
 *
 * for (const outcome of report.outcomes) {
 *   console.log(outcome.name, outcome.status);
 * }
 * ```
 *
 * @example Routines
 * ```typescript
 * import { defineRoutine } from 'sqldag';
 *
 * export default defineRoutine({
 *   source: 'select * from stg_orders',
 *   run: async (ctx) => {
 *     const orders = await ctx.getSource();
 *     return { columns: ['orders'], rows: [{ orders: orders.rows.length }] };
 *   },
 * });
 * ```
 */

// ============================================================================
// ENGINE, REGISTRY, ANALYSIS, EXECUTION
// ============================================================================

export * from "./core/index.js";

// ============================================================================
// ROUTINES
// ============================================================================

export { Routine, defineRoutine, isRoutine } from "./routine.js";
export type { RoutineContext, RoutineDefinition } from "./routine.js";
export { RoutineRegistry } from "./routine-registry.js";

// ============================================================================
// PARSING
// ============================================================================

export { SqlParser } from "./parsing/sql-parser.js";
export type { QueryParser } from "./parsing/types.js";

// ============================================================================
// STORE
// ============================================================================

export { SqliteStore, openSqliteStore } from "./store/sqlite-store.js";
export type { Store } from "./store/types.js";

// ============================================================================
// CORE TYPES
// ============================================================================

export type {
	CellValue,
	Table,
	UnitDefinition,
	SqlStatement,
	DeclarativeUnit,
	RoutineUnit,
	TransformationUnit,
	FailurePolicy,
	UnitStatus,
	UnitOutcome,
	RunReport,
	ExecutionPlan,
	ProgressUpdate,
	RunOptions,
	Logger,
} from "./types.js";
