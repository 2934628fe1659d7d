import type { RoutineUnit, Table } from "./types.js";

/**
 * Read access to the store handed to a routine while it runs
 */
export interface RoutineContext {
	/** The unit being materialized */
	unit: RoutineUnit;

	/** Namespace the result will be written to */
	namespace: string;

	/**
	 * Result of the routine's declared source query
	 *
	 * @throws {RoutineError} If the routine declares no source query
	 */
	getSource(): Promise<Table>;

	/** Run an arbitrary read query */
	query(sql: string): Promise<Table>;

	/** Read a whole relation from the target namespace */
	readTable(name: string): Promise<Table>;
}

/**
 * Imperative transformation unit
 *
 * Subclasses implement `run()`; the returned table is materialized under the
 * unit's name. A routine that reads other units declares that through
 * `sourceQuery()` so the scheduler can order it after them.
 *
 * @example
 * ```typescript
 * export default class OrderTotals extends Routine {
 *   sourceQuery() {
 *     return "select * from stg_orders";
 *   }
 *
 *   async run(context: RoutineContext): Promise<Table> {
 *     const orders = await context.getSource();
 *     return { columns: ["count"], rows: [{ count: orders.rows.length }] };
 *   }
 * }
 * ```
 */
export abstract class Routine {
	/**
	 * Query whose relations this routine reads (optional)
	 *
	 * @returns SQL text, or undefined when the routine reads nothing
	 */
	sourceQuery?(): string | undefined;

	/**
	 * Produce the unit's table (REQUIRED)
	 */
	abstract run(context: RoutineContext): Table | Promise<Table>;
}

/**
 * Plain-object routine shape accepted by {@link defineRoutine}
 */
export interface RoutineDefinition {
	source?: string;
	run(context: RoutineContext): Table | Promise<Table>;
}

/**
 * Build a routine from a plain object
 *
 * @example
 * ```typescript
 * export default defineRoutine({
 *   source: "select * from orders",
 *   run: async (ctx) => ctx.getSource(),
 * });
 * ```
 */
export function defineRoutine(definition: RoutineDefinition): Routine {
	class DefinedRoutine extends Routine {
		override sourceQuery(): string | undefined {
			return definition.source;
		}

		run(context: RoutineContext): Table | Promise<Table> {
			return definition.run(context);
		}
	}

	return new DefinedRoutine();
}

/**
 * Structural check for the routine contract
 *
 * Modules loaded from disk may come from a different copy of this package,
 * so `instanceof` alone is not enough.
 */
export function isRoutine(value: unknown): value is Routine {
	if (value instanceof Routine) {
		return true;
	}
	if (typeof value !== "object" || value === null || !("run" in value)) {
		return false;
	}
	if (typeof value.run !== "function") {
		return false;
	}
	return !("sourceQuery" in value) || typeof value.sourceQuery === "function";
}
