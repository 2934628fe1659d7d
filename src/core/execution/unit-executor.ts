/**
 * Materializes a single unit
 *
 * @module execution/unit-executor
 */

import type { RoutineContext } from "../../routine.js";
import type { Store } from "../../store/types.js";
import type {
	CellValue,
	DeclarativeUnit,
	RoutineUnit,
	Table,
	TransformationUnit,
} from "../../types.js";
import { ExecutionError, RoutineError } from "../shared/errors.js";
import { toCellValue } from "../shared/utils.js";

export class UnitExecutor {
	constructor(
		private readonly store: Store,
		private readonly namespace: string,
	) {}

	/**
	 * Build `unit` as `namespace.<unit name>`, replacing the previous result
	 *
	 * @throws {ExecutionError} If the store rejects a statement
	 * @throws {RoutineError} If a routine throws or returns an unusable table
	 */
	async execute(unit: TransformationUnit): Promise<void> {
		if (unit.kind === "declarative") {
			await this.executeDeclarative(unit);
		} else {
			await this.executeRoutine(unit);
		}
	}

	createContext(unit: RoutineUnit): RoutineContext {
		const { store, namespace } = this;
		return {
			unit,
			namespace,
			getSource: async () => {
				if (unit.declarativeText === undefined) {
					throw new RoutineError(unit.name, "routine declares no source query");
				}
				return store.query(unit.declarativeText);
			},
			query: (sql) => store.query(sql),
			readTable: (name) => store.readAsTable(namespace, name),
		};
	}

	/**
	 * Setup statements run first, in file order; the producing statement is
	 * materialized last
	 */
	private async executeDeclarative(unit: DeclarativeUnit): Promise<void> {
		const setup = unit.statements.filter((statement) => !statement.producing);
		const producing = unit.statements.filter((statement) => statement.producing);

		for (const statement of setup) {
			try {
				await this.store.execute(statement.text);
			} catch (error) {
				throw new ExecutionError(unit.name, error, statement.text);
			}
		}
		for (const statement of producing) {
			try {
				await this.store.executeAndMaterialize(
					statement.text,
					this.namespace,
					unit.name,
				);
			} catch (error) {
				throw new ExecutionError(unit.name, error, statement.text);
			}
		}
	}

	private async executeRoutine(unit: RoutineUnit): Promise<void> {
		let result: unknown;
		try {
			result = await unit.routine.run(this.createContext(unit));
		} catch (error) {
			throw error instanceof RoutineError
				? error
				: new RoutineError(unit.name, error);
		}

		const table = toTable(unit.name, result);
		try {
			await this.store.materializeTable(table, this.namespace, unit.name);
		} catch (error) {
			throw new ExecutionError(unit.name, error);
		}
	}
}

/**
 * Check a routine's return value against the table contract
 *
 * @throws {RoutineError} If it has no columns, repeats a column, or has a
 *   row that is not an object
 */
export function toTable(unitName: string, value: unknown): Table {
	if (typeof value !== "object" || value === null) {
		throw new RoutineError(unitName, "run() must return a table");
	}
	if (!("columns" in value) || !Array.isArray(value.columns)) {
		throw new RoutineError(unitName, "returned table has no columns array");
	}
	if (!("rows" in value) || !Array.isArray(value.rows)) {
		throw new RoutineError(unitName, "returned table has no rows array");
	}

	const columns: string[] = [];
	for (const column of value.columns) {
		if (typeof column !== "string" || column === "") {
			throw new RoutineError(unitName, "column names must be non-empty strings");
		}
		if (columns.includes(column)) {
			throw new RoutineError(unitName, `column "${column}" appears twice`);
		}
		columns.push(column);
	}
	if (columns.length === 0) {
		throw new RoutineError(unitName, "returned table has no columns");
	}

	const rows = value.rows.map((row: unknown, index: number) => {
		if (typeof row !== "object" || row === null || Array.isArray(row)) {
			throw new RoutineError(unitName, `row ${index} is not an object`);
		}
		const cells: Record<string, CellValue> = {};
		for (const column of columns) {
			cells[column] = toCellValue(Reflect.get(row, column));
		}
		return cells;
	});

	return { columns, rows };
}
