import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { UnitExecutor, toTable } from "../../src/core/execution/unit-executor.js";
import { ExecutionError, RoutineError } from "../../src/core/shared/errors.js";
import { SqlParser } from "../../src/parsing/sql-parser.js";
import { defineRoutine } from "../../src/routine.js";
import { SqliteStore } from "../../src/store/sqlite-store.js";
import type { RoutineUnit, TransformationUnit } from "../../src/types.js";
import { loadProject } from "../helpers/project.js";

function routineUnit(unit: TransformationUnit): RoutineUnit {
	if (unit.kind !== "routine") {
		throw new Error(`${unit.name} is not a routine`);
	}
	return unit;
}

describe("UnitExecutor - declarative units", () => {
	let store: SqliteStore;
	let executor: UnitExecutor;

	beforeEach(() => {
		store = new SqliteStore();
		executor = new UnitExecutor(store, "main");
	});

	afterEach(async () => {
		await store.close();
	});

	test("runs setup statements before the producing one", async () => {
		const { registry } = loadProject({
			"doubled.sql":
				"create temp table scratch as select 3 as n; select n * 2 as doubled from scratch",
		});

		await executor.execute(registry.get("doubled"));

		expect((await store.readAsTable("main", "doubled")).rows).toEqual([{ doubled: 6 }]);
	});

	test("setup statements after the query still run before it", async () => {
		await store.materializeTable({ columns: ["id"], rows: [{ id: 1 }] }, "main", "raw");
		const { registry } = loadProject({
			"counted.sql": "select count(*) as n from raw; insert into raw values (2)",
		});

		await executor.execute(registry.get("counted"));

		expect((await store.readAsTable("main", "counted")).rows).toEqual([{ n: 2 }]);
	});

	test("runs setup statements exactly as written", async () => {
		const { registry } = loadProject(
			{
				"labelled.sql":
					"create temp table ids (id integer primary key autoincrement, v text);\n" +
					"insert into ids (v) values ('a');\n" +
					"select * from ids",
			},
			new SqlParser(),
		);

		await executor.execute(registry.get("labelled"));

		expect((await store.readAsTable("main", "labelled")).rows).toEqual([{ id: 1, v: "a" }]);
	});

	test("wraps store failures in ExecutionError with the statement", async () => {
		const { registry } = loadProject({ "A.sql": "select * from missing_source" });

		const failure = executor.execute(registry.get("A"));

		await expect(failure).rejects.toBeInstanceOf(ExecutionError);
		await expect(failure).rejects.toMatchObject({
			unitName: "A",
			statement: "select * from missing_source",
			message: 'Unit "A" failed: no such table: missing_source',
		});
	});

	test("materializes into the executor's namespace", async () => {
		const { registry } = loadProject({ "t.sql": "select 1 as one" });
		await store.ensureNamespace("analytics");

		await new UnitExecutor(store, "analytics").execute(registry.get("t"));

		expect(await store.relationExists("analytics", "t")).toBe(true);
		expect(await store.relationExists("main", "t")).toBe(false);
	});
});

describe("UnitExecutor - routines", () => {
	let store: SqliteStore;
	let executor: UnitExecutor;

	beforeEach(async () => {
		store = new SqliteStore();
		executor = new UnitExecutor(store, "main");
		await store.materializeTable(
			{ columns: ["amount"], rows: [{ amount: 5 }, { amount: 7 }] },
			"main",
			"payments",
		);
	});

	afterEach(async () => {
		await store.close();
	});

	test("getSource returns the source query's rows", async () => {
		const { registry } = loadProject({
			payments_total: defineRoutine({
				source: "select * from payments",
				run: async (context) => {
					const payments = await context.getSource();
					const total = payments.rows.reduce(
						(sum, row) => sum + (typeof row.amount === "number" ? row.amount : 0),
						0,
					);
					return { columns: ["total"], rows: [{ total }] };
				},
			}),
		});

		await executor.execute(registry.get("payments_total"));

		expect((await store.readAsTable("main", "payments_total")).rows).toEqual([{ total: 12 }]);
	});

	test("readTable and query reach the store", async () => {
		const { registry } = loadProject({
			copy: defineRoutine({
				run: async (context) => {
					const table = await context.readTable("payments");
					const count = await context.query("select count(*) as n from payments");
					return {
						columns: ["rows", "counted"],
						rows: [{ rows: table.rows.length, counted: count.rows[0]?.n ?? null }],
					};
				},
			}),
		});

		await executor.execute(registry.get("copy"));

		expect((await store.readAsTable("main", "copy")).rows).toEqual([{ rows: 2, counted: 2 }]);
	});

	test("the context exposes the unit and namespace", () => {
		const { registry } = loadProject({
			seed: defineRoutine({ run: () => ({ columns: ["x"], rows: [] }) }),
		});
		const unit = routineUnit(registry.get("seed"));

		const context = executor.createContext(unit);

		expect(context.unit).toBe(unit);
		expect(context.namespace).toBe("main");
	});

	test("getSource without a source query is a RoutineError", async () => {
		const { registry } = loadProject({
			seed: defineRoutine({ run: (context) => context.getSource() }),
		});

		await expect(executor.execute(registry.get("seed"))).rejects.toThrow(
			'Routine "seed" failed: routine declares no source query',
		);
	});

	test("a thrown error becomes a RoutineError", async () => {
		const { registry } = loadProject({
			boom: defineRoutine({
				run: () => {
					throw new Error("exploded");
				},
			}),
		});

		const failure = executor.execute(registry.get("boom"));

		await expect(failure).rejects.toBeInstanceOf(RoutineError);
		await expect(failure).rejects.toThrow('Routine "boom" failed: exploded');
	});

	test("an invalid table is a RoutineError and nothing is written", async () => {
		const { registry } = loadProject({
			dupes: defineRoutine({ run: () => ({ columns: ["a", "a"], rows: [] }) }),
		});

		await expect(executor.execute(registry.get("dupes"))).rejects.toThrow(
			'Routine "dupes" failed: column "a" appears twice',
		);
		expect(await store.relationExists("main", "dupes")).toBe(false);
	});
});

describe("toTable", () => {
	test("fills missing cells with null and drops unknown keys", () => {
		expect(
			toTable("t", { columns: ["a", "b"], rows: [{ a: 1, extra: true }] }),
		).toEqual({ columns: ["a", "b"], rows: [{ a: 1, b: null }] });
	});

	test("stores nested values as JSON text", () => {
		expect(toTable("t", { columns: ["meta"], rows: [{ meta: { k: 1 } }] }).rows).toEqual([
			{ meta: '{"k":1}' },
		]);
	});

	test.each([
		[42, "run() must return a table"],
		[{ rows: [] }, "returned table has no columns array"],
		[{ columns: ["a"] }, "returned table has no rows array"],
		[{ columns: [], rows: [] }, "returned table has no columns"],
		[{ columns: [""], rows: [] }, "column names must be non-empty strings"],
		[{ columns: ["a"], rows: [[1]] }, "row 0 is not an object"],
	])("rejects %j", (value, reason) => {
		expect(() => toTable("t", value)).toThrow(`Routine "t" failed: ${reason}`);
	});
});
