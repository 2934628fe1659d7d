import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { SqlDag } from "../src/core/engine/sql-dag.js";
import {
	CircularDependencyError,
	ConfigurationError,
	DuplicateNameError,
	UndefinedVariableError,
} from "../src/core/shared/errors.js";
import { defineRoutine } from "../src/routine.js";
import { RoutineRegistry } from "../src/routine-registry.js";
import { SqliteStore } from "../src/store/sqlite-store.js";
import { fixturePath } from "./helpers/project.js";
import { createRecordingLogger } from "./helpers/recording-logger.js";

const WAREHOUSE_ORDER = ["stg_customers", "stg_orders", "customer_orders", "order_count"];

describe("SqlDag", () => {
	let store: SqliteStore;

	beforeEach(() => {
		store = new SqliteStore();
	});

	afterEach(async () => {
		await store.close();
	});

	function warehouse(logger = createRecordingLogger().logger) {
		return new SqlDag({ definitions: fixturePath("warehouse"), store, logger });
	}

	// ============================================================================
	// RUNNING
	// ============================================================================

	describe("run", () => {
		test("materializes a definitions directory in dependency order", async () => {
			const report = await warehouse().run();

			expect(report.ok).toBe(true);
			expect(report.outcomes.map((o) => o.name)).toEqual(WAREHOUSE_ORDER);
			expect((await store.readAsTable("main", "customer_orders")).rows).toEqual([
				{ customer_id: 10, name: "Ada", amount: 25 },
			]);
			expect((await store.readAsTable("main", "order_count")).rows).toEqual([{ orders: 1 }]);
		});

		test("running again replaces previous results", async () => {
			const dag = warehouse();

			await dag.run();
			const second = await dag.run();

			expect(second.ok).toBe(true);
			expect((await store.readAsTable("main", "order_count")).rows).toEqual([{ orders: 1 }]);
		});

		test("rebuilds a relation that was dropped between runs", async () => {
			const dag = warehouse();
			await dag.run();
			await store.dropRelation("main", "stg_orders");

			const report = await dag.run();

			expect(report.succeeded).toBe(4);
			expect(await store.relationExists("main", "stg_orders")).toBe(true);
		});

		test("re-running keeps views over a unit working", async () => {
			const dag = new SqlDag({
				definitions: { "A.sql": "select 1 as id" },
				store,
				logger: createRecordingLogger().logger,
			});
			await dag.run();
			await store.execute("create view report as select * from A");

			const report = await dag.run();

			expect(report.outcomes.map((o) => [o.name, o.status])).toEqual([["A", "succeeded"]]);
			expect((await store.query("select * from report")).rows).toEqual([{ id: 1 }]);
		});

		test("leaves a supplied store open", async () => {
			await warehouse().run();

			expect((await store.query("select count(*) as n from stg_orders")).rows).toEqual([{ n: 1 }]);
		});

		test("logs the load at debug level", async () => {
			const recording = createRecordingLogger();

			await warehouse(recording.logger).load();

			expect(recording.messages("debug")).toEqual([
				"Loaded 4 units",
				"Execution order: stg_customers → stg_orders → customer_orders → order_count",
			]);
		});

		test("continue-on-error keeps independent units running", async () => {
			const dag = new SqlDag({
				definitions: fixturePath("broken"),
				store,
				logger: createRecordingLogger().logger,
				execution: { failurePolicy: "continue-on-error" },
			});

			const report = await dag.run();

			expect(report.outcomes.map((o) => [o.name, o.status])).toEqual([
				["A", "failed"],
				["B", "skipped"],
				["C", "succeeded"],
			]);
			expect(report.outcomes[0]?.error?.message).toBe(
				'Unit "A" failed: no such table: missing_source',
			);
		});

		test("fail-fast is the default", async () => {
			const dag = new SqlDag({
				definitions: fixturePath("broken"),
				store,
				logger: createRecordingLogger().logger,
			});

			const report = await dag.run();

			expect(report.failurePolicy).toBe("fail-fast");
			expect(report.outcomes.map((o) => o.status)).toEqual(["failed", "skipped", "skipped"]);
		});

		test("materializes into the configured namespace", async () => {
			const dag = new SqlDag({
				definitions: {
					"orders.sql": "select 1 as id",
					"totals.sql": "select count(*) as n from analytics.orders",
				},
				namespace: "analytics",
				store,
				logger: createRecordingLogger().logger,
			});

			const report = await dag.run();

			expect(report.namespace).toBe("analytics");
			expect(await dag.plan()).toEqual({
				order: ["orders", "totals"],
				dependencies: { orders: [], totals: ["orders"] },
			});
			expect((await store.readAsTable("analytics", "totals")).rows).toEqual([{ n: 1 }]);
		});

		test("runs registered routines alongside definitions", async () => {
			const routines = RoutineRegistry.from({
				order_total: defineRoutine({
					source: "select * from stg_orders",
					run: async (context) => {
						const orders = await context.getSource();
						const total = orders.rows.reduce(
							(sum, row) => sum + (typeof row.amount === "number" ? row.amount : 0),
							0,
						);
						return { columns: ["total"], rows: [{ total }] };
					},
				}),
			});
			const dag = new SqlDag({
				definitions: fixturePath("warehouse"),
				routines,
				store,
				logger: createRecordingLogger().logger,
			});

			const report = await dag.run();

			expect(report.outcomes.map((o) => o.name)).toEqual([...WAREHOUSE_ORDER, "order_total"]);
			expect((await store.readAsTable("main", "order_total")).rows).toEqual([{ total: 25 }]);
		});
	});

	// ============================================================================
	// LOADING
	// ============================================================================

	describe("load", () => {
		test("is cached until reload", async () => {
			const dag = warehouse();

			const first = await dag.load();

			expect(await dag.load()).toBe(first);
			expect(await dag.reload()).not.toBe(first);
		});

		test("rejects a cycle", async () => {
			const dag = new SqlDag({ definitions: fixturePath("cycle"), store });

			const failure = dag.run();

			await expect(failure).rejects.toBeInstanceOf(CircularDependencyError);
			await expect(failure).rejects.toMatchObject({ cycle: ["X", "Y"] });
		});

		test("rejects two definitions with the same unit name", async () => {
			const dag = new SqlDag({ definitions: fixturePath("duplicates"), store });

			const failure = dag.load();

			await expect(failure).rejects.toBeInstanceOf(DuplicateNameError);
			await expect(failure).rejects.toThrow(
				'Duplicate unit name "orders" defined by: marts/orders.sql, staging/orders.sql',
			);
		});

		test("renders placeholders from variables", async () => {
			const dag = new SqlDag({
				definitions: fixturePath("templated"),
				templating: { variables: { SQLDAG_REGION: "emea" }, env: {} },
				store,
				logger: createRecordingLogger().logger,
			});

			await dag.run();

			expect((await store.readAsTable("main", "region")).rows).toEqual([{ region: "emea" }]);
		});

		test("a placeholder without a value fails the load", async () => {
			const dag = new SqlDag({
				definitions: fixturePath("templated"),
				templating: { env: {} },
				store,
			});

			const failure = dag.load();

			await expect(failure).rejects.toBeInstanceOf(UndefinedVariableError);
			await expect(failure).rejects.toThrow(
				'Variable "SQLDAG_REGION" is not set (referenced in region.sql)',
			);
		});
	});

	// ============================================================================
	// ANALYTICS & EXPORT
	// ============================================================================

	describe("analytics and export", () => {
		test("summarizes the graph", async () => {
			const analytics = await warehouse().getGraphAnalytics();

			expect(analytics).toMatchObject({
				totalUnits: 4,
				totalDependencies: 3,
				roots: ["stg_customers", "stg_orders"],
				leaves: ["customer_orders", "order_count"],
				maxDepth: 2,
				criticalPath: ["stg_customers", "customer_orders"],
				bottlenecks: [],
			});
		});

		test("exports lineage as Mermaid", async () => {
			expect(await warehouse().exportGraphMermaid()).toBe(
				"flowchart LR\n" +
					"  customer_orders(customer_orders)\n" +
					"  stg_customers --> customer_orders\n" +
					"  stg_orders --> customer_orders\n" +
					"  order_count(order_count)\n" +
					"  stg_orders --> order_count\n" +
					"  stg_customers(stg_customers)\n" +
					"  stg_orders(stg_orders)\n",
			);
		});

		test("JSON export has one link per dependency", async () => {
			const exported = await warehouse().exportGraphJSON();

			expect(exported.nodes.map((node) => node.id)).toEqual([
				"customer_orders",
				"order_count",
				"stg_customers",
				"stg_orders",
			]);
			expect(exported.links).toHaveLength(3);
		});
	});

	// ============================================================================
	// CONFIGURATION
	// ============================================================================

	describe("configuration", () => {
		test("applies defaults", () => {
			const dag = new SqlDag({ definitions: {} });

			expect(dag.getExecutionConfig()).toEqual({ failurePolicy: "fail-fast" });
			expect(dag.getNamespace()).toBe("main");
			expect(dag.getParser().dialect).toBe("sqlite");
		});

		test("rejects a store together with a database path", () => {
			expect(() => new SqlDag({ definitions: {}, store, database: ":memory:" })).toThrow(
				ConfigurationError,
			);
		});
	});
});
