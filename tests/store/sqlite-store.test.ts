import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { existsSync } from "node:fs";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { ValidationError } from "../../src/core/shared/errors.js";
import { SqliteStore, quoteIdentifier } from "../../src/store/sqlite-store.js";

describe("SqliteStore - materialization", () => {
	let store: SqliteStore;

	beforeEach(() => {
		store = new SqliteStore();
	});

	afterEach(async () => {
		await store.close();
	});

	test("materializes a query result", async () => {
		await store.executeAndMaterialize("select 1 as id, 'alpha' as label", "main", "things");

		expect(await store.readAsTable("main", "things")).toEqual({
			columns: ["id", "label"],
			rows: [{ id: 1, label: "alpha" }],
		});
	});

	test("replaces the previous result and leaves no staging table", async () => {
		await store.executeAndMaterialize("select 1 as id, 'alpha' as label", "main", "things");
		await store.executeAndMaterialize("select 2 as id, 'beta' as label", "main", "things");

		expect((await store.readAsTable("main", "things")).rows).toEqual([
			{ id: 2, label: "beta" },
		]);
		expect(await store.relationExists("main", "__sqldag_staging_things")).toBe(false);
	});

	test("replaces a view of the same name with a table", async () => {
		await store.execute("create view shadow as select 1 as v");
		await store.executeAndMaterialize("select 5 as v", "main", "shadow");

		expect((await store.readAsTable("main", "shadow")).rows).toEqual([{ v: 5 }]);
		expect(
			(await store.query("select type from sqlite_master where name = 'shadow'")).rows,
		).toEqual([{ type: "table" }]);
	});

	test("a view reading the relation survives its rebuild", async () => {
		await store.executeAndMaterialize("select 1 as id", "main", "A");
		await store.execute("create view report as select * from A");

		await store.executeAndMaterialize("select 2 as id", "main", "A");

		expect((await store.query("select * from report")).rows).toEqual([{ id: 2 }]);
		expect((await store.query("pragma legacy_alter_table")).rows).toEqual([
			{ legacy_alter_table: 0 },
		]);
	});

	test("a view reading a routine result survives its rebuild", async () => {
		await store.materializeTable({ columns: ["n"], rows: [{ n: 1 }] }, "main", "counts");
		await store.execute("create view doubled as select n * 2 as twice from counts");

		await store.materializeTable({ columns: ["n"], rows: [{ n: 4 }] }, "main", "counts");

		expect((await store.query("select * from doubled")).rows).toEqual([{ twice: 8 }]);
	});

	test("a failed query keeps the previous result", async () => {
		await store.executeAndMaterialize("select 1 as id", "main", "things");

		await expect(
			store.executeAndMaterialize("select * from missing_table", "main", "things"),
		).rejects.toThrow("no such table: missing_table");
		expect((await store.readAsTable("main", "things")).rows).toEqual([{ id: 1 }]);
		expect(await store.relationExists("main", "__sqldag_staging_things")).toBe(false);
	});

	test("materializes an in-memory table", async () => {
		await store.materializeTable(
			{
				columns: ["name", "active", "note"],
				rows: [
					{ name: "a", active: true, note: null },
					{ name: "b", active: false, note: "second" },
				],
			},
			"main",
			"flags",
		);

		expect(await store.readAsTable("main", "flags")).toEqual({
			columns: ["name", "active", "note"],
			rows: [
				{ name: "a", active: 1, note: null },
				{ name: "b", active: 0, note: "second" },
			],
		});
	});

	test("materializes an empty table with its columns", async () => {
		await store.materializeTable({ columns: ["x"], rows: [] }, "main", "empty");

		expect(await store.readAsTable("main", "empty")).toEqual({ columns: ["x"], rows: [] });
	});

	test("query runs a statement that returns no rows", async () => {
		expect(await store.query("create table z (a)")).toEqual({ columns: [], rows: [] });
		expect(await store.relationExists("main", "z")).toBe(true);
	});
});

describe("SqliteStore - namespaces", () => {
	let store: SqliteStore;

	beforeEach(() => {
		store = new SqliteStore();
	});

	afterEach(async () => {
		await store.close();
	});

	test("materializes into an attached namespace", async () => {
		await store.ensureNamespace("analytics");
		await store.executeAndMaterialize("select 1 as one", "analytics", "t");

		expect(await store.relationExists("analytics", "t")).toBe(true);
		expect(await store.relationExists("main", "t")).toBe(false);
		expect((await store.readAsTable("analytics", "t")).rows).toEqual([{ one: 1 }]);
	});

	test("creates a missing namespace on materialization", async () => {
		await store.materializeTable({ columns: ["x"], rows: [{ x: 1 }] }, "staging", "t");
		expect(await store.relationExists("staging", "t")).toBe(true);
	});

	test("an unknown namespace has no relations", async () => {
		expect(await store.relationExists("nowhere", "t")).toBe(false);
	});

	test("rejects a namespace that is not an identifier", async () => {
		await expect(store.ensureNamespace("bad-name")).rejects.toBeInstanceOf(ValidationError);
	});

	test("dropRelation removes a relation and ignores a missing one", async () => {
		await store.executeAndMaterialize("select 1 as id", "main", "gone");
		await store.dropRelation("main", "gone");

		expect(await store.relationExists("main", "gone")).toBe(false);
		await expect(store.dropRelation("main", "gone")).resolves.toBeUndefined();
		await expect(store.dropRelation("nowhere", "gone")).resolves.toBeUndefined();
	});
});

describe("SqliteStore - files", () => {
	let directory: string;

	beforeEach(async () => {
		directory = await mkdtemp(path.join(tmpdir(), "sqldag-store-"));
	});

	afterEach(async () => {
		await rm(directory, { recursive: true, force: true });
	});

	test("attaches other namespaces beside the main file", async () => {
		const store = new SqliteStore(path.join(directory, "warehouse.sqlite"));
		try {
			await store.ensureNamespace("analytics");

			expect(store.isInMemory).toBe(false);
			expect(existsSync(path.join(directory, "warehouse.analytics.sqlite"))).toBe(true);
		} finally {
			await store.close();
		}
	});

	test("results survive reopening", async () => {
		const file = path.join(directory, "warehouse.sqlite");
		const first = new SqliteStore(file);
		await first.executeAndMaterialize("select 7 as answer", "main", "kept");
		await first.close();

		const second = new SqliteStore(file);
		try {
			expect((await second.readAsTable("main", "kept")).rows).toEqual([{ answer: 7 }]);
		} finally {
			await second.close();
		}
	});

	test("close is idempotent", async () => {
		const store = new SqliteStore(path.join(directory, "once.sqlite"));
		await store.close();
		await expect(store.close()).resolves.toBeUndefined();
	});
});

describe("quoteIdentifier", () => {
	test("doubles embedded quotes", () => {
		expect(quoteIdentifier("orders")).toBe('"orders"');
		expect(quoteIdentifier('we"ird')).toBe('"we""ird"');
	});
});
