import { describe, test, expect } from "vitest";
import { UnitNotFoundError, ValidationError } from "../src/core/shared/errors.js";
import { Routine, defineRoutine, isRoutine, type RoutineContext } from "../src/routine.js";
import { RoutineRegistry } from "../src/routine-registry.js";
import type { Table } from "../src/types.js";

class Snapshot extends Routine {
	override sourceQuery(): string {
		return "select * from orders";
	}

	async run(context: RoutineContext): Promise<Table> {
		return context.getSource();
	}
}

const noop = () => ({ columns: ["x"], rows: [] });

describe("defineRoutine", () => {
	test("exposes the source query", () => {
		const routine = defineRoutine({ source: "select * from a", run: noop });

		expect(routine).toBeInstanceOf(Routine);
		expect(routine.sourceQuery?.()).toBe("select * from a");
	});

	test("without a source the query is undefined", () => {
		expect(defineRoutine({ run: noop }).sourceQuery?.()).toBeUndefined();
	});
});

describe("isRoutine", () => {
	test("accepts subclasses and structural matches", () => {
		expect(isRoutine(new Snapshot())).toBe(true);
		expect(isRoutine({ run: noop })).toBe(true);
		expect(isRoutine({ run: noop, sourceQuery: () => "select 1" })).toBe(true);
	});

	test("rejects everything else", () => {
		expect(isRoutine(null)).toBe(false);
		expect(isRoutine("select 1")).toBe(false);
		expect(isRoutine({ run: "not a function" })).toBe(false);
		expect(isRoutine({ run: noop, sourceQuery: "select 1" })).toBe(false);
	});
});

describe("RoutineRegistry", () => {
	test("registers and lists routines", () => {
		const snapshot = new Snapshot();
		const registry = RoutineRegistry.from({ snapshot });

		expect(registry.has("snapshot")).toBe(true);
		expect(registry.get("snapshot")).toBe(snapshot);
		expect(registry.list()).toEqual(["snapshot"]);
	});

	test("rejects a second routine under the same name", () => {
		const registry = new RoutineRegistry();
		registry.register("snapshot", new Snapshot());

		expect(() => registry.register("snapshot", new Snapshot())).toThrow(ValidationError);
	});

	test("throws UnitNotFoundError for an unknown name", () => {
		expect(() => new RoutineRegistry().get("missing")).toThrow(UnitNotFoundError);
	});

	test("converts to definitions labelled by name", () => {
		const snapshot = new Snapshot();
		const definitions = RoutineRegistry.from({ snapshot }).toDefinitions();

		expect(definitions).toEqual([{ kind: "routine", label: "snapshot", routine: snapshot }]);
	});
});
