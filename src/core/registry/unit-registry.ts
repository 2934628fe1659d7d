/**
 * Unit registry
 *
 * Turns raw definitions into named, immutable transformation units.
 *
 * @module registry/unit-registry
 */

import path from "node:path";
import type { QueryParser } from "../../parsing/types.js";
import type {
	DeclarativeUnit,
	RoutineUnit,
	SqlStatement,
	TransformationUnit,
	UnitDefinition,
} from "../../types.js";
import {
	DuplicateNameError,
	ParseError,
	UnitNotFoundError,
	ValidationError,
} from "../shared/errors.js";
import { TemplateRenderer } from "./templating.js";

export interface RegistryLoadOptions {
	parser: QueryParser;
	templating?: TemplateRenderer;
}

/**
 * Derive a unit name from a definition label: base name, extension dropped
 *
 * @example
 * ```typescript
 * unitNameFromLabel("staging/stg_orders.sql"); // "stg_orders"
 * ```
 */
export function unitNameFromLabel(label: string): string {
	const base = path.basename(label.replaceAll("\\", "/"));
	const extension = path.extname(base);
	return extension ? base.slice(0, -extension.length) : base;
}

export class UnitRegistry {
	readonly unitsByName: ReadonlyMap<string, TransformationUnit>;

	private constructor(units: Map<string, TransformationUnit>) {
		this.unitsByName = units;
	}

	/**
	 * Build a registry from definitions
	 *
	 * Placeholders are rendered before any parsing. Nothing is returned unless
	 * every definition loads.
	 *
	 * @throws {DuplicateNameError} When two definitions share a unit name
	 * @throws {UndefinedVariableError} When a placeholder has no value
	 * @throws {ParseError} When a declarative definition does not parse
	 * @throws {ValidationError} When a declarative definition does not have
	 *   exactly one producing statement
	 */
	static load(
		definitions: Iterable<UnitDefinition>,
		options: RegistryLoadOptions,
	): UnitRegistry {
		const templating = options.templating ?? new TemplateRenderer();
		const units = new Map<string, TransformationUnit>();

		for (const definition of definitions) {
			const name = unitNameFromLabel(definition.label);
			const existing = units.get(name);
			if (existing) {
				throw new DuplicateNameError(name, [existing.origin, definition.label]);
			}

			const unit =
				definition.kind === "declarative"
					? buildDeclarativeUnit(
							name,
							definition.label,
							definition.text,
							options.parser,
							templating,
						)
					: buildRoutineUnit(name, definition, templating);

			units.set(name, Object.freeze(unit));
		}

		return new UnitRegistry(units);
	}

	/** Every unit, in no particular order */
	get allUnits(): readonly TransformationUnit[] {
		return Array.from(this.unitsByName.values());
	}

	get size(): number {
		return this.unitsByName.size;
	}

	names(): string[] {
		return Array.from(this.unitsByName.keys());
	}

	has(name: string): boolean {
		return this.unitsByName.has(name);
	}

	/**
	 * @throws {UnitNotFoundError} For an unknown name
	 */
	get(name: string): TransformationUnit {
		const unit = this.unitsByName.get(name);
		if (!unit) {
			throw new UnitNotFoundError(name, this.names());
		}
		return unit;
	}
}

// ============================================================================
// UNIT CONSTRUCTION
// ============================================================================

function buildDeclarativeUnit(
	name: string,
	origin: string,
	text: string,
	parser: QueryParser,
	templating: TemplateRenderer,
): DeclarativeUnit {
	const declarativeText = templating.render(text, origin);

	let statements: SqlStatement[];
	try {
		statements = parser.splitStatements(declarativeText);
	} catch (error) {
		throw withOrigin(error, origin);
	}

	const producing = statements.filter((statement) => statement.producing);
	if (producing.length !== 1) {
		throw new ValidationError(
			producing.length === 0
				? `${origin} has no SELECT statement to materialize`
				: `${origin} has ${producing.length} SELECT statements; exactly one is allowed`,
			"statements",
			{ origin, producing: producing.length },
		);
	}

	return {
		kind: "declarative",
		name,
		origin,
		declarativeText,
		statements: Object.freeze(statements.map((s) => Object.freeze({ ...s }))),
	};
}

function buildRoutineUnit(
	name: string,
	definition: Extract<UnitDefinition, { kind: "routine" }>,
	templating: TemplateRenderer,
): RoutineUnit {
	const source = definition.routine.sourceQuery?.();
	const unit: RoutineUnit = {
		kind: "routine",
		name,
		origin: definition.label,
		routine: definition.routine,
	};

	if (source === undefined || source.trim() === "") {
		return unit;
	}
	return { ...unit, declarativeText: templating.render(source, definition.label) };
}

function withOrigin(error: unknown, origin: string): unknown {
	if (error instanceof ParseError && error.origin === undefined) {
		return new ParseError(error.message, origin, error);
	}
	return error;
}
