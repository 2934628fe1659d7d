/**
 * Reference extraction
 *
 * @module analysis/reference-extractor
 */

import type { QueryParser } from "../../parsing/types.js";
import type { Logger, TransformationUnit } from "../../types.js";
import { ParseError } from "../shared/errors.js";
import { DEFAULT_ENGINE_CONFIG } from "../shared/constants.js";

export interface ReferenceExtractionOptions {
	/** Namespace a qualified reference must name to count as a unit */
	namespace?: string;
	/** Receives the relations that are not units, at debug level */
	logger?: Pick<Logger, "debug">;
}

/**
 * Names of the units `unit` reads from
 *
 * Only the producing statement of a declarative unit, or the source query
 * of a routine, is inspected. A relation maps to a unit when it is a unit
 * name or `<namespace>.<unit name>`; anything else is a source table and is
 * left out, as is the unit itself.
 *
 * @throws {ParseError} If the inspected text does not parse
 */
export function extractReferences(
	unit: TransformationUnit,
	knownNames: ReadonlySet<string>,
	parser: QueryParser,
	options: ReferenceExtractionOptions = {},
): Set<string> {
	const text = inspectedText(unit);
	if (text === undefined) {
		return new Set();
	}

	let relations: Set<string>;
	try {
		relations = parser.parseReferences(text);
	} catch (error) {
		if (error instanceof ParseError && error.origin === undefined) {
			throw new ParseError(error.message, unit.origin, error);
		}
		throw error;
	}

	const namespace = options.namespace ?? DEFAULT_ENGINE_CONFIG.NAMESPACE;
	const references = new Set<string>();
	for (const relation of relations) {
		const name = toUnitName(relation, knownNames, namespace);
		if (name === undefined) {
			options.logger?.debug(`${unit.name}: ${relation} identified as a source`);
			continue;
		}
		if (name !== unit.name) {
			references.add(name);
		}
	}
	return references;
}

function inspectedText(unit: TransformationUnit): string | undefined {
	if (unit.kind === "routine") {
		return unit.declarativeText;
	}
	return unit.statements.find((statement) => statement.producing)?.text;
}

function toUnitName(
	relation: string,
	knownNames: ReadonlySet<string>,
	namespace: string,
): string | undefined {
	if (knownNames.has(relation)) {
		return relation;
	}

	const prefix = `${namespace}.`;
	if (relation.startsWith(prefix)) {
		const name = relation.slice(prefix.length);
		return knownNames.has(name) ? name : undefined;
	}
	return undefined;
}
