/**
 * Definition sources
 *
 * Reads transformation definitions from a directory tree, or builds them
 * from an in-memory mapping.
 *
 * @module registry/definition-loader
 */

import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { globby } from "globby";
import { isRoutine, type Routine } from "../../routine.js";
import type { UnitDefinition } from "../../types.js";
import { DEFINITION_EXTENSIONS } from "../shared/constants.js";
import {
	ConfigurationError,
	ValidationError,
	getErrorMessage,
} from "../shared/errors.js";

const DEFINITION_PATTERNS = [
	...DEFINITION_EXTENSIONS.DECLARATIVE,
	...DEFINITION_EXTENSIONS.ROUTINE,
].map((extension) => `**/*${extension}`);

/**
 * Load every definition below `directory`
 *
 * SQL files become declarative definitions. JavaScript modules must
 * default-export a routine instance, or a routine class with a no-argument
 * constructor. Labels are paths relative to `directory`, sorted.
 *
 * @throws {ConfigurationError} If the directory is missing or holds no definitions
 * @throws {ValidationError} If a module does not export a routine
 */
export async function loadDefinitionsFromDirectory(
	directory: string,
): Promise<UnitDefinition[]> {
	const root = path.resolve(directory);
	await assertDirectory(root);

	const files = await globby(DEFINITION_PATTERNS, {
		cwd: root,
		onlyFiles: true,
	});
	if (files.length === 0) {
		throw new ConfigurationError(
			`No definitions found in ${directory} (looked for ${DEFINITION_PATTERNS.join(", ")})`,
			{ field: "definitions", directory },
		);
	}

	const definitions: UnitDefinition[] = [];
	for (const label of [...files].sort()) {
		const absolute = path.join(root, label);
		if (isDeclarativeFile(label)) {
			definitions.push({
				kind: "declarative",
				label,
				text: await readFile(absolute, "utf8"),
			});
		} else {
			definitions.push({
				kind: "routine",
				label,
				routine: await importRoutine(absolute, label),
			});
		}
	}
	return definitions;
}

/**
 * Build definitions from a label → SQL text or routine mapping
 *
 * @example
 * ```typescript
 * definitionsFromMemory({
 *   "staging/stg_orders.sql": "select * from raw_orders",
 *   order_stats: defineRoutine({ source: "select * from stg_orders", run }),
 * });
 * ```
 */
export function definitionsFromMemory(
	entries: Record<string, string | Routine>,
): UnitDefinition[] {
	return Object.entries(entries).map(([label, value]): UnitDefinition => {
		if (typeof value === "string") {
			return { kind: "declarative", label, text: value };
		}
		if (!isRoutine(value)) {
			throw new ValidationError(
				`Definition "${label}" is neither SQL text nor a routine`,
				"definitions",
				{ label },
			);
		}
		return { kind: "routine", label, routine: value };
	});
}

// ============================================================================
// HELPERS
// ============================================================================

function isDeclarativeFile(file: string): boolean {
	const extension = path.extname(file);
	return DEFINITION_EXTENSIONS.DECLARATIVE.some((ext) => ext === extension);
}

async function assertDirectory(directory: string): Promise<void> {
	try {
		const info = await stat(directory);
		if (info.isDirectory()) return;
	} catch (error) {
		throw new ConfigurationError(
			`Definitions directory ${directory} is not readable: ${getErrorMessage(error)}`,
			{ field: "definitions", directory },
		);
	}
	throw new ConfigurationError(`${directory} is not a directory`, {
		field: "definitions",
		directory,
	});
}

async function importRoutine(file: string, label: string): Promise<Routine> {
	const module: unknown = await import(pathToFileURL(file).href);
	const exported =
		typeof module === "object" && module !== null && "default" in module
			? module.default
			: undefined;

	if (isRoutine(exported)) {
		return exported;
	}
	if (typeof exported === "function") {
		const instance: unknown = Reflect.construct(exported, []);
		if (isRoutine(instance)) {
			return instance;
		}
	}

	throw new ValidationError(
		`${label} must default-export a routine (an object or class with run(context))`,
		"definitions",
		{ label },
	);
}
