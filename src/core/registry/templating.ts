/**
 * `{{ NAME }}` substitution in definition text
 *
 * @module registry/templating
 */

import { config } from "dotenv";
import { TEMPLATE_PATTERN } from "../shared/constants.js";
import {
	ConfigurationError,
	UndefinedVariableError,
} from "../shared/errors.js";

/**
 * Where placeholder values come from
 *
 * Lookup order: `variables`, then `env` (defaults to `process.env`), then the
 * `.env` file at `envFile`, then `defaults`.
 */
export interface TemplatingOptions {
	variables?: Record<string, string>;
	defaults?: Record<string, string>;
	envFile?: string;
	env?: Record<string, string | undefined>;
}

export class TemplateRenderer {
	private readonly sources: ReadonlyArray<Record<string, string | undefined>>;

	constructor(options: TemplatingOptions = {}) {
		this.sources = [
			options.variables ?? {},
			options.env ?? process.env,
			options.envFile ? loadEnvFile(options.envFile) : {},
			options.defaults ?? {},
		];
	}

	/**
	 * Replace every placeholder in `text`
	 *
	 * @param origin - Definition label, used in error messages
	 * @throws {UndefinedVariableError} If a placeholder has no value
	 */
	render(text: string, origin?: string): string {
		return text.replace(TEMPLATE_PATTERN, (_match, variable: string) => {
			const value = this.resolve(variable);
			if (value === undefined) {
				throw new UndefinedVariableError(variable, origin);
			}
			return value;
		});
	}

	resolve(variable: string): string | undefined {
		for (const source of this.sources) {
			const value = source[variable];
			if (value !== undefined) {
				return value;
			}
		}
		return undefined;
	}
}

/**
 * Names of the placeholders used in `text`, in order of first use
 */
export function listVariables(text: string): string[] {
	const names = new Set<string>();
	for (const match of text.matchAll(TEMPLATE_PATTERN)) {
		const [, name] = match;
		if (name) names.add(name);
	}
	return Array.from(names);
}

function loadEnvFile(envFile: string): Record<string, string> {
	const values: Record<string, string> = {};
	const result = config({ path: envFile, processEnv: values });
	if (result.error) {
		throw new ConfigurationError(
			`Unable to read env file "${envFile}": ${result.error.message}`,
			{ field: "templating.envFile", envFile },
		);
	}
	return values;
}
