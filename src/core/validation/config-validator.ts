/**
 * Engine configuration validator
 *
 * Validates SqlDag configuration during construction to catch errors early
 * and provide clear error messages.
 *
 * @module validation/config-validator
 */

import type { EngineConfig } from "../engine/engine-config.js";
import {
	IDENTIFIER_PATTERN,
	SUPPORTED_DIALECTS,
} from "../shared/constants.js";
import { ConfigurationError, ValidationError } from "../shared/errors.js";
import type { FailurePolicy } from "../../types.js";

const FAILURE_POLICIES: readonly FailurePolicy[] = [
	"fail-fast",
	"continue-on-error",
];

/**
 * Configuration validator for SqlDag
 */
export class ConfigValidator {
	/**
	 * Validates engine configuration
	 *
	 * @throws {ConfigurationError} If a required field is missing or fields conflict
	 * @throws {ValidationError} If a field has an invalid value
	 *
	 * @example
	 * ```typescript
	 * try {
	 *   ConfigValidator.validate(config);
	 * } catch (error) {
	 *   if (error instanceof ConfigurationError) {
	 *     console.error('Invalid config:', error.message);
	 *   }
	 * }
	 * ```
	 */
	static validate(config: EngineConfig): void {
		this.validateRequired(config);
		this.validateStore(config);
		this.validateNamespace(config.namespace);
		this.validateFailurePolicy(config.execution?.failurePolicy);
		this.validateDialect(config);
		this.validateTemplating(config);
	}

	// ============================================================================
	// PRIVATE VALIDATION METHODS
	// ============================================================================

	private static validateRequired(config: EngineConfig): void {
		const { definitions } = config;
		if (definitions === undefined || definitions === null) {
			throw new ConfigurationError("SqlDag requires definitions", {
				field: "definitions",
			});
		}

		if (typeof definitions === "string" && definitions.trim() === "") {
			throw new ConfigurationError(
				"SqlDag requires a non-empty definitions directory",
				{ field: "definitions" },
			);
		}
	}

	private static validateStore(config: EngineConfig): void {
		if (config.store && config.database !== undefined) {
			throw new ConfigurationError(
				'Provide either "store" or "database", not both',
				{ field: "store" },
			);
		}
	}

	private static validateNamespace(namespace: string | undefined): void {
		if (namespace === undefined) return;

		if (!IDENTIFIER_PATTERN.test(namespace)) {
			throw new ValidationError(
				`Namespace "${namespace}" must be a plain identifier`,
				"namespace",
				{ provided: namespace },
			);
		}
	}

	private static validateFailurePolicy(policy: string | undefined): void {
		if (policy === undefined) return;

		if (!FAILURE_POLICIES.some((allowed) => allowed === policy)) {
			throw new ValidationError(
				`Failure policy must be one of: ${FAILURE_POLICIES.join(", ")}`,
				"execution.failurePolicy",
				{ provided: policy, allowed: FAILURE_POLICIES },
			);
		}
	}

	/**
	 * A custom parser decides for itself which dialects it accepts
	 */
	private static validateDialect(config: EngineConfig): void {
		if (config.parser || config.dialect === undefined) return;

		if (!SUPPORTED_DIALECTS.some((dialect) => dialect === config.dialect)) {
			throw new ValidationError(
				`Unsupported dialect "${config.dialect}". Supported: ${SUPPORTED_DIALECTS.join(", ")}`,
				"dialect",
				{ provided: config.dialect },
			);
		}
	}

	private static validateTemplating(config: EngineConfig): void {
		const groups = {
			variables: config.templating?.variables,
			defaults: config.templating?.defaults,
		};

		for (const [group, values] of Object.entries(groups)) {
			if (!values) continue;

			for (const [name, value] of Object.entries(values)) {
				if (typeof value !== "string") {
					throw new ValidationError(
						`Template ${group} must be strings; "${name}" is ${typeof value}`,
						`templating.${group}.${name}`,
						{ provided: value },
					);
				}
			}
		}
	}
}
