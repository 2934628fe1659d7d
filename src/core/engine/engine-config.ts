/**
 * Engine configuration types and defaults
 *
 * @module engine/engine-config
 */

import type { QueryParser } from "../../parsing/types.js";
import type { Routine } from "../../routine.js";
import type { RoutineRegistry } from "../../routine-registry.js";
import type { Store } from "../../store/types.js";
import type { FailurePolicy, Logger, UnitDefinition } from "../../types.js";
import type { TemplatingOptions } from "../registry/templating.js";
import { DEFAULT_ENGINE_CONFIG } from "../shared/constants.js";

// ============================================================================
// EXECUTION CONFIGURATION
// ============================================================================

/**
 * Execution configuration for the SqlDag engine
 *
 * @example
 * ```typescript
 * const execution: ExecutionConfig = {
 *   failurePolicy: "continue-on-error",
 * };
 * ```
 */
export interface ExecutionConfig {
	/**
	 * What happens after a unit fails
	 *
	 * - `"fail-fast"`: every unit not yet run is skipped
	 * - `"continue-on-error"`: only units depending on the failed one are
	 *   skipped; independent branches still run
	 *
	 * @default "fail-fast"
	 */
	failurePolicy?: FailurePolicy;
}

// ============================================================================
// MAIN ENGINE CONFIGURATION
// ============================================================================

/**
 * Where definitions come from: a directory path, ready-made definitions, or
 * a label → SQL text / routine mapping
 */
export type DefinitionSource =
	| string
	| UnitDefinition[]
	| Record<string, string | Routine>;

/**
 * Main configuration interface for the SqlDag engine
 *
 * @example Directory of definitions, file-backed store
 * ```typescript
 * const config: EngineConfig = {
 *   definitions: "./transformations",
 *   database: "warehouse.sqlite",
 *   namespace: "analytics",
 * };
 * ```
 *
 * @example Embedded, in-memory
 * ```typescript
 * const config: EngineConfig = {
 *   definitions: {
 *     "stg_orders.sql": "select * from raw_orders",
 *     "orders.sql": "select * from stg_orders where status = '{{ STATUS }}'",
 *   },
 *   templating: { variables: { STATUS: "completed" } },
 *   execution: { failurePolicy: "continue-on-error" },
 * };
 * ```
 */
export interface EngineConfig {
	/**
	 * REQUIRED - the transformations to run
	 */
	definitions: DefinitionSource;

	/**
	 * Additional routines, added to the definitions under their registered
	 * names
	 */
	routines?: RoutineRegistry;

	/**
	 * Store to run against. When omitted, a SQLite store is opened at
	 * `database` for each run and closed afterwards.
	 */
	store?: Store;

	/**
	 * SQLite database file, or `:memory:`
	 *
	 * @default ":memory:"
	 */
	database?: string;

	/**
	 * Namespace units are materialized into, and the qualifier recognised in
	 * references to other units
	 *
	 * @default "main"
	 */
	namespace?: string;

	/**
	 * Query parser; defaults to a {@link SqlParser} for `dialect`
	 */
	parser?: QueryParser;

	/**
	 * @default "sqlite"
	 */
	dialect?: string;

	execution?: ExecutionConfig;

	/**
	 * Values for `{{ NAME }}` placeholders
	 */
	templating?: TemplatingOptions;

	/**
	 * @default console
	 */
	logger?: Logger;
}

/**
 * Engine configuration with every default applied
 */
export interface NormalizedEngineConfig
	extends Omit<
		EngineConfig,
		"database" | "namespace" | "dialect" | "execution" | "logger"
	> {
	database: string;
	namespace: string;
	dialect: string;
	execution: Required<ExecutionConfig>;
	logger: Logger;
}

// ============================================================================
// DEFAULT CONFIGURATION
// ============================================================================

/**
 * Default execution configuration
 *
 * @example
 * ```typescript
 * import { DEFAULT_EXECUTION_CONFIG } from 'sqldag';
 *
 * const execution = { ...DEFAULT_EXECUTION_CONFIG, failurePolicy: "continue-on-error" };
 * ```
 */
export const DEFAULT_EXECUTION_CONFIG = {
	failurePolicy: DEFAULT_ENGINE_CONFIG.FAILURE_POLICY,
} as const satisfies Required<ExecutionConfig>;

// ============================================================================
// UTILITY FUNCTIONS
// ============================================================================

/**
 * Merges execution configuration with defaults
 *
 * @internal
 */
export function mergeExecutionConfig(
	config: EngineConfig,
): Required<ExecutionConfig> {
	return {
		failurePolicy:
			config.execution?.failurePolicy ?? DEFAULT_EXECUTION_CONFIG.failurePolicy,
	};
}

/**
 * Applies defaults to an engine configuration
 *
 * @internal
 */
export function normalizeEngineConfig(
	config: EngineConfig,
): NormalizedEngineConfig {
	return {
		...config,
		database: config.database ?? DEFAULT_ENGINE_CONFIG.DATABASE,
		namespace: config.namespace ?? DEFAULT_ENGINE_CONFIG.NAMESPACE,
		dialect:
			config.parser?.dialect ??
			config.dialect ??
			DEFAULT_ENGINE_CONFIG.DIALECT,
		execution: mergeExecutionConfig(config),
		logger: config.logger ?? console,
	};
}
