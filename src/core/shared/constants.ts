/**
 * Constants used throughout sqldag
 *
 * @module shared/constants
 */

// ============================================================================
// DEFAULT ENGINE CONFIGURATION
// ============================================================================

/**
 * Default configuration values
 *
 * @example
 * ```typescript
 * import { DEFAULT_ENGINE_CONFIG } from 'sqldag';
 *
 * console.log(DEFAULT_ENGINE_CONFIG.NAMESPACE); // "main"
 * ```
 */
export const DEFAULT_ENGINE_CONFIG = {
	/** Store location used when none is configured */
	DATABASE: ":memory:",

	/** Database file the CLI writes to by default */
	CLI_DATABASE: "sqldag.sqlite",

	/** Namespace units are materialized into */
	NAMESPACE: "main",

	/** SQL dialect handed to the parser */
	DIALECT: "sqlite",

	/** What happens after a unit fails */
	FAILURE_POLICY: "fail-fast",
} as const;

// ============================================================================
// DEFINITIONS
// ============================================================================

/**
 * File extensions recognised in a definitions directory
 */
export const DEFINITION_EXTENSIONS = {
	DECLARATIVE: [".sql"],
	ROUTINE: [".js", ".mjs"],
} as const;

/**
 * `{{ NAME }}` placeholder inside definition text
 */
export const TEMPLATE_PATTERN = /\{\{\s*(\w+)\s*\}\}/g;

/**
 * Dialects accepted by the default SQL parser
 */
export const SUPPORTED_DIALECTS = [
	"bigquery",
	"db2",
	"flinksql",
	"hive",
	"mariadb",
	"mysql",
	"noql",
	"postgresql",
	"redshift",
	"snowflake",
	"sqlite",
	"transactsql",
	"trino",
] as const;

export type SupportedDialect = (typeof SUPPORTED_DIALECTS)[number];

// ============================================================================
// STORE
// ============================================================================

/**
 * Namespaces that always exist in a SQLite connection
 */
export const BUILTIN_NAMESPACES = ["main", "temp"] as const;

/**
 * Prefix of the staging table a result is built in before it replaces the
 * previous materialization
 */
export const STAGING_TABLE_PREFIX = "__sqldag_staging_";

/**
 * Identifier shape accepted for namespaces
 */
export const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

// ============================================================================
// ANALYTICS
// ============================================================================

/**
 * A unit read by at least this many units is reported as a bottleneck
 */
export const BOTTLENECK_MIN_DEPENDENTS = 3;

// ============================================================================
// SKIP REASONS
// ============================================================================

/**
 * Standardized reasons for skipping a unit
 */
export const SKIP_REASONS = {
	/** A unit failed and the run stops */
	FAIL_FAST: "Skipped because the run stopped after a failure",

	/** A unit this one depends on (directly or transitively) failed */
	FAILED_DEPENDENCY: "Skipped due to a failed dependency",
} as const;

export type SkipReason = (typeof SKIP_REASONS)[keyof typeof SKIP_REASONS];
