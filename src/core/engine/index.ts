/**
 * Engine module exports
 *
 * @module engine
 */

export { SqlDag } from "./sql-dag.js";
export type { LoadedProject } from "./sql-dag.js";

export type {
	DefinitionSource,
	EngineConfig,
	ExecutionConfig,
	NormalizedEngineConfig,
} from "./engine-config.js";

export {
	DEFAULT_EXECUTION_CONFIG,
	mergeExecutionConfig,
	normalizeEngineConfig,
} from "./engine-config.js";
