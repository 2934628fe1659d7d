/**
 * Registry module exports
 *
 * @module registry
 */

export { UnitRegistry, unitNameFromLabel } from "./unit-registry.js";
export type { RegistryLoadOptions } from "./unit-registry.js";
export {
	loadDefinitionsFromDirectory,
	definitionsFromMemory,
} from "./definition-loader.js";
export { TemplateRenderer, listVariables } from "./templating.js";
export type { TemplatingOptions } from "./templating.js";
