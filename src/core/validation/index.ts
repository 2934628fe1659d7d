/**
 * Validation module exports
 *
 * Configuration and dependency validation utilities.
 *
 * @module validation
 */

export { ConfigValidator } from "./config-validator.js";
export { DependencyValidator } from "./dependency-validator.js";
