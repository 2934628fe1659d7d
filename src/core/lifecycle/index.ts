/**
 * Lifecycle module exports
 *
 * @module lifecycle
 */

export { HookExecutor } from "./hook-executor.js";
