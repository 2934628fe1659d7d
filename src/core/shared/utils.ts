/**
 * Utility functions used throughout sqldag
 *
 * @module shared/utils
 */

import type { CellValue, UnitOutcome, UnitStatus } from "../../types.js";

// ============================================================================
// NAME ORDERING
// ============================================================================

/**
 * Code-unit comparison of unit names
 *
 * Used wherever a deterministic order is required. Unlike `localeCompare`,
 * the result does not depend on the host's locale.
 *
 * @example
 * ```typescript
 * ["b", "B", "a"].sort(compareNames); // ["B", "a", "b"]
 * ```
 */
export function compareNames(a: string, b: string): number {
	if (a < b) return -1;
	if (a > b) return 1;
	return 0;
}

/**
 * Insert `name` into an array already sorted with {@link compareNames}
 */
export function insertSorted(sorted: string[], name: string): void {
	let low = 0;
	let high = sorted.length;
	while (low < high) {
		const middle = (low + high) >>> 1;
		const current = sorted[middle];
		if (current !== undefined && compareNames(current, name) < 0) {
			low = middle + 1;
		} else {
			high = middle;
		}
	}
	sorted.splice(low, 0, name);
}

// ============================================================================
// RESULT UTILITIES
// ============================================================================

/**
 * Counts outcomes with the given status
 */
export function countByStatus(
	outcomes: readonly UnitOutcome[],
	status: UnitStatus,
): number {
	return outcomes.filter((outcome) => outcome.status === status).length;
}

/**
 * Human-readable duration
 *
 * @example
 * ```typescript
 * formatDuration(950);   // "950ms"
 * formatDuration(12_400); // "12.4s"
 * formatDuration(75_000); // "1m 15s"
 * ```
 */
export function formatDuration(ms: number): string {
	if (ms < 1000) {
		return `${Math.round(ms)}ms`;
	}
	if (ms < 60_000) {
		return `${(ms / 1000).toFixed(1)}s`;
	}
	const minutes = Math.floor(ms / 60_000);
	const seconds = Math.round((ms % 60_000) / 1000);
	return `${minutes}m ${seconds}s`;
}

// ============================================================================
// TABLE VALUES
// ============================================================================

/**
 * Coerce a value read from the store or returned by a routine to a cell
 *
 * `undefined` becomes null; any other non-scalar is stored as its JSON text.
 */
export function toCellValue(value: unknown): CellValue {
	if (
		value === null ||
		typeof value === "string" ||
		typeof value === "number" ||
		typeof value === "bigint" ||
		typeof value === "boolean" ||
		Buffer.isBuffer(value)
	) {
		return value;
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	return value === undefined ? null : (JSON.stringify(value) ?? String(value));
}
