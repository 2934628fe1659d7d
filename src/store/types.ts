/**
 * Store contract
 *
 * The embedded analytical database the executor materializes units into.
 * Every method is asynchronous so that a store backed by a remote or
 * worker-thread connection can implement the same contract.
 *
 * @module store/types
 */

import type { Table } from "../types.js";

export interface Store {
	/** Database file path, or `:memory:` */
	readonly location: string;

	/**
	 * Run one or more statements for their side effects
	 */
	execute(sql: string): Promise<void>;

	/**
	 * Evaluate a query and store its result as `namespace.name`, replacing
	 * any previous relation of that name
	 */
	executeAndMaterialize(
		sql: string,
		namespace: string,
		name: string,
	): Promise<void>;

	/**
	 * Run a read query and return its rows
	 */
	query(sql: string): Promise<Table>;

	/**
	 * Read the whole of `namespace.name`
	 */
	readAsTable(namespace: string, name: string): Promise<Table>;

	/**
	 * Store an in-memory table as `namespace.name`, replacing any previous
	 * relation of that name
	 */
	materializeTable(table: Table, namespace: string, name: string): Promise<void>;

	/**
	 * Make sure `namespace` exists, creating it when missing
	 */
	ensureNamespace(namespace: string): Promise<void>;

	/**
	 * Whether `namespace.name` exists as a table or view
	 */
	relationExists(namespace: string, name: string): Promise<boolean>;

	/**
	 * Drop `namespace.name` if it exists
	 */
	dropRelation(namespace: string, name: string): Promise<void>;

	/**
	 * Release the underlying connection
	 */
	close(): Promise<void>;
}
