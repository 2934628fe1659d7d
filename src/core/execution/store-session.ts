/**
 * Serialized access to a store for the duration of one run
 *
 * @module execution/store-session
 */

import PQueue from "p-queue";
import type { Store } from "../../store/types.js";
import type { Table } from "../../types.js";

/**
 * Wraps a {@link Store} so that every call goes through a single-slot queue.
 *
 * A routine may issue several reads without awaiting each one; the store
 * connection still sees them one at a time, in submission order.
 */
export class StoreSession implements Store {
	private readonly queue = new PQueue({ concurrency: 1 });

	constructor(private readonly store: Store) {}

	get location(): string {
		return this.store.location;
	}

	execute(sql: string): Promise<void> {
		return this.enqueue(() => this.store.execute(sql));
	}

	executeAndMaterialize(
		sql: string,
		namespace: string,
		name: string,
	): Promise<void> {
		return this.enqueue(() =>
			this.store.executeAndMaterialize(sql, namespace, name),
		);
	}

	query(sql: string): Promise<Table> {
		return this.enqueue(() => this.store.query(sql));
	}

	readAsTable(namespace: string, name: string): Promise<Table> {
		return this.enqueue(() => this.store.readAsTable(namespace, name));
	}

	materializeTable(
		table: Table,
		namespace: string,
		name: string,
	): Promise<void> {
		return this.enqueue(() =>
			this.store.materializeTable(table, namespace, name),
		);
	}

	ensureNamespace(namespace: string): Promise<void> {
		return this.enqueue(() => this.store.ensureNamespace(namespace));
	}

	relationExists(namespace: string, name: string): Promise<boolean> {
		return this.enqueue(() => this.store.relationExists(namespace, name));
	}

	dropRelation(namespace: string, name: string): Promise<void> {
		return this.enqueue(() => this.store.dropRelation(namespace, name));
	}

	/**
	 * Wait until every queued call has settled
	 */
	async drain(): Promise<void> {
		await this.queue.onIdle();
	}

	/**
	 * Wait for queued calls, then release the store
	 */
	async close(): Promise<void> {
		await this.drain();
		await this.store.close();
	}

	/** Calls waiting or running */
	get pending(): number {
		return this.queue.size + this.queue.pending;
	}

	private enqueue<T>(task: () => Promise<T>): Promise<T> {
		return this.queue.add(task, { throwOnTimeout: true });
	}
}
