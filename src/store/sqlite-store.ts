/**
 * SQLite store backed by better-sqlite3
 *
 * Namespace `main` is the database itself and `temp` is the connection's
 * temporary schema. Any other namespace is an attached database: a private
 * in-memory database for in-memory stores, or `<stem>.<namespace>.sqlite`
 * next to the main file for file stores.
 *
 * @module store/sqlite-store
 */

import path from "node:path";
import Database from "better-sqlite3";
import {
	BUILTIN_NAMESPACES,
	DEFAULT_ENGINE_CONFIG,
	IDENTIFIER_PATTERN,
	STAGING_TABLE_PREFIX,
} from "../core/shared/constants.js";
import { ValidationError } from "../core/shared/errors.js";
import { toCellValue } from "../core/shared/utils.js";
import type { CellValue, Table } from "../types.js";
import type { Store } from "./types.js";

type RelationType = "table" | "view";

export class SqliteStore implements Store {
	readonly location: string;
	private readonly db: Database.Database;
	private readonly attached = new Set<string>(BUILTIN_NAMESPACES);

	constructor(location: string = DEFAULT_ENGINE_CONFIG.DATABASE) {
		this.location = location;
		this.db = new Database(location);
		if (!this.isInMemory) {
			this.db.pragma("journal_mode = WAL");
		}
	}

	get isInMemory(): boolean {
		return this.location === ":memory:" || this.location === "";
	}

	async execute(sql: string): Promise<void> {
		this.db.exec(sql);
	}

	async executeAndMaterialize(
		sql: string,
		namespace: string,
		name: string,
	): Promise<void> {
		await this.ensureNamespace(namespace);
		const staging = qualify(namespace, STAGING_TABLE_PREFIX + name);

		this.replaceWith(namespace, name, () => {
			this.db.exec(`CREATE TABLE ${staging} AS ${sql}`);
		});
	}

	async materializeTable(
		table: Table,
		namespace: string,
		name: string,
	): Promise<void> {
		await this.ensureNamespace(namespace);
		const staging = qualify(namespace, STAGING_TABLE_PREFIX + name);
		const columnList = table.columns.map(quoteIdentifier).join(", ");
		const placeholders = table.columns.map(() => "?").join(", ");

		this.replaceWith(namespace, name, () => {
			this.db.exec(`CREATE TABLE ${staging} (${columnList})`);
			const insert = this.db.prepare(
				`INSERT INTO ${staging} (${columnList}) VALUES (${placeholders})`,
			);
			for (const row of table.rows) {
				insert.run(...table.columns.map((column) => toBindable(row[column])));
			}
		});
	}

	async query(sql: string): Promise<Table> {
		const statement = this.db.prepare(sql);
		if (!statement.reader) {
			statement.run();
			return { columns: [], rows: [] };
		}

		const columns = statement.columns().map((column) => column.name);
		const rows = statement.all().map(toRow);
		return { columns, rows };
	}

	async readAsTable(namespace: string, name: string): Promise<Table> {
		return this.query(`SELECT * FROM ${qualify(namespace, name)}`);
	}

	async ensureNamespace(namespace: string): Promise<void> {
		if (this.attached.has(namespace)) {
			return;
		}
		if (!IDENTIFIER_PATTERN.test(namespace)) {
			throw new ValidationError(
				`Invalid namespace "${namespace}": expected a plain identifier`,
				"namespace",
				{ provided: namespace },
			);
		}

		this.db
			.prepare(`ATTACH DATABASE ? AS ${quoteIdentifier(namespace)}`)
			.run(this.attachmentFile(namespace));
		this.attached.add(namespace);
	}

	async relationExists(namespace: string, name: string): Promise<boolean> {
		if (!this.attached.has(namespace)) {
			return false;
		}
		return this.relationType(namespace, name) !== undefined;
	}

	async dropRelation(namespace: string, name: string): Promise<void> {
		if (this.attached.has(namespace)) {
			this.dropIfExists(namespace, name);
		}
	}

	async close(): Promise<void> {
		if (this.db.open) {
			this.db.close();
		}
	}

	// ============================================================================
	// PRIVATE HELPERS
	// ============================================================================

	/**
	 * Build the new relation under a staging name, then swap it in, all in
	 * one transaction
	 *
	 * The rename runs with `legacy_alter_table` on: views reading the old
	 * relation are left as they are and resolve to the new table by name.
	 */
	private replaceWith(namespace: string, name: string, build: () => void): void {
		const swap = this.db.transaction(() => {
			this.dropIfExists(namespace, STAGING_TABLE_PREFIX + name);
			build();
			this.dropIfExists(namespace, name);
			this.db.exec(
				`ALTER TABLE ${qualify(namespace, STAGING_TABLE_PREFIX + name)} ` +
					`RENAME TO ${quoteIdentifier(name)}`,
			);
		});

		this.db.pragma("legacy_alter_table = ON");
		try {
			swap();
		} finally {
			this.db.pragma("legacy_alter_table = OFF");
		}
	}

	private dropIfExists(namespace: string, name: string): void {
		const type = this.relationType(namespace, name);
		if (type === "view") {
			this.db.exec(`DROP VIEW ${qualify(namespace, name)}`);
		} else if (type === "table") {
			this.db.exec(`DROP TABLE ${qualify(namespace, name)}`);
		}
	}

	private relationType(namespace: string, name: string): RelationType | undefined {
		const row: unknown = this.db
			.prepare(
				`SELECT type FROM ${quoteIdentifier(namespace)}.sqlite_master ` +
					"WHERE type IN ('table', 'view') AND name = ?",
			)
			.get(name);

		if (typeof row !== "object" || row === null || !("type" in row)) {
			return undefined;
		}
		return row.type === "view" || row.type === "table" ? row.type : undefined;
	}

	private attachmentFile(namespace: string): string {
		if (this.isInMemory) {
			return ":memory:";
		}
		const stem = path.basename(this.location, path.extname(this.location));
		return path.join(
			path.dirname(this.location),
			`${stem}.${namespace}.sqlite`,
		);
	}
}

/**
 * Open (creating when missing) a SQLite store
 *
 * @example
 * ```typescript
 * const store = openSqliteStore("warehouse.sqlite");
 * await store.ensureNamespace("analytics");
 * ```
 */
export function openSqliteStore(
	location: string = DEFAULT_ENGINE_CONFIG.DATABASE,
): SqliteStore {
	return new SqliteStore(location);
}

// ============================================================================
// VALUE CONVERSION
// ============================================================================

export function quoteIdentifier(identifier: string): string {
	return `"${identifier.replaceAll('"', '""')}"`;
}

function qualify(namespace: string, name: string): string {
	return `${quoteIdentifier(namespace)}.${quoteIdentifier(name)}`;
}

function toBindable(value: unknown): Exclude<CellValue, boolean> {
	const cell = toCellValue(value);
	if (typeof cell === "boolean") return cell ? 1 : 0;
	return cell;
}

function toRow(row: unknown): Record<string, CellValue> {
	const result: Record<string, CellValue> = {};
	if (typeof row !== "object" || row === null) {
		return result;
	}
	for (const [column, value] of Object.entries(row)) {
		result[column] = toCellValue(value);
	}
	return result;
}
