/**
 * SQL parsing collaborator backed by node-sql-parser
 *
 * @module parsing/sql-parser
 */

import sqlParser from "node-sql-parser";
import type { AST, Option } from "node-sql-parser";
import { DEFAULT_ENGINE_CONFIG } from "../core/shared/constants.js";
import { ParseError, getErrorMessage } from "../core/shared/errors.js";
import type { SqlStatement } from "../types.js";
import { splitSqlText } from "./statement-splitter.js";
import type { QueryParser } from "./types.js";

/**
 * Default {@link QueryParser}
 *
 * Statements are cut from the text as written and only classified by the
 * parser: a statement is producing when it is a `SELECT` (with or without a
 * leading `WITH`).
 *
 * @example
 * ```typescript
 * const parser = new SqlParser("sqlite");
 * parser.parseReferences("select * from orders join customers using (id)");
 * // Set { "orders", "customers" }
 * ```
 */
export class SqlParser implements QueryParser {
	readonly dialect: string;
	private readonly parser = new sqlParser.Parser();
	private readonly options: Option;

	constructor(dialect: string = DEFAULT_ENGINE_CONFIG.DIALECT) {
		this.dialect = dialect;
		this.options = { database: dialect };
	}

	splitStatements(text: string): SqlStatement[] {
		return splitSqlText(text).map((statement) => ({
			text: statement,
			producing: this.astify(statement).some(isProducing),
		}));
	}

	parseReferences(statementText: string): Set<string> {
		let tableList: string[];
		let ast: AST | AST[];
		try {
			({ tableList, ast } = this.parser.parse(statementText, this.options));
		} catch (error) {
			throw new ParseError(getErrorMessage(error), undefined, error);
		}

		const cteNames = new Set<string>();
		collectCteNames(ast, cteNames);

		const references = new Set<string>();
		for (const entry of tableList) {
			const relation = toRelationName(entry);
			if (relation && !cteNames.has(relation)) {
				references.add(relation);
			}
		}
		return references;
	}

	private astify(text: string): AST[] {
		try {
			const ast = this.parser.astify(text, this.options);
			return Array.isArray(ast) ? ast : [ast];
		} catch (error) {
			throw new ParseError(getErrorMessage(error), undefined, error);
		}
	}
}

function isProducing(statement: AST | undefined): boolean {
	return statement?.type === "select";
}

/**
 * Turns a `op::schema::table` tableList entry into `table` or `schema.table`
 */
function toRelationName(entry: string): string | undefined {
	const [operation, schema, table] = entry.split("::");
	if (operation !== "select" || !table) {
		return undefined;
	}
	return schema && schema !== "null" ? `${schema}.${table}` : table;
}

/**
 * Names bound by every `WITH` clause in the tree, nested subqueries included
 */
function collectCteNames(node: unknown, names: Set<string>): void {
	if (Array.isArray(node)) {
		for (const child of node) {
			collectCteNames(child, names);
		}
		return;
	}
	if (typeof node !== "object" || node === null) return;

	if ("with" in node && Array.isArray(node.with)) {
		for (const cte of node.with) {
			const name = readCteName(cte);
			if (name) names.add(name);
		}
	}
	for (const child of Object.values(node)) {
		collectCteNames(child, names);
	}
}

// The with-clause name is a plain string in older grammars and `{ value }` in newer ones
function readCteName(cte: unknown): string | undefined {
	if (typeof cte !== "object" || cte === null || !("name" in cte)) {
		return undefined;
	}
	const { name } = cte;
	if (typeof name === "string") {
		return name;
	}
	if (typeof name === "object" && name !== null && "value" in name) {
		return typeof name.value === "string" ? name.value : undefined;
	}
	return undefined;
}
