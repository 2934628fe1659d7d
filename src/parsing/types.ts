import type { SqlStatement } from "../types.js";

/**
 * Query parsing collaborator
 *
 * Implementations turn SQL text into statements and report the relations a
 * statement reads. Both methods throw {@link ParseError} on malformed input.
 */
export interface QueryParser {
	/** Dialect name understood by the implementation */
	readonly dialect: string;

	/**
	 * Split a definition into statements, flagging the data-producing ones
	 */
	splitStatements(text: string): SqlStatement[];

	/**
	 * Relations read by a single statement
	 *
	 * Qualified names come back as `schema.table`; common table expressions
	 * are not relations and are never reported.
	 */
	parseReferences(statementText: string): Set<string>;
}
