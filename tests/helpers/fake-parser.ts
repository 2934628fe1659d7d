import { ParseError } from "../../src/core/shared/errors.js";
import type { QueryParser } from "../../src/parsing/types.js";
import type { SqlStatement } from "../../src/types.js";

const PRODUCING = /^\s*(select|with)\b/i;
const RELATION = /\b(?:from|join)\s+([A-Za-z_][\w.]*)/gi;

/**
 * Regex-based parser for tests that exercise the graph rather than SQL
 *
 * Statements are split on `;`; relations are the identifiers after FROM and
 * JOIN. Any text containing "syntax error" fails to parse.
 */
export class FakeParser implements QueryParser {
	readonly dialect = "fake";

	/** Every text handed to parseReferences, in call order */
	readonly inspected: string[] = [];

	splitStatements(text: string): SqlStatement[] {
		this.assertParsable(text);
		return text
			.split(";")
			.map((statement) => statement.trim())
			.filter((statement) => statement !== "")
			.map((statement) => ({
				text: statement,
				producing: PRODUCING.test(statement),
			}));
	}

	parseReferences(statementText: string): Set<string> {
		this.inspected.push(statementText);
		this.assertParsable(statementText);

		const relations = new Set<string>();
		for (const [, relation] of statementText.matchAll(RELATION)) {
			if (relation) relations.add(relation);
		}
		return relations;
	}

	private assertParsable(text: string): void {
		if (text.includes("syntax error")) {
			throw new ParseError("unexpected token");
		}
	}
}
