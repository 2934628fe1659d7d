/**
 * Statement boundaries in SQL text
 *
 * @module parsing/statement-splitter
 */

const QUOTE_CLOSERS = new Map([
	["'", "'"],
	['"', '"'],
	["`", "`"],
]);

/**
 * Cut `text` at top-level semicolons, keeping each statement as written
 *
 * Semicolons inside quoted strings, quoted identifiers and comments do not
 * end a statement. Pieces holding only whitespace and comments are dropped.
 *
 * @example
 * ```typescript
 * splitSqlText("insert into log values ('a;b'); select * from log;");
 * // ["insert into log values ('a;b')", "select * from log"]
 * ```
 */
export function splitSqlText(text: string): string[] {
	const statements: string[] = [];
	let start = 0;
	let hasCode = false;
	let index = 0;

	const flush = (end: number): void => {
		if (hasCode) {
			statements.push(text.slice(start, end).trim());
		}
		start = end + 1;
		hasCode = false;
	};

	while (index < text.length) {
		const char = text.charAt(index);
		const next = text.charAt(index + 1);

		if (char === "-" && next === "-") {
			const newline = text.indexOf("\n", index + 2);
			index = newline === -1 ? text.length : newline + 1;
			continue;
		}
		if (char === "/" && next === "*") {
			const close = text.indexOf("*/", index + 2);
			index = close === -1 ? text.length : close + 2;
			continue;
		}

		const closer = QUOTE_CLOSERS.get(char);
		if (closer !== undefined) {
			hasCode = true;
			index = skipQuoted(text, index + 1, closer);
			continue;
		}

		if (char === ";") {
			flush(index);
		} else if (char.trim() !== "") {
			hasCode = true;
		}
		index++;
	}
	flush(text.length);

	return statements;
}

/**
 * Index just past the closing quote; a doubled quote is an escaped one
 */
function skipQuoted(text: string, from: number, closer: string): number {
	let index = from;
	while (index < text.length) {
		if (text.charAt(index) === closer) {
			if (text.charAt(index + 1) === closer) {
				index += 2;
				continue;
			}
			return index + 1;
		}
		index++;
	}
	return text.length;
}
