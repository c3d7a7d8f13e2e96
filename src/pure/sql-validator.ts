/**
 * Pure functions for read-only statement validation
 *
 * Decisions are made on lexical tokens rather than raw substrings, so a
 * forbidden word inside a string literal, a quoted identifier or a longer
 * identifier (`'airdrop'`, `"update"`, `updated_at`) never triggers a
 * rejection, while the bare keyword always does whatever its case and
 * whatever comments surround it.
 */

export type TokenType =
	| "word"
	| "number"
	| "string"
	| "identifier"
	| "semicolon"
	| "symbol";

export interface SqlToken {
	type: TokenType;
	/** Source text of the token, quotes included */
	text: string;
	offset: number;
}

export type ValidationRule =
	| "empty"
	| "unterminated_literal"
	| "forbidden_keyword"
	| "multiple_statements"
	| "not_read_query";

export type ValidationVerdict =
	| { accepted: true }
	| { accepted: false; rule: ValidationRule; reason: string };

export const FORBIDDEN_KEYWORDS: ReadonlySet<string> = new Set([
	"DROP",
	"DELETE",
	"UPDATE",
	"INSERT",
	"ALTER",
	"CREATE",
	"ATTACH",
	"DETACH",
	"COPY",
	"PRAGMA",
	"EXPORT",
	"IMPORT",
	"CALL",
	"GRANT",
	"REVOKE",
	"VACUUM",
	// DuckDB-specific statements that write, load code or change session state
	"TRUNCATE",
	"MERGE",
	"INSTALL",
	"LOAD",
	"SET",
	"RESET",
	"CHECKPOINT",
	"USE",
	"PREPARE",
	"EXECUTE",
	"DEALLOCATE",
	"BEGIN",
	"COMMIT",
	"ROLLBACK",
]);

const READ_KEYWORDS = new Set(["SELECT", "WITH"]);

export class SqlLexError extends Error {
	constructor(
		message: string,
		readonly offset: number,
	) {
		super(message);
		this.name = "SqlLexError";
	}
}

const isWordStart = (ch: string) => /[A-Za-z_\u0080-\uffff]/.test(ch);
const isWordPart = (ch: string) => /[A-Za-z0-9_$\u0080-\uffff]/.test(ch);
const isDigit = (ch: string) => ch >= "0" && ch <= "9";

/**
 * Split SQL text into tokens, dropping whitespace and comments.
 * Throws SqlLexError on an unterminated literal or block comment.
 */
export function tokenizeSql(sql: string): SqlToken[] {
	const tokens: SqlToken[] = [];
	const n = sql.length;
	let i = 0;

	while (i < n) {
		const ch = sql[i];

		if (/\s/.test(ch)) {
			i++;
			continue;
		}

		// -- line comment
		if (ch === "-" && sql[i + 1] === "-") {
			const end = sql.indexOf("\n", i + 2);
			i = end === -1 ? n : end + 1;
			continue;
		}

		// /* block comment */
		if (ch === "/" && sql[i + 1] === "*") {
			const end = sql.indexOf("*/", i + 2);
			if (end === -1) {
				throw new SqlLexError("Unterminated block comment", i);
			}
			i = end + 2;
			continue;
		}

		// E'...' escape string (backslash escapes)
		if ((ch === "E" || ch === "e") && sql[i + 1] === "'") {
			const end = scanQuoted(sql, i + 1, "'", true);
			tokens.push({ type: "string", text: sql.slice(i, end), offset: i });
			i = end;
			continue;
		}

		if (ch === "'") {
			const end = scanQuoted(sql, i, "'", false);
			tokens.push({ type: "string", text: sql.slice(i, end), offset: i });
			i = end;
			continue;
		}

		if (ch === '"') {
			const end = scanQuoted(sql, i, '"', false);
			tokens.push({ type: "identifier", text: sql.slice(i, end), offset: i });
			i = end;
			continue;
		}

		// $tag$ ... $tag$ dollar-quoted string
		if (ch === "$") {
			const tag = /^\$([A-Za-z_][A-Za-z0-9_]*)?\$/.exec(sql.slice(i));
			if (tag) {
				const close = sql.indexOf(tag[0], i + tag[0].length);
				if (close === -1) {
					throw new SqlLexError("Unterminated dollar-quoted string", i);
				}
				const end = close + tag[0].length;
				tokens.push({ type: "string", text: sql.slice(i, end), offset: i });
				i = end;
				continue;
			}
		}

		if (isWordStart(ch)) {
			let end = i + 1;
			while (end < n && isWordPart(sql[end])) end++;
			tokens.push({ type: "word", text: sql.slice(i, end), offset: i });
			i = end;
			continue;
		}

		if (isDigit(ch) || (ch === "." && isDigit(sql[i + 1] ?? ""))) {
			let end = i + 1;
			while (end < n && /[0-9A-Za-z_.]/.test(sql[end])) end++;
			tokens.push({ type: "number", text: sql.slice(i, end), offset: i });
			i = end;
			continue;
		}

		tokens.push({
			type: ch === ";" ? "semicolon" : "symbol",
			text: ch,
			offset: i,
		});
		i++;
	}

	return tokens;
}

/**
 * Scan a quoted literal starting at `start` (the opening quote).
 * A doubled quote is an escaped quote; with `backslashEscapes` a backslash
 * escapes the next character. Returns the offset just past the closing quote.
 */
function scanQuoted(
	sql: string,
	start: number,
	quote: string,
	backslashEscapes: boolean,
): number {
	let i = start + 1;
	while (i < sql.length) {
		const ch = sql[i];
		if (backslashEscapes && ch === "\\") {
			i += 2;
			continue;
		}
		if (ch === quote) {
			if (sql[i + 1] === quote) {
				i += 2;
				continue;
			}
			return i + 1;
		}
		i++;
	}
	throw new SqlLexError(
		quote === '"'
			? "Unterminated quoted identifier"
			: "Unterminated string literal",
		start,
	);
}

/**
 * Decide whether a statement may be executed. The input text is never
 * modified; case folding happens on token copies only.
 */
export function validateStatement(sql: string): ValidationVerdict {
	let tokens: SqlToken[];
	try {
		tokens = tokenizeSql(sql);
	} catch (error) {
		if (error instanceof SqlLexError) {
			return {
				accepted: false,
				rule: "unterminated_literal",
				reason: `${error.message} at offset ${error.offset}`,
			};
		}
		throw error;
	}

	if (tokens.length === 0) {
		return { accepted: false, rule: "empty", reason: "Query cannot be empty" };
	}

	for (const token of tokens) {
		if (token.type !== "word") continue;
		const keyword = token.text.toUpperCase();
		if (FORBIDDEN_KEYWORDS.has(keyword)) {
			return {
				accepted: false,
				rule: "forbidden_keyword",
				reason: `Query contains forbidden keyword: ${keyword}`,
			};
		}
	}

	const firstSemicolon = tokens.findIndex((t) => t.type === "semicolon");
	if (
		firstSemicolon !== -1 &&
		tokens.slice(firstSemicolon).some((t) => t.type !== "semicolon")
	) {
		return {
			accepted: false,
			rule: "multiple_statements",
			reason:
				"Multiple SQL statements are not allowed; submit exactly one statement",
		};
	}

	const first = tokens[0];
	if (first.type !== "word" || !READ_KEYWORDS.has(first.text.toUpperCase())) {
		return {
			accepted: false,
			rule: "not_read_query",
			reason: `Only SELECT queries are allowed (optionally prefixed by WITH); statement begins with '${first.text}'`,
		};
	}

	return { accepted: true };
}
