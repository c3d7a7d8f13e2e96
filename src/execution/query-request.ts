import { ValidationError } from "../errors/gateway.errors.js";
import { validateStatement } from "../pure/sql-validator.js";

const ACCEPTED: unique symbol = Symbol("accepted");

export interface QueryRequest {
	readonly sql: string;
	readonly submittedAt: Date;
}

/**
 * A QueryRequest that has passed the statement validator. Only acceptQuery()
 * can produce one, so the executor never sees unvalidated text.
 */
export interface AcceptedQuery extends QueryRequest {
	readonly [ACCEPTED]: true;
}

/**
 * Validate raw query text. Throws ValidationError naming the failed rule;
 * the text itself is carried through unchanged.
 */
export function acceptQuery(sql: string, submittedAt = new Date()): AcceptedQuery {
	const verdict = validateStatement(sql);
	if (!verdict.accepted) {
		throw new ValidationError(verdict.reason);
	}
	return { sql, submittedAt, [ACCEPTED]: true };
}
