/**
 * Error taxonomy surfaced to gateway callers.
 *
 * Every error carries a remediation hint so that a caller can correct its
 * request without access to server logs.
 */

export const ERROR_KINDS = [
	"ValidationError",
	"TimeoutError",
	"ExecutionError",
	"NotFoundError",
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export const SCHEMA_HINT =
	"Check table and column names with the schema tool (get_schema).";

export abstract class GatewayError extends Error {
	abstract readonly kind: ErrorKind;

	constructor(
		message: string,
		readonly hint: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
	}
}

/** The statement was rejected before it reached the engine. */
export class ValidationError extends GatewayError {
	readonly kind = "ValidationError";
	override readonly name = "ValidationError";

	constructor(
		message: string,
		hint = "Submit a single SELECT (or WITH ... SELECT) statement without write or admin keywords.",
	) {
		super(message, hint);
	}
}

export class TimeoutError extends GatewayError {
	readonly kind = "TimeoutError";
	override readonly name = "TimeoutError";

	constructor(readonly timeoutMs: number) {
		super(
			`Query exceeded the ${formatSeconds(timeoutMs)} timeout and was cancelled`,
			"Simplify filters or aggregate before returning large result sets.",
		);
	}
}

/** Engine rejection, store unavailability or a failed cursor acquisition. */
export class ExecutionError extends GatewayError {
	readonly kind = "ExecutionError";
	override readonly name = "ExecutionError";

	constructor(message: string, hint = SCHEMA_HINT, cause?: unknown) {
		super(message, hint, { cause });
	}
}

export class NotFoundError extends GatewayError {
	readonly kind = "NotFoundError";
	override readonly name = "NotFoundError";

	constructor(objectName: string) {
		super(
			`Table or view '${objectName}' not found`,
			"Call get_schema with no arguments to list the available tables and views.",
		);
	}
}

function formatSeconds(ms: number): string {
	const seconds = ms / 1000;
	return Number.isInteger(seconds) ? `${seconds} second` : `${seconds}s`;
}
