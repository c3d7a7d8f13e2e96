/**
 * Maps every failure surface onto the single external error shape
 */
import {
	ERROR_KINDS,
	type ErrorKind,
	ExecutionError,
	GatewayError,
	SCHEMA_HINT,
} from "../errors/gateway.errors.js";

export interface ErrorReport {
	kind: ErrorKind;
	message: string;
	hint: string;
}

export function toErrorReport(error: unknown): ErrorReport {
	if (error instanceof GatewayError) {
		return { kind: error.kind, message: error.message, hint: error.hint };
	}
	if (error instanceof Error) {
		// Anything the engine raised: parser, binder, catalog, conversion errors
		return {
			kind: "ExecutionError",
			message: `Query execution failed: ${error.message}`,
			hint: SCHEMA_HINT,
		};
	}
	return {
		kind: "ExecutionError",
		message: `Query execution failed: ${String(error)}`,
		hint: SCHEMA_HINT,
	};
}

/** Wrap an engine failure so it carries a hint from the point it was caught */
export function asExecutionError(error: unknown): GatewayError {
	if (error instanceof GatewayError) return error;
	const message = error instanceof Error ? error.message : String(error);
	return new ExecutionError(`Query execution failed: ${message}`, SCHEMA_HINT, error);
}

const KIND_SET: ReadonlySet<string> = new Set(ERROR_KINDS);

export function isErrorReport(value: unknown): value is ErrorReport {
	return (
		typeof value === "object" &&
		value !== null &&
		!Array.isArray(value) &&
		"kind" in value &&
		typeof value.kind === "string" &&
		KIND_SET.has(value.kind) &&
		"message" in value &&
		"hint" in value
	);
}
