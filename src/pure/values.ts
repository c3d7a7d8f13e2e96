/**
 * Pure functions converting DuckDB values into JSON scalars
 */
import { DuckDBDecimalValue, type DuckDBValue } from "@duckdb/node-api";

export type Scalar = string | number | boolean | null;

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * Convert a DuckDB value to a JSON-safe scalar.
 *
 * BIGINT and HUGEINT become numbers when they fit in a double without loss
 * and decimal strings otherwise. DECIMAL becomes a number. Dates, times,
 * intervals, UUIDs, blobs and nested values use their DuckDB text form.
 */
export function toScalar(value: DuckDBValue): Scalar {
	if (value === null) return null;
	if (typeof value === "string" || typeof value === "boolean") {
		return value;
	}
	if (typeof value === "number") {
		return Number.isFinite(value) ? value : String(value);
	}
	if (typeof value === "bigint") {
		return value >= MIN_SAFE && value <= MAX_SAFE
			? Number(value)
			: value.toString();
	}
	if (value instanceof DuckDBDecimalValue) {
		return Number(value.toString());
	}
	return value.toString();
}

export function toScalarRow(row: readonly DuckDBValue[]): Scalar[] {
	return row.map(toScalar);
}
