/**
 * Pure result bounding: reads at most `cap + 1` rows from a cursor and
 * reports truncation without a second pass over the result.
 */
import type { DuckDBValue } from "@duckdb/node-api";
import { type Scalar, toScalarRow } from "./values.js";

export interface ColumnDescriptor {
	name: string;
	type: string;
}

/** A live, forward-only result owned by an execution session */
export interface RowCursor {
	columns(): ColumnDescriptor[];
	/** Read up to `limit` further rows; fewer means the result is exhausted */
	fetch(limit: number): Promise<DuckDBValue[][]>;
}

export interface ResultPayload {
	columns: string[];
	column_types: string[];
	rows: Scalar[][];
	row_count: number;
	truncated: boolean;
	warning?: string;
}

export function truncationWarning(cap: number): string {
	return `Results limited to ${cap} rows. Add filters, aggregate, or use LIMIT to narrow the query.`;
}

/**
 * Give duplicate column names a numeric suffix (`a`, `a_1`, `a_2`) so that
 * names are unique within a result set.
 */
export function uniqueColumnNames(names: readonly string[]): string[] {
	const taken = new Set<string>();
	return names.map((name) => {
		let candidate = name;
		for (let n = 1; taken.has(candidate); n++) {
			candidate = `${name}_${n}`;
		}
		taken.add(candidate);
		return candidate;
	});
}

export async function materializeResult(
	cursor: RowCursor,
	cap: number,
): Promise<ResultPayload> {
	if (!Number.isInteger(cap) || cap < 1) {
		throw new RangeError(`Row cap must be a positive integer, got ${cap}`);
	}

	// Column metadata is captured before any row is read (also for zero rows)
	const columns = cursor.columns();
	const fetched = await cursor.fetch(cap + 1);
	const truncated = fetched.length > cap;
	const rows = (truncated ? fetched.slice(0, cap) : fetched).map(toScalarRow);

	const payload: ResultPayload = {
		columns: uniqueColumnNames(columns.map((c) => c.name)),
		column_types: columns.map((c) => c.type),
		rows,
		row_count: rows.length,
		truncated,
	};
	if (truncated) {
		payload.warning = truncationWarning(cap);
	}
	return payload;
}
