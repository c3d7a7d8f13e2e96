import type { DuckDBResult, DuckDBValue } from "@duckdb/node-api";
import type { ColumnDescriptor, RowCursor } from "../pure/result-materializer.js";

/**
 * RowCursor over a streaming DuckDB result. Chunks are pulled only as far
 * as the caller asks; rows left over from a chunk wait for the next fetch.
 */
export class DuckDBRowCursor implements RowCursor {
	private buffered: DuckDBValue[][] = [];
	private exhausted = false;

	constructor(private readonly result: DuckDBResult) {}

	columns(): ColumnDescriptor[] {
		const names = this.result.columnNames();
		const types = this.result.columnTypes();
		return names.map((name, index) => ({
			name,
			type: types[index]?.toString() ?? "UNKNOWN",
		}));
	}

	async fetch(limit: number): Promise<DuckDBValue[][]> {
		while (!this.exhausted && this.buffered.length < limit) {
			const chunk = await this.result.fetchChunk();
			if (!chunk || chunk.rowCount === 0) {
				this.exhausted = true;
				break;
			}
			this.buffered.push(...chunk.getRows());
		}
		return this.buffered.splice(0, limit);
	}
}
