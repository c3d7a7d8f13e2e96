import type { Scalar } from "../pure/values.js";

export type CatalogObjectKind = "table" | "view";

// get_schema() listing entry
export interface SchemaListing {
	name: string;
	kind: CatalogObjectKind;
	description: string;
}

export interface SchemaColumn {
	name: string;
	/** Declared type as reported by the engine, e.g. VARCHAR, DOUBLE */
	type: string;
	description: string;
}

// get_schema(name) result
export interface SchemaDescriptor {
	name: string;
	kind: CatalogObjectKind;
	description: string;
	columns: SchemaColumn[];
	row_count: number;
	sample_rows: Scalar[][];
	/** Column the sample was drawn from at its maximum value, if any */
	recency_column: string | null;
	sample_policy: string;
}
