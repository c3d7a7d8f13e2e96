import type { DuckDBConnection } from "@duckdb/node-api";
import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { NotFoundError, ValidationError } from "../errors/gateway.errors.js";
import { QueryExecutorService } from "../execution/query-executor.service.js";
import { type Scalar, toScalar, toScalarRow } from "../pure/values.js";
import {
	type CatalogDescriptions,
	CatalogDescriptionsSchema,
} from "../schemas/catalog.schemas.js";
import type { GatewayConfig } from "../schemas/config.schemas.js";
import { loadJsonAsset } from "../utils/assets.js";
import { readGatewayConfig } from "../utils/config.js";
import type {
	CatalogObjectKind,
	SchemaDescriptor,
	SchemaListing,
} from "./catalog.types.js";

export const STORAGE_ORDER_POLICY =
	"First rows ordered by every column left to right; stable while the data is unchanged";

interface CatalogObjectRef {
	schema: string;
	name: string;
	kind: CatalogObjectKind;
}

/**
 * Schema Catalog Reader: introspects tables and views of the store.
 *
 * Runs only gateway-authored SQL (identifiers quoted, literals escaped) and
 * goes through the execution coordinator, so introspection shares the same
 * per-request session and deadline discipline as caller queries.
 */
@Injectable()
export class CatalogService {
	private readonly logger = new Logger(CatalogService.name);
	private readonly config: GatewayConfig;
	private readonly descriptions: CatalogDescriptions;

	constructor(
		private executor: QueryExecutorService,
		private configService: ConfigService,
	) {
		this.config = readGatewayConfig(this.configService);
		this.descriptions = loadJsonAsset(
			"catalog-descriptions.json",
			CatalogDescriptionsSchema,
		);
	}

	/** Usage advice shown alongside the listing, if the catalog defines one */
	get recommendation(): string | undefined {
		return this.descriptions.recommendation;
	}

	async listObjects(): Promise<SchemaListing[]> {
		const objects = await this.executor.run((conn) => this.readObjects(conn));
		return objects.map((object) => ({
			name: object.name,
			kind: object.kind,
			description: this.describeTable(object.name),
		}));
	}

	async describeObject(tableName: string): Promise<SchemaDescriptor> {
		const requested = tableName.trim();
		if (!requested) {
			throw new ValidationError(
				"table_name cannot be empty",
				"Omit table_name to list every table and view.",
			);
		}

		return this.executor.run(async (conn) => {
			const object = await this.findObject(conn, requested);
			if (!object) {
				throw new NotFoundError(requested);
			}
			const target = `${quoteIdentifier(object.schema)}.${quoteIdentifier(object.name)}`;

			const columnReader = await conn.runAndReadAll(`
				SELECT column_name, data_type
				FROM information_schema.columns
				WHERE table_catalog = current_database()
				  AND table_schema = '${escapeLiteral(object.schema)}'
				  AND table_name = '${escapeLiteral(object.name)}'
				ORDER BY ordinal_position
			`);
			const columns = columnReader.getRows().map(([name, type]) => ({
				name: String(name),
				type: String(type),
				description: this.describeColumn(String(name)),
			}));

			const countReader = await conn.runAndReadAll(
				`SELECT COUNT(*) FROM ${target}`,
			);
			const rowCount = Number(toScalar(countReader.getRows()[0]?.[0] ?? 0));

			const recencyColumn = this.findRecencyColumn(columns.map((c) => c.name));
			// ORDER BY ALL keeps the sample stable across runs, including views over joins
			const sampleSql = recencyColumn
				? `SELECT * FROM ${target}
					WHERE ${quoteIdentifier(recencyColumn)} = (SELECT MAX(${quoteIdentifier(recencyColumn)}) FROM ${target})
					ORDER BY ALL
					LIMIT ${this.config.sampleRowLimit}`
				: `SELECT * FROM ${target} ORDER BY ALL LIMIT ${this.config.sampleRowLimit}`;
			const sampleReader = await conn.runAndReadAll(sampleSql);
			const sampleRows: Scalar[][] = sampleReader.getRows().map(toScalarRow);

			this.logger.debug(
				`Described ${object.kind} ${object.name}: ${columns.length} columns, ${rowCount} rows`,
			);

			return {
				name: object.name,
				kind: object.kind,
				description: this.describeTable(object.name),
				columns,
				row_count: rowCount,
				sample_rows: sampleRows,
				recency_column: recencyColumn,
				sample_policy: recencyColumn
					? `Rows from the most recent ${recencyColumn} (its maximum value), ordered by every column`
					: STORAGE_ORDER_POLICY,
			};
		});
	}

	private async readObjects(conn: DuckDBConnection): Promise<CatalogObjectRef[]> {
		const reader = await conn.runAndReadAll(`
			SELECT table_schema, table_name, table_type
			FROM information_schema.tables
			WHERE table_catalog = current_database()
			  AND table_schema NOT IN ('information_schema', 'pg_catalog')
			ORDER BY table_name, table_schema
		`);
		return reader.getRows().map(([schema, name, type]) => ({
			schema: String(schema),
			name: String(name),
			kind: toObjectKind(String(type)),
		}));
	}

	/** Case-insensitive lookup, preferring the main schema */
	private async findObject(
		conn: DuckDBConnection,
		name: string,
	): Promise<CatalogObjectRef | null> {
		const reader = await conn.runAndReadAll(`
			SELECT table_schema, table_name, table_type
			FROM information_schema.tables
			WHERE table_catalog = current_database()
			  AND table_schema NOT IN ('information_schema', 'pg_catalog')
			  AND lower(table_name) = lower('${escapeLiteral(name)}')
			ORDER BY table_schema <> 'main', table_schema
			LIMIT 1
		`);
		const row = reader.getRows()[0];
		if (!row) {
			return null;
		}
		const [schema, tableName, type] = row;
		return {
			schema: String(schema),
			name: String(tableName),
			kind: toObjectKind(String(type)),
		};
	}

	private findRecencyColumn(columnNames: string[]): string | null {
		for (const candidate of this.config.recencyColumns) {
			const match = columnNames.find((name) => name.toLowerCase() === candidate);
			if (match) {
				return match;
			}
		}
		return null;
	}

	private describeTable(name: string): string {
		return lookup(this.descriptions.tables, name);
	}

	private describeColumn(name: string): string {
		return lookup(this.descriptions.columns, name);
	}
}

function lookup(dictionary: Record<string, string>, key: string): string {
	return dictionary[key] ?? dictionary[key.toLowerCase()] ?? "";
}

function toObjectKind(tableType: string): CatalogObjectKind {
	return tableType.toUpperCase() === "VIEW" ? "view" : "table";
}

export function quoteIdentifier(identifier: string): string {
	return `"${identifier.replace(/"/g, '""')}"`;
}

export function escapeLiteral(value: string): string {
	return value.replace(/'/g, "''");
}
