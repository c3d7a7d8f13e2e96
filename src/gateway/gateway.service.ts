import { Injectable, Logger } from "@nestjs/common";
import { CatalogService } from "../catalog/catalog.service.js";
import type {
	SchemaDescriptor,
	SchemaListing,
} from "../catalog/catalog.types.js";
import { ExamplesService } from "../catalog/examples.service.js";
import { QueryExecutorService, type RunOptions } from "../execution/query-executor.service.js";
import { acceptQuery } from "../execution/query-request.js";
import { type ErrorReport, toErrorReport } from "../pure/error-translator.js";
import type { ResultPayload } from "../pure/result-materializer.js";
import type { TemplateEntry } from "../schemas/catalog.schemas.js";

/**
 * The three operations exposed to tool-calling clients.
 *
 * Each returns either its payload or an ErrorReport; no exception crosses
 * this boundary untranslated.
 */
@Injectable()
export class GatewayService {
	private readonly logger = new Logger(GatewayService.name);

	constructor(
		private readonly executor: QueryExecutorService,
		private readonly catalogService: CatalogService,
		private readonly examplesService: ExamplesService,
	) {}

	async executeSql(
		query: string,
		options: RunOptions = {},
	): Promise<ResultPayload | ErrorReport> {
		try {
			// Rejected statements never reach the store
			const accepted = acceptQuery(query);
			return await this.executor.executeQuery(accepted, options);
		} catch (error) {
			return this.report("execute_sql", error);
		}
	}

	async getSchema(
		tableName?: string,
	): Promise<SchemaListing[] | SchemaDescriptor | ErrorReport> {
		try {
			if (tableName === undefined) {
				return await this.catalogService.listObjects();
			}
			return await this.catalogService.describeObject(tableName);
		} catch (error) {
			return this.report("get_schema", error);
		}
	}

	getExampleQueries(category?: string): TemplateEntry[] | ErrorReport {
		try {
			return this.examplesService.getExamples(category);
		} catch (error) {
			return this.report("get_example_queries", error);
		}
	}

	private report(operation: string, error: unknown): ErrorReport {
		const report = toErrorReport(error);
		this.logger.warn(`${operation} failed (${report.kind}): ${report.message}`);
		return report;
	}
}
