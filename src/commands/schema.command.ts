import { Injectable } from "@nestjs/common";
import { Command, CommandRunner, Option } from "nest-commander";
import { CatalogService } from "../catalog/catalog.service.js";
import { GatewayService } from "../gateway/gateway.service.js";
import { isErrorReport } from "../pure/error-translator.js";

// Schema Command
@Injectable()
@Command({
	name: "schema",
	arguments: "[table]",
	description: "List tables and views, or describe one with sample rows",
})
export class SchemaCommand extends CommandRunner {
	constructor(
		private readonly gatewayService: GatewayService,
		private readonly catalogService: CatalogService,
	) {
		super();
	}

	async run(inputs: string[]): Promise<void> {
		const result = await this.gatewayService.getSchema(inputs[0]);

		if (isErrorReport(result)) {
			console.error(JSON.stringify(result, null, 2));
			process.exit(1);
		}

		const output = Array.isArray(result)
			? { tables: result, recommendation: this.catalogService.recommendation }
			: result;
		console.log(JSON.stringify(output, null, 2));
		process.exit(0);
	}
}

// Examples Command
interface ExamplesCommandOptions {
	category?: string;
}

@Injectable()
@Command({
	name: "examples",
	description: "Show ready-to-run example queries",
})
export class ExamplesCommand extends CommandRunner {
	constructor(private readonly gatewayService: GatewayService) {
		super();
	}

	async run(_inputs: string[], options: ExamplesCommandOptions): Promise<void> {
		const result = this.gatewayService.getExampleQueries(options.category);

		if (isErrorReport(result)) {
			console.error(JSON.stringify(result, null, 2));
			process.exit(1);
		}

		console.log(JSON.stringify(result, null, 2));
		process.exit(0);
	}

	@Option({
		flags: "-c, --category <name>",
		description: "Filter by category (search, comparison, ranking, trends, financial_analysis)",
	})
	parseCategory(value: string): string {
		return value;
	}
}
