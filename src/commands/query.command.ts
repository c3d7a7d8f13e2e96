import { Injectable } from "@nestjs/common";
import { Command, CommandRunner, Option } from "nest-commander";
import { GatewayService } from "../gateway/gateway.service.js";
import { isErrorReport } from "../pure/error-translator.js";
import { validateStatement } from "../pure/sql-validator.js";

// SQL Command
interface SqlCommandOptions {
	timeout?: string;
}

@Injectable()
@Command({
	name: "sql",
	arguments: "<query>",
	description: "Execute a read-only SQL query against the store",
})
export class SqlCommand extends CommandRunner {
	constructor(private readonly gatewayService: GatewayService) {
		super();
	}

	async run(inputs: string[], options: SqlCommandOptions): Promise<void> {
		const query = inputs[0] ?? "";

		let timeoutMs: number | undefined;
		if (options.timeout !== undefined) {
			timeoutMs = Number(options.timeout);
			if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
				console.error("Error: --timeout must be a positive number of milliseconds");
				process.exit(1);
			}
		}

		const result = await this.gatewayService.executeSql(query, { timeoutMs });
		if (isErrorReport(result)) {
			console.error(JSON.stringify(result, null, 2));
			process.exit(1);
		}

		console.log(JSON.stringify(result, null, 2));
		process.exit(0);
	}

	@Option({
		flags: "-t, --timeout <ms>",
		description: "Deadline for this query in milliseconds",
	})
	parseTimeout(value: string): string {
		return value;
	}
}

// Check Command
@Injectable()
@Command({
	name: "check",
	arguments: "<query>",
	description: "Validate a query without executing it",
})
export class CheckCommand extends CommandRunner {
	async run(inputs: string[]): Promise<void> {
		const verdict = validateStatement(inputs[0] ?? "");

		if (verdict.accepted) {
			console.log("✅ Query accepted");
			process.exit(0);
		}

		console.log(`❌ Query rejected (${verdict.rule})`);
		console.log(`   ${verdict.reason}`);
		process.exit(1);
	}
}
