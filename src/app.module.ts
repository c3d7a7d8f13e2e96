import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import {
	CheckCommand,
	ExamplesCommand,
	SchemaCommand,
	SqlCommand,
} from "./commands/index.js";
import { CatalogModule } from "./catalog/catalog.module.js";
import { GatewayModule } from "./gateway/gateway.module.js";
import { getEnvPath } from "./utils/paths.js";

@Module({
	imports: [
		ConfigModule.forRoot({
			isGlobal: true,
			envFilePath: getEnvPath(),
		}),
		GatewayModule,
		CatalogModule,
	],
	providers: [
		// CLI Commands
		SqlCommand,
		CheckCommand,
		SchemaCommand,
		ExamplesCommand,
	],
})
export class AppModule {}
