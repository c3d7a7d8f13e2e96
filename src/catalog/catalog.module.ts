import { Module } from "@nestjs/common";
import { ExecutionModule } from "../execution/execution.module.js";
import { CatalogService } from "./catalog.service.js";
import { ExamplesService } from "./examples.service.js";

@Module({
	imports: [ExecutionModule],
	providers: [CatalogService, ExamplesService],
	exports: [CatalogService, ExamplesService],
})
export class CatalogModule {}
