import { Module } from "@nestjs/common";
import { CatalogModule } from "../catalog/catalog.module.js";
import { ExecutionModule } from "../execution/execution.module.js";
import { GatewayService } from "./gateway.service.js";

@Module({
	imports: [ExecutionModule, CatalogModule],
	providers: [GatewayService],
	exports: [GatewayService],
})
export class GatewayModule {}
