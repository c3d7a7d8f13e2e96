import { Module } from "@nestjs/common";
import { StoreModule } from "../store/store.module.js";
import { QueryExecutorService } from "./query-executor.service.js";

@Module({
	imports: [StoreModule],
	providers: [QueryExecutorService],
	exports: [QueryExecutorService],
})
export class ExecutionModule {}
