import type { DuckDBConnection } from "@duckdb/node-api";
import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import {
	ExecutionError,
	GatewayError,
	TimeoutError,
} from "../errors/gateway.errors.js";
import { asExecutionError } from "../pure/error-translator.js";
import {
	materializeResult,
	type ResultPayload,
} from "../pure/result-materializer.js";
import type { GatewayConfig } from "../schemas/config.schemas.js";
import { StoreService } from "../store/store.service.js";
import { readGatewayConfig } from "../utils/config.js";
import { DuckDBRowCursor } from "./duckdb-row-cursor.js";
import type { AcceptedQuery } from "./query-request.js";

// An interrupt can land before the engine has started the statement; repeat
// it until the in-flight work has actually settled.
const INTERRUPT_RETRY_MS = 50;

export interface RunOptions {
	/** Deadline for this run; defaults to SQLGATE_QUERY_TIMEOUT_MS */
	timeoutMs?: number;
	/** Caller-side cancellation, handled exactly like the deadline */
	signal?: AbortSignal;
}

/**
 * Runs work against a per-request session under a hard deadline.
 *
 * The session is acquired before the first row is read and released exactly
 * once on every exit path. On timeout the in-flight statement is interrupted
 * and the coordinator waits for it to unwind before reporting, so nothing
 * leaks into the next request.
 */
@Injectable()
export class QueryExecutorService {
	private readonly logger = new Logger(QueryExecutorService.name);
	private readonly config: GatewayConfig;

	constructor(
		private storeService: StoreService,
		private configService: ConfigService,
	) {
		this.config = readGatewayConfig(this.configService);
	}

	get rowCap(): number {
		return this.config.maxRows;
	}

	/**
	 * Execute an accepted statement and materialize at most rowCap rows.
	 * Never retried: a failed or timed-out query is reported as-is.
	 */
	async executeQuery(
		query: AcceptedQuery,
		options: RunOptions = {},
	): Promise<ResultPayload> {
		this.logger.debug(`Executing query: ${query.sql}`);
		const result = await this.run(async (connection) => {
			const stream = await connection.stream(query.sql);
			return materializeResult(new DuckDBRowCursor(stream), this.config.maxRows);
		}, options);
		this.logger.debug(
			`Query returned ${result.row_count} rows${result.truncated ? " (truncated)" : ""} in ${Date.now() - query.submittedAt.getTime()} ms`,
		);
		return result;
	}

	async run<T>(
		work: (connection: DuckDBConnection) => Promise<T>,
		options: RunOptions = {},
	): Promise<T> {
		const timeoutMs = options.timeoutMs ?? this.config.queryTimeoutMs;
		if (options.signal?.aborted) {
			throw cancelledByCaller();
		}

		const connection = await this.storeService.acquire();
		// The caller may have given up while the session was being acquired
		if (options.signal?.aborted) {
			this.storeService.release(connection);
			throw cancelledByCaller();
		}
		const controller = new AbortController();
		const forwardAbort = () => controller.abort(cancelledByCaller());
		options.signal?.addEventListener("abort", forwardAbort, { once: true });
		const timer = setTimeout(
			() => controller.abort(new TimeoutError(timeoutMs)),
			timeoutMs,
		);
		const cancelled = new Promise<never>((_, reject) => {
			controller.signal.addEventListener(
				"abort",
				() => {
					connection.interrupt();
					reject(controller.signal.reason);
				},
				{ once: true },
			);
		});

		const startedAt = Date.now();
		const execution = work(connection);
		try {
			return await Promise.race([execution, cancelled]);
		} catch (error) {
			if (controller.signal.aborted) {
				await this.unwind(execution, connection);
				const reason: unknown = controller.signal.reason;
				this.logger.warn(
					`Query cancelled after ${Date.now() - startedAt} ms: ${reason instanceof Error ? reason.message : String(reason)}`,
				);
				throw reason instanceof GatewayError ? reason : cancelledByCaller();
			}
			this.logger.warn(
				`Query failed: ${error instanceof Error ? error.message : String(error)}`,
			);
			throw asExecutionError(error);
		} finally {
			clearTimeout(timer);
			options.signal?.removeEventListener("abort", forwardAbort);
			this.storeService.release(connection);
		}
	}

	/** Wait for interrupted work to settle; its outcome is discarded */
	private async unwind(
		execution: Promise<unknown>,
		connection: DuckDBConnection,
	): Promise<void> {
		const retry = setInterval(() => connection.interrupt(), INTERRUPT_RETRY_MS);
		try {
			await execution.then(
				() => this.logger.debug("Cancelled query completed; result discarded"),
				(error: unknown) =>
					this.logger.debug(
						`Cancelled query unwound: ${error instanceof Error ? error.message : String(error)}`,
					),
			);
		} finally {
			clearInterval(retry);
		}
	}
}

function cancelledByCaller(): ExecutionError {
	return new ExecutionError(
		"Query was cancelled before completion",
		"Resubmit the query if the result is still needed.",
	);
}
