import { existsSync } from "node:fs";
import { DuckDBConnection, DuckDBInstance } from "@duckdb/node-api";
import {
	Injectable,
	Logger,
	OnModuleDestroy,
	OnModuleInit,
} from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { ExecutionError, GatewayError } from "../errors/gateway.errors.js";
import { readGatewayConfig } from "../utils/config.js";
import { getDefaultDatabasePath } from "../utils/paths.js";

const STORE_HINT =
	"Ensure the DuckDB store exists at the configured path (SQLGATE_DATABASE_PATH) and retry.";

/**
 * Owns the single read-only DuckDB instance for the lifetime of the process.
 *
 * The instance is opened once, at startup when the file is present (else on
 * first use), and never reopened per request.
 * Every request takes its own connection from it via acquire() and hands it
 * back via release(), so an interrupted or failed query cannot disturb
 * another request's cursor.
 */
@Injectable()
export class StoreService implements OnModuleInit, OnModuleDestroy {
	private readonly logger = new Logger(StoreService.name);
	private instance: DuckDBInstance | null = null;
	private opening: Promise<DuckDBInstance> | null = null;
	private readonly sessions = new Set<DuckDBConnection>();
	private readonly dbPath: string;
	private readonly acquireTimeoutMs: number;

	constructor(private configService: ConfigService) {
		const config = readGatewayConfig(this.configService);
		this.dbPath = config.databasePath ?? getDefaultDatabasePath();
		this.acquireTimeoutMs = config.acquireTimeoutMs;
	}

	get databasePath(): string {
		return this.dbPath;
	}

	/** Number of connections currently checked out */
	get activeSessions(): number {
		return this.sessions.size;
	}

	get isOpen(): boolean {
		return this.instance !== null;
	}

	/**
	 * Open the store at application start. A missing file is left to the first
	 * request to report, so commands that never touch the store still run.
	 */
	async onModuleInit(): Promise<void> {
		if (!existsSync(this.dbPath)) {
			this.logger.debug(`No store at ${this.dbPath} yet; opening deferred`);
			return;
		}
		await this.ensureOpen();
	}

	async onModuleDestroy(): Promise<void> {
		await this.close();
	}

	/**
	 * Open the store if startup did not - shared by concurrent first requests
	 */
	private async ensureOpen(): Promise<DuckDBInstance> {
		if (this.instance) {
			return this.instance;
		}

		// Prevent multiple simultaneous open attempts
		if (!this.opening) {
			this.opening = this.open().finally(() => {
				this.opening = null;
			});
		}
		return await this.opening;
	}

	private async open(): Promise<DuckDBInstance> {
		if (!existsSync(this.dbPath)) {
			throw new ExecutionError(
				`Database not found at ${this.dbPath}`,
				STORE_HINT,
			);
		}
		try {
			// External access stays off so table functions cannot read files
			// or load extensions on behalf of a caller
			const instance = await DuckDBInstance.create(this.dbPath, {
				access_mode: "READ_ONLY",
				enable_external_access: "false",
			});
			this.instance = instance;
			this.logger.log(`Opened DuckDB store (read-only) at ${this.dbPath}`);
			return instance;
		} catch (error) {
			this.logger.error(
				`Failed to open DuckDB store: ${error instanceof Error ? error.message : String(error)}`,
			);
			throw new ExecutionError(
				`Store unavailable: ${error instanceof Error ? error.message : String(error)}`,
				STORE_HINT,
				error,
			);
		}
	}

	/**
	 * Check out a connection scoped to one request. Never waits longer than
	 * the acquisition timeout; a connection that arrives late is closed.
	 */
	async acquire(timeoutMs = this.acquireTimeoutMs): Promise<DuckDBConnection> {
		const instance = await this.ensureOpen();
		const pending = instance.connect();

		let timer: NodeJS.Timeout | undefined;
		const deadline = new Promise<never>((_, reject) => {
			timer = setTimeout(
				() =>
					reject(
						new ExecutionError(
							`Could not acquire a store session within ${timeoutMs} ms`,
							"The store is busy or unavailable; retry the request shortly.",
						),
					),
				timeoutMs,
			);
		});

		try {
			const connection = await Promise.race([pending, deadline]);
			this.sessions.add(connection);
			this.logger.debug(`Session acquired (${this.sessions.size} active)`);
			return connection;
		} catch (error) {
			void pending.then(
				(late) => this.closeConnection(late),
				(lateError: unknown) =>
					this.logger.debug(
						`Late session acquisition failed: ${lateError instanceof Error ? lateError.message : String(lateError)}`,
					),
			);
			if (error instanceof GatewayError) {
				throw error;
			}
			throw new ExecutionError(
				`Could not acquire a store session: ${error instanceof Error ? error.message : String(error)}`,
				STORE_HINT,
				error,
			);
		} finally {
			clearTimeout(timer);
		}
	}

	/** Return a connection; safe to call more than once for the same session */
	release(connection: DuckDBConnection): void {
		if (!this.sessions.delete(connection)) {
			return;
		}
		this.closeConnection(connection);
		this.logger.debug(`Session released (${this.sessions.size} active)`);
	}

	private closeConnection(connection: DuckDBConnection): void {
		try {
			connection.closeSync();
		} catch (error) {
			this.logger.warn(
				`Failed to close session: ${error instanceof Error ? error.message : String(error)}`,
			);
		}
	}

	async close(): Promise<void> {
		if (this.opening) {
			// Let an in-flight open settle so its instance is not orphaned
			await this.opening.catch((error: unknown) =>
				this.logger.debug(
					`Store open failed during shutdown: ${error instanceof Error ? error.message : String(error)}`,
				),
			);
		}
		for (const connection of this.sessions) {
			connection.interrupt();
			this.closeConnection(connection);
		}
		this.sessions.clear();
		if (this.instance) {
			this.instance = null;
			this.logger.log("Closed DuckDB store");
		}
	}
}
