import { z } from "zod";

/**
 * Gateway configuration schema
 *
 * Values arrive from environment variables (strings) or from a ConfigService
 * built in tests (numbers), so numeric fields are coerced.
 */
export const GatewayConfigSchema = z.object({
	// Default database path is resolved in src/utils/paths.ts
	databasePath: z.string().min(1).optional(),
	queryTimeoutMs: z.coerce.number().int().positive().default(10_000),
	maxRows: z.coerce.number().int().positive().default(1000),
	sampleRowLimit: z.coerce.number().int().min(3).max(5).default(5),
	acquireTimeoutMs: z.coerce.number().int().positive().default(2000),
	recencyColumns: z
		.string()
		.default("cycle_date")
		.transform((value) =>
			value
				.split(",")
				.map((column) => column.trim().toLowerCase())
				.filter((column) => column.length > 0),
		),
});

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;

/** Environment variable carrying each configuration field */
export const GATEWAY_ENV_KEYS = {
	databasePath: "SQLGATE_DATABASE_PATH",
	queryTimeoutMs: "SQLGATE_QUERY_TIMEOUT_MS",
	maxRows: "SQLGATE_MAX_ROWS",
	sampleRowLimit: "SQLGATE_SAMPLE_ROWS",
	acquireTimeoutMs: "SQLGATE_ACQUIRE_TIMEOUT_MS",
	recencyColumns: "SQLGATE_RECENCY_COLUMNS",
} as const satisfies Record<keyof GatewayConfig, string>;
