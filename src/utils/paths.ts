/**
 * @fileoverview Centralized path utilities for sqlgate
 *
 * Gateway state lives in ~/.sqlgate/:
 * - store.duckdb   Default location of the read-only analytics store
 * - .env           Configuration overrides (SQLGATE_*)
 *
 * Reference assets (catalog descriptions, example queries) ship with the
 * package under assets/.
 */

import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = dirname(fileURLToPath(import.meta.url));

// Default home directory, can be overridden for testing
let gatewayHomeOverride: string | null = null;

/**
 * Override the gateway home path (for testing only)
 */
export function setGatewayHomeForTesting(path: string | null): void {
	gatewayHomeOverride = path;
}

/**
 * Get the root gateway directory path (~/.sqlgate)
 */
export function getGatewayHome(): string {
	if (gatewayHomeOverride) {
		return gatewayHomeOverride;
	}
	return join(homedir(), ".sqlgate");
}

/**
 * Get the default DuckDB store path (~/.sqlgate/store.duckdb)
 */
export function getDefaultDatabasePath(): string {
	return join(getGatewayHome(), "store.duckdb");
}

/**
 * Get the environment file path (~/.sqlgate/.env)
 */
export function getEnvPath(): string {
	return join(getGatewayHome(), ".env");
}

/**
 * Resolve a bundled asset. Works from both src/utils and dist/utils.
 */
export function getAssetPath(fileName: string): string {
	return join(__dirname, "..", "..", "assets", fileName);
}
