/**
 * @fileoverview Unit tests for centralized path utilities
 */

import { existsSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
	getAssetPath,
	getDefaultDatabasePath,
	getEnvPath,
	getGatewayHome,
	setGatewayHomeForTesting,
} from "./paths.js";

describe("paths utilities", () => {
	const expectedHome = join(homedir(), ".sqlgate");

	afterEach(() => {
		setGatewayHomeForTesting(null);
	});

	describe("getGatewayHome()", () => {
		it("returns ~/.sqlgate path", () => {
			expect(getGatewayHome()).toBe(expectedHome);
		});

		it("honours the testing override", () => {
			setGatewayHomeForTesting("/tmp/sqlgate-paths-test");
			expect(getGatewayHome()).toBe("/tmp/sqlgate-paths-test");
		});
	});

	describe("getDefaultDatabasePath()", () => {
		it("returns ~/.sqlgate/store.duckdb path", () => {
			expect(getDefaultDatabasePath()).toBe(join(expectedHome, "store.duckdb"));
		});
	});

	describe("getEnvPath()", () => {
		it("returns ~/.sqlgate/.env path", () => {
			expect(getEnvPath()).toBe(join(expectedHome, ".env"));
		});
	});

	describe("getAssetPath()", () => {
		it("points at the bundled assets directory", () => {
			expect(existsSync(getAssetPath("example-queries.json"))).toBe(true);
			expect(existsSync(getAssetPath("catalog-descriptions.json"))).toBe(true);
		});
	});
});
