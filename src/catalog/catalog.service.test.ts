import { ConfigService } from "@nestjs/config";
import { afterAll, afterEach, beforeAll, describe, expect, it } from "vitest";
import { NotFoundError, ValidationError } from "../errors/gateway.errors.js";
import { QueryExecutorService } from "../execution/query-executor.service.js";
import { StoreService } from "../store/store.service.js";
import {
	createFixtureStore,
	type FixtureStore,
	LATEST_CYCLE,
	PREVIOUS_CYCLE,
} from "../testing/fixture-store.js";
import {
	CatalogService,
	escapeLiteral,
	quoteIdentifier,
	STORAGE_ORDER_POLICY,
} from "./catalog.service.js";

describe("CatalogService", () => {
	let fixture: FixtureStore;
	let store: StoreService;
	let service: CatalogService;

	beforeAll(async () => {
		fixture = await createFixtureStore();
	});

	afterAll(() => {
		fixture.cleanup();
	});

	const createService = (overrides: Record<string, unknown> = {}) => {
		const config = new ConfigService({
			SQLGATE_DATABASE_PATH: fixture.path,
			...overrides,
		});
		store = new StoreService(config);
		service = new CatalogService(new QueryExecutorService(store, config), config);
	};

	afterEach(async () => {
		await store.close();
	});

	describe("listObjects", () => {
		it("lists tables and views by name with descriptions", async () => {
			createService();

			const listing = await service.listObjects();

			expect(listing).toEqual([
				{
					name: "acctdesc",
					kind: "table",
					description: "Account code dictionary mapping acct_XXX columns to names",
				},
				{
					name: "cu_with_ratios",
					kind: "view",
					description:
						"Consolidated view that joins identifying info with pre-calculated ratios",
				},
				{
					name: "foicu",
					kind: "table",
					description: "Credit union identity (charter, branchings, geography)",
				},
				{
					name: "fs220",
					kind: "table",
					description: "Primary financial schedule with core account balances",
				},
				{ name: "ledger_lines", kind: "view", description: "" },
			]);
			expect(store.activeSessions).toBe(0);
		});

		it("exposes the usage recommendation", () => {
			createService();
			expect(service.recommendation).toBe(
				"Use the cu_with_ratios view for most analytical queries",
			);
		});
	});

	describe("describeObject", () => {
		it("describes a table without a recency column", async () => {
			createService();

			const descriptor = await service.describeObject("acctdesc");

			expect(descriptor.name).toBe("acctdesc");
			expect(descriptor.kind).toBe("table");
			expect(descriptor.columns).toEqual([
				{ name: "account", type: "VARCHAR", description: "" },
				{ name: "description", type: "VARCHAR", description: "" },
			]);
			expect(descriptor.row_count).toBe(6);
			expect(descriptor.sample_rows).toEqual([
				["acct_010", "Total assets"],
				["acct_018", "Total shares and deposits"],
				["acct_025b", "Total amount of loans and leases"],
				["acct_083", "Number of current members"],
				["acct_602", "Net income"],
			]);
			expect(descriptor.recency_column).toBeNull();
			expect(descriptor.sample_policy).toBe(STORAGE_ORDER_POLICY);
		});

		it("resolves names case-insensitively and samples the latest cycle", async () => {
			createService();

			const descriptor = await service.describeObject("CU_WITH_RATIOS");

			expect(descriptor.name).toBe("cu_with_ratios");
			expect(descriptor.kind).toBe("view");
			expect(descriptor.columns.map((c) => c.name)).toEqual([
				"cu_number",
				"cycle_date",
				"cu_name",
				"city",
				"state",
				"assets",
				"member_count",
				"roa",
				"loan_to_share_ratio",
			]);
			expect(descriptor.columns.find((c) => c.name === "roa")).toEqual({
				name: "roa",
				type: "DOUBLE",
				description: "Return on Assets (annualized percentage)",
			});
			expect(descriptor.row_count).toBe(8);
			expect(descriptor.recency_column).toBe("cycle_date");
			expect(descriptor.sample_policy).toBe(
				"Rows from the most recent cycle_date (its maximum value), ordered by every column",
			);
			expect(descriptor.sample_rows).toHaveLength(4);
			for (const row of descriptor.sample_rows) {
				expect(row[1]).toBe(LATEST_CYCLE);
			}
			expect(descriptor.sample_rows.map((row) => row[0])).toEqual([
				101, 102, 103, 104,
			]);
		});

		it("returns the same sample for a joined view on every call", async () => {
			createService({ SQLGATE_RECENCY_COLUMNS: "period_end" });

			const first = await service.describeObject("cu_with_ratios");
			const second = await service.describeObject("cu_with_ratios");

			expect(first.recency_column).toBeNull();
			expect(first.sample_policy).toBe(STORAGE_ORDER_POLICY);
			expect(first.sample_rows.map((row) => [row[0], row[1]])).toEqual([
				[101, PREVIOUS_CYCLE],
				[101, LATEST_CYCLE],
				[102, PREVIOUS_CYCLE],
				[102, LATEST_CYCLE],
				[103, PREVIOUS_CYCLE],
			]);
			expect(second.sample_rows).toEqual(first.sample_rows);
		});

		it("honours the configured sample size", async () => {
			createService({ SQLGATE_SAMPLE_ROWS: 3 });

			const descriptor = await service.describeObject("ledger_lines");

			expect(descriptor.row_count).toBe(50_000);
			expect(descriptor.sample_rows).toHaveLength(3);
		});

		it("reports an unknown name as not found", async () => {
			createService();

			const attempt = service.describeObject("nonexistent_table");

			await expect(attempt).rejects.toBeInstanceOf(NotFoundError);
			await expect(attempt).rejects.toThrow(
				"Table or view 'nonexistent_table' not found",
			);
			expect(store.activeSessions).toBe(0);
		});

		it("treats quotes in the name as data", async () => {
			createService();

			await expect(
				service.describeObject("acctdesc' OR '1'='1"),
			).rejects.toBeInstanceOf(NotFoundError);
		});

		it("rejects a blank name", async () => {
			createService();

			const attempt = service.describeObject("   ");

			await expect(attempt).rejects.toBeInstanceOf(ValidationError);
			await expect(attempt).rejects.toThrow("table_name cannot be empty");
		});
	});
});

describe("quoteIdentifier", () => {
	it("doubles embedded quotes", () => {
		expect(quoteIdentifier('odd"name')).toBe('"odd""name"');
	});
});

describe("escapeLiteral", () => {
	it("doubles single quotes", () => {
		expect(escapeLiteral("it's")).toBe("it''s");
	});
});
