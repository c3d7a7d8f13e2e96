import { beforeEach, describe, expect, it } from "vitest";
import { ValidationError } from "../errors/gateway.errors.js";
import { validateStatement } from "../pure/sql-validator.js";
import { ExamplesService } from "./examples.service.js";

describe("ExamplesService", () => {
	let service: ExamplesService;

	beforeEach(() => {
		service = new ExamplesService();
	});

	it("returns every template when no category is given", () => {
		const examples = service.getExamples();

		expect(examples).toHaveLength(19);
		expect(examples[0]).toEqual({
			category: "search",
			title: "Find credit unions by name pattern",
			description:
				"Locate credit unions that partially match a provided name substring",
			sql: "-- Use LOWER() with wildcards so name matching is flexible\nSELECT cu_name, state, city, assets, member_count\nFROM cu_with_ratios\nWHERE LOWER(cu_name) LIKE '%navy%'\n  AND cycle_date = (SELECT MAX(cycle_date) FROM cu_with_ratios)\nORDER BY assets DESC;",
			use_case: "When users only know part of the credit union's name",
		});
	});

	it("treats a blank category as no filter", () => {
		expect(service.getExamples("  ")).toHaveLength(19);
	});

	it("lists categories alphabetically", () => {
		expect(service.categories).toEqual([
			"comparison",
			"financial_analysis",
			"ranking",
			"search",
			"trends",
		]);
	});

	it.each([
		["search", 4],
		["comparison", 3],
		["ranking", 4],
		["trends", 4],
		["financial_analysis", 4],
	])("filters %s to %i templates", (category, count) => {
		const examples = service.getExamples(category);

		expect(examples).toHaveLength(count);
		expect(examples.every((entry) => entry.category === category)).toBe(true);
	});

	it("matches categories case-insensitively", () => {
		expect(service.getExamples("Ranking")).toEqual(service.getExamples("ranking"));
	});

	it("rejects an unknown category and lists the valid ones", () => {
		let caught: unknown;
		try {
			service.getExamples("forecasting");
		} catch (error) {
			caught = error;
		}

		expect(caught).toBeInstanceOf(ValidationError);
		expect(caught).toMatchObject({
			message: "Unknown category: forecasting",
			hint: "Use one of: comparison, financial_analysis, ranking, search, trends; or omit the category to list every example.",
		});
	});

	it("only ships templates the validator accepts", () => {
		for (const entry of service.getExamples()) {
			expect(validateStatement(entry.sql), entry.title).toEqual({ accepted: true });
		}
	});

	it("returns copies that callers cannot use to alter the catalog", () => {
		const first = service.getExamples();
		first.pop();

		expect(service.getExamples()).toHaveLength(19);
	});

	it("keeps template text intact when a caller edits an entry", () => {
		const original = service.getExamples()[0].sql;
		service.getExamples()[0].sql = "DROP TABLE x";
		service.getExamples("search")[0].title = "changed";

		expect(service.getExamples()[0].sql).toBe(original);
		expect(service.getExamples("search")[0].title).toBe(
			"Find credit unions by name pattern",
		);
	});
});
