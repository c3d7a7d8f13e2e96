import { Injectable, Logger } from "@nestjs/common";
import { ValidationError } from "../errors/gateway.errors.js";
import {
	type ExampleQueryCatalog,
	ExampleQueryCatalogSchema,
	type TemplateEntry,
} from "../schemas/catalog.schemas.js";
import { loadJsonAsset } from "../utils/assets.js";

/**
 * Static catalog of ready-to-run query templates, consumed verbatim from
 * assets/example-queries.json. The only logic is category filtering.
 */
@Injectable()
export class ExamplesService {
	private readonly logger = new Logger(ExamplesService.name);
	private readonly catalog: ExampleQueryCatalog;

	constructor() {
		this.catalog = loadJsonAsset("example-queries.json", ExampleQueryCatalogSchema);
		this.logger.debug(
			`Loaded ${this.catalog.examples.length} example queries in ${this.catalog.categories.length} categories`,
		);
	}

	get categories(): string[] {
		return [...this.catalog.categories].sort();
	}

	getExamples(category?: string): TemplateEntry[] {
		if (category === undefined || category.trim() === "") {
			return this.catalog.examples.map(copyEntry);
		}

		const normalized = category.trim().toLowerCase();
		if (!this.catalog.categories.includes(normalized)) {
			throw new ValidationError(
				`Unknown category: ${category}`,
				`Use one of: ${this.categories.join(", ")}; or omit the category to list every example.`,
			);
		}
		return this.catalog.examples
			.filter((entry) => entry.category === normalized)
			.map(copyEntry);
	}
}

// Callers get their own entries; the loaded catalog is shared
function copyEntry(entry: TemplateEntry): TemplateEntry {
	return { ...entry };
}
