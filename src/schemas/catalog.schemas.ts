import { z } from "zod";

/**
 * Human-authored descriptions of catalog objects and common columns
 * (assets/catalog-descriptions.json)
 */
export const CatalogDescriptionsSchema = z.object({
	recommendation: z.string().optional(),
	tables: z.record(z.string(), z.string()),
	columns: z.record(z.string(), z.string()),
});

export type CatalogDescriptions = z.infer<typeof CatalogDescriptionsSchema>;

export const TemplateEntrySchema = z.object({
	category: z.string().min(1),
	title: z.string().min(1),
	description: z.string(),
	sql: z.string().min(1),
	use_case: z.string(),
});

export type TemplateEntry = z.infer<typeof TemplateEntrySchema>;

/**
 * Example query catalog (assets/example-queries.json)
 */
export const ExampleQueryCatalogSchema = z
	.object({
		categories: z.array(z.string().min(1)).min(1),
		examples: z.array(TemplateEntrySchema),
	})
	.refine(
		(catalog) =>
			catalog.examples.every((entry) =>
				catalog.categories.includes(entry.category),
			),
		{ message: "Every example must use a declared category" },
	);

export type ExampleQueryCatalog = z.infer<typeof ExampleQueryCatalogSchema>;
