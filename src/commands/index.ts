// Barrel export for all CLI commands

export { CheckCommand, SqlCommand } from "./query.command.js";
export { ExamplesCommand, SchemaCommand } from "./schema.command.js";
