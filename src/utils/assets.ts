import { readFileSync } from "node:fs";
import type { z } from "zod";
import { getAssetPath } from "./paths.js";

/**
 * Read a bundled JSON asset and validate it against a Zod schema.
 * Throws with the asset name on malformed content.
 */
export function loadJsonAsset<T extends z.ZodTypeAny>(
	fileName: string,
	schema: T,
): z.output<T> {
	const raw = readFileSync(getAssetPath(fileName), "utf-8");
	const parsed = schema.safeParse(JSON.parse(raw));
	if (!parsed.success) {
		throw new Error(`Invalid asset ${fileName}: ${parsed.error.message}`);
	}
	return parsed.data;
}
