import * as z from "zod";

export const debugCategories = ["source", "parser", "cli"] as const;
export type DebugCategory = typeof debugCategories[number];

const debugEnvSchema = z
	.string()
	.optional()
	.transform((value) => (value ?? "").split(",").map((part) => part.trim()).filter((part) => part !== ""))
	.pipe(z.array(z.union([z.enum(debugCategories), z.literal("*")])));

/**
 * Reads a comma separated category list such as `parser,source` or `*`.
 * Any unrecognised entry yields no categories.
 */
export function debugCategoriesFromEnv(value: string | undefined): DebugCategory[] {
	const parsed = debugEnvSchema.safeParse(value);
	if (!parsed.success) {
		return [];
	}
	if (parsed.data.includes("*")) {
		return [...debugCategories];
	}
	return parsed.data.filter((category): category is DebugCategory => category !== "*");
}

export const cacheSourceOptionsSchema = z.object({
	blockSize: z.number().int().positive().default(1024 * 1024),
	maxCacheSize: z.number().int().positive().default(16 * 1024 * 1024),
});

export type CacheSourceOptions = z.input<typeof cacheSourceOptionsSchema>;

export const renderOptionsSchema = z.object({
	/** Levels of children to print below the rendered node; unlimited when absent. */
	maxDepth: z.number().int().nonnegative().optional(),
	indent: z.union([z.string(), z.number().int().nonnegative()]).default("\t"),
	/** Binary payloads longer than this are cut off in the hex dump. */
	hexLimit: z.number().int().nonnegative().default(32),
});

export type RenderOptions = z.input<typeof renderOptionsSchema>;
