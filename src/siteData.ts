import { createRequire } from "module";
import { z } from "zod";

const require = createRequire(import.meta.url);

const SUBCATEGORY_SCHEMA = z.object({
	code: z.number().int().min(0).max(0xffff),
	name: z.string().min(1),
});

export const SITE_DATA_SCHEMA = z.object({
	categories: z.array(
		SUBCATEGORY_SCHEMA.extend({
			subcategories: z.array(SUBCATEGORY_SCHEMA),
		}),
	),
	trackers: z.array(z.string().min(1)),
});

export type SiteData = z.infer<typeof SITE_DATA_SCHEMA>;
export type TopLevelCategory = SiteData["categories"][number];
export type CategoryEntry = readonly [code: number, name: string];

/**
 * Top-level categories keep their own name, subcategories are named
 * "<Parent>: <Sub>".
 */
export function flattenCategories(data: SiteData): CategoryEntry[] {
	return data.categories.flatMap(({ code, name, subcategories }) => [
		[code, name] as const,
		...subcategories.map(
			(sub) => [sub.code, `${name}: ${sub.name}`] as const,
		),
	]);
}

const siteData = SITE_DATA_SCHEMA.parse(
	require("../data/site-data.json"),
);

/**
 * Category codes and their names, in site order.
 */
export const CATEGORIES: readonly CategoryEntry[] = Object.freeze(
	flattenCategories(siteData),
);

/**
 * Trackers announced in the site's own magnet links.
 */
export const TRACKERS: readonly string[] = Object.freeze([
	...siteData.trackers,
]);
