import {
	CATEGORY_REGEX,
	DEFAULT_MIRROR,
	TRACKER_REGEX,
	USER_AGENT,
} from "./constants.js";
import { ScrapeError } from "./errors.js";
import { Label, logger } from "./logger.js";
import type { SiteData, TopLevelCategory } from "./siteData.js";
import { getErrorMessage, sanitizeUrl } from "./utils.js";

export interface FetchSiteDataOptions {
	mirror?: string;
	fetch?: typeof fetch;
	timeout?: number;
}

/**
 * Pulls the category tree and the tracker list out of the site's
 * `static/main.js`. This is pattern matching on minified code, so any
 * redesign of the site will break it.
 */
export function parseSiteData(mainJs: string): SiteData {
	const categories: TopLevelCategory[] = [];
	for (const [, rawCode, rawName] of mainJs.matchAll(CATEGORY_REGEX)) {
		const code = parseInt(rawCode);
		const name = rawName.trim();
		if (code % 100 === 0) {
			categories.push({ code, name, subcategories: [] });
			continue;
		}
		const parent = categories.at(-1);
		if (!parent) {
			throw new ScrapeError(
				`subcategory ${code} (${name}) appears before any top-level category`,
			);
		}
		parent.subcategories.push({ code, name });
	}
	const trackers = Array.from(
		mainJs.matchAll(TRACKER_REGEX),
		([, tracker]) => tracker,
	);
	return { categories, trackers };
}

export async function fetchSiteData(
	options: FetchSiteDataOptions = {},
): Promise<SiteData> {
	const mirror = (options.mirror ?? DEFAULT_MIRROR).replace(/\/+$/, "");
	const url = `${mirror}/static/main.js`;
	const fetchImpl = options.fetch ?? fetch;

	logger.verbose({ label: Label.SCRAPE, message: `GET ${url}` });
	let text: string;
	try {
		const response = await fetchImpl(url, {
			headers: { "User-Agent": USER_AGENT },
			redirect: "manual",
			signal:
				options.timeout !== undefined
					? AbortSignal.timeout(options.timeout)
					: undefined,
		});
		if (!response.ok) {
			throw new Error(`request failed with code ${response.status}`);
		}
		text = await response.text();
	} catch (e) {
		throw new ScrapeError(
			`${sanitizeUrl(url)} failed to respond: ${getErrorMessage(e)}`,
			{ cause: e },
		);
	}

	const data = parseSiteData(text);
	logger.info({
		label: Label.SCRAPE,
		message: `Found ${data.categories.length} categories and ${data.trackers.length} trackers`,
	});
	return data;
}
