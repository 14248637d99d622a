import { describe, expect, it } from "vitest";
import { ScrapeError } from "../src/errors.js";
import { fetchSiteData, parseSiteData } from "../src/scrape.js";
import { flattenCategories } from "../src/siteData.js";
import { createFakeFetch } from "./support/fakeFetch.js";

const MAIN_JS = [
	`function print_selectbox() { var s = '<a href="/search.php?q=category:100" title="Browse"> Audio </a>';`,
	`s += '<a href="/search.php?q=category:101">Music</a>';`,
	`s += '<a href="/search.php?q=category:200">Video</a>';`,
	`s += '<a href="/search.php?q=category:207">HD - Movies</a>'; }`,
	`function print_trackers() { var tr = '&tr=' + encodeURIComponent('udp://tracker.example.org:1337/announce');`,
	`tr += '&tr=' + encodeURIComponent('udp://open.example.net:80'); }`,
].join("\n");

const SITE_DATA = {
	categories: [
		{ code: 100, name: "Audio", subcategories: [{ code: 101, name: "Music" }] },
		{
			code: 200,
			name: "Video",
			subcategories: [{ code: 207, name: "HD - Movies" }],
		},
	],
	trackers: [
		"udp://tracker.example.org:1337/announce",
		"udp://open.example.net:80",
	],
};

describe("parseSiteData", () => {
	it("groups subcategories under the preceding top-level category", () => {
		expect(parseSiteData(MAIN_JS)).toEqual(SITE_DATA);
	});

	it("fails on a subcategory with no parent", () => {
		expect(() =>
			parseSiteData(`'<a href="/search.php?q=category:101">Music</a>'`),
		).toThrow(
			new ScrapeError(
				"subcategory 101 (Music) appears before any top-level category",
			),
		);
	});

	it("returns empty data for unrelated scripts", () => {
		expect(parseSiteData("console.log('hi')")).toEqual({
			categories: [],
			trackers: [],
		});
	});
});

describe("flattenCategories", () => {
	it("prefixes subcategory names with their parent", () => {
		expect(flattenCategories(SITE_DATA)).toEqual([
			[100, "Audio"],
			[101, "Audio: Music"],
			[200, "Video"],
			[207, "Video: HD - Movies"],
		]);
	});
});

describe("fetchSiteData", () => {
	it("reads static/main.js from the mirror without following redirects", async () => {
		const fake = createFakeFetch(() => ({ body: MAIN_JS }));

		const data = await fetchSiteData({
			mirror: "https://mirror.example/",
			fetch: fake.fetch,
		});

		expect(fake.requests[0]?.url.href).toBe(
			"https://mirror.example/static/main.js",
		);
		expect(fake.requests[0]?.init?.redirect).toBe("manual");
		expect(data).toEqual(SITE_DATA);
	});

	it("fails on a redirect", async () => {
		const fake = createFakeFetch(() => ({ status: 302, body: "" }));

		await expect(
			fetchSiteData({ mirror: "https://mirror.example", fetch: fake.fetch }),
		).rejects.toThrow(
			"https://mirror.example/static/main.js failed to respond: request failed with code 302",
		);
	});

	it("wraps transport errors", async () => {
		const fake = createFakeFetch(() => new Error("getaddrinfo ENOTFOUND"));

		await expect(
			fetchSiteData({ mirror: "https://mirror.example", fetch: fake.fetch }),
		).rejects.toBeInstanceOf(ScrapeError);
	});
});
