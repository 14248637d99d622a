import chalk from "chalk";
import type { Category, PartialTorrent, TorrentFile } from "./models.js";
import type { SiteData } from "./siteData.js";
import { humanReadableDate, humanReadableSize } from "./utils.js";

export function formatTorrent(torrent: PartialTorrent): string {
	const stats = [
		chalk.green(`S:${torrent.seeders}`),
		chalk.red(`L:${torrent.leechers}`),
		humanReadableSize(torrent.size),
		torrent.category.name,
		humanReadableDate(torrent.added),
		`${torrent.username} (${torrent.status})`,
	].join("  ");
	return `${chalk.bold(torrent.name)} ${chalk.dim(`#${torrent.id}`)}\n\t${stats}`;
}

export function formatFile(file: TorrentFile): string {
	return `${humanReadableSize(file.size).padStart(10)}  ${file.name}`;
}

export function formatCategories(categories: Iterable<Category>): string {
	const lines: string[] = [];
	for (const category of categories) {
		const indent = category.isTopLevel ? "  " : "    ";
		lines.push(`${indent}${category.code} ${category.name}`);
	}
	return lines.join("\n");
}

export function formatSiteData({ categories, trackers }: SiteData): string {
	const lines = ["Categories:"];
	for (const { code, name, subcategories } of categories) {
		lines.push(`  ${code} ${name}`);
		for (const sub of subcategories) {
			lines.push(`    ${sub.code} ${name}: ${sub.name}`);
		}
	}
	lines.push("", "Trackers:", ...trackers.map((tracker) => `  ${tracker}`));
	return lines.join("\n");
}

/**
 * JSON.stringify that writes bigints as decimal strings.
 */
export function toJson(value: unknown): string {
	return JSON.stringify(
		value,
		(_key, v: unknown) => (typeof v === "bigint" ? v.toString() : v),
		"\t",
	);
}
