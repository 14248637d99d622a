#!/usr/bin/env node
import chalk from "chalk";
import { Command, program } from "commander";
import { parseCategory, parseId } from "./args.js";
import { ApibayClient } from "./client.js";
import { DEFAULT_BASE_URL, PROGRAM_NAME, PROGRAM_VERSION } from "./constants.js";
import { exitOnApibayErrors } from "./errors.js";
import {
	formatCategories,
	formatFile,
	formatSiteData,
	formatTorrent,
	toJson,
} from "./format.js";
import { initializeLogger, Label, logger } from "./logger.js";
import { Category } from "./models.js";
import { fetchSiteData } from "./scrape.js";
import { TRACKERS } from "./siteData.js";
import { fallback } from "./utils.js";

interface SharedOptions {
	baseUrl: string;
	timeout?: string;
	verbose?: boolean;
	logDir?: string;
	json?: boolean;
}

function createClient(options: SharedOptions): ApibayClient {
	initializeLogger({ verbose: options.verbose, logDir: options.logDir });
	logger.verbose({
		label: Label.CLI,
		message: `${PROGRAM_NAME} v${PROGRAM_VERSION} using ${options.baseUrl}`,
	});
	return new ApibayClient({
		baseUrl: options.baseUrl,
		timeout: options.timeout,
	});
}

/**
 * parsing and processing of CLI options
 */
function createCommandWithSharedOptions(
	name: string,
	description: string,
): Command {
	return program
		.command(name)
		.description(description)
		.option(
			"-u, --base-url <url>",
			"API base url",
			fallback(process.env.APIBAY_URL, DEFAULT_BASE_URL),
		)
		.option(
			"-t, --timeout <duration>",
			"Request timeout. Format: https://github.com/vercel/ms",
			process.env.APIBAY_TIMEOUT,
		)
		.option("-v, --verbose", "Log verbose output")
		.option("--log-dir <dir>", "Also write rotating log files here")
		.option("--json", "Print JSON instead of text");
}

program.name(PROGRAM_NAME);
program.description(chalk.yellow.bold(PROGRAM_NAME));
program.version(PROGRAM_VERSION, "-V, --version", "output the current version");

createCommandWithSharedOptions("search", "Search for torrents by name")
	.argument("<query>")
	.option("-c, --category <code>", "Only search within this category")
	.action(async (query: string, options: SharedOptions & { category?: string }) => {
		try {
			const category =
				options.category !== undefined
					? parseCategory(options.category)
					: null;
			const torrents = await createClient(options).search(query, category);
			console.log(
				options.json ? toJson(torrents) : torrents.map(formatTorrent).join("\n"),
			);
		} catch (e) {
			exitOnApibayErrors(e);
		}
	});

createCommandWithSharedOptions("top100", "List the top 100 torrents of a category")
	.argument("<category>", "category code")
	.option("--last-48h", "Only torrents uploaded in the last 48 hours")
	.action(async (code: string, options: SharedOptions & { last48h?: boolean }) => {
		try {
			const torrents = await createClient(options).top100(
				parseCategory(code),
				Boolean(options.last48h),
			);
			console.log(
				options.json ? toJson(torrents) : torrents.map(formatTorrent).join("\n"),
			);
		} catch (e) {
			exitOnApibayErrors(e);
		}
	});

createCommandWithSharedOptions("torrent", "Show full details on a torrent")
	.argument("<id>")
	.action(async (id: string, options: SharedOptions) => {
		try {
			const torrent = await createClient(options).torrent(parseId(id));
			if (options.json) {
				console.log(toJson(torrent));
				return;
			}
			console.log(formatTorrent(torrent.partial));
			if (torrent.imdb) console.log(`\timdb ${torrent.imdb}`);
			console.log(`\n${torrent.description}`);
		} catch (e) {
			exitOnApibayErrors(e);
		}
	});

createCommandWithSharedOptions("files", "List the files in a torrent")
	.argument("<id>")
	.action(async (id: string, options: SharedOptions) => {
		try {
			const files = await createClient(options).torrentFiles(parseId(id));
			console.log(
				options.json ? toJson(files) : files.map(formatFile).join("\n"),
			);
		} catch (e) {
			exitOnApibayErrors(e);
		}
	});

createCommandWithSharedOptions("magnet", "Print the magnet link of a torrent")
	.argument("<id>")
	.action(async (id: string, options: SharedOptions) => {
		try {
			const torrent = await createClient(options).torrent(parseId(id));
			console.log(torrent.magnet());
		} catch (e) {
			exitOnApibayErrors(e);
		}
	});

program
	.command("categories")
	.description("List every category code")
	.action(() => {
		console.log(formatCategories(Category.all()));
	});

program
	.command("trackers")
	.description("List the trackers added to magnet links")
	.action(() => {
		console.log(TRACKERS.join("\n"));
	});

program
	.command("scrape")
	.description("Scrape the category table and trackers from the site")
	.option("-m, --mirror <url>", "Site mirror to scrape")
	.option("-v, --verbose", "Log verbose output")
	.option("--json", "Print JSON in the layout of data/site-data.json")
	.action(
		async (options: { mirror?: string; verbose?: boolean; json?: boolean }) => {
			try {
				initializeLogger({ verbose: options.verbose });
				const data = await fetchSiteData({ mirror: options.mirror });
				console.log(options.json ? toJson(data) : formatSiteData(data));
			} catch (e) {
				exitOnApibayErrors(e);
			}
		},
	);

program.showHelpAfterError("(add --help for additional information)");

await program.parseAsync();
