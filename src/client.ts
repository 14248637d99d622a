import { z } from "zod";
import {
	type ClientConfig,
	type ClientOptions,
	parseClientConfig,
} from "./configSchema.js";
import { NO_RESULTS_INFO_HASH } from "./constants.js";
import { formatIssues, parseJson } from "./decode.js";
import { ApiError } from "./errors.js";
import { Label, logger } from "./logger.js";
import {
	type Category,
	PARTIAL_TORRENT_SCHEMA,
	type PartialTorrent,
	type Torrent,
	TORRENT_FILE_SCHEMA,
	TORRENT_SCHEMA,
	type TorrentFile,
} from "./models.js";
import { getErrorMessage, sanitizeUrl } from "./utils.js";

const PARTIAL_TORRENTS_SCHEMA = z.array(PARTIAL_TORRENT_SCHEMA);
const TORRENT_FILES_SCHEMA = z.array(TORRENT_FILE_SCHEMA);

/**
 * An empty search answers with one placeholder row instead of `[]`.
 */
function isNoResultsPlaceholder(torrent: PartialTorrent): boolean {
	return torrent.id === 0n && torrent.infoHash === NO_RESULTS_INFO_HASH;
}

/**
 * Client for the apibay.org JSON API. Build one and reuse it; requests are
 * independent of each other and are never retried.
 *
 * Every method rejects with an {@link ApiError}, whether the request failed
 * or the response did not decode.
 */
export class ApibayClient {
	readonly config: ClientConfig;

	constructor(options: ClientOptions = {}) {
		this.config = parseClientConfig(options);
	}

	/**
	 * Search for torrents by name, optionally within a category.
	 */
	async search(
		query: string,
		category?: Category | null,
	): Promise<PartialTorrent[]> {
		const torrents = await this.get("/q.php", PARTIAL_TORRENTS_SCHEMA, {
			q: query,
			cat: category ? String(category.code) : "",
		});
		return torrents.filter((torrent) => !isNoResultsPlaceholder(torrent));
	}

	/**
	 * The top 100 torrents of a category, or only those uploaded in the last
	 * 48 hours.
	 */
	async top100(
		category: Category,
		last48h: boolean = false,
	): Promise<PartialTorrent[]> {
		const specifier = last48h ? "_48h" : "";
		return this.get(
			`/precompiled/data_top100${specifier}_${category.code}.json`,
			PARTIAL_TORRENTS_SCHEMA,
		);
	}

	async torrent(id: bigint | number): Promise<Torrent> {
		return this.get("/t.php", TORRENT_SCHEMA, { id: String(id) });
	}

	async torrentFiles(id: bigint | number): Promise<TorrentFile[]> {
		return this.get("/f.php", TORRENT_FILES_SCHEMA, { id: String(id) });
	}

	private async get<T extends z.ZodTypeAny>(
		path: string,
		schema: T,
		query: Record<string, string> = {},
	): Promise<z.output<T>> {
		const url = new URL(`${this.config.baseUrl}${path}`);
		for (const [key, value] of Object.entries(query)) {
			url.searchParams.set(key, value);
		}
		const fetchImpl = this.config.fetch ?? fetch;
		const where = sanitizeUrl(url);

		logger.verbose({ label: Label.CLIENT, message: `GET ${url}` });
		let body: string;
		try {
			const response = await fetchImpl(url, {
				headers: {
					Accept: "application/json",
					"User-Agent": this.config.userAgent,
				},
				signal:
					this.config.timeout !== undefined
						? AbortSignal.timeout(this.config.timeout)
						: undefined,
			});
			if (!response.ok) {
				throw new Error(`request failed with code ${response.status}`);
			}
			body = await response.text();
		} catch (e) {
			throw new ApiError(`${where} failed to respond: ${getErrorMessage(e)}`, {
				cause: e,
			});
		}

		let json: unknown;
		try {
			json = parseJson(body);
		} catch (e) {
			throw new ApiError(
				`${where} returned invalid JSON: ${getErrorMessage(e)}`,
				{ cause: e },
			);
		}

		const result = schema.safeParse(json);
		if (!result.success) {
			logger.debug({
				label: Label.DECODE,
				message: `${where} body: ${body}`,
			});
			throw new ApiError(
				`${where} returned an unexpected response: ${formatIssues(result.error)}`,
				{ cause: result.error },
			);
		}
		return result.data;
	}
}
