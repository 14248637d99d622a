export { ApibayClient } from "./client.js";
export {
	CLIENT_CONFIG_SCHEMA,
	parseClientConfig,
	type ClientConfig,
	type ClientOptions,
} from "./configSchema.js";
export {
	DecodeErrorMsg,
	emptyAsNone,
	epochSeconds,
	flexibleU16,
	flexibleU64,
	parseJson,
	unitArray,
} from "./decode.js";
export {
	ApibayError,
	ApiError,
	ConfigError,
	InvalidInfoHashError,
	ScrapeError,
} from "./errors.js";
export { initializeLogger, type LoggerOptions } from "./logger.js";
export { magnetLink } from "./magnet.js";
export {
	Category,
	PartialTorrent,
	Torrent,
	UserStatus,
	type PartialTorrentFields,
	type TorrentFile,
} from "./models.js";
export {
	fetchSiteData,
	parseSiteData,
	type FetchSiteDataOptions,
} from "./scrape.js";
export {
	CATEGORIES,
	TRACKERS,
	flattenCategories,
	type CategoryEntry,
	type SiteData,
} from "./siteData.js";
