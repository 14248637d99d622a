import { createRequire } from "module";

const require = createRequire(import.meta.url);
const packageDotJson: { name: string; version: string } = require("../package.json");

export const PROGRAM_NAME = packageDotJson.name;
export const PROGRAM_VERSION = packageDotJson.version;
export const USER_AGENT = `${PROGRAM_NAME}/${PROGRAM_VERSION}`;

export const DEFAULT_BASE_URL = "https://apibay.org";
export const DEFAULT_MIRROR = "https://thepiratebay.org";

export const UNKNOWN_CATEGORY_NAME = "Unknown";
export const NO_RESULTS_INFO_HASH = "0".repeat(40);

export const U16_MAX = 0xffff;
export const U64_MAX = 2n ** 64n - 1n;

/**
 * The JavaScript Date range, in seconds either side of the epoch.
 */
export const MAX_EPOCH_SECONDS = 8_640_000_000_000;

export const CATEGORY_REGEX = /category:(\d{3})[^>]*>([^<]+)</g;
export const TRACKER_REGEX = /encodeURIComponent\('(udp:\/\/[^']+)'/g;
export const UNSIGNED_INT_REGEX = /^\+?\d+$/;
export const SIGNED_INT_REGEX = /^[+-]?\d+$/;
