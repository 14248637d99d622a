import { InvalidInfoHashError } from "./errors.js";
import { TRACKERS } from "./siteData.js";

const MAGNET_PREFIX = "magnet:?xt=urn:btih:";

/**
 * Builds a magnet URI announcing every known tracker.
 *
 * The `xt` pair is written by hand since form encoding would escape the
 * colons in `urn:btih:`; `dn` and `tr` go through URLSearchParams.
 *
 * @throws InvalidInfoHashError if the hash leaves the base URI unparseable
 */
export function magnetLink(
	infoHash: string,
	name: string,
	trackers: readonly string[] = TRACKERS,
): string {
	let url: URL;
	try {
		url = new URL(`${MAGNET_PREFIX}${infoHash}`);
	} catch {
		throw new InvalidInfoHashError(infoHash);
	}

	const params = new URLSearchParams([["dn", name]]);
	for (const tracker of trackers) {
		params.append("tr", tracker);
	}
	url.search = `${url.search}&${params}`;
	return url.href;
}
