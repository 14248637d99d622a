import { Label, logger } from "./logger.js";

export class ApibayError extends Error {
	constructor(message?: string, options?: ErrorOptions) {
		super(message, options);
		delete this.stack;
	}
}

/**
 * The one error every request operation rejects with, whether the request
 * never completed or the body did not decode.
 */
export class ApiError extends ApibayError {
	name = "ApiError";
}

export class ConfigError extends ApibayError {
	name = "ConfigError";
}

export class ScrapeError extends ApibayError {
	name = "ScrapeError";
}

/**
 * Thrown when an info hash cannot be embedded in a magnet URI. The API only
 * serves well-formed hashes, so this means the upstream data is corrupt and
 * is deliberately not an {@link ApibayError}.
 */
export class InvalidInfoHashError extends Error {
	name = "InvalidInfoHashError";

	constructor(readonly infoHash: string) {
		super(`magnet link failed to parse - invalid info hash ${JSON.stringify(infoHash)}`);
	}
}

export function exitOnApibayErrors(e: unknown): void {
	if (e instanceof ApibayError) {
		logger.error({ label: Label.CLI, message: e.message });
		if (e.cause) logger.debug({ label: Label.CLI, message: String(e.cause) });
		process.exitCode = 1;
		return;
	}
	throw e;
}
