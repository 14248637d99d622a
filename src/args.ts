import { PROGRAM_NAME } from "./constants.js";
import { ConfigError } from "./errors.js";
import { Category } from "./models.js";

export function parseCategory(raw: string): Category {
	const category = /^\d+$/.test(raw) ? Category.fromCode(Number(raw)) : null;
	if (!category) {
		throw new ConfigError(
			`${raw} is not a known category code, see \`${PROGRAM_NAME} categories\``,
		);
	}
	return category;
}

export function parseId(raw: string): bigint {
	if (!/^\d+$/.test(raw)) {
		throw new ConfigError(`${raw} is not a valid torrent id`);
	}
	return BigInt(raw);
}
