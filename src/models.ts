import { z } from "zod";
import { UNKNOWN_CATEGORY_NAME } from "./constants.js";
import {
	emptyAsNone,
	epochSeconds,
	flexibleU16,
	flexibleU64,
	unitArray,
} from "./decode.js";
import { magnetLink } from "./magnet.js";
import { CATEGORIES } from "./siteData.js";

/**
 * The trust status of an uploader.
 */
export enum UserStatus {
	MEMBER = "member",
	TRUSTED = "trusted",
	HELPER = "helper",
	VIP = "vip",
	MODERATOR = "moderator",
	SUPER_MOD = "supermod",
	ADMIN = "admin",
}

function lookupCategoryName(code: number): string | undefined {
	return CATEGORIES.find(([categoryCode]) => categoryCode === code)?.[1];
}

/**
 * A media category code, e.g. 201 for "Video: Movies".
 */
export class Category {
	/**
	 * Codes coming from the API are trusted as-is; only the public
	 * constructor checks them against the table.
	 */
	static readonly schema = flexibleU16.transform((code) => new Category(code));

	private constructor(readonly code: number) {}

	/**
	 * Returns null if the code is not in {@link CATEGORIES}.
	 */
	static fromCode(code: number): Category | null {
		return lookupCategoryName(code) === undefined ? null : new Category(code);
	}

	/**
	 * Every category in table order. Each iteration starts from the top.
	 */
	static all(): Iterable<Category> {
		return {
			*[Symbol.iterator]() {
				for (const [code] of CATEGORIES) {
					yield new Category(code);
				}
			},
		};
	}

	/**
	 * The table name for this code, else its hundreds parent's name, else
	 * "Unknown".
	 */
	get name(): string {
		return (
			lookupCategoryName(this.code) ??
			lookupCategoryName(this.parentCode) ??
			UNKNOWN_CATEGORY_NAME
		);
	}

	get isTopLevel(): boolean {
		return this.code % 100 === 0;
	}

	get parent(): Category | null {
		return this.isTopLevel ? null : Category.fromCode(this.parentCode);
	}

	private get parentCode(): number {
		return Math.floor(this.code / 100) * 100;
	}

	equals(other: Category): boolean {
		return this.code === other.code;
	}

	toString(): string {
		return `${this.code} ${this.name}`;
	}

	toJSON(): number {
		return this.code;
	}
}

const PARTIAL_TORRENT_SHAPE = {
	id: flexibleU64,
	name: z.string(),
	info_hash: z.string(),
	leechers: flexibleU64,
	seeders: flexibleU64,
	num_files: flexibleU64,
	size: flexibleU64,
	username: z.string(),
	added: epochSeconds,
	status: z.preprocess(
		(value) => (typeof value === "string" ? value.toLowerCase() : value),
		z.nativeEnum(UserStatus),
	),
	category: Category.schema,
	imdb: emptyAsNone,
};

export type PartialTorrentWire = z.output<z.ZodObject<typeof PARTIAL_TORRENT_SHAPE>>;

export interface PartialTorrentFields {
	readonly id: bigint;
	readonly name: string;
	readonly infoHash: string;
	readonly leechers: bigint;
	readonly seeders: bigint;
	readonly numFiles: bigint;
	/** Total size in bytes. */
	readonly size: bigint;
	readonly username: string;
	readonly added: Date;
	readonly status: UserStatus;
	readonly category: Category;
	/** IMDb id such as "tt0000000", null when the listing has none. */
	readonly imdb: string | null;
}

/**
 * A torrent as returned by the listing endpoints. {@link Torrent} has the
 * remaining attributes.
 */
export class PartialTorrent implements PartialTorrentFields {
	readonly id: bigint;
	readonly name: string;
	readonly infoHash: string;
	readonly leechers: bigint;
	readonly seeders: bigint;
	readonly numFiles: bigint;
	readonly size: bigint;
	readonly username: string;
	readonly added: Date;
	readonly status: UserStatus;
	readonly category: Category;
	readonly imdb: string | null;

	constructor(fields: PartialTorrentFields) {
		this.id = fields.id;
		this.name = fields.name;
		this.infoHash = fields.infoHash;
		this.leechers = fields.leechers;
		this.seeders = fields.seeders;
		this.numFiles = fields.numFiles;
		this.size = fields.size;
		this.username = fields.username;
		this.added = fields.added;
		this.status = fields.status;
		this.category = fields.category;
		this.imdb = fields.imdb;
		Object.freeze(this);
	}

	static fromWire(wire: PartialTorrentWire): PartialTorrent {
		return new PartialTorrent({
			id: wire.id,
			name: wire.name,
			infoHash: wire.info_hash,
			leechers: wire.leechers,
			seeders: wire.seeders,
			numFiles: wire.num_files,
			size: wire.size,
			username: wire.username,
			added: wire.added,
			status: wire.status,
			category: wire.category,
			imdb: wire.imdb,
		});
	}

	/**
	 * @throws InvalidInfoHashError if the info hash leaves the URI unparseable
	 */
	magnet(): string {
		return magnetLink(this.infoHash, this.name);
	}
}

export const PARTIAL_TORRENT_SCHEMA = z
	.object(PARTIAL_TORRENT_SHAPE)
	.transform(PartialTorrent.fromWire);

const languageCode = z
	.union([
		z.number().int().nonnegative(),
		z
			.bigint()
			.nonnegative()
			.max(BigInt(Number.MAX_SAFE_INTEGER))
			.transform((value) => Number(value)),
	])
	.nullish()
	.transform((value) => value ?? null);

/**
 * Full details on a single torrent. Every {@link PartialTorrent} attribute is
 * forwarded from {@link Torrent.partial}.
 */
export class Torrent implements PartialTorrentFields {
	constructor(
		readonly partial: PartialTorrent,
		readonly description: string,
		// Undocumented upstream; kept as the raw numbers.
		readonly language: number | null,
		readonly textLanguage: number | null,
	) {
		Object.freeze(this);
	}

	get id() {
		return this.partial.id;
	}
	get name() {
		return this.partial.name;
	}
	get infoHash() {
		return this.partial.infoHash;
	}
	get leechers() {
		return this.partial.leechers;
	}
	get seeders() {
		return this.partial.seeders;
	}
	get numFiles() {
		return this.partial.numFiles;
	}
	get size() {
		return this.partial.size;
	}
	get username() {
		return this.partial.username;
	}
	get added() {
		return this.partial.added;
	}
	get status() {
		return this.partial.status;
	}
	get category() {
		return this.partial.category;
	}
	get imdb() {
		return this.partial.imdb;
	}

	magnet(): string {
		return this.partial.magnet();
	}
}

export const TORRENT_SCHEMA = z
	.object({
		...PARTIAL_TORRENT_SHAPE,
		descr: z.string(),
		language: languageCode,
		textlanguage: languageCode,
	})
	.transform(
		({ descr, language, textlanguage, ...rest }) =>
			new Torrent(
				PartialTorrent.fromWire(rest),
				descr,
				language,
				textlanguage,
			),
	);

export interface TorrentFile {
	readonly name: string;
	/** Size in bytes. */
	readonly size: bigint;
}

export const TORRENT_FILE_SCHEMA = z
	.object({
		name: unitArray(z.string()),
		size: unitArray(flexibleU64),
	})
	.transform(({ name, size }): TorrentFile => Object.freeze({ name, size }));
