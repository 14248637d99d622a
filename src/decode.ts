import { isInteger, LosslessNumber, parse } from "lossless-json";
import { z } from "zod";
import {
	MAX_EPOCH_SECONDS,
	SIGNED_INT_REGEX,
	U16_MAX,
	U64_MAX,
	UNSIGNED_INT_REGEX,
} from "./constants.js";

/**
 * Messages attached to the issues raised by the lenient schemas below.
 */
export enum DecodeErrorMsg {
	u64 = "expected a u64 or a string",
	u16 = "expected a u16",
	timestamp = "expected a timestamp in seconds",
	array = "expected an array",
	unitArray = "expected an array of length 1",
	nested = "failed to deserialize",
}

function toU64(value: unknown): bigint | null {
	let parsed: bigint;
	if (typeof value === "bigint") {
		parsed = value;
	} else if (typeof value === "number" && Number.isSafeInteger(value)) {
		parsed = BigInt(value);
	} else if (typeof value === "string" && UNSIGNED_INT_REGEX.test(value)) {
		parsed = BigInt(value.replace(/^\+/, ""));
	} else {
		return null;
	}
	return parsed >= 0n && parsed <= U64_MAX ? parsed : null;
}

function toEpochSeconds(value: unknown): number | null {
	let secs: bigint;
	if (typeof value === "bigint") {
		secs = value;
	} else if (typeof value === "number" && Number.isSafeInteger(value)) {
		secs = BigInt(value);
	} else if (typeof value === "string" && SIGNED_INT_REGEX.test(value)) {
		secs = BigInt(value.replace(/^\+/, ""));
	} else {
		return null;
	}
	const limit = BigInt(MAX_EPOCH_SECONDS);
	return secs >= -limit && secs <= limit ? Number(secs) : null;
}

/**
 * Integer literals become bigints. Any other number literal stays a
 * {@link LosslessNumber}, which no schema here accepts.
 */
function parseNumberLiteral(value: string): bigint | LosslessNumber {
	return isInteger(value) ? BigInt(value) : new LosslessNumber(value);
}

/**
 * JSON.parse without the rounding of integers past 2^53.
 *
 * @throws SyntaxError on malformed input
 */
export function parseJson(text: string): unknown {
	return parse(text, undefined, parseNumberLiteral);
}

/**
 * A JSON number or a numeric string holding an unsigned 64-bit integer.
 * Decodes to a bigint. Numbers past 2^53 only survive exactly when the body
 * went through {@link parseJson}, which hands them over as bigints.
 */
export const flexibleU64 = z.unknown().transform((value, ctx) => {
	const parsed = toU64(value);
	if (parsed === null) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: DecodeErrorMsg.u64 });
		return z.NEVER;
	}
	return parsed;
});

export const flexibleU16 = flexibleU64.transform((value, ctx) => {
	if (value > BigInt(U16_MAX)) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: DecodeErrorMsg.u16 });
		return z.NEVER;
	}
	return Number(value);
});

/**
 * Whole seconds since the Unix epoch, as a number or a string.
 */
export const epochSeconds = z.unknown().transform((value, ctx) => {
	const secs = toEpochSeconds(value);
	if (secs === null) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: DecodeErrorMsg.timestamp,
		});
		return z.NEVER;
	}
	return new Date(secs * 1000);
});

export const emptyAsNone = z
	.string()
	.nullable()
	.transform((value) => (value ? value : null));

/**
 * The API wraps some scalars in a one-element array, e.g. `"size": [1024]`.
 */
export function unitArray<T extends z.ZodTypeAny>(inner: T) {
	return z.unknown().transform((value, ctx): z.output<T> => {
		if (!Array.isArray(value)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: DecodeErrorMsg.array,
			});
			return z.NEVER;
		}
		if (value.length !== 1) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: DecodeErrorMsg.unitArray,
			});
			return z.NEVER;
		}
		const result = inner.safeParse(value[0]);
		if (!result.success) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `${DecodeErrorMsg.nested}: ${formatIssues(result.error)}`,
			});
			return z.NEVER;
		}
		return result.data;
	});
}

export function formatIssues(error: z.ZodError): string {
	return error.issues
		.map(({ path, message }) =>
			path.length ? `${path.join(".")}: ${message}` : message,
		)
		.join("; ");
}
