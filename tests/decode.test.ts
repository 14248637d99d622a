import { describe, expect, it } from "vitest";
import { z } from "zod";
import { U64_MAX } from "../src/constants.js";
import {
	DecodeErrorMsg,
	emptyAsNone,
	epochSeconds,
	flexibleU16,
	flexibleU64,
	parseJson,
	unitArray,
} from "../src/decode.js";

function issueMessage(schema: z.ZodTypeAny, value: unknown): string | undefined {
	const result = schema.safeParse(value);
	return result.success ? undefined : result.error.issues[0]?.message;
}

describe("flexibleU64", () => {
	it("accepts numbers and numeric strings", () => {
		expect(flexibleU64.parse(5)).toBe(5n);
		expect(flexibleU64.parse("5")).toBe(5n);
		expect(flexibleU64.parse("+7")).toBe(7n);
		expect(flexibleU64.parse(0)).toBe(0n);
	});

	it("keeps values past 2^53 exact when they arrive as strings", () => {
		expect(flexibleU64.parse("18446744073709551615")).toBe(U64_MAX);
		expect(flexibleU64.parse("9007199254740993")).toBe(9007199254740993n);
	});

	it("takes bigints as they are", () => {
		expect(flexibleU64.parse(U64_MAX)).toBe(U64_MAX);
		expect(issueMessage(flexibleU64, U64_MAX + 1n)).toBe(DecodeErrorMsg.u64);
		expect(issueMessage(flexibleU64, -1n)).toBe(DecodeErrorMsg.u64);
	});

	it("rejects numbers that are no longer exact", () => {
		expect(issueMessage(flexibleU64, 2 ** 53)).toBe(DecodeErrorMsg.u64);
		expect(issueMessage(flexibleU64, 1e20)).toBe(DecodeErrorMsg.u64);
	});

	it("rejects values outside the u64 range", () => {
		expect(issueMessage(flexibleU64, "18446744073709551616")).toBe(
			DecodeErrorMsg.u64,
		);
		expect(issueMessage(flexibleU64, -1)).toBe(DecodeErrorMsg.u64);
		expect(issueMessage(flexibleU64, "-1")).toBe(DecodeErrorMsg.u64);
	});

	it("rejects non-numeric input", () => {
		for (const value of ["abc", "", "1.5", 1.5, true, null, undefined, [1]]) {
			expect(issueMessage(flexibleU64, value)).toBe(
				"expected a u64 or a string",
			);
		}
	});
});

describe("flexibleU16", () => {
	it("accepts the whole u16 range", () => {
		expect(flexibleU16.parse(0)).toBe(0);
		expect(flexibleU16.parse("207")).toBe(207);
		expect(flexibleU16.parse(65535)).toBe(65535);
	});

	it("rejects valid u64 values that do not fit in 16 bits", () => {
		expect(issueMessage(flexibleU16, 65536)).toBe("expected a u16");
		expect(issueMessage(flexibleU16, "70000")).toBe(DecodeErrorMsg.u16);
	});

	it("reports non-numeric input like flexibleU64", () => {
		expect(issueMessage(flexibleU16, "video")).toBe(DecodeErrorMsg.u64);
	});
});

describe("epochSeconds", () => {
	it("decodes strings and numbers to the same UTC instant", () => {
		const fromString = epochSeconds.parse("1700000000");
		const fromNumber = epochSeconds.parse(1700000000);

		expect(fromString.toISOString()).toBe("2023-11-14T22:13:20.000Z");
		expect(fromNumber.getTime()).toBe(fromString.getTime());
	});

	it("accepts bigint seconds", () => {
		expect(epochSeconds.parse(1700000000n).toISOString()).toBe(
			"2023-11-14T22:13:20.000Z",
		);
		expect(issueMessage(epochSeconds, 9_000_000_000_000n)).toBe(
			DecodeErrorMsg.timestamp,
		);
	});

	it("accepts instants before the epoch", () => {
		expect(epochSeconds.parse("-86400").toISOString()).toBe(
			"1969-12-31T00:00:00.000Z",
		);
	});

	it("rejects anything that is not whole seconds", () => {
		for (const value of ["abc", "1e3", "1.5", 1.5, null]) {
			expect(issueMessage(epochSeconds, value)).toBe(
				"expected a timestamp in seconds",
			);
		}
	});

	it("rejects instants outside the representable range", () => {
		expect(issueMessage(epochSeconds, 9_000_000_000_000)).toBe(
			DecodeErrorMsg.timestamp,
		);
		expect(issueMessage(epochSeconds, "-9000000000000")).toBe(
			DecodeErrorMsg.timestamp,
		);
	});
});

describe("parseJson", () => {
	it("turns integer literals into bigints", () => {
		expect(parseJson('{"id":9007199254740993,"size":[0]}')).toEqual({
			id: 9007199254740993n,
			size: [0n],
		});
	});

	it("leaves other number literals undecodable", () => {
		const parsed = parseJson("[1.5, 1e3]");

		expect(flexibleU64.safeParse(Array.isArray(parsed) && parsed[0]).success).toBe(
			false,
		);
		expect(issueMessage(epochSeconds, Array.isArray(parsed) && parsed[1])).toBe(
			DecodeErrorMsg.timestamp,
		);
	});

	it("throws on malformed input", () => {
		expect(() => parseJson("<html>")).toThrow();
	});
});

describe("emptyAsNone", () => {
	it("maps empty strings and null to null", () => {
		expect(emptyAsNone.parse("")).toBeNull();
		expect(emptyAsNone.parse(null)).toBeNull();
	});

	it("keeps non-empty strings", () => {
		expect(emptyAsNone.parse("abc")).toBe("abc");
	});

	it("rejects other types", () => {
		expect(emptyAsNone.safeParse(5).success).toBe(false);
	});
});

describe("unitArray", () => {
	it("unwraps a single element", () => {
		expect(unitArray(z.string()).parse(["x"])).toBe("x");
		expect(unitArray(flexibleU64).parse(["42"])).toBe(42n);
	});

	it("rejects arrays of any other length", () => {
		expect(issueMessage(unitArray(z.string()), [])).toBe(
			"expected an array of length 1",
		);
		expect(issueMessage(unitArray(z.string()), ["x", "y"])).toBe(
			DecodeErrorMsg.unitArray,
		);
	});

	it("rejects non-arrays", () => {
		expect(issueMessage(unitArray(z.string()), "x")).toBe(
			"expected an array",
		);
	});

	it("adds context to a failing element", () => {
		expect(issueMessage(unitArray(z.string()), [5])).toBe(
			"failed to deserialize: Expected string, received number",
		);
		expect(issueMessage(unitArray(flexibleU64), ["big"])).toBe(
			"failed to deserialize: expected a u64 or a string",
		);
	});
});
