import { Either } from "effect";
import { describe, expect, it } from "vitest";
import { load, loadValue } from "../src/api.js";
import {
	constructBinary,
	constructBool,
	constructFloat,
	constructInt,
	constructTimestamp,
	construct,
} from "../src/convert/construct.js";
import { makeConverterConfig } from "../src/convert/converter.js";
import { ConversionError } from "../src/errors/conversion-errors.js";

const right = <A>(result: Either.Either<A, string>): A =>
	Either.getOrThrowWith(result, (message) => new Error(message));

describe("scalar constructors", () => {
	it.each([
		["123", 123],
		["-17", -17],
		["+12", 12],
		["0x1A", 26],
		["0b101", 5],
		["012", 10],
		["190:20:30", 685230],
		["1_000", 1000],
	])("reads the integer %j", (text, expected) => {
		expect(right(constructInt(text))).toBe(expected);
	});

	it("reads integers beyond the safe range as bigint", () => {
		expect(right(constructInt("9007199254740993"))).toBe(9007199254740993n);
		expect(right(constructInt("-0x20000000000001"))).toBe(-9007199254740993n);
		expect(right(constructInt("9007199254740991"))).toBe(9007199254740991);
	});

	it("rejects malformed integers", () => {
		expect(constructInt("09")).toEqual(Either.left("invalid octal integer '09'"));
		expect(constructInt("abc")).toEqual(Either.left("invalid integer 'abc'"));
	});

	it("reads floats", () => {
		expect(right(constructFloat("1.5"))).toBe(1.5);
		expect(right(constructFloat("1e5"))).toBe(100000);
		expect(right(constructFloat("-.inf"))).toBe(Number.NEGATIVE_INFINITY);
		expect(right(constructFloat(".Inf"))).toBe(Number.POSITIVE_INFINITY);
		expect(right(constructFloat(".NaN"))).toBeNaN();
		expect(right(constructFloat("190:20:30.15"))).toBeCloseTo(685230.15, 6);
		expect(constructFloat(".")).toEqual(Either.left("invalid float '.'"));
	});

	it("reads booleans in any case", () => {
		expect(right(constructBool("yes"))).toBe(true);
		expect(right(constructBool("Off"))).toBe(false);
		expect(right(constructBool("TRUE"))).toBe(true);
		expect(constructBool("y")).toEqual(Either.left("invalid boolean 'y'"));
	});

	it("reads dates as midnight UTC", () => {
		expect(right(constructTimestamp("2001-12-14")).toISOString()).toBe("2001-12-14T00:00:00.000Z");
	});

	it("keeps years before 100", () => {
		expect(right(constructTimestamp("0099-01-01")).toISOString()).toBe("0099-01-01T00:00:00.000Z");
		expect(right(constructTimestamp("0050-06-01T12:30:00Z")).toISOString()).toBe(
			"0050-06-01T12:30:00.000Z",
		);
		expect(loadValue("c: 0099-01-01\n")).toEqual({ c: new Date("0099-01-01T00:00:00.000Z") });
	});

	it("applies the time zone of a timestamp", () => {
		expect(right(constructTimestamp("2001-12-14t21:59:43.10-05:00")).toISOString()).toBe(
			"2001-12-15T02:59:43.100Z",
		);
		expect(right(constructTimestamp("2001-12-14 21:59:43.10 -5")).toISOString()).toBe(
			"2001-12-15T02:59:43.100Z",
		);
		expect(right(constructTimestamp("2001-12-14T21:59:43Z")).toISOString()).toBe(
			"2001-12-14T21:59:43.000Z",
		);
	});

	it("reads base64 across lines", () => {
		expect(Array.from(right(constructBinary("AQ\nID\n")))).toEqual([1, 2, 3]);
		expect(constructBinary("@@@@")).toEqual(Either.left("invalid base64 data"));
	});
});

describe("construct", () => {
	it("returns null for an empty stream", () => {
		expect(loadValue("")).toBeNull();
		expect(construct(null)).toEqual(Either.right(null));
	});

	it("builds plain values from core tags", () => {
		expect(
			loadValue("a: 1\nb: [true, ~, 1.5, text]\nc: 2001-12-14\nd: !!binary AQID\n"),
		).toEqual({
			a: 1,
			b: [true, null, 1.5, "text"],
			c: new Date(Date.UTC(2001, 11, 14)),
			d: Uint8Array.from([1, 2, 3]),
		});
	});

	it("honours explicit tags", () => {
		expect(loadValue("[!!str 1, !!int '2', !!float 3]")).toEqual(["1", 2, 3]);
	});

	it("builds ordered pairs and sets", () => {
		expect(loadValue("!!omap [a: 1, b: 2]")).toEqual([
			["a", 1],
			["b", 2],
		]);
		expect(loadValue("!!pairs [a: 1, a: 2]")).toEqual([
			["a", 1],
			["a", 2],
		]);
		expect(loadValue("!!set {a, b}")).toEqual(new Set(["a", "b"]));
	});

	it("requires single-pair mappings in ordered pairs", () => {
		expect(() => loadValue("!!omap [1]")).toThrow(
			"expected a mapping of length 1 in 'tag:yaml.org,2002:omap', but found a scalar",
		);
	});

	it("keeps the identity of recursive collections", () => {
		const list = loadValue("&a [1, *a]");
		expect(Array.isArray(list) && list[1]).toBe(list);
		const object = loadValue("&m\nself: *m\n");
		expect(typeof object === "object" && object !== null && "self" in object && object.self).toBe(
			object,
		);
	});

	it("shares values reached through aliases", () => {
		const value = loadValue("a: &x [1]\nb: *x\n");
		expect(
			typeof value === "object" && value !== null && "a" in value && "b" in value && value.a === value.b,
		).toBe(true);
	});

	describe("mapping keys", () => {
		it("stringifies scalar keys of objects", () => {
			expect(loadValue("1: a\n~: b\ntrue: c\n")).toEqual({ "1": "a", null: "b", true: "c" });
		});

		it("stores __proto__ as an own property", () => {
			const value = loadValue("__proto__: 1\n");
			expect(Object.keys(value ?? {})).toEqual(["__proto__"]);
			expect(Object.getPrototypeOf(value)).toBe(Object.prototype);
		});

		it("rejects collection keys in objects", () => {
			expect(() => loadValue("[x]: b\n")).toThrow(
				"found a sequence key, which an object cannot hold; construct mappings as Maps instead",
			);
		});

		it("keeps keys as values in Map mode", () => {
			const value = loadValue("1: a\n[x]: b\n", {}, makeConverterConfig({ mapping: "map" }));
			expect(value).toBeInstanceOf(Map);
			if (value instanceof Map) {
				expect(value.get(1)).toBe("a");
				expect(Array.from(value.keys())[1]).toEqual(["x"]);
			}
		});
	});

	describe("duplicate keys", () => {
		it("lets the last value win by default", () => {
			expect(loadValue("a: 1\na: 2\n")).toEqual({ a: 2 });
		});

		it("rejects duplicates when the load options ask", () => {
			expect(() => loadValue("a: 1\na: 2\n", { allowDuplicateKeys: false })).toThrow(
				"found duplicate key a",
			);
		});

		it("rejects duplicates when the converter asks", () => {
			const converter = makeConverterConfig({ allowDuplicateKeys: false });
			expect(() => loadValue("a: 1\na: 2\n", {}, converter)).toThrow(ConversionError);
		});

		it("lets explicit keys override merged ones", () => {
			expect(
				loadValue("base: &b {x: 1, y: 2}\nchild:\n  <<: *b\n  y: 3\n", {
					allowDuplicateKeys: false,
				}),
			).toEqual({ base: { x: 1, y: 2 }, child: { x: 1, y: 3 } });
		});
	});

	describe("merge keys", () => {
		it("prefers the first of several merged mappings", () => {
			expect(
				loadValue("a: &a {k: 1}\nb: &b {k: 2, j: 2}\nc:\n  <<: [*a, *b]\n"),
			).toEqual({ a: { k: 1 }, b: { k: 2, j: 2 }, c: { k: 1, j: 2 } });
		});

		it("merges nested merges", () => {
			expect(
				loadValue("a: &a {x: 1}\nb: &b {<<: *a, y: 2}\nc: {<<: *b, z: 3}\n"),
			).toEqual({ a: { x: 1 }, b: { x: 1, y: 2 }, c: { x: 1, y: 2, z: 3 } });
		});

		it("rejects a scalar merge source", () => {
			expect(() => loadValue("a:\n  <<: 1\n")).toThrow(
				"expected a mapping or list of mappings for merging, but found a scalar",
			);
		});
	});

	describe("unknown tags", () => {
		it("fails by default with the node position", () => {
			try {
				loadValue("a: !thing x\n");
				expect.unreachable();
			} catch (error) {
				expect(error).toBeInstanceOf(ConversionError);
				if (error instanceof ConversionError) {
					expect(error.tag).toBe("!thing");
					expect(error.mark?.column).toBe(3);
					expect(error.message.split("\n")[0]).toBe(
						"could not determine a constructor for the tag '!thing'",
					);
				}
			}
		});

		it("fails when a core tag is used on the wrong kind", () => {
			expect(() => loadValue("!!int [1]")).toThrow(
				"the tag 'tag:yaml.org,2002:int' does not apply to a sequence",
			);
		});

		it("constructs the plain kind when kept", () => {
			const keep = makeConverterConfig({ unknownTags: "keep" });
			expect(loadValue("[!thing x, !list [1], !map {a: 1}]", {}, keep)).toEqual([
				"x",
				[1],
				{ a: 1 },
			]);
		});
	});

	it("reports invalid scalars with the tag", () => {
		const node = load("!!int abc");
		const result = construct(node);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.tag).toBe("tag:yaml.org,2002:int");
			expect(result.left.message.split("\n")[0]).toBe("invalid integer 'abc'");
		}
	});
});
