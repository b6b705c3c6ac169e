import { Either } from "effect";
import { describe, expect, it } from "vitest";
import { dump, dumpValue, loadValue } from "../src/api.js";
import { represent, representBinary, representFloat } from "../src/convert/represent.js";
import { Tags } from "../src/resolver/tags.js";

describe("representFloat", () => {
	it.each([
		[1, "1.0"],
		[1.5, "1.5"],
		[-2.25, "-2.25"],
		[Number.POSITIVE_INFINITY, ".inf"],
		[Number.NEGATIVE_INFINITY, "-.inf"],
		[Number.NaN, ".nan"],
		[-0, "-0.0"],
	])("writes %s as %j", (value, expected) => {
		expect(representFloat(value)).toBe(expected);
	});
});

describe("representBinary", () => {
	it("writes base64 lines of 76 characters", () => {
		expect(representBinary(Uint8Array.from([1, 2, 3]))).toBe("AQID\n");
		const lines = representBinary(new Uint8Array(60)).split("\n");
		expect(lines.map((line) => line.length)).toEqual([76, 4, 0]);
	});
});

describe("represent", () => {
	it("tags values by their type", () => {
		const node = Either.getOrThrow(represent([null, true, 7, 1.5, 12n, "s"]));
		expect(node.kind === "sequence" && node.value.map((item) => item.tag)).toEqual([
			Tags.NULL,
			Tags.BOOL,
			Tags.INT,
			Tags.FLOAT,
			Tags.INT,
			Tags.STR,
		]);
	});

	it("writes negative zero as a float", () => {
		const node = Either.getOrThrow(represent(-0));
		expect(node.kind === "scalar" && [node.tag, node.value]).toEqual([Tags.FLOAT, "-0.0"]);
		expect(Object.is(loadValue(dumpValue(-0)), -0)).toBe(true);
	});

	it("asks for a literal block for multi-line strings", () => {
		const node = Either.getOrThrow(represent("a\nb"));
		expect(node.kind === "scalar" && node.style).toBe("literal");
		const single = Either.getOrThrow(represent("a b"));
		expect(single.kind === "scalar" && single.style).toBeNull();
	});

	it("maps one object to one node", () => {
		const shared = { x: 1 };
		const node = Either.getOrThrow(represent({ a: shared, b: shared }));
		expect(node.kind === "mapping" && node.value[0]?.[1]).toBe(
			node.kind === "mapping" ? node.value[1]?.[1] : undefined,
		);
		expect(dump(node)).toBe("a: &id001 {x: 1}\nb: *id001\n");
	});

	it("fails on values without a representation", () => {
		class Opaque {}
		const result = represent(new Opaque());
		expect(Either.isLeft(result) && result.left.message).toBe("cannot represent an instance of Opaque");
		expect(Either.isLeft(represent(() => 1))).toBe(true);
		expect(Either.isLeft(represent(Symbol("s")))).toBe(true);
		expect(Either.isLeft(represent(new Date(Number.NaN)))).toBe(true);
	});
});

describe("dumpValue", () => {
	it.each([
		[null, "null\n"],
		[undefined, "null\n"],
		[true, "true\n"],
		[42, "42\n"],
		[1.5, "1.5\n"],
		[Number.NaN, ".nan\n"],
		[9007199254740993n, "9007199254740993\n"],
		["text", "text\n"],
		["123", "'123'\n"],
		["", "''\n"],
	])("writes %s as %j", (value, expected) => {
		expect(dumpValue(value)).toBe(expected);
	});

	it("puts collections of scalars in flow style", () => {
		expect(dumpValue({ a: 1, b: "x" })).toBe("{a: 1, b: x}\n");
		expect(dumpValue([1, 2])).toBe("[1, 2]\n");
	});

	it("puts collections holding collections in block style", () => {
		expect(dumpValue({ a: [1, 2, { b: true }] })).toBe("a:\n- 1\n- 2\n- {b: true}\n");
	});

	it("follows the default flow style", () => {
		expect(dumpValue({ a: [1, 2] }, { defaultFlowStyle: "block" })).toBe("a:\n- 1\n- 2\n");
		expect(dumpValue({ a: { b: 1 }, c: [1] }, { defaultFlowStyle: "block" })).toBe(
			"a:\n  b: 1\nc:\n- 1\n",
		);
		expect(dumpValue({ a: { b: 1 } }, { defaultFlowStyle: "flow" })).toBe("{a: {b: 1}}\n");
	});

	it("writes multi-line strings as literal blocks", () => {
		expect(dumpValue({ a: "line one\nline two\n" })).toBe("a: |\n  line one\n  line two\n");
		expect(dumpValue(["a\n\n"])).toBe("- |+\n  a\n\n...\n");
		expect(loadValue(dumpValue(["a\n\n"]))).toEqual(["a\n\n"]);
	});

	it("writes dates as timestamps", () => {
		expect(dumpValue(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toBe("2024-01-02T03:04:05.000Z\n");
	});

	it("writes bytes as a binary literal", () => {
		expect(dumpValue(Uint8Array.from([1, 2, 3]))).toBe("!!binary |\n  AQID\n");
	});

	it("writes maps and sets", () => {
		expect(dumpValue(new Map<unknown, unknown>([[1, "a"]]))).toBe("{1: a}\n");
		expect(dumpValue(new Set(["a"]))).toBe("!!set {a: null}\n");
	});

	it("writes a self-containing array with an alias", () => {
		const cyclic: Array<unknown> = [1];
		cyclic.push(cyclic);
		expect(dumpValue(cyclic)).toBe("&id001\n- 1\n- *id001\n");
	});

	it("reads back what it writes", () => {
		const value = {
			when: new Date(Date.UTC(2024, 0, 2)),
			bytes: Uint8Array.from([1, 2, 3]),
			big: 9007199254740993n,
			tags: new Set(["a", "b"]),
			nested: { list: ["yes", "1", ""], flag: false },
		};
		expect(loadValue(dumpValue(value))).toEqual(value);
	});

	it("keeps cycles through a round trip", () => {
		const cyclic: Array<unknown> = [1];
		cyclic.push(cyclic);
		const back = loadValue(dumpValue(cyclic));
		expect(Array.isArray(back) && back[1]).toBe(back);
	});
});
