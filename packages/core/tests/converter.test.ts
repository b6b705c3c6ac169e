import { Either } from "effect";
import { afterEach, describe, expect, it, vi } from "vitest";
import { dumpValue, loadValue } from "../src/api.js";
import {
	defineTag,
	makeConverterConfig,
	withLoadOptions,
} from "../src/convert/converter.js";

interface Point {
	readonly x: number;
	readonly y: number;
}

interface Color {
	readonly hex: string;
}

interface Range {
	readonly from: number;
	readonly to: number;
}

const point = defineTag<Point>({
	tag: "!point",
	kind: "sequence",
	construct: ([x, y]) =>
		typeof x === "number" && typeof y === "number"
			? Either.right({ x, y })
			: Either.left("expected two numbers"),
	identify: (value): value is Point =>
		typeof value === "object" && value !== null && "x" in value && "y" in value,
	represent: (p) => [p.x, p.y],
});

const color = defineTag<Color>({
	tag: "!color",
	kind: "scalar",
	construct: (text) =>
		/^#[0-9a-f]{6}$/.test(text) ? Either.right({ hex: text }) : Either.left(`not a color: ${text}`),
	identify: (value): value is Color =>
		typeof value === "object" && value !== null && "hex" in value && typeof value.hex === "string",
	represent: (c) => c.hex,
});

const range = defineTag<Range>({
	tag: "!range",
	kind: "mapping",
	construct: (pairs) => {
		const entries = new Map(pairs);
		const from = entries.get("from");
		const to = entries.get("to");
		return typeof from === "number" && typeof to === "number"
			? Either.right({ from, to })
			: Either.left("expected from and to");
	},
	identify: (value): value is Range =>
		typeof value === "object" && value !== null && "from" in value && "to" in value,
	represent: (r) => [
		["from", r.from],
		["to", r.to],
	],
});

const config = makeConverterConfig({ tags: [point, color, range] });

describe("custom tags", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("constructs each kind of tagged node", () => {
		expect(
			loadValue("at: !point [1, 2]\nink: !color '#ff0000'\nspan: !range {from: 1, to: 5}\n", {}, config),
		).toEqual({
			at: { x: 1, y: 2 },
			ink: { hex: "#ff0000" },
			span: { from: 1, to: 5 },
		});
	});

	it("represents values the definitions identify", () => {
		expect(dumpValue({ x: 1, y: 2 }, {}, config)).toBe("!point [1, 2]\n");
		expect(dumpValue({ hex: "#ff0000" }, {}, config)).toBe("!color '#ff0000'\n");
		expect(dumpValue({ from: 1, to: 5 }, {}, config)).toBe("!range {from: 1, to: 5}\n");
		expect(dumpValue({ origin: { x: 0, y: 0 } }, {}, config)).toBe("origin: !point [0, 0]\n");
	});

	it("reads back what it writes", () => {
		const value = [{ x: 3, y: 4 }, { hex: "#00ff00" }, { from: 0, to: 9 }];
		expect(loadValue(dumpValue(value, {}, config), {}, config)).toEqual(value);
	});

	it("reports the reason a construction failed", () => {
		expect(() => loadValue("!point [a]", {}, config)).toThrow("expected two numbers");
		expect(() => loadValue("!color red", {}, config)).toThrow("not a color: red");
	});

	it("rejects a tag used on the wrong kind of node", () => {
		expect(() => loadValue("!point {a: 1}", {}, config)).toThrow(
			"the tag '!point' is defined for a sequence, but found a mapping",
		);
	});

	it("cannot construct a custom value that contains itself", () => {
		expect(() => loadValue("&p !point [*p]", {}, config)).toThrow(
			"found unconstructable recursive node",
		);
	});

	it("treats a tag without represent as load-only", () => {
		const loadOnly = makeConverterConfig({
			tags: [
				defineTag<string>({
					tag: "!upper",
					kind: "scalar",
					construct: (text) => Either.right(text.toUpperCase()),
				}),
			],
		});
		expect(loadValue("!upper abc", {}, loadOnly)).toBe("ABC");
		expect(dumpValue("abc", {}, loadOnly)).toBe("abc\n");
	});

	it("warns when a tag is registered twice", () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
		const twice = makeConverterConfig({ tags: [point, point] });
		expect(twice.tags.size).toBe(1);
		expect(warn).toHaveBeenCalledWith(
			"Tag '!point' is defined more than once. The last definition wins.",
		);
	});
});

describe("makeConverterConfig", () => {
	it("fills in defaults", () => {
		const defaults = makeConverterConfig();
		expect([defaults.mapping, defaults.allowDuplicateKeys, defaults.unknownTags]).toEqual([
			"object",
			true,
			"error",
		]);
		expect(defaults.tags.size).toBe(0);
	});

	it("returns a frozen configuration", () => {
		expect(Object.isFrozen(config)).toBe(true);
		expect(Object.isFrozen(point)).toBe(true);
	});
});

describe("withLoadOptions", () => {
	it("turns duplicate keys off when the load options do", () => {
		expect(withLoadOptions(config, { allowDuplicateKeys: false }).allowDuplicateKeys).toBe(false);
		expect(withLoadOptions(config, { allowDuplicateKeys: true })).toBe(config);
	});
});
