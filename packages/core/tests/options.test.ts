import { Either } from "effect";
import { describe, expect, it } from "vitest";
import {
	dumpOptionsOrThrow,
	loadOptionsOrThrow,
	resolveDumpOptions,
	resolveLoadOptions,
	versionTuple,
} from "../src/config/options.js";
import { ConfigurationError } from "../src/errors/conversion-errors.js";
import { Resolver } from "../src/resolver/resolver.js";

describe("load options", () => {
	it("fills in defaults", () => {
		const resolved = loadOptionsOrThrow();
		expect(resolved).toEqual({
			sourceName: "<reader>",
			maxNestingDepth: 50,
			maxAliasesForCollections: 50,
			allowRecursiveKeys: false,
			allowDuplicateKeys: true,
			codePointLimit: 3 * 1024 * 1024,
			processComments: false,
			resolver: Resolver.default,
		});
	});

	it("keeps given values", () => {
		const resolver = Resolver.empty();
		const resolved = loadOptionsOrThrow({ sourceName: "doc.yaml", maxNestingDepth: 5, resolver });
		expect([resolved.sourceName, resolved.maxNestingDepth, resolved.resolver]).toEqual([
			"doc.yaml",
			5,
			resolver,
		]);
	});

	it.each([
		[{ maxNestingDepth: 0 }],
		[{ maxNestingDepth: 1.5 }],
		[{ maxAliasesForCollections: -1 }],
		[{ codePointLimit: 0 }],
	])("rejects %j", (options) => {
		const result = resolveLoadOptions(options);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left).toBeInstanceOf(ConfigurationError);
			expect(result.left.option).toBe("load");
			expect(result.left.message.startsWith("Invalid load options: ")).toBe(true);
		}
	});
});

describe("dump options", () => {
	it("fills in defaults", () => {
		const resolved = dumpOptionsOrThrow();
		expect(resolved).toEqual({
			width: 80,
			indent: 2,
			indicatorIndent: 0,
			indentWithIndicator: false,
			defaultFlowStyle: "auto",
			defaultScalarStyle: "plain",
			explicitStart: false,
			explicitEnd: false,
			canonical: false,
			lineBreak: "unix",
			allowUnicode: true,
			splitLines: true,
			prettyFlow: false,
			version: null,
			tags: null,
			explicitRoot: null,
			maxSimpleKeyLength: 128,
			resolver: Resolver.default,
		});
	});

	it.each([[{ indent: 0 }], [{ indent: 10 }], [{ maxSimpleKeyLength: 1025 }], [{ width: 1.5 }]])(
		"rejects %j",
		(options) => {
			expect(Either.isLeft(resolveDumpOptions(options))).toBe(true);
		},
	);

	it("requires the indicator indent to stay below the indent", () => {
		const result = resolveDumpOptions({ indent: 2, indicatorIndent: 2 });
		expect(Either.isLeft(result) && result.left.message).toBe(
			"Invalid dump options: indicatorIndent (2) must be smaller than indent (2)",
		);
		expect(Either.isRight(resolveDumpOptions({ indent: 3, indicatorIndent: 2 }))).toBe(true);
	});

	it("throws ConfigurationError from the synchronous form", () => {
		expect(() => dumpOptionsOrThrow({ indent: 0 })).toThrow(ConfigurationError);
	});

	it("maps the version option to a pair", () => {
		expect(versionTuple("1.1")).toEqual([1, 1]);
		expect(versionTuple("1.0")).toEqual([1, 0]);
		expect(versionTuple(null)).toBeNull();
	});
});
