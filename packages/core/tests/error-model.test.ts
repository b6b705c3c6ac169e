import { Effect } from "effect";
import { describe, expect, it } from "vitest";
import {
	ComposerError,
	ConfigurationError,
	ConversionError,
	EmitterError,
	type LoadError,
	NestingDepthExceededError,
	ParserError,
	ReaderError,
	ResolverError,
	ScannerError,
	SerializerError,
	type YamlError,
	marked,
} from "../src/errors/index.js";
import { Mark } from "../src/reader/mark.js";

const at = (line: number, column: number) => new Mark("doc.yaml", 0, line, column);

describe("pipeline error creation and _tag discrimination", () => {
	it("ReaderError has correct _tag and fields", () => {
		const err = new ReaderError({
			source: "doc.yaml",
			position: 4,
			codePoint: 1,
			message: "unacceptable code point",
		});
		expect(err._tag).toBe("ReaderError");
		expect(err.position).toBe(4);
		expect(err.codePoint).toBe(1);
	});

	it("ScannerError carries the marked fields", () => {
		const err = new ScannerError(
			marked({
				context: "while scanning a simple key",
				contextMark: at(0, 0),
				problem: "could not find expected ':'",
				problemMark: at(1, 0),
			}),
		);
		expect(err._tag).toBe("ScannerError");
		expect(err.problem).toBe("could not find expected ':'");
		expect(err.contextMark?.line).toBe(0);
		expect(err.message).toBe(
			[
				"while scanning a simple key",
				' in "doc.yaml", line 1, column 1',
				"could not find expected ':'",
				' in "doc.yaml", line 2, column 1',
			].join("\n"),
		);
	});

	it("ParserError and ComposerError share the marked shape", () => {
		const parser = new ParserError(marked({ problem: "expected <block end>" }));
		const composer = new ComposerError(marked({ problem: "found undefined alias 'x'" }));
		expect([parser._tag, parser.message]).toEqual(["ParserError", "expected <block end>"]);
		expect([composer._tag, composer.message]).toEqual([
			"ComposerError",
			"found undefined alias 'x'",
		]);
	});

	it("NestingDepthExceededError has correct _tag and fields", () => {
		const err = new NestingDepthExceededError({ limit: 3, message: "Nesting Depth exceeded max 3" });
		expect(err._tag).toBe("NestingDepthExceededError");
		expect(err.limit).toBe(3);
		expect(err.mark).toBeUndefined();
	});

	it("dump and converter errors have correct _tag", () => {
		expect(new SerializerError({ message: "serializer is closed" })._tag).toBe("SerializerError");
		expect(new EmitterError({ message: "expected nothing" })._tag).toBe("EmitterError");
		expect(new ResolverError({ tag: "!x", message: "unknown" }).tag).toBe("!x");
		expect(new ConversionError({ tag: "!x", message: "bad" })._tag).toBe("ConversionError");
		expect(new ConfigurationError({ option: "dump", message: "bad indent" }).option).toBe("dump");
	});
});

describe("_tag discrimination in union types", () => {
	const describeError = (error: YamlError): string => {
		switch (error._tag) {
			case "ReaderError":
				return `reader at ${error.position}`;
			case "ScannerError":
			case "ParserError":
			case "ComposerError":
				return `${error._tag}: ${error.problem}`;
			case "NestingDepthExceededError":
				return `deeper than ${error.limit}`;
			case "ResolverError":
			case "ConversionError":
				return `tag ${error.tag}`;
			case "SerializerError":
			case "EmitterError":
				return `dump: ${error.message}`;
			case "ConfigurationError":
				return `option ${error.option}`;
		}
	};

	it("narrows each member of YamlError", () => {
		expect(describeError(new NestingDepthExceededError({ limit: 2, message: "" }))).toBe(
			"deeper than 2",
		);
		expect(describeError(new ComposerError(marked({ problem: "second occurrence" })))).toBe(
			"ComposerError: second occurrence",
		);
		expect(describeError(new ConfigurationError({ option: "load", message: "" }))).toBe(
			"option load",
		);
	});
});

describe("Effect.catchTag pattern matching", () => {
	it("catches a specific load error", async () => {
		const failing: Effect.Effect<string, LoadError> = Effect.fail(
			new NestingDepthExceededError({ limit: 1, message: "Nesting Depth exceeded max 1" }),
		);
		const effect = failing.pipe(
			Effect.catchTag("NestingDepthExceededError", (err) =>
				Effect.succeed(`limit was ${err.limit}`),
			),
		);
		expect(await Effect.runPromise(effect)).toBe("limit was 1");
	});

	it("leaves other errors uncaught", async () => {
		const failing: Effect.Effect<string, LoadError> = Effect.fail(
			new ParserError(marked({ problem: "found duplicate YAML directive" })),
		);
		const uncaught = failing.pipe(
			Effect.catchTag("ScannerError", () => Effect.succeed("should not happen")),
		);
		const either = await Effect.runPromise(Effect.either(uncaught));
		expect(either._tag).toBe("Left");
		if (either._tag === "Left") {
			expect(either.left._tag).toBe("ParserError");
		}
	});
});

describe("errors are instances of Error", () => {
	it("can be thrown and caught as Error", () => {
		const err = new ScannerError(marked({ problem: "found unknown escape character 'q'" }));
		expect(err).toBeInstanceOf(Error);
		expect(() => {
			throw err;
		}).toThrow("found unknown escape character 'q'");
	});
});
