import { describe, expect, it } from "vitest";
import { scan } from "../src/api.js";
import { ScannerError } from "../src/errors/yaml-errors.js";
import type { Token } from "../src/scanner/tokens.js";

const types = (source: string, processComments = false) =>
	Array.from(scan(source, { processComments }), (token) => token.type);

const scalars = (source: string) =>
	Array.from(scan(source)).flatMap((token) =>
		token.type === "Scalar" ? [{ value: token.value, style: token.style }] : [],
	);

const scanError = (source: string): ScannerError => {
	try {
		Array.from(scan(source));
	} catch (error) {
		if (error instanceof ScannerError) {
			return error;
		}
		throw error;
	}
	throw new Error(`expected a scanner error for ${JSON.stringify(source)}`);
};

describe("Scanner", () => {
	describe("structure tokens", () => {
		it("opens and closes a block mapping", () => {
			expect(types("a: 1")).toEqual([
				"StreamStart",
				"BlockMappingStart",
				"Key",
				"Scalar",
				"Value",
				"Scalar",
				"BlockEnd",
				"StreamEnd",
			]);
		});

		it("tokenizes a flow sequence", () => {
			expect(types("[a, b]")).toEqual([
				"StreamStart",
				"FlowSequenceStart",
				"Scalar",
				"FlowEntry",
				"Scalar",
				"FlowSequenceEnd",
				"StreamEnd",
			]);
		});

		it("treats a sequence inside a mapping value as indentless", () => {
			expect(types("a:\n- 1\n- 2\n")).toEqual([
				"StreamStart",
				"BlockMappingStart",
				"Key",
				"Scalar",
				"Value",
				"BlockEntry",
				"Scalar",
				"BlockEntry",
				"Scalar",
				"BlockEnd",
				"StreamEnd",
			]);
		});

		it("closes several block collections when indentation drops", () => {
			expect(types("a:\n  b:\n    c: 1\nd: 2\n")).toEqual([
				"StreamStart",
				"BlockMappingStart",
				"Key",
				"Scalar",
				"Value",
				"BlockMappingStart",
				"Key",
				"Scalar",
				"Value",
				"BlockMappingStart",
				"Key",
				"Scalar",
				"Value",
				"Scalar",
				"BlockEnd",
				"BlockEnd",
				"Key",
				"Scalar",
				"Value",
				"Scalar",
				"BlockEnd",
				"StreamEnd",
			]);
		});

		it("recognizes document markers at column zero", () => {
			expect(types("--- a\n...\n")).toEqual([
				"StreamStart",
				"DocumentStart",
				"Scalar",
				"DocumentEnd",
				"StreamEnd",
			]);
		});

		it("reads anchors, aliases and tags", () => {
			const tokens = Array.from(scan("- &x !!str a\n- *x\n"));
			const anchor = tokens.find((token) => token.type === "Anchor");
			const alias = tokens.find((token) => token.type === "Alias");
			const tag = tokens.find((token) => token.type === "Tag");
			expect(anchor?.type === "Anchor" && anchor.value).toBe("x");
			expect(alias?.type === "Alias" && alias.value).toBe("x");
			expect(tag?.type === "Tag" && [tag.handle, tag.suffix]).toEqual(["!!", "str"]);
		});

		it("reads a verbatim tag without a handle", () => {
			const tag = Array.from(scan("!<tag:example.com,2024:thing> x")).find(
				(token): token is Extract<Token, { type: "Tag" }> => token.type === "Tag",
			);
			expect(tag?.handle).toBeNull();
			expect(tag?.suffix).toBe("tag:example.com,2024:thing");
		});

		it("reads %YAML and %TAG directives", () => {
			const directives = Array.from(scan("%YAML 1.1\n%TAG !e! tag:example.com,2024:\n--- x\n"))
				.filter((token) => token.type === "Directive")
				.map((token) => (token.type === "Directive" ? [token.name, token.value] : []));
			expect(directives).toEqual([
				["YAML", [1, 1]],
				["TAG", ["!e!", "tag:example.com,2024:"]],
			]);
		});
	});

	describe("scalars", () => {
		it("folds plain scalars over line breaks", () => {
			expect(scalars("a b\n  c\n\n  d")).toEqual([{ value: "a b c\nd", style: "plain" }]);
		});

		it("keeps a colon that is not followed by a space", () => {
			expect(scalars("url: http://example.com:8080/x")).toEqual([
				{ value: "url", style: "plain" },
				{ value: "http://example.com:8080/x", style: "plain" },
			]);
		});

		it("unescapes single-quoted scalars", () => {
			expect(scalars("'it''s'")).toEqual([{ value: "it's", style: "single-quoted" }]);
		});

		it("unescapes double-quoted scalars", () => {
			expect(scalars('"a\\tb\\n\\x41\\u00e9\\"q\\""')).toEqual([
				{ value: 'a\tb\nA\u00e9"q"', style: "double-quoted" },
			]);
		});

		it("joins an escaped line break without a space", () => {
			expect(scalars('"ab\\\n  cd"')).toEqual([{ value: "abcd", style: "double-quoted" }]);
		});

		it("keeps line breaks in literal scalars", () => {
			expect(scalars("|\n  a\n  b\n")).toEqual([{ value: "a\nb\n", style: "literal" }]);
		});

		it("folds lines in folded scalars", () => {
			expect(scalars(">\n  a\n  b\n\n  c\n")).toEqual([{ value: "a b\nc\n", style: "folded" }]);
		});

		it("does not fold more-indented lines", () => {
			expect(scalars(">\n  a\n    b\n  c\n")).toEqual([{ value: "a\n  b\nc\n", style: "folded" }]);
		});

		it("applies chomping indicators", () => {
			expect(scalars("|-\n  a\n\n")).toEqual([{ value: "a", style: "literal" }]);
			expect(scalars("|+\n  a\n\n")).toEqual([{ value: "a\n\n", style: "literal" }]);
			expect(scalars("|\n  a\n\n")).toEqual([{ value: "a\n", style: "literal" }]);
		});

		it("honours an explicit indentation indicator", () => {
			expect(scalars("|2\n   a\n  b\n")).toEqual([{ value: " a\nb\n", style: "literal" }]);
		});

		it("ends a block scalar at a less indented line", () => {
			expect(scalars("a: |\n  x\nb: y\n")).toEqual([
				{ value: "a", style: "plain" },
				{ value: "x\n", style: "literal" },
				{ value: "b", style: "plain" },
				{ value: "y", style: "plain" },
			]);
		});
	});

	describe("comments", () => {
		it("drops comments by default", () => {
			expect(types("# note\na: 1 # trailing\n")).not.toContain("Comment");
		});

		it("emits comment tokens when asked", () => {
			const comments = Array.from(scan("# note\na: 1 # trailing\n", { processComments: true }))
				.filter((token) => token.type === "Comment")
				.map((token) => (token.type === "Comment" ? [token.kind, token.value] : []));
			expect(comments).toEqual([
				["line", " note"],
				["inline", " trailing"],
			]);
		});
	});

	describe("errors", () => {
		it("rejects characters that cannot start a token", () => {
			const error = scanError("`foo");
			expect(error.problem).toBe("found character '`' that cannot start any token");
			expect(error.problemMark?.line).toBe(0);
			expect(error.problemMark?.column).toBe(0);
		});

		it("rejects a tab used for indentation", () => {
			const error = scanError("a:\n\tb: 1\n");
			expect(error.problem).toBe("found a tab character where an indentation space is expected");
			expect(error.problemMark?.line).toBe(1);
			expect(error.problemMark?.column).toBe(0);
		});

		it("rejects a second mapping value on the same line", () => {
			const error = scanError("a: b: c");
			expect(error.problem).toBe("mapping values are not allowed here");
			expect(error.problemMark?.column).toBe(4);
		});

		it("rejects a block entry after a key on the same line", () => {
			expect(scanError("a: - b").problem).toBe("sequence entries are not allowed here");
		});

		it("requires a colon after a simple key in a block mapping", () => {
			const error = scanError("a: 1\nb\nc: 2\n");
			expect(error.context).toBe("while scanning a simple key");
			expect(error.problem).toBe("could not find expected ':'");
			expect(error.contextMark?.line).toBe(1);
		});

		it("rejects an unterminated quoted scalar", () => {
			const error = scanError("'abc");
			expect(error.context).toBe("while scanning a quoted scalar");
			expect(error.problem).toBe("found unexpected end of stream");
		});

		it("rejects an unknown escape", () => {
			expect(scanError('"\\q"').problem).toBe("found unknown escape character 'q'");
		});

		it("rejects a zero indentation indicator", () => {
			expect(scanError("|0\n  a\n").problem).toBe(
				"expected indentation indicator in the range 1-9, but found 0",
			);
		});

		it("renders the position in the message", () => {
			expect(scanError("`foo").message).toBe(
				[
					"while scanning for the next token",
					"found character '`' that cannot start any token",
					' in "<reader>", line 1, column 1:',
					"    `foo",
					"    ^",
				].join("\n"),
			);
		});
	});
});
