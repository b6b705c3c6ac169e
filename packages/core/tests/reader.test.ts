import { describe, expect, it } from "vitest";
import { load, loadAll } from "../src/api.js";
import { marked, ReaderError } from "../src/errors/yaml-errors.js";
import { Mark } from "../src/reader/mark.js";
import { decodeSource, EOF, Reader } from "../src/reader/reader.js";

const options = { name: "<test>", codePointLimit: 1024 };

describe("Mark", () => {
	it("renders a snippet with a caret under the marked character", () => {
		const mark = new Mark("<reader>", 3, 0, 3, "a: [b");
		expect(mark.snippet()).toBe("    a: [b\n       ^");
	});

	it("renders one-based line and column", () => {
		const mark = new Mark("<reader>", 3, 0, 3, "a: [b");
		expect(mark.toString()).toBe(' in "<reader>", line 1, column 4:\n    a: [b\n       ^');
	});

	it("shows only the line the mark is on", () => {
		const buffer = "first: 1\nsecond: [\nthird: 3";
		const mark = new Mark("doc.yaml", 17, 1, 8, buffer);
		expect(mark.snippet()).toBe(`    second: [\n${" ".repeat(12)}^`);
	});

	it("clips long lines around the mark", () => {
		const buffer = `${"a".repeat(100)}X${"b".repeat(100)}`;
		const snippet = new Mark("<reader>", 100, 0, 100, buffer).snippet();
		expect(snippet).not.toBeNull();
		const [line, caret] = (snippet ?? "").split("\n");
		expect(line?.startsWith("     ... ")).toBe(true);
		expect(line?.endsWith(" ... ")).toBe(true);
		expect(line?.charAt((caret ?? "").indexOf("^"))).toBe("X");
	});

	it("has no snippet without a buffer", () => {
		const mark = new Mark("external", 0, 4, 2);
		expect(mark.snippet()).toBeNull();
		expect(mark.toString()).toBe(' in "external", line 5, column 3');
	});

	it("compares positions by name, line and column", () => {
		expect(new Mark("a", 0, 1, 2).samePosition(new Mark("a", 9, 1, 2, "x"))).toBe(true);
		expect(new Mark("a", 0, 1, 2).samePosition(new Mark("b", 0, 1, 2))).toBe(false);
	});
});

describe("marked", () => {
	it("joins context, marks and problem in order", () => {
		const fields = marked({
			context: "while scanning a quoted scalar",
			contextMark: new Mark("f", 0, 0, 0),
			problem: "found unexpected end of stream",
			problemMark: new Mark("f", 5, 1, 2),
		});
		expect(fields.message).toBe(
			[
				"while scanning a quoted scalar",
				' in "f", line 1, column 1',
				"found unexpected end of stream",
				' in "f", line 2, column 3',
			].join("\n"),
		);
	});

	it("leaves out a context mark at the problem position", () => {
		const fields = marked({
			context: "while scanning for the next token",
			contextMark: new Mark("f", 3, 0, 3),
			problem: "found character '`' that cannot start any token",
			problemMark: new Mark("f", 3, 0, 3),
			note: "backquotes are reserved",
		});
		expect(fields.message).toBe(
			[
				"while scanning for the next token",
				"found character '`' that cannot start any token",
				' in "f", line 1, column 4',
				"backquotes are reserved",
			].join("\n"),
		);
	});
});

describe("decodeSource", () => {
	it("drops a UTF-8 byte order mark", () => {
		expect(decodeSource(Uint8Array.from([0xef, 0xbb, 0xbf, 0x61]))).toEqual({
			text: "a",
			encoding: "utf-8",
		});
	});

	it("drops a byte order mark from a string", () => {
		expect(decodeSource("\uFEFFkey: value").text).toBe("key: value");
	});

	it("decodes UTF-16 in both byte orders", () => {
		expect(decodeSource(Uint8Array.from([0xff, 0xfe, 0x61, 0x00, 0x3a, 0x00]))).toEqual({
			text: "a:",
			encoding: "utf-16le",
		});
		expect(decodeSource(Uint8Array.from([0xfe, 0xff, 0x00, 0x61]))).toEqual({
			text: "a",
			encoding: "utf-16be",
		});
	});

	it("decodes UTF-32 in both byte orders", () => {
		expect(decodeSource(Uint8Array.from([0xff, 0xfe, 0x00, 0x00, 0x61, 0x00, 0x00, 0x00]))).toEqual({
			text: "a",
			encoding: "utf-32le",
		});
		expect(decodeSource(Uint8Array.from([0x00, 0x00, 0xfe, 0xff, 0x00, 0x00, 0x00, 0x62]))).toEqual({
			text: "b",
			encoding: "utf-32be",
		});
	});

	it("defaults to UTF-8 without a byte order mark", () => {
		expect(decodeSource(Uint8Array.from([0x63, 0x61, 0x66, 0xc3, 0xa9]))).toEqual({
			text: "caf\u00e9",
			encoding: "utf-8",
		});
	});

	it("rejects malformed UTF-8", () => {
		expect(() => decodeSource(Uint8Array.from([0xc3, 0x28]), "bad.yaml")).toThrow(
			'invalid utf-8 input in "bad.yaml"',
		);
	});

	it("rejects truncated UTF-32", () => {
		expect(() => decodeSource(Uint8Array.from([0xff, 0xfe, 0x00, 0x00, 0x61, 0x00]))).toThrow(
			ReaderError,
		);
	});
});

describe("Reader", () => {
	it("tracks lines and columns while moving forward", () => {
		const reader = new Reader("ab\ncd", options);
		reader.forward(4);
		const mark = reader.getMark();
		expect([mark.index, mark.line, mark.column]).toEqual([4, 1, 1]);
		expect(reader.peek()).toBe("d");
		expect(reader.peek(1)).toBe(EOF);
	});

	it("counts CRLF as a single line break", () => {
		const reader = new Reader("a\r\nb", options);
		reader.forward(3);
		expect([reader.currentLine, reader.currentColumn]).toEqual([1, 0]);
	});

	it("returns a prefix without moving", () => {
		const reader = new Reader("--- x", options);
		expect(reader.prefix(3)).toBe("---");
		expect(reader.index).toBe(0);
	});

	it("rejects input longer than the code point limit", () => {
		expect(() => new Reader("abcdef", { name: "<test>", codePointLimit: 5 })).toThrow(
			"The incoming YAML document exceeds the limit: 5 code points.",
		);
	});

	it("measures the limit in code points, not UTF-16 units", () => {
		const text = "\u{1F600}\u{1F600}\u{1F600}";
		expect(() => new Reader(text, { name: "<test>", codePointLimit: 3 })).not.toThrow();
	});

	it("rejects a non-printable character once the cursor reaches it", () => {
		const reader = new Reader("a\x01b", options);
		expect(reader.peek()).toBe("a");
		try {
			reader.peek(1);
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(ReaderError);
			if (error instanceof ReaderError) {
				expect(error.codePoint).toBe(1);
				expect(error.position).toBe(1);
				expect(error.source).toBe("<test>");
				expect([error.mark?.line, error.mark?.column]).toEqual([0, 1]);
				expect(error.message).toBe(
					'unacceptable code point #x0001: special characters are not allowed\n in "<test>", line 1, column 2:\n    a\x01b\n     ^',
				);
			}
		}
	});

	it("keeps the cursor where it was after the failure", () => {
		const reader = new Reader("ab\x01", options);
		expect(() => reader.prefix(3)).toThrow(ReaderError);
		expect([reader.index, reader.currentColumn]).toEqual([0, 0]);
		expect(reader.prefix(2)).toBe("ab");
	});
});

describe("non-printable characters while loading", () => {
	it("points at the line and column of the character", () => {
		try {
			load("a: 1\nb: \x01\n");
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(ReaderError);
			if (error instanceof ReaderError) {
				expect([error.mark?.line, error.mark?.column]).toEqual([1, 3]);
				expect(error.mark?.snippet()).toBe("    b: \x01\n       ^");
			}
		}
	});

	it("yields the documents before the character", () => {
		const roots = loadAll("first\n---\nsecond: \x01\n");
		const first = roots.next();
		expect(first.value?.kind === "scalar" && first.value.value).toBe("first");
		expect(() => roots.next()).toThrow(ReaderError);
	});
});
