import { ReaderError } from "../errors/yaml-errors.js";
import { Mark } from "./mark.js";

// ============================================================================
// Types
// ============================================================================

/** Text to load: already-decoded characters, or raw bytes with optional BOM. */
export type YamlSource = string | Uint8Array;

export type SourceEncoding =
	| "utf-8"
	| "utf-16le"
	| "utf-16be"
	| "utf-32le"
	| "utf-32be";

export interface DecodedSource {
	readonly text: string;
	readonly encoding: SourceEncoding;
}

export interface ReaderOptions {
	readonly name: string;
	readonly codePointLimit: number;
}

/** Returned by `peek` past the end of the input. */
export const EOF = "\0";

// Tab, LF, CR, printable ASCII, NEL and the printable Unicode planes.
const NON_PRINTABLE =
	/[^\x09\x0A\x0D\x20-\x7E\x85\xA0-\uD7FF\uE000-\uFFFD\u{10000}-\u{10FFFF}]/u;

// ============================================================================
// Encoding detection
// ============================================================================

const detectEncoding = (
	bytes: Uint8Array,
): { readonly encoding: SourceEncoding; readonly bomLength: number } => {
	const [b0, b1, b2, b3] = [bytes[0], bytes[1], bytes[2], bytes[3]];
	if (b0 === 0xef && b1 === 0xbb && b2 === 0xbf) {
		return { encoding: "utf-8", bomLength: 3 };
	}
	if (b0 === 0x00 && b1 === 0x00 && b2 === 0xfe && b3 === 0xff) {
		return { encoding: "utf-32be", bomLength: 4 };
	}
	if (b0 === 0xff && b1 === 0xfe && b2 === 0x00 && b3 === 0x00) {
		return { encoding: "utf-32le", bomLength: 4 };
	}
	if (b0 === 0xfe && b1 === 0xff) {
		return { encoding: "utf-16be", bomLength: 2 };
	}
	if (b0 === 0xff && b1 === 0xfe) {
		return { encoding: "utf-16le", bomLength: 2 };
	}
	return { encoding: "utf-8", bomLength: 0 };
};

const decodeUtf32 = (
	bytes: Uint8Array,
	littleEndian: boolean,
	name: string,
): string => {
	if (bytes.length % 4 !== 0) {
		throw new ReaderError({
			source: name,
			position: bytes.length - (bytes.length % 4),
			codePoint: -1,
			message: `truncated UTF-32 input in "${name}"`,
		});
	}
	const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
	const parts: Array<string> = [];
	for (let offset = 0; offset < bytes.length; offset += 4) {
		const codePoint = view.getUint32(offset, littleEndian);
		if (codePoint > 0x10ffff) {
			throw new ReaderError({
				source: name,
				position: offset / 4,
				codePoint,
				message: `invalid UTF-32 code point #x${codePoint.toString(16)} in "${name}", position ${offset / 4}`,
			});
		}
		parts.push(String.fromCodePoint(codePoint));
	}
	return parts.join("");
};

/**
 * Decodes raw bytes into characters, honouring a UTF-8, UTF-16 or UTF-32 byte
 * order mark and defaulting to UTF-8. The BOM itself is dropped.
 */
export const decodeSource = (
	source: YamlSource,
	name = "<reader>",
): DecodedSource => {
	if (typeof source === "string") {
		const text = source.startsWith("\uFEFF") ? source.slice(1) : source;
		return { text, encoding: "utf-8" };
	}

	const { encoding, bomLength } = detectEncoding(source);
	const body = source.subarray(bomLength);

	if (encoding === "utf-32le" || encoding === "utf-32be") {
		return { text: decodeUtf32(body, encoding === "utf-32le", name), encoding };
	}

	try {
		const text = new TextDecoder(encoding, { fatal: true }).decode(body);
		return { text, encoding };
	} catch (error) {
		throw new ReaderError({
			source: name,
			position: 0,
			codePoint: -1,
			message: `invalid ${encoding} input in "${name}": ${error instanceof Error ? error.message : String(error)}`,
		});
	}
};

// ============================================================================
// Reader
// ============================================================================

const countCodePoints = (text: string, stopAfter: number): number => {
	let count = 0;
	for (const _ of text) {
		count++;
		if (count > stopAfter) {
			break;
		}
	}
	return count;
};

/**
 * Character cursor over a decoded YAML source. Tracks line and column for
 * marks and rejects characters that YAML does not allow in a stream.
 */
export class Reader {
	readonly name: string;
	readonly encoding: SourceEncoding;
	private readonly buffer: string;
	private pointer = 0;
	private line = 0;
	private column = 0;
	/** Offset of the first character YAML does not allow; reported once reached. */
	private readonly badIndex: number;

	constructor(source: YamlSource, options: ReaderOptions) {
		this.name = options.name;
		const { text, encoding } = decodeSource(source, options.name);
		this.encoding = encoding;

		if (
			text.length > options.codePointLimit &&
			countCodePoints(text, options.codePointLimit) > options.codePointLimit
		) {
			throw new ReaderError({
				source: this.name,
				position: options.codePointLimit,
				codePoint: -1,
				message: `The incoming YAML document exceeds the limit: ${options.codePointLimit} code points.`,
			});
		}

		const bad = NON_PRINTABLE.exec(text);
		this.badIndex = bad === null ? Number.POSITIVE_INFINITY : bad.index;
		this.buffer = text;
	}

	/** Character `index` places ahead of the cursor, or EOF. */
	peek(index = 0): string {
		const position = this.pointer + index;
		if (position >= this.buffer.length) {
			return EOF;
		}
		if (position >= this.badIndex) {
			this.failUnacceptable();
		}
		return this.buffer.charAt(position);
	}

	/** Up to `length` characters starting at the cursor. */
	prefix(length = 1): string {
		const end = Math.min(this.pointer + length, this.buffer.length);
		if (end > this.badIndex) {
			this.failUnacceptable();
		}
		return this.buffer.slice(this.pointer, end);
	}

	forward(length = 1): void {
		for (let i = 0; i < length && this.pointer < this.buffer.length; i++) {
			if (this.pointer >= this.badIndex) {
				this.failUnacceptable();
			}
			this.advance();
		}
	}

	private advance(): void {
		const ch = this.buffer.charAt(this.pointer);
		this.pointer++;
		if (
			ch === "\n" ||
			ch === "\x85" ||
			ch === "\u2028" ||
			ch === "\u2029" ||
			(ch === "\r" && this.buffer.charAt(this.pointer) !== "\n")
		) {
			this.line++;
			this.column = 0;
		} else if (ch !== "\uFEFF") {
			this.column++;
		}
	}

	private failUnacceptable(): never {
		const index = this.badIndex;
		const codePoint = this.buffer.codePointAt(index) ?? 0;
		// The cursor stops short of the character; walk up to it for the mark.
		const start = { pointer: this.pointer, line: this.line, column: this.column };
		while (this.pointer < index) {
			this.advance();
		}
		const mark = this.getMark();
		this.pointer = start.pointer;
		this.line = start.line;
		this.column = start.column;
		const hex = codePoint.toString(16).toUpperCase().padStart(4, "0");
		throw new ReaderError({
			source: this.name,
			position: index,
			codePoint,
			mark,
			message: `unacceptable code point #x${hex}: special characters are not allowed\n${mark.toString()}`,
		});
	}

	getMark(): Mark {
		return new Mark(this.name, this.pointer, this.line, this.column, this.buffer);
	}

	get index(): number {
		return this.pointer;
	}

	get currentColumn(): number {
		return this.column;
	}

	get currentLine(): number {
		return this.line;
	}
}
