import { marked, ScannerError } from "../errors/yaml-errors.js";
import type { Mark } from "../reader/mark.js";
import { EOF, type Reader } from "../reader/reader.js";
import {
	BLANK_BREAK_OR_EOF,
	describeChar,
	ESCAPE_CODES,
	ESCAPE_REPLACEMENTS,
	FLOW_INDICATORS,
	isBlankOrEof,
	isBreak,
	isBreakOrEof,
	isDigit,
	isHexDigit,
	isWordChar,
	SPACE_BREAK_OR_EOF,
} from "./chars.js";
import {
	type ScalarToken,
	type SimpleTokenType,
	simpleToken,
	type Token,
	type TokenType,
} from "./tokens.js";

// ============================================================================
// Types
// ============================================================================

export interface ScannerOptions {
	/** Emit `Comment` tokens instead of discarding comments. */
	readonly processComments: boolean;
}

/**
 * A position where an implicit mapping key may have started. Only one is
 * tracked per flow level: it becomes a key when a `:` follows on the same
 * line, and is dropped otherwise.
 */
interface SimpleKey {
	readonly tokenNumber: number;
	readonly required: boolean;
	readonly index: number;
	readonly line: number;
	readonly column: number;
	readonly mark: Mark;
}

type Chomping = "clip" | "strip" | "keep";

const MAX_SIMPLE_KEY_LENGTH = 1024;

const URI_CHARS = "-;/?:@&=+$,_.!~*'()[]%";

// ============================================================================
// Scanner
// ============================================================================

/**
 * Turns a character stream into YAML tokens, one at a time, on demand.
 *
 * The scanner owns all indentation state: it opens block collections when a
 * line is indented deeper than the current level and closes them (possibly
 * several at once) when a line is indented less. Mapping keys are detected
 * retroactively: a candidate is remembered when a scalar, alias or flow
 * collection starts, and a `Key` token is inserted in front of it once the
 * `:` indicator is found.
 */
export class Scanner implements Iterable<Token> {
	private done = false;
	private flowLevel = 0;
	private readonly tokens: Array<Token> = [];
	private tokensTaken = 0;
	private indent = -1;
	private readonly indents: Array<number> = [];
	private allowSimpleKey = true;
	private readonly possibleSimpleKeys = new Map<number, SimpleKey>();

	constructor(
		private readonly reader: Reader,
		private readonly options: ScannerOptions = { processComments: false },
	) {
		this.fetchStreamStart();
	}

	// ------------------------------------------------------------------------
	// Public pull interface
	// ------------------------------------------------------------------------

	/** True when the next token is one of `types` (or any token when none given). */
	checkToken(...types: ReadonlyArray<TokenType>): boolean {
		while (this.needMoreTokens()) {
			this.fetchMoreTokens();
		}
		const next = this.tokens[0];
		if (next === undefined) {
			return false;
		}
		return types.length === 0 || types.includes(next.type);
	}

	peekToken(): Token | undefined {
		while (this.needMoreTokens()) {
			this.fetchMoreTokens();
		}
		return this.tokens[0];
	}

	getToken(): Token | undefined {
		while (this.needMoreTokens()) {
			this.fetchMoreTokens();
		}
		const token = this.tokens.shift();
		if (token !== undefined) {
			this.tokensTaken++;
		}
		return token;
	}

	*[Symbol.iterator](): Generator<Token> {
		for (;;) {
			const token = this.getToken();
			if (token === undefined) {
				return;
			}
			yield token;
		}
	}

	// ------------------------------------------------------------------------
	// Queue management
	// ------------------------------------------------------------------------

	private needMoreTokens(): boolean {
		if (this.done) {
			return false;
		}
		if (this.tokens.length === 0) {
			return true;
		}
		// The head token may still turn out to be preceded by a Key token.
		this.stalePossibleSimpleKeys();
		return this.nextPossibleSimpleKey() === this.tokensTaken;
	}

	private fetchMoreTokens(): void {
		this.scanToNextToken();
		this.stalePossibleSimpleKeys();
		this.unwindIndent(this.reader.currentColumn);

		const ch = this.reader.peek();
		switch (ch) {
			case EOF:
				return this.fetchStreamEnd();
			case "%":
				if (this.checkDirective()) return this.fetchDirective();
				break;
			case "-":
				if (this.checkDocumentIndicator("---"))
					return this.fetchDocumentIndicator("DocumentStart");
				if (this.checkBlockEntry()) return this.fetchBlockEntry();
				break;
			case ".":
				if (this.checkDocumentIndicator("..."))
					return this.fetchDocumentIndicator("DocumentEnd");
				break;
			case "[":
				return this.fetchFlowCollectionStart("FlowSequenceStart");
			case "{":
				return this.fetchFlowCollectionStart("FlowMappingStart");
			case "]":
				return this.fetchFlowCollectionEnd("FlowSequenceEnd");
			case "}":
				return this.fetchFlowCollectionEnd("FlowMappingEnd");
			case ",":
				return this.fetchFlowEntry();
			case "?":
				if (this.checkKey()) return this.fetchKey();
				break;
			case ":":
				if (this.checkValue()) return this.fetchValue();
				break;
			case "*":
				return this.fetchAnchor("Alias");
			case "&":
				return this.fetchAnchor("Anchor");
			case "!":
				return this.fetchTag();
			case "|":
				if (this.flowLevel === 0) return this.fetchBlockScalar("literal");
				break;
			case ">":
				if (this.flowLevel === 0) return this.fetchBlockScalar("folded");
				break;
			case "'":
				return this.fetchFlowScalar("single-quoted");
			case '"':
				return this.fetchFlowScalar("double-quoted");
		}

		if (this.checkPlain()) {
			return this.fetchPlain();
		}

		if (ch === "\t") {
			this.fail(
				"while scanning for the next token",
				this.reader.getMark(),
				"found a tab character where an indentation space is expected",
				this.reader.getMark(),
			);
		}
		this.fail(
			"while scanning for the next token",
			this.reader.getMark(),
			`found character ${describeChar(ch)} that cannot start any token`,
			this.reader.getMark(),
		);
	}

	// ------------------------------------------------------------------------
	// Simple keys
	// ------------------------------------------------------------------------

	private nextPossibleSimpleKey(): number | undefined {
		let min: number | undefined;
		for (const key of this.possibleSimpleKeys.values()) {
			if (min === undefined || key.tokenNumber < min) {
				min = key.tokenNumber;
			}
		}
		return min;
	}

	/** Drops candidates that can no longer be keys: a key fits on one line. */
	private stalePossibleSimpleKeys(): void {
		for (const [level, key] of this.possibleSimpleKeys) {
			if (
				key.line !== this.reader.currentLine ||
				this.reader.index - key.index > MAX_SIMPLE_KEY_LENGTH
			) {
				if (key.required) {
					this.fail(
						"while scanning a simple key",
						key.mark,
						"could not find expected ':'",
						this.reader.getMark(),
					);
				}
				this.possibleSimpleKeys.delete(level);
			}
		}
	}

	private savePossibleSimpleKey(): void {
		// A key at the current indentation of a block collection must be followed by ':'.
		const required =
			this.flowLevel === 0 && this.indent === this.reader.currentColumn;
		if (!this.allowSimpleKey) {
			return;
		}
		this.removePossibleSimpleKey();
		this.possibleSimpleKeys.set(this.flowLevel, {
			tokenNumber: this.tokensTaken + this.tokens.length,
			required,
			index: this.reader.index,
			line: this.reader.currentLine,
			column: this.reader.currentColumn,
			mark: this.reader.getMark(),
		});
	}

	private removePossibleSimpleKey(): void {
		const key = this.possibleSimpleKeys.get(this.flowLevel);
		if (key === undefined) {
			return;
		}
		if (key.required) {
			this.fail(
				"while scanning a simple key",
				key.mark,
				"could not find expected ':'",
				this.reader.getMark(),
			);
		}
		this.possibleSimpleKeys.delete(this.flowLevel);
	}

	// ------------------------------------------------------------------------
	// Indentation
	// ------------------------------------------------------------------------

	private unwindIndent(column: number): void {
		// Indentation is meaningless inside flow collections.
		if (this.flowLevel > 0) {
			return;
		}
		while (this.indent > column) {
			const mark = this.reader.getMark();
			this.indent = this.indents.pop() ?? -1;
			this.tokens.push(simpleToken("BlockEnd", mark, mark));
		}
	}

	private addIndent(column: number): boolean {
		if (this.indent < column) {
			this.indents.push(this.indent);
			this.indent = column;
			return true;
		}
		return false;
	}

	// ------------------------------------------------------------------------
	// Fetchers
	// ------------------------------------------------------------------------

	private fetchStreamStart(): void {
		const mark = this.reader.getMark();
		this.tokens.push({
			type: "StreamStart",
			encoding: this.reader.encoding,
			startMark: mark,
			endMark: mark,
		});
	}

	private fetchStreamEnd(): void {
		this.unwindIndent(-1);
		this.removePossibleSimpleKey();
		this.allowSimpleKey = false;
		this.possibleSimpleKeys.clear();
		const mark = this.reader.getMark();
		this.tokens.push(simpleToken("StreamEnd", mark, mark));
		this.done = true;
	}

	private fetchDirective(): void {
		this.unwindIndent(-1);
		this.removePossibleSimpleKey();
		this.allowSimpleKey = false;
		this.tokens.push(this.scanDirective());
	}

	private fetchDocumentIndicator(type: "DocumentStart" | "DocumentEnd"): void {
		this.unwindIndent(-1);
		this.removePossibleSimpleKey();
		// Document markers always end any flow context.
		this.flowLevel = 0;
		this.possibleSimpleKeys.clear();
		this.allowSimpleKey = false;
		const start = this.reader.getMark();
		this.reader.forward(3);
		this.tokens.push(simpleToken(type, start, this.reader.getMark()));
	}

	private fetchFlowCollectionStart(
		type: "FlowSequenceStart" | "FlowMappingStart",
	): void {
		// '[' and '{' may start a simple key.
		this.savePossibleSimpleKey();
		this.flowLevel++;
		this.allowSimpleKey = true;
		this.pushIndicator(type);
	}

	private fetchFlowCollectionEnd(
		type: "FlowSequenceEnd" | "FlowMappingEnd",
	): void {
		this.removePossibleSimpleKey();
		if (this.flowLevel > 0) {
			this.flowLevel--;
		}
		this.allowSimpleKey = false;
		this.pushIndicator(type);
	}

	private fetchFlowEntry(): void {
		this.allowSimpleKey = true;
		this.removePossibleSimpleKey();
		this.pushIndicator("FlowEntry");
	}

	private fetchBlockEntry(): void {
		if (this.flowLevel === 0) {
			if (!this.allowSimpleKey) {
				this.fail(
					undefined,
					undefined,
					"sequence entries are not allowed here",
					this.reader.getMark(),
				);
			}
			if (this.addIndent(this.reader.currentColumn)) {
				const mark = this.reader.getMark();
				this.tokens.push(simpleToken("BlockSequenceStart", mark, mark));
			}
		}
		// A '-' inside a flow collection is left for the parser to reject.
		this.allowSimpleKey = true;
		this.removePossibleSimpleKey();
		this.pushIndicator("BlockEntry");
	}

	private fetchKey(): void {
		if (this.flowLevel === 0) {
			if (!this.allowSimpleKey) {
				this.fail(
					undefined,
					undefined,
					"mapping keys are not allowed here",
					this.reader.getMark(),
				);
			}
			if (this.addIndent(this.reader.currentColumn)) {
				const mark = this.reader.getMark();
				this.tokens.push(simpleToken("BlockMappingStart", mark, mark));
			}
		}
		this.allowSimpleKey = this.flowLevel === 0;
		this.removePossibleSimpleKey();
		this.pushIndicator("Key");
	}

	private fetchValue(): void {
		const key = this.possibleSimpleKeys.get(this.flowLevel);
		if (key !== undefined) {
			this.possibleSimpleKeys.delete(this.flowLevel);
			const position = key.tokenNumber - this.tokensTaken;
			this.tokens.splice(position, 0, simpleToken("Key", key.mark, key.mark));
			if (this.flowLevel === 0 && this.addIndent(key.column)) {
				this.tokens.splice(
					position,
					0,
					simpleToken("BlockMappingStart", key.mark, key.mark),
				);
			}
			// A simple key cannot be followed by another one.
			this.allowSimpleKey = false;
		} else {
			if (this.flowLevel === 0) {
				if (!this.allowSimpleKey) {
					this.fail(
						undefined,
						undefined,
						"mapping values are not allowed here",
						this.reader.getMark(),
					);
				}
				if (this.addIndent(this.reader.currentColumn)) {
					const mark = this.reader.getMark();
					this.tokens.push(simpleToken("BlockMappingStart", mark, mark));
				}
			}
			this.allowSimpleKey = this.flowLevel === 0;
			this.removePossibleSimpleKey();
		}
		this.pushIndicator("Value");
	}

	private fetchAnchor(type: "Alias" | "Anchor"): void {
		this.savePossibleSimpleKey();
		this.allowSimpleKey = false;
		this.tokens.push(this.scanAnchor(type));
	}

	private fetchTag(): void {
		this.savePossibleSimpleKey();
		this.allowSimpleKey = false;
		this.tokens.push(this.scanTag());
	}

	private fetchBlockScalar(style: "literal" | "folded"): void {
		// A simple key may follow a block scalar.
		this.allowSimpleKey = true;
		this.removePossibleSimpleKey();
		this.tokens.push(this.scanBlockScalar(style));
	}

	private fetchFlowScalar(style: "single-quoted" | "double-quoted"): void {
		this.savePossibleSimpleKey();
		this.allowSimpleKey = false;
		this.tokens.push(this.scanFlowScalar(style));
	}

	private fetchPlain(): void {
		this.savePossibleSimpleKey();
		this.allowSimpleKey = false;
		this.tokens.push(this.scanPlain());
	}

	private pushIndicator(type: SimpleTokenType): void {
		const start = this.reader.getMark();
		this.reader.forward();
		this.tokens.push(simpleToken(type, start, this.reader.getMark()));
	}

	// ------------------------------------------------------------------------
	// Checkers
	// ------------------------------------------------------------------------

	private checkDirective(): boolean {
		return this.reader.currentColumn === 0;
	}

	private checkDocumentIndicator(marker: "---" | "..."): boolean {
		return (
			this.reader.currentColumn === 0 &&
			this.reader.prefix(3) === marker &&
			isBlankOrEof(this.reader.peek(3))
		);
	}

	private checkBlockEntry(): boolean {
		return isBlankOrEof(this.reader.peek(1));
	}

	private checkKey(): boolean {
		return this.flowLevel > 0 || isBlankOrEof(this.reader.peek(1));
	}

	private checkValue(): boolean {
		return this.flowLevel > 0 || isBlankOrEof(this.reader.peek(1));
	}

	private checkPlain(): boolean {
		// A plain scalar may start with '-', '?' or ':' when a non-space follows.
		const ch = this.reader.peek();
		if (!`${BLANK_BREAK_OR_EOF}-?:,[]{}#&*!|>'"%@\``.includes(ch)) {
			return true;
		}
		return (
			!isBlankOrEof(this.reader.peek(1)) &&
			(ch === "-" || (this.flowLevel === 0 && (ch === "?" || ch === ":")))
		);
	}

	// ------------------------------------------------------------------------
	// Whitespace, comments and line breaks
	// ------------------------------------------------------------------------

	private scanToNextToken(): void {
		let inIndentation = this.reader.currentColumn === 0;
		for (;;) {
			for (;;) {
				const ch = this.reader.peek();
				if (ch === " ") {
					this.reader.forward();
				} else if (
					ch === "\t" &&
					(this.flowLevel > 0 || !inIndentation || this.restOfLineIsBlank())
				) {
					this.reader.forward();
				} else {
					break;
				}
			}
			if (this.reader.peek() === "#") {
				this.scanComment(inIndentation ? "line" : "inline");
			}
			if (this.scanLineBreak() !== "") {
				if (this.flowLevel === 0) {
					this.allowSimpleKey = true;
				}
				inIndentation = true;
			} else {
				return;
			}
		}
	}

	private restOfLineIsBlank(): boolean {
		let offset = 0;
		while (this.reader.peek(offset) === " " || this.reader.peek(offset) === "\t") {
			offset++;
		}
		const ch = this.reader.peek(offset);
		return ch === "#" || isBreakOrEof(ch);
	}

	private scanComment(kind: "line" | "inline"): void {
		const start = this.reader.getMark();
		let length = 0;
		while (!isBreakOrEof(this.reader.peek(length))) {
			length++;
		}
		const text = this.reader.prefix(length);
		this.reader.forward(length);
		if (this.options.processComments) {
			this.tokens.push({
				type: "Comment",
				kind,
				value: text.slice(1),
				startMark: start,
				endMark: this.reader.getMark(),
			});
		}
	}

	/** Consumes one line break, normalizing CR, CRLF and NEL to '\n'. */
	private scanLineBreak(): string {
		const ch = this.reader.peek();
		if (ch === "\r" || ch === "\n" || ch === "\x85") {
			if (this.reader.prefix(2) === "\r\n") {
				this.reader.forward(2);
			} else {
				this.reader.forward();
			}
			return "\n";
		}
		if (ch === "\u2028" || ch === "\u2029") {
			this.reader.forward();
			return ch;
		}
		return "";
	}

	// ------------------------------------------------------------------------
	// Directives
	// ------------------------------------------------------------------------

	private scanDirective(): Token {
		const start = this.reader.getMark();
		this.reader.forward();
		const name = this.scanDirectiveName(start);
		let value: readonly [number, number] | readonly [string, string] | null =
			null;
		let end: Mark;
		if (name === "YAML") {
			value = this.scanYamlDirectiveValue(start);
			end = this.reader.getMark();
		} else if (name === "TAG") {
			value = this.scanTagDirectiveValue(start);
			end = this.reader.getMark();
		} else {
			end = this.reader.getMark();
			while (!isBreakOrEof(this.reader.peek())) {
				this.reader.forward();
			}
		}
		this.scanDirectiveIgnoredLine(start);
		return { type: "Directive", name, value, startMark: start, endMark: end };
	}

	private scanDirectiveName(start: Mark): string {
		let length = 0;
		while (isWordChar(this.reader.peek(length))) {
			length++;
		}
		if (length === 0) {
			this.fail(
				"while scanning a directive",
				start,
				`expected alphabetic or numeric character, but found ${describeChar(this.reader.peek())}`,
				this.reader.getMark(),
			);
		}
		const name = this.reader.prefix(length);
		this.reader.forward(length);
		if (!SPACE_BREAK_OR_EOF.includes(this.reader.peek())) {
			this.fail(
				"while scanning a directive",
				start,
				`expected alphabetic or numeric character, but found ${describeChar(this.reader.peek())}`,
				this.reader.getMark(),
			);
		}
		return name;
	}

	private scanYamlDirectiveValue(start: Mark): readonly [number, number] {
		this.skipSpaces();
		const major = this.scanYamlDirectiveNumber(start);
		if (this.reader.peek() !== ".") {
			this.fail(
				"while scanning a directive",
				start,
				`expected a digit or '.', but found ${describeChar(this.reader.peek())}`,
				this.reader.getMark(),
			);
		}
		this.reader.forward();
		const minor = this.scanYamlDirectiveNumber(start);
		if (!SPACE_BREAK_OR_EOF.includes(this.reader.peek())) {
			this.fail(
				"while scanning a directive",
				start,
				`expected a digit or ' ', but found ${describeChar(this.reader.peek())}`,
				this.reader.getMark(),
			);
		}
		return [major, minor];
	}

	private scanYamlDirectiveNumber(start: Mark): number {
		if (!isDigit(this.reader.peek())) {
			this.fail(
				"while scanning a directive",
				start,
				`expected a digit, but found ${describeChar(this.reader.peek())}`,
				this.reader.getMark(),
			);
		}
		let length = 0;
		while (isDigit(this.reader.peek(length))) {
			length++;
		}
		const value = Number.parseInt(this.reader.prefix(length), 10);
		this.reader.forward(length);
		return value;
	}

	private scanTagDirectiveValue(start: Mark): readonly [string, string] {
		this.skipSpaces();
		const handle = this.scanTagHandle("directive", start);
		if (this.reader.peek() !== " ") {
			this.fail(
				"while scanning a directive",
				start,
				`expected ' ', but found ${describeChar(this.reader.peek())}`,
				this.reader.getMark(),
			);
		}
		this.skipSpaces();
		const prefix = this.scanTagUri("directive", start);
		if (!SPACE_BREAK_OR_EOF.includes(this.reader.peek())) {
			this.fail(
				"while scanning a directive",
				start,
				`expected ' ', but found ${describeChar(this.reader.peek())}`,
				this.reader.getMark(),
			);
		}
		return [handle, prefix];
	}

	private scanDirectiveIgnoredLine(start: Mark): void {
		this.skipSpaces();
		if (this.reader.peek() === "#") {
			this.scanComment("inline");
		}
		if (!isBreakOrEof(this.reader.peek())) {
			this.fail(
				"while scanning a directive",
				start,
				`expected a comment or a line break, but found ${describeChar(this.reader.peek())}`,
				this.reader.getMark(),
			);
		}
		this.scanLineBreak();
	}

	private skipSpaces(): void {
		while (this.reader.peek() === " ") {
			this.reader.forward();
		}
	}

	// ------------------------------------------------------------------------
	// Anchors, aliases and tags
	// ------------------------------------------------------------------------

	private scanAnchor(type: "Alias" | "Anchor"): Token {
		const start = this.reader.getMark();
		const name = type === "Alias" ? "alias" : "anchor";
		this.reader.forward();
		let length = 0;
		for (;;) {
			const ch = this.reader.peek(length);
			if (isBlankOrEof(ch) || FLOW_INDICATORS.includes(ch)) {
				break;
			}
			length++;
		}
		if (length === 0) {
			this.fail(
				`while scanning an ${name}`,
				start,
				`expected alphabetic or numeric character, but found ${describeChar(this.reader.peek())}`,
				this.reader.getMark(),
			);
		}
		const value = this.reader.prefix(length);
		this.reader.forward(length);
		const next = this.reader.peek();
		if (!isBlankOrEof(next) && !`?:,]}%@\``.includes(next)) {
			this.fail(
				`while scanning an ${name}`,
				start,
				`expected alphabetic or numeric character, but found ${describeChar(next)}`,
				this.reader.getMark(),
			);
		}
		return { type, value, startMark: start, endMark: this.reader.getMark() };
	}

	private scanTag(): Token {
		const start = this.reader.getMark();
		let handle: string | null;
		let suffix: string;
		const ch = this.reader.peek(1);
		if (ch === "<") {
			handle = null;
			this.reader.forward(2);
			suffix = this.scanTagUri("tag", start);
			if (this.reader.peek() !== ">") {
				this.fail(
					"while parsing a tag",
					start,
					`expected '>', but found ${describeChar(this.reader.peek())}`,
					this.reader.getMark(),
				);
			}
			this.reader.forward();
		} else if (this.endsTag(ch)) {
			handle = null;
			suffix = "!";
			this.reader.forward();
		} else {
			let length = 1;
			let useHandle = false;
			let current = ch;
			while (!this.endsTag(current)) {
				if (current === "!") {
					useHandle = true;
					break;
				}
				length++;
				current = this.reader.peek(length);
			}
			if (useHandle) {
				handle = this.scanTagHandle("tag", start);
			} else {
				handle = "!";
				this.reader.forward();
			}
			suffix = this.scanTagUri("tag", start);
		}
		if (!this.endsTag(this.reader.peek())) {
			this.fail(
				"while scanning a tag",
				start,
				`expected ' ', but found ${describeChar(this.reader.peek())}`,
				this.reader.getMark(),
			);
		}
		return {
			type: "Tag",
			handle,
			suffix,
			startMark: start,
			endMark: this.reader.getMark(),
		};
	}

	private endsTag(ch: string): boolean {
		return (
			isBlankOrEof(ch) || (this.flowLevel > 0 && FLOW_INDICATORS.includes(ch))
		);
	}

	private scanTagHandle(name: "tag" | "directive", start: Mark): string {
		if (this.reader.peek() !== "!") {
			this.fail(
				`while scanning a ${name}`,
				start,
				`expected '!', but found ${describeChar(this.reader.peek())}`,
				this.reader.getMark(),
			);
		}
		let length = 1;
		let ch = this.reader.peek(length);
		if (ch !== " ") {
			while (isWordChar(ch)) {
				length++;
				ch = this.reader.peek(length);
			}
			if (ch !== "!") {
				this.reader.forward(length);
				this.fail(
					`while scanning a ${name}`,
					start,
					`expected '!', but found ${describeChar(ch)}`,
					this.reader.getMark(),
				);
			}
			length++;
		}
		const value = this.reader.prefix(length);
		this.reader.forward(length);
		return value;
	}

	private scanTagUri(name: "tag" | "directive", start: Mark): string {
		const chunks: Array<string> = [];
		let length = 0;
		for (;;) {
			const ch = this.reader.peek(length);
			const allowed =
				/^[0-9A-Za-z]$/.test(ch) ||
				(URI_CHARS.includes(ch) &&
					!(this.flowLevel > 0 && FLOW_INDICATORS.includes(ch)));
			if (!allowed) {
				break;
			}
			if (ch === "%") {
				chunks.push(this.reader.prefix(length));
				this.reader.forward(length);
				length = 0;
				chunks.push(this.scanUriEscapes(name, start));
			} else {
				length++;
			}
		}
		if (length > 0) {
			chunks.push(this.reader.prefix(length));
			this.reader.forward(length);
		}
		const uri = chunks.join("");
		if (uri.length === 0) {
			this.fail(
				`while parsing a ${name}`,
				start,
				`expected URI, but found ${describeChar(this.reader.peek())}`,
				this.reader.getMark(),
			);
		}
		return uri;
	}

	private scanUriEscapes(name: "tag" | "directive", start: Mark): string {
		const bytes: Array<number> = [];
		const mark = this.reader.getMark();
		while (this.reader.peek() === "%") {
			this.reader.forward();
			if (!isHexDigit(this.reader.peek()) || !isHexDigit(this.reader.peek(1))) {
				this.fail(
					`while scanning a ${name}`,
					start,
					`expected URI escape sequence of 2 hexadecimal numbers, but found ${describeChar(this.reader.peek())}`,
					this.reader.getMark(),
				);
			}
			bytes.push(Number.parseInt(this.reader.prefix(2), 16));
			this.reader.forward(2);
		}
		try {
			return new TextDecoder("utf-8", { fatal: true }).decode(
				Uint8Array.from(bytes),
			);
		} catch (error) {
			return this.fail(
				`while scanning a ${name}`,
				start,
				error instanceof Error ? error.message : "invalid UTF-8 in URI escape",
				mark,
			);
		}
	}

	// ------------------------------------------------------------------------
	// Block scalars
	// ------------------------------------------------------------------------

	private scanBlockScalar(style: "literal" | "folded"): ScalarToken {
		const folded = style === "folded";
		const chunks: Array<string> = [];
		const start = this.reader.getMark();

		this.reader.forward();
		const { chomping, increment } = this.scanBlockScalarIndicators(start);
		this.scanBlockScalarIgnoredLine(start);

		const minIndent = Math.max(this.indent + 1, 1);
		let indent: number;
		let breaks: Array<string>;
		let end: Mark;
		if (increment === undefined) {
			const scanned = this.scanBlockScalarIndentation();
			breaks = scanned.breaks;
			end = scanned.end;
			indent = Math.max(minIndent, scanned.maxIndent);
		} else {
			indent = minIndent + increment - 1;
			const scanned = this.scanBlockScalarBreaks(indent);
			breaks = scanned.breaks;
			end = scanned.end;
		}

		let lineBreak = "";
		while (this.reader.currentColumn === indent && this.reader.peek() !== EOF) {
			chunks.push(...breaks);
			const leadingNonSpace = !" \t".includes(this.reader.peek());
			let length = 0;
			while (!isBreakOrEof(this.reader.peek(length))) {
				length++;
			}
			chunks.push(this.reader.prefix(length));
			this.reader.forward(length);
			lineBreak = this.scanLineBreak();
			const scanned = this.scanBlockScalarBreaks(indent);
			breaks = scanned.breaks;
			end = scanned.end;
			if (this.reader.currentColumn === indent && this.reader.peek() !== EOF) {
				// Folding joins lines with a space unless either line is more indented.
				if (
					folded &&
					lineBreak === "\n" &&
					leadingNonSpace &&
					!" \t".includes(this.reader.peek())
				) {
					if (breaks.length === 0) {
						chunks.push(" ");
					}
				} else {
					chunks.push(lineBreak);
				}
			} else {
				break;
			}
		}

		if (chomping !== "strip") {
			chunks.push(lineBreak);
		}
		if (chomping === "keep") {
			chunks.push(...breaks);
		}

		return {
			type: "Scalar",
			value: chunks.join(""),
			plain: false,
			style,
			startMark: start,
			endMark: end,
		};
	}

	private scanBlockScalarIndicators(start: Mark): {
		readonly chomping: Chomping;
		readonly increment: number | undefined;
	} {
		let chomping: Chomping = "clip";
		let increment: number | undefined;
		let ch = this.reader.peek();
		if (ch === "+" || ch === "-") {
			chomping = ch === "+" ? "keep" : "strip";
			this.reader.forward();
			ch = this.reader.peek();
			if (isDigit(ch)) {
				increment = this.scanIndentationIndicator(start);
			}
		} else if (isDigit(ch)) {
			increment = this.scanIndentationIndicator(start);
			ch = this.reader.peek();
			if (ch === "+" || ch === "-") {
				chomping = ch === "+" ? "keep" : "strip";
				this.reader.forward();
			}
		}
		if (!SPACE_BREAK_OR_EOF.includes(this.reader.peek())) {
			this.fail(
				"while scanning a block scalar",
				start,
				`expected chomping or indentation indicators, but found ${describeChar(this.reader.peek())}`,
				this.reader.getMark(),
			);
		}
		return { chomping, increment };
	}

	private scanIndentationIndicator(start: Mark): number {
		const increment = Number.parseInt(this.reader.peek(), 10);
		if (increment === 0) {
			this.fail(
				"while scanning a block scalar",
				start,
				"expected indentation indicator in the range 1-9, but found 0",
				this.reader.getMark(),
			);
		}
		this.reader.forward();
		return increment;
	}

	private scanBlockScalarIgnoredLine(start: Mark): void {
		this.skipSpaces();
		if (this.reader.peek() === "#") {
			this.scanComment("inline");
		}
		if (!isBreakOrEof(this.reader.peek())) {
			this.fail(
				"while scanning a block scalar",
				start,
				`expected a comment or a line break, but found ${describeChar(this.reader.peek())}`,
				this.reader.getMark(),
			);
		}
		this.scanLineBreak();
	}

	private scanBlockScalarIndentation(): {
		readonly breaks: Array<string>;
		readonly maxIndent: number;
		readonly end: Mark;
	} {
		const breaks: Array<string> = [];
		let maxIndent = 0;
		let end = this.reader.getMark();
		for (;;) {
			const ch = this.reader.peek();
			if (ch === " ") {
				this.reader.forward();
				maxIndent = Math.max(maxIndent, this.reader.currentColumn);
			} else if (isBreak(ch)) {
				breaks.push(this.scanLineBreak());
				end = this.reader.getMark();
			} else {
				break;
			}
		}
		return { breaks, maxIndent, end };
	}

	private scanBlockScalarBreaks(indent: number): {
		readonly breaks: Array<string>;
		readonly end: Mark;
	} {
		const breaks: Array<string> = [];
		let end = this.reader.getMark();
		const skipIndentation = () => {
			while (
				this.reader.currentColumn < indent &&
				this.reader.peek() === " "
			) {
				this.reader.forward();
			}
		};
		skipIndentation();
		while (isBreak(this.reader.peek())) {
			breaks.push(this.scanLineBreak());
			end = this.reader.getMark();
			skipIndentation();
		}
		return { breaks, end };
	}

	// ------------------------------------------------------------------------
	// Flow (quoted) scalars
	// ------------------------------------------------------------------------

	private scanFlowScalar(style: "single-quoted" | "double-quoted"): ScalarToken {
		const double = style === "double-quoted";
		const start = this.reader.getMark();
		const quote = this.reader.peek();
		const chunks: Array<string> = [];
		this.reader.forward();
		this.scanFlowScalarNonSpaces(double, start, chunks);
		while (this.reader.peek() !== quote) {
			this.scanFlowScalarSpaces(start, chunks);
			this.scanFlowScalarNonSpaces(double, start, chunks);
		}
		this.reader.forward();
		return {
			type: "Scalar",
			value: chunks.join(""),
			plain: false,
			style,
			startMark: start,
			endMark: this.reader.getMark(),
		};
	}

	private scanFlowScalarNonSpaces(
		double: boolean,
		start: Mark,
		chunks: Array<string>,
	): void {
		for (;;) {
			let length = 0;
			while (!`'"\\${BLANK_BREAK_OR_EOF}`.includes(this.reader.peek(length))) {
				length++;
			}
			if (length > 0) {
				chunks.push(this.reader.prefix(length));
				this.reader.forward(length);
			}
			const ch = this.reader.peek();
			if (!double && ch === "'" && this.reader.peek(1) === "'") {
				chunks.push("'");
				this.reader.forward(2);
			} else if ((double && ch === "'") || (!double && (ch === '"' || ch === "\\"))) {
				chunks.push(ch);
				this.reader.forward();
			} else if (double && ch === "\\") {
				this.reader.forward();
				this.scanEscape(start, chunks);
			} else {
				return;
			}
		}
	}

	private scanEscape(start: Mark, chunks: Array<string>): void {
		const ch = this.reader.peek();
		const replacement = ESCAPE_REPLACEMENTS[ch];
		const codeLength = ESCAPE_CODES[ch];
		if (replacement !== undefined) {
			chunks.push(replacement);
			this.reader.forward();
		} else if (codeLength !== undefined) {
			this.reader.forward();
			for (let k = 0; k < codeLength; k++) {
				if (!isHexDigit(this.reader.peek(k))) {
					this.fail(
						"while scanning a double-quoted scalar",
						start,
						`expected escape sequence of ${codeLength} hexadecimal numbers, but found ${describeChar(this.reader.peek(k))}`,
						this.reader.getMark(),
					);
				}
			}
			const code = Number.parseInt(this.reader.prefix(codeLength), 16);
			if (code > 0x10ffff) {
				this.fail(
					"while scanning a double-quoted scalar",
					start,
					`found invalid Unicode character escape code ${this.reader.prefix(codeLength)}`,
					this.reader.getMark(),
				);
			}
			chunks.push(String.fromCodePoint(code));
			this.reader.forward(codeLength);
		} else if (isBreak(ch)) {
			this.scanLineBreak();
			this.scanFlowScalarBreaks(start, chunks);
		} else {
			this.fail(
				"while scanning a double-quoted scalar",
				start,
				`found unknown escape character ${describeChar(ch)}`,
				this.reader.getMark(),
			);
		}
	}

	private scanFlowScalarSpaces(start: Mark, chunks: Array<string>): void {
		let length = 0;
		while (this.reader.peek(length) === " " || this.reader.peek(length) === "\t") {
			length++;
		}
		const whitespace = this.reader.prefix(length);
		this.reader.forward(length);
		const ch = this.reader.peek();
		if (ch === EOF) {
			this.fail(
				"while scanning a quoted scalar",
				start,
				"found unexpected end of stream",
				this.reader.getMark(),
			);
		}
		if (isBreak(ch)) {
			const lineBreak = this.scanLineBreak();
			const breaks: Array<string> = [];
			this.scanFlowScalarBreaks(start, breaks);
			if (lineBreak !== "\n") {
				chunks.push(lineBreak);
			} else if (breaks.length === 0) {
				chunks.push(" ");
			}
			chunks.push(...breaks);
		} else {
			chunks.push(whitespace);
		}
	}

	private scanFlowScalarBreaks(start: Mark, chunks: Array<string>): void {
		for (;;) {
			const marker = this.reader.prefix(3);
			if ((marker === "---" || marker === "...") && isBlankOrEof(this.reader.peek(3))) {
				this.fail(
					"while scanning a quoted scalar",
					start,
					"found unexpected document separator",
					this.reader.getMark(),
				);
			}
			while (this.reader.peek() === " " || this.reader.peek() === "\t") {
				this.reader.forward();
			}
			if (isBreak(this.reader.peek())) {
				chunks.push(this.scanLineBreak());
			} else {
				return;
			}
		}
	}

	// ------------------------------------------------------------------------
	// Plain scalars
	// ------------------------------------------------------------------------

	private scanPlain(): ScalarToken {
		const chunks: Array<string> = [];
		const start = this.reader.getMark();
		let end = start;
		const indent = this.indent + 1;
		let spaces: Array<string> = [];
		for (;;) {
			if (this.reader.peek() === "#") {
				break;
			}
			let length = 0;
			for (;;) {
				const ch = this.reader.peek(length);
				if (
					isBlankOrEof(ch) ||
					(ch === ":" && this.endsPlainAfterColon(this.reader.peek(length + 1))) ||
					(this.flowLevel > 0 && `${FLOW_INDICATORS}?`.includes(ch))
				) {
					break;
				}
				length++;
			}
			if (length === 0) {
				break;
			}
			this.allowSimpleKey = false;
			chunks.push(...spaces);
			chunks.push(this.reader.prefix(length));
			this.reader.forward(length);
			end = this.reader.getMark();
			spaces = this.scanPlainSpaces();
			if (
				spaces.length === 0 ||
				this.reader.peek() === "#" ||
				(this.flowLevel === 0 && this.reader.currentColumn < indent)
			) {
				break;
			}
		}
		return {
			type: "Scalar",
			value: chunks.join(""),
			plain: true,
			style: "plain",
			startMark: start,
			endMark: end,
		};
	}

	private endsPlainAfterColon(next: string): boolean {
		return (
			isBlankOrEof(next) || (this.flowLevel > 0 && FLOW_INDICATORS.includes(next))
		);
	}

	private scanPlainSpaces(): Array<string> {
		const chunks: Array<string> = [];
		let length = 0;
		while (this.reader.peek(length) === " " || this.reader.peek(length) === "\t") {
			length++;
		}
		const whitespace = this.reader.prefix(length);
		this.reader.forward(length);
		if (!isBreak(this.reader.peek())) {
			if (whitespace.length > 0) {
				chunks.push(whitespace);
			}
			return chunks;
		}

		const lineBreak = this.scanLineBreak();
		this.allowSimpleKey = true;
		if (this.atDocumentMarker()) {
			return [];
		}
		const breaks: Array<string> = [];
		for (;;) {
			const ch = this.reader.peek();
			if (ch === " ") {
				this.reader.forward();
			} else if (isBreak(ch)) {
				breaks.push(this.scanLineBreak());
				if (this.atDocumentMarker()) {
					return [];
				}
			} else {
				break;
			}
		}
		if (lineBreak !== "\n") {
			chunks.push(lineBreak);
		} else if (breaks.length === 0) {
			chunks.push(" ");
		}
		chunks.push(...breaks);
		return chunks;
	}

	private atDocumentMarker(): boolean {
		const marker = this.reader.prefix(3);
		return (
			this.reader.currentColumn === 0 &&
			(marker === "---" || marker === "...") &&
			isBlankOrEof(this.reader.peek(3))
		);
	}

	// ------------------------------------------------------------------------
	// Errors
	// ------------------------------------------------------------------------

	private fail(
		context: string | undefined,
		contextMark: Mark | undefined,
		problem: string,
		problemMark: Mark,
	): never {
		throw new ScannerError(
			marked({
				...(context !== undefined ? { context } : {}),
				...(contextMark !== undefined ? { contextMark } : {}),
				problem,
				problemMark,
			}),
		);
	}
}

