import { EmitterError } from "../errors/yaml-errors.js";
import type {
	CollectionStartEvent,
	DocumentStartEvent,
	Event,
	ScalarEvent,
} from "../parser/events.js";
import { TAG_PREFIX } from "../resolver/tags.js";
import { LINE_SEPARATOR, PARAGRAPH_SEPARATOR } from "../scanner/chars.js";
import type { ScalarStyle } from "../scanner/tokens.js";
import {
	analyzeScalar,
	isEmitterBreak,
	isMultilineText,
	isPrintableAscii,
	isPrintableUnicode,
	type ScalarAnalysis,
} from "./analysis.js";
import type { YamlSink } from "./sink.js";

// ============================================================================
// Types
// ============================================================================

export type LineBreak = "unix" | "windows" | "mac";

export interface EmitterOptions {
	readonly canonical: boolean;
	/** Spaces per nesting level, 1 to 9. */
	readonly indent: number;
	/** Spaces before a block sequence's `-`, less than `indent`. */
	readonly indicatorIndent: number;
	/** Count `indicatorIndent` as part of the item's indentation. */
	readonly indentWithIndicator: boolean;
	/** Preferred line width; zero or less never folds. */
	readonly width: number;
	readonly splitLines: boolean;
	readonly allowUnicode: boolean;
	readonly lineBreak: LineBreak;
	/** Break flow collections with one entry per line. */
	readonly prettyFlow: boolean;
	/** Keys at least this long are written in the `? key` form. */
	readonly maxSimpleKeyLength: number;
}

export const defaultEmitterOptions: EmitterOptions = {
	canonical: false,
	indent: 2,
	indicatorIndent: 0,
	indentWithIndicator: false,
	width: 80,
	splitLines: true,
	allowUnicode: true,
	lineBreak: "unix",
	prettyFlow: false,
	maxSimpleKeyLength: 128,
};

type State = (event: Event) => void;

interface NodeContext {
	readonly mapping?: boolean;
	readonly simpleKey?: boolean;
}

const LINE_BREAK_TEXT: Readonly<Record<LineBreak, string>> = {
	unix: "\n",
	windows: "\r\n",
	mac: "\r",
};

const DEFAULT_TAG_PREFIXES: Readonly<Record<string, string>> = {
	"!": "!",
	[TAG_PREFIX]: "!!",
};

/** Characters written as a letter escape in double-quoted scalars. */
const ESCAPES: Readonly<Record<string, string>> = {
	"\0": "0",
	"\x07": "a",
	"\x08": "b",
	"\t": "t",
	"\n": "n",
	"\x0B": "v",
	"\x0C": "f",
	"\r": "r",
	"\x1B": "e",
	'"': '"',
	"\\": "\\",
	"\x85": "N",
	"\xA0": "_",
	[LINE_SEPARATOR]: "L",
	[PARAGRAPH_SEPARATOR]: "P",
};

const ALWAYS_ESCAPED = `"\\\x85${LINE_SEPARATOR}${PARAGRAPH_SEPARATOR}`;

const URI_SAFE = "-;/?:@&=+$,_.~*'()[]";

const isAlphanumeric = (ch: string): boolean => /^[0-9A-Za-z]$/.test(ch);

const percentEncode = (ch: string): string =>
	Array.from(new TextEncoder().encode(ch), (byte) =>
		`%${byte.toString(16).toUpperCase().padStart(2, "0")}`,
	).join("");

const isCollectionStart = (event: Event): event is CollectionStartEvent =>
	event.type === "SequenceStart" || event.type === "MappingStart";

// ============================================================================
// Emitter
// ============================================================================

/**
 * Writes YAML text for a stream of events.
 *
 * Events are buffered until enough look-ahead is available to decide how a
 * node is laid out: one event after a document start (is the document
 * empty?), two after a sequence start and three after a mapping start (is
 * the collection empty, is the next key short enough to be written inline?).
 * The layout itself is driven by a state stack mirroring the parser's.
 *
 * @example
 * ```typescript
 * const sink = new StringSink()
 * const emitter = new Emitter(sink)
 * for (const event of parse("a: [1, 2]")) emitter.emit(event)
 * sink.toString() // "a: [1, 2]\n"
 * ```
 */
export class Emitter {
	private readonly events: Array<Event> = [];
	private state: State;
	private readonly states: Array<State> = [];

	private readonly indents: Array<number | null> = [];
	private indent: number | null = null;
	private flowLevel = 0;

	private mappingContext = false;
	private simpleKeyContext = false;

	private line = 0;
	private column = 0;
	private whitespace = true;
	private indention = true;
	private openEnded = false;

	private readonly bestIndent: number;
	private readonly bestWidth: number;
	private readonly bestLineBreak: string;

	private tagPrefixes: Record<string, string> = { ...DEFAULT_TAG_PREFIXES };
	private preparedAnchor: string | null = null;
	private preparedTag: string | null = null;
	private analysis: ScalarAnalysis | null = null;
	private style: ScalarStyle | null = null;

	constructor(
		private readonly sink: YamlSink,
		private readonly options: EmitterOptions = defaultEmitterOptions,
	) {
		this.state = (event) => this.expectStreamStart(event);
		this.bestIndent = options.indent > 0 && options.indent < 10 ? options.indent : 2;
		this.bestWidth =
			options.width <= 0
				? Number.POSITIVE_INFINITY
				: options.width > this.bestIndent * 2
					? options.width
					: 80;
		this.bestLineBreak = LINE_BREAK_TEXT[options.lineBreak];
	}

	/** Number of lines written so far. */
	get lines(): number {
		return this.line;
	}

	emit(event: Event): void {
		this.events.push(event);
		while (!this.needMoreEvents()) {
			const next = this.events.shift();
			if (next === undefined) {
				return;
			}
			this.state(next);
		}
	}

	// ------------------------------------------------------------------------
	// Look-ahead
	// ------------------------------------------------------------------------

	private needMoreEvents(): boolean {
		const first = this.events[0];
		if (first === undefined) {
			return true;
		}
		switch (first.type) {
			case "DocumentStart":
				return this.needEvents(1);
			case "SequenceStart":
				return this.needEvents(2);
			case "MappingStart":
				return this.needEvents(3);
			default:
				return false;
		}
	}

	private needEvents(count: number): boolean {
		let level = 0;
		for (const event of this.events.slice(1)) {
			if (event.type === "DocumentStart" || isCollectionStart(event)) {
				level++;
			} else if (
				event.type === "DocumentEnd" ||
				event.type === "SequenceEnd" ||
				event.type === "MappingEnd"
			) {
				level--;
			} else if (event.type === "StreamEnd") {
				level = -1;
			}
			if (level < 0) {
				return false;
			}
		}
		return this.events.length < count + 1;
	}

	private increaseIndent(flow: boolean, indentless = false): void {
		this.indents.push(this.indent);
		if (this.indent === null) {
			this.indent = flow ? this.bestIndent : 0;
		} else if (!indentless) {
			this.indent += this.bestIndent;
		}
	}

	private popIndent(): void {
		this.indent = this.indents.pop() ?? null;
	}

	private popState(): void {
		const state = this.states.pop();
		this.state = state ?? ((event) => this.expectNothing(event));
	}

	// ------------------------------------------------------------------------
	// Stream and documents
	// ------------------------------------------------------------------------

	private expectStreamStart(event: Event): void {
		if (event.type !== "StreamStart") {
			throw new EmitterError({ message: `expected StreamStart, but got ${event.type}` });
		}
		this.state = (next) => this.expectDocumentStart(next, true);
	}

	private expectNothing(event: Event): void {
		throw new EmitterError({ message: `expected nothing, but got ${event.type}` });
	}

	private expectDocumentStart(event: Event, first: boolean): void {
		if (event.type === "DocumentStart") {
			const hasTags = event.tags !== null && Object.keys(event.tags).length > 0;
			if ((event.version !== null || hasTags) && this.openEnded) {
				this.writeIndicator("...", true);
				this.writeIndent();
			}
			if (event.version !== null) {
				this.writeDirective(`%YAML ${this.prepareVersion(event.version)}`);
			}
			this.tagPrefixes = { ...DEFAULT_TAG_PREFIXES };
			if (event.tags !== null) {
				for (const handle of Object.keys(event.tags).sort()) {
					const prefix = event.tags[handle] ?? "";
					this.tagPrefixes[prefix] = handle;
					this.writeDirective(
						`%TAG ${this.prepareTagHandle(handle)} ${this.prepareTagPrefix(prefix)}`,
					);
				}
			}
			const implicit =
				first &&
				!event.explicit &&
				!this.options.canonical &&
				event.version === null &&
				!hasTags &&
				!this.checkEmptyDocument(event);
			if (!implicit) {
				this.writeIndent();
				this.writeIndicator("---", true);
				if (this.options.canonical) {
					this.writeIndent();
				}
			}
			this.state = (next) => this.expectDocumentRoot(next);
			return;
		}
		if (event.type === "StreamEnd") {
			if (this.openEnded) {
				this.writeIndicator("...", true);
				this.writeIndent();
			}
			this.state = (next) => this.expectNothing(next);
			return;
		}
		throw new EmitterError({ message: `expected DocumentStart, but got ${event.type}` });
	}

	private expectDocumentEnd(event: Event): void {
		if (event.type !== "DocumentEnd") {
			throw new EmitterError({ message: `expected DocumentEnd, but got ${event.type}` });
		}
		this.writeIndent();
		if (event.explicit) {
			this.writeIndicator("...", true);
			this.writeIndent();
		}
		this.state = (next) => this.expectDocumentStart(next, false);
	}

	private expectDocumentRoot(event: Event): void {
		this.states.push((next) => this.expectDocumentEnd(next));
		this.expectNode(event, {});
	}

	// ------------------------------------------------------------------------
	// Nodes
	// ------------------------------------------------------------------------

	private expectNode(event: Event, context: NodeContext): void {
		this.mappingContext = context.mapping === true;
		this.simpleKeyContext = context.simpleKey === true;

		switch (event.type) {
			case "Alias":
				this.processAnchor(event.anchor, "*");
				this.popState();
				return;
			case "Scalar":
				this.processAnchor(event.anchor, "&");
				this.processTag(event);
				this.expectScalar(event);
				return;
			case "SequenceStart":
				this.processAnchor(event.anchor, "&");
				this.processTag(event);
				if (
					this.flowLevel > 0 ||
					this.options.canonical ||
					event.flowStyle === true ||
					this.checkEmptyCollection(event)
				) {
					this.expectFlowSequence();
				} else {
					this.expectBlockSequence();
				}
				return;
			case "MappingStart":
				this.processAnchor(event.anchor, "&");
				this.processTag(event);
				if (
					this.flowLevel > 0 ||
					this.options.canonical ||
					event.flowStyle === true ||
					this.checkEmptyCollection(event)
				) {
					this.expectFlowMapping();
				} else {
					this.expectBlockMapping();
				}
				return;
			default:
				throw new EmitterError({ message: `expected a node event, but got ${event.type}` });
		}
	}

	private expectScalar(event: ScalarEvent): void {
		this.increaseIndent(true);
		this.processScalar(event);
		this.popIndent();
		this.popState();
	}

	// ------------------------------------------------------------------------
	// Flow sequences
	// ------------------------------------------------------------------------

	private expectFlowSequence(): void {
		this.writeIndicator("[", true, true);
		this.flowLevel++;
		this.increaseIndent(true);
		this.state = (event) => this.expectFlowSequenceItem(event, true);
	}

	private expectFlowSequenceItem(event: Event, first: boolean): void {
		if (event.type === "SequenceEnd") {
			this.popIndent();
			this.flowLevel--;
			if (!first && this.options.canonical) {
				this.writeIndicator(",", false);
				this.writeIndent();
			} else if (!first && this.options.prettyFlow) {
				this.writeIndent();
			}
			this.writeIndicator("]", false);
			this.popState();
			return;
		}
		if (!first) {
			this.writeIndicator(",", false);
		}
		if (this.breakFlowEntry()) {
			this.writeIndent();
		}
		this.states.push((next) => this.expectFlowSequenceItem(next, false));
		this.expectNode(event, {});
	}

	// ------------------------------------------------------------------------
	// Flow mappings
	// ------------------------------------------------------------------------

	private expectFlowMapping(): void {
		this.writeIndicator("{", true, true);
		this.flowLevel++;
		this.increaseIndent(true);
		this.state = (event) => this.expectFlowMappingKey(event, true);
	}

	private expectFlowMappingKey(event: Event, first: boolean): void {
		if (event.type === "MappingEnd") {
			this.popIndent();
			this.flowLevel--;
			if (!first && this.options.canonical) {
				this.writeIndicator(",", false);
				this.writeIndent();
			} else if (!first && this.options.prettyFlow) {
				this.writeIndent();
			}
			this.writeIndicator("}", false);
			this.popState();
			return;
		}
		if (!first) {
			this.writeIndicator(",", false);
		}
		if (this.breakFlowEntry()) {
			this.writeIndent();
		}
		if (!this.options.canonical && this.checkSimpleKey(event)) {
			this.states.push((next) => this.expectFlowMappingSimpleValue(next));
			this.expectNode(event, { mapping: true, simpleKey: true });
		} else {
			this.writeIndicator("?", true);
			this.states.push((next) => this.expectFlowMappingValue(next));
			this.expectNode(event, { mapping: true });
		}
	}

	private expectFlowMappingSimpleValue(event: Event): void {
		this.writeIndicator(":", false);
		this.states.push((next) => this.expectFlowMappingKey(next, false));
		this.expectNode(event, { mapping: true });
	}

	private expectFlowMappingValue(event: Event): void {
		if (this.breakFlowEntry()) {
			this.writeIndent();
		}
		this.writeIndicator(":", true);
		this.states.push((next) => this.expectFlowMappingKey(next, false));
		this.expectNode(event, { mapping: true });
	}

	private breakFlowEntry(): boolean {
		return (
			this.options.canonical ||
			this.options.prettyFlow ||
			(this.column > this.bestWidth && this.options.splitLines)
		);
	}

	// ------------------------------------------------------------------------
	// Block sequences
	// ------------------------------------------------------------------------

	private expectBlockSequence(): void {
		const indentless = this.mappingContext && !this.indention;
		this.increaseIndent(false, indentless);
		this.state = (event) => this.expectBlockSequenceItem(event, true);
	}

	private expectBlockSequenceItem(event: Event, first: boolean): void {
		if (!first && event.type === "SequenceEnd") {
			this.popIndent();
			this.popState();
			return;
		}
		this.writeIndent();
		if (!this.options.indentWithIndicator || first) {
			this.writeWhitespace(this.options.indicatorIndent);
		}
		this.writeIndicator("-", true, false, true);
		if (this.options.indentWithIndicator && first && this.indent !== null) {
			this.indent += this.options.indicatorIndent;
		}
		this.states.push((next) => this.expectBlockSequenceItem(next, false));
		this.expectNode(event, {});
	}

	// ------------------------------------------------------------------------
	// Block mappings
	// ------------------------------------------------------------------------

	private expectBlockMapping(): void {
		this.increaseIndent(false);
		this.state = (event) => this.expectBlockMappingKey(event, true);
	}

	private expectBlockMappingKey(event: Event, first: boolean): void {
		if (!first && event.type === "MappingEnd") {
			this.popIndent();
			this.popState();
			return;
		}
		this.writeIndent();
		if (this.checkSimpleKey(event)) {
			this.states.push((next) => this.expectBlockMappingSimpleValue(next));
			this.expectNode(event, { mapping: true, simpleKey: true });
		} else {
			this.writeIndicator("?", true, false, true);
			this.states.push((next) => this.expectBlockMappingValue(next));
			this.expectNode(event, { mapping: true });
		}
	}

	private expectBlockMappingSimpleValue(event: Event): void {
		this.writeIndicator(":", false);
		this.states.push((next) => this.expectBlockMappingKey(next, false));
		this.expectNode(event, { mapping: true });
	}

	private expectBlockMappingValue(event: Event): void {
		this.writeIndent();
		this.writeIndicator(":", true, false, true);
		this.states.push((next) => this.expectBlockMappingKey(next, false));
		this.expectNode(event, { mapping: true });
	}

	// ------------------------------------------------------------------------
	// Checks
	// ------------------------------------------------------------------------

	private checkEmptyCollection(event: CollectionStartEvent): boolean {
		const next = this.events[0];
		return (
			next !== undefined &&
			next.type === (event.type === "SequenceStart" ? "SequenceEnd" : "MappingEnd")
		);
	}

	private checkEmptyDocument(event: DocumentStartEvent): boolean {
		const next = this.events[0];
		return (
			event.explicit === false &&
			next !== undefined &&
			next.type === "Scalar" &&
			next.anchor === null &&
			next.implicit.plain &&
			next.value === ""
		);
	}

	private checkSimpleKey(event: Event): boolean {
		let length = 0;
		if (event.type === "Alias" || event.type === "Scalar" || isCollectionStart(event)) {
			if (event.anchor !== null) {
				this.preparedAnchor ??= this.prepareAnchor(event.anchor);
				length += this.preparedAnchor.length;
			}
		}
		if ((event.type === "Scalar" || isCollectionStart(event)) && event.tag !== null) {
			this.preparedTag ??= this.prepareTag(event.tag);
			length += this.preparedTag.length;
		}
		let simpleScalar = false;
		if (event.type === "Scalar") {
			this.analysis ??= analyzeScalar(event.value, this.options.allowUnicode);
			length += this.analysis.chars.length;
			simpleScalar = !this.analysis.empty && !this.analysis.multiline;
		}
		return (
			length < this.options.maxSimpleKeyLength &&
			(event.type === "Alias" ||
				simpleScalar ||
				(isCollectionStart(event) && this.checkEmptyCollection(event)))
		);
	}

	// ------------------------------------------------------------------------
	// Anchors, tags and scalars
	// ------------------------------------------------------------------------

	private processAnchor(anchor: string | null, indicator: "&" | "*"): void {
		if (anchor === null) {
			if (indicator === "*") {
				throw new EmitterError({ message: "anchor is not specified for alias" });
			}
			this.preparedAnchor = null;
			return;
		}
		this.preparedAnchor ??= this.prepareAnchor(anchor);
		if (this.preparedAnchor.length > 0) {
			this.writeIndicator(indicator + this.preparedAnchor, true);
		}
		this.preparedAnchor = null;
	}

	private processTag(event: ScalarEvent | CollectionStartEvent): void {
		let tag = event.tag;
		if (event.type === "Scalar") {
			this.style ??= this.chooseScalarStyle(event);
			if (
				(!this.options.canonical || tag === null) &&
				((this.style === "plain" && event.implicit.plain) ||
					(this.style !== "plain" && event.implicit.quoted))
			) {
				this.preparedTag = null;
				return;
			}
			if (event.implicit.plain && tag === null) {
				tag = "!";
				this.preparedTag = null;
			}
		} else if ((!this.options.canonical || tag === null) && event.implicit) {
			this.preparedTag = null;
			return;
		}
		if (tag === null) {
			throw new EmitterError({ message: "tag is not specified" });
		}
		this.preparedTag ??= this.prepareTag(tag);
		if (this.preparedTag.length > 0) {
			this.writeIndicator(this.preparedTag, true);
		}
		this.preparedTag = null;
	}

	private chooseScalarStyle(event: ScalarEvent): ScalarStyle {
		const analysis = (this.analysis ??= analyzeScalar(event.value, this.options.allowUnicode));
		if (event.style === "double-quoted" || this.options.canonical) {
			return "double-quoted";
		}
		if ((event.style === null || event.style === "plain") && event.implicit.plain) {
			const plainFits =
				this.flowLevel > 0 ? analysis.allowFlowPlain : analysis.allowBlockPlain;
			if (!(this.simpleKeyContext && (analysis.empty || analysis.multiline)) && plainFits) {
				return "plain";
			}
		}
		const blockStyle =
			event.style === null && isMultilineText(event.value) ? "literal" : event.style;
		if (blockStyle === "literal" || blockStyle === "folded") {
			if (this.flowLevel === 0 && !this.simpleKeyContext && analysis.allowBlock) {
				return blockStyle;
			}
		}
		if (event.style === null || event.style === "plain" || event.style === "single-quoted") {
			if (analysis.allowSingleQuoted && !(this.simpleKeyContext && analysis.multiline)) {
				return "single-quoted";
			}
		}
		return "double-quoted";
	}

	private processScalar(event: ScalarEvent): void {
		const analysis = (this.analysis ??= analyzeScalar(event.value, this.options.allowUnicode));
		const style = (this.style ??= this.chooseScalarStyle(event));
		const split = !this.simpleKeyContext && this.options.splitLines;
		switch (style) {
			case "double-quoted":
				this.writeDoubleQuoted(analysis.chars, split);
				break;
			case "single-quoted":
				this.writeSingleQuoted(analysis.chars, split);
				break;
			case "folded":
				this.writeFolded(analysis.chars);
				break;
			case "literal":
				this.writeLiteral(analysis.chars);
				break;
			case "plain":
				this.writePlain(analysis.chars, split);
				break;
		}
		this.analysis = null;
		this.style = null;
	}

	// ------------------------------------------------------------------------
	// Preparing directives, anchors and tags
	// ------------------------------------------------------------------------

	private prepareVersion(version: readonly [number, number]): string {
		const [major, minor] = version;
		if (major !== 1) {
			throw new EmitterError({ message: `unsupported YAML version: ${major}.${minor}` });
		}
		return `${major}.${minor}`;
	}

	private prepareTagHandle(handle: string): string {
		if (handle.length === 0) {
			throw new EmitterError({ message: "tag handle must not be empty" });
		}
		if (!handle.startsWith("!") || !handle.endsWith("!")) {
			throw new EmitterError({
				message: `tag handle must start and end with '!': ${JSON.stringify(handle)}`,
			});
		}
		for (const ch of handle.slice(1, -1)) {
			if (!isAlphanumeric(ch) && ch !== "-" && ch !== "_") {
				throw new EmitterError({
					message: `invalid character ${JSON.stringify(ch)} in the tag handle: ${JSON.stringify(handle)}`,
				});
			}
		}
		return handle;
	}

	private prepareTagPrefix(prefix: string): string {
		if (prefix.length === 0) {
			throw new EmitterError({ message: "tag prefix must not be empty" });
		}
		const head = prefix.startsWith("!") ? "!" : "";
		return head + this.encodeUri(prefix.slice(head.length), (ch) => ch === "!");
	}

	private prepareTag(tag: string): string {
		if (tag.length === 0) {
			throw new EmitterError({ message: "tag must not be empty" });
		}
		if (tag === "!") {
			return tag;
		}
		let handle: string | null = null;
		let suffix = tag;
		for (const prefix of Object.keys(this.tagPrefixes).sort()) {
			if (tag.startsWith(prefix) && (prefix === "!" || prefix.length < tag.length)) {
				handle = this.tagPrefixes[prefix] ?? null;
				suffix = tag.slice(prefix.length);
			}
		}
		const suffixText = this.encodeUri(suffix, (ch) => ch === "!" && handle !== "!");
		return handle !== null ? handle + suffixText : `!<${suffixText}>`;
	}

	private encodeUri(text: string, alsoSafe: (ch: string) => boolean): string {
		return Array.from(text, (ch) =>
			isAlphanumeric(ch) || URI_SAFE.includes(ch) || alsoSafe(ch) ? ch : percentEncode(ch),
		).join("");
	}

	private prepareAnchor(anchor: string): string {
		if (anchor.length === 0) {
			throw new EmitterError({ message: "anchor must not be empty" });
		}
		for (const ch of anchor) {
			if (!isAlphanumeric(ch) && ch !== "-" && ch !== "_") {
				throw new EmitterError({
					message: `invalid character ${JSON.stringify(ch)} in the anchor: ${JSON.stringify(anchor)}`,
				});
			}
		}
		return anchor;
	}

	// ------------------------------------------------------------------------
	// Low-level writers
	// ------------------------------------------------------------------------

	private write(data: string): void {
		this.sink.write(data);
	}

	private writeIndicator(
		indicator: string,
		needWhitespace: boolean,
		whitespace = false,
		indention = false,
	): void {
		const data = this.whitespace || !needWhitespace ? indicator : ` ${indicator}`;
		this.whitespace = whitespace;
		this.indention = this.indention && indention;
		this.column += data.length;
		this.openEnded = false;
		this.write(data);
	}

	private writeIndent(): void {
		const indent = this.indent ?? 0;
		if (
			!this.indention ||
			this.column > indent ||
			(this.column === indent && !this.whitespace)
		) {
			this.writeLineBreak();
		}
		if (this.column < indent) {
			this.whitespace = true;
			this.write(" ".repeat(indent - this.column));
			this.column = indent;
		}
	}

	private writeWhitespace(length: number): void {
		if (length <= 0) {
			return;
		}
		this.whitespace = true;
		this.column += length;
		this.write(" ".repeat(length));
	}

	private writeLineBreak(data: string = this.bestLineBreak): void {
		this.whitespace = true;
		this.indention = true;
		this.line++;
		this.column = 0;
		this.write(data);
	}

	/** Writes the breaks in `chars`, mapping `\n` to the configured line break. */
	private writeBreaks(chars: ReadonlyArray<string>): void {
		for (const br of chars) {
			this.writeLineBreak(br === "\n" ? this.bestLineBreak : br);
		}
	}

	private writeDirective(text: string): void {
		this.write(text);
		this.writeLineBreak();
	}

	private writeText(chars: ReadonlyArray<string>, start: number, end: number): void {
		const data = chars.slice(start, end).join("");
		this.column += end - start;
		this.write(data);
	}

	// ------------------------------------------------------------------------
	// Scalar writers
	// ------------------------------------------------------------------------

	private writeSingleQuoted(text: ReadonlyArray<string>, split: boolean): void {
		this.writeIndicator("'", true);
		let spaces = false;
		let breaks = false;
		let start = 0;
		for (let end = 0; end <= text.length; end++) {
			const ch = text[end];
			if (spaces) {
				if (ch !== " ") {
					if (
						start + 1 === end &&
						this.column > this.bestWidth &&
						split &&
						start !== 0 &&
						end !== text.length
					) {
						this.writeIndent();
					} else {
						this.writeText(text, start, end);
					}
					start = end;
				}
			} else if (breaks) {
				if (!isEmitterBreak(ch)) {
					if (text[start] === "\n") {
						this.writeLineBreak();
					}
					this.writeBreaks(text.slice(start, end));
					this.writeIndent();
					start = end;
				}
			} else if (ch === undefined || ch === " " || ch === "'" || isEmitterBreak(ch)) {
				if (start < end) {
					this.writeText(text, start, end);
					start = end;
				}
			}
			if (ch === "'") {
				this.column += 2;
				this.write("''");
				start = end + 1;
			}
			if (ch !== undefined) {
				spaces = ch === " ";
				breaks = isEmitterBreak(ch);
			}
		}
		this.writeIndicator("'", false);
	}

	private writeDoubleQuoted(text: ReadonlyArray<string>, split: boolean): void {
		this.writeIndicator('"', true);
		let start = 0;
		for (let end = 0; end <= text.length; end++) {
			const ch = text[end];
			if (ch === undefined || this.needsEscape(ch)) {
				if (start < end) {
					this.writeText(text, start, end);
					start = end;
				}
				if (ch !== undefined) {
					const data = `\\${ESCAPES[ch] ?? this.hexEscape(ch)}`;
					this.column += data.length;
					this.write(data);
					start = end + 1;
				}
			}
			if (
				end > 0 &&
				end < text.length - 1 &&
				(ch === " " || start >= end) &&
				this.column + (end - start) > this.bestWidth &&
				split
			) {
				const data = `${text.slice(start, end).join("")}\\`;
				if (start < end) {
					start = end;
				}
				this.column += data.length;
				this.write(data);
				this.writeIndent();
				this.whitespace = false;
				this.indention = false;
				if (text[start] === " ") {
					this.column += 1;
					this.write("\\");
				}
			}
		}
		this.writeIndicator('"', false);
	}

	private needsEscape(ch: string): boolean {
		if (ALWAYS_ESCAPED.includes(ch) || ch.codePointAt(0) === 0xfeff) {
			return true;
		}
		return !(isPrintableAscii(ch) || (this.options.allowUnicode && isPrintableUnicode(ch)));
	}

	private hexEscape(ch: string): string {
		const cp = ch.codePointAt(0) ?? 0;
		const hex = cp.toString(16).toUpperCase();
		if (cp <= 0xff) {
			return `x${hex.padStart(2, "0")}`;
		}
		if (cp <= 0xffff) {
			return `u${hex.padStart(4, "0")}`;
		}
		return `U${hex.padStart(8, "0")}`;
	}

	private blockHints(text: ReadonlyArray<string>): string {
		let hints = "";
		const first = text[0];
		const last = text[text.length - 1];
		if (first !== undefined && (first === " " || isEmitterBreak(first))) {
			hints += String(this.bestIndent);
		}
		if (last !== undefined) {
			if (!isEmitterBreak(last)) {
				hints += "-";
			} else if (text.length === 1 || isEmitterBreak(text[text.length - 2])) {
				hints += "+";
			}
		}
		return hints;
	}

	private writeFolded(text: ReadonlyArray<string>): void {
		const hints = this.blockHints(text);
		this.writeIndicator(`>${hints}`, true);
		if (hints.endsWith("+")) {
			this.openEnded = true;
		}
		this.writeLineBreak();
		let leadingSpace = true;
		let spaces = false;
		let breaks = true;
		let start = 0;
		for (let end = 0; end <= text.length; end++) {
			const ch = text[end];
			if (breaks) {
				if (!isEmitterBreak(ch)) {
					if (!leadingSpace && ch !== undefined && ch !== " " && text[start] === "\n") {
						this.writeLineBreak();
					}
					leadingSpace = ch === " ";
					this.writeBreaks(text.slice(start, end));
					if (ch !== undefined) {
						this.writeIndent();
					}
					start = end;
				}
			} else if (spaces) {
				if (ch !== " ") {
					if (start + 1 === end && this.column > this.bestWidth) {
						this.writeIndent();
					} else {
						this.writeText(text, start, end);
					}
					start = end;
				}
			} else if (ch === undefined || ch === " " || isEmitterBreak(ch)) {
				this.writeText(text, start, end);
				if (ch === undefined) {
					this.writeLineBreak();
				}
				start = end;
			}
			if (ch !== undefined) {
				breaks = isEmitterBreak(ch);
				spaces = ch === " ";
			}
		}
	}

	private writeLiteral(text: ReadonlyArray<string>): void {
		const hints = this.blockHints(text);
		this.writeIndicator(`|${hints}`, true);
		if (hints.endsWith("+")) {
			this.openEnded = true;
		}
		this.writeLineBreak();
		let breaks = true;
		let start = 0;
		for (let end = 0; end <= text.length; end++) {
			const ch = text[end];
			if (breaks) {
				if (!isEmitterBreak(ch)) {
					this.writeBreaks(text.slice(start, end));
					if (ch !== undefined) {
						this.writeIndent();
					}
					start = end;
				}
			} else if (ch === undefined || isEmitterBreak(ch)) {
				this.writeText(text, start, end);
				if (ch === undefined) {
					this.writeLineBreak();
				}
				start = end;
			}
			if (ch !== undefined) {
				breaks = isEmitterBreak(ch);
			}
		}
	}

	private writePlain(text: ReadonlyArray<string>, split: boolean): void {
		if (text.length === 0) {
			return;
		}
		if (!this.whitespace) {
			this.column += 1;
			this.write(" ");
		}
		this.whitespace = false;
		this.indention = false;
		let spaces = false;
		let breaks = false;
		let start = 0;
		for (let end = 0; end <= text.length; end++) {
			const ch = text[end];
			if (spaces) {
				if (ch !== " ") {
					if (start + 1 === end && this.column > this.bestWidth && split) {
						this.writeIndent();
						this.whitespace = false;
						this.indention = false;
					} else {
						this.writeText(text, start, end);
					}
					start = end;
				}
			} else if (breaks) {
				if (!isEmitterBreak(ch)) {
					if (text[start] === "\n") {
						this.writeLineBreak();
					}
					this.writeBreaks(text.slice(start, end));
					this.writeIndent();
					this.whitespace = false;
					this.indention = false;
					start = end;
				}
			} else if (ch === undefined || ch === " " || isEmitterBreak(ch)) {
				this.writeText(text, start, end);
				start = end;
			}
			if (ch !== undefined) {
				spaces = ch === " ";
				breaks = isEmitterBreak(ch);
			}
		}
	}
}
