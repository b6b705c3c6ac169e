import {
	marked,
	NestingDepthExceededError,
	ParserError,
} from "../errors/yaml-errors.js";
import type { Mark } from "../reader/mark.js";
import type { Resolver } from "../resolver/resolver.js";
import { DEFAULT_TAG_HANDLES } from "../resolver/tags.js";
import type { Scanner } from "../scanner/scanner.js";
import {
	describeToken,
	type TagToken,
	type Token,
	type TokenType,
} from "../scanner/tokens.js";
import type {
	Event,
	EventType,
	FlowStyle,
	ImplicitTuple,
	ScalarEvent,
} from "./events.js";

// ============================================================================
// Types
// ============================================================================

export interface ParserOptions {
	readonly resolver: Resolver;
	/** Deepest collection nesting accepted before failing. */
	readonly maxNestingDepth: number;
}

type State = () => Event;

// ============================================================================
// Parser
// ============================================================================

/**
 * Pulls tokens from a scanner and produces events one at a time.
 *
 * The grammar is driven by an explicit state stack rather than recursion:
 * each state consumes some tokens, pushes the state to return to, and hands
 * back exactly one event. Untagged nodes get their tag from the resolver here,
 * so every scalar and collection event leaves the parser tagged; the
 * `implicit` flags record whether the tag was written in the source.
 */
export class Parser implements Iterable<Event> {
	private current: Event | undefined;
	private state: State | null;
	private readonly states: Array<State> = [];
	private readonly marks: Array<Mark> = [];
	private tagHandles: Readonly<Record<string, string>> = DEFAULT_TAG_HANDLES;
	private depth = 0;

	constructor(
		private readonly scanner: Scanner,
		private readonly options: ParserOptions,
	) {
		this.state = () => this.parseStreamStart();
	}

	// ------------------------------------------------------------------------
	// Public pull interface
	// ------------------------------------------------------------------------

	checkEvent(...types: ReadonlyArray<EventType>): boolean {
		const event = this.peekEvent();
		if (event === undefined) {
			return false;
		}
		return types.length === 0 || types.includes(event.type);
	}

	peekEvent(): Event | undefined {
		if (this.current === undefined && this.state !== null) {
			this.current = this.state();
		}
		return this.current;
	}

	getEvent(): Event | undefined {
		const event = this.peekEvent();
		this.current = undefined;
		return event;
	}

	*[Symbol.iterator](): Generator<Event> {
		for (;;) {
			const event = this.getEvent();
			if (event === undefined) {
				return;
			}
			yield event;
		}
	}

	// ------------------------------------------------------------------------
	// Token access (comment tokens never reach the grammar)
	// ------------------------------------------------------------------------

	private skipComments(): void {
		while (this.scanner.checkToken("Comment")) {
			this.scanner.getToken();
		}
	}

	private check(...types: ReadonlyArray<TokenType>): boolean {
		this.skipComments();
		return this.scanner.checkToken(...types);
	}

	private peek(): Token {
		this.skipComments();
		const token = this.scanner.peekToken();
		if (token === undefined) {
			throw new ParserError(marked({ problem: "unexpected end of the token stream" }));
		}
		return token;
	}

	private next(): Token {
		const token = this.peek();
		this.scanner.getToken();
		return token;
	}

	private popState(): State | null {
		return this.states.pop() ?? null;
	}

	// ------------------------------------------------------------------------
	// Stream and documents
	// ------------------------------------------------------------------------

	private parseStreamStart(): Event {
		const token = this.next();
		this.state = () => this.parseImplicitDocumentStart();
		return { type: "StreamStart", startMark: token.startMark, endMark: token.endMark };
	}

	private parseImplicitDocumentStart(): Event {
		if (this.check("Directive", "DocumentStart", "StreamEnd")) {
			return this.parseDocumentStart();
		}
		this.tagHandles = DEFAULT_TAG_HANDLES;
		const mark = this.peek().startMark;
		this.states.push(() => this.parseDocumentEnd());
		this.state = () => this.parseBlockNode();
		return {
			type: "DocumentStart",
			explicit: false,
			version: null,
			tags: null,
			startMark: mark,
			endMark: mark,
		};
	}

	private parseDocumentStart(): Event {
		// Stray document end markers between documents are skipped.
		while (this.check("DocumentEnd")) {
			this.next();
		}
		if (this.check("StreamEnd")) {
			const token = this.next();
			this.state = null;
			return { type: "StreamEnd", startMark: token.startMark, endMark: token.endMark };
		}

		const start = this.peek().startMark;
		const { version, tags } = this.processDirectives();
		if (!this.check("DocumentStart")) {
			const token = this.peek();
			this.fail(
				undefined,
				undefined,
				`expected '<document start>', but found '${describeToken(token.type)}'`,
				token.startMark,
			);
		}
		const token = this.next();
		this.states.push(() => this.parseDocumentEnd());
		this.state = () => this.parseDocumentContent();
		return {
			type: "DocumentStart",
			explicit: true,
			version,
			tags,
			startMark: start,
			endMark: token.endMark,
		};
	}

	private parseDocumentEnd(): Event {
		const token = this.peek();
		const start = token.startMark;
		let end = token.startMark;
		let explicit = false;
		if (this.check("DocumentEnd")) {
			end = this.next().endMark;
			explicit = true;
		}
		this.state = () => this.parseDocumentStart();
		return { type: "DocumentEnd", explicit, startMark: start, endMark: end };
	}

	private parseDocumentContent(): Event {
		if (this.check("Directive", "DocumentStart", "DocumentEnd", "StreamEnd")) {
			const event = this.processEmptyScalar(this.peek().startMark);
			this.state = this.popState();
			return event;
		}
		return this.parseBlockNode();
	}

	private processDirectives(): {
		readonly version: readonly [number, number] | null;
		readonly tags: Readonly<Record<string, string>> | null;
	} {
		let version: readonly [number, number] | null = null;
		const declared: Record<string, string> = {};
		let hasTags = false;
		while (this.check("Directive")) {
			const token = this.next();
			if (token.type !== "Directive" || token.value === null) {
				continue;
			}
			if (token.name === "YAML") {
				const [major, minor] = token.value;
				if (version !== null) {
					this.fail(undefined, undefined, "found duplicate YAML directive", token.startMark);
				}
				if (major !== 1 || typeof minor !== "number") {
					this.fail(
						undefined,
						undefined,
						"found incompatible YAML document (version 1.* is required)",
						token.startMark,
					);
				}
				version = [major, minor];
			} else if (token.name === "TAG") {
				const [handle, prefix] = token.value;
				if (typeof handle !== "string" || typeof prefix !== "string") {
					continue;
				}
				if (Object.hasOwn(declared, handle)) {
					this.fail(
						undefined,
						undefined,
						`duplicate tag handle '${handle}'`,
						token.startMark,
					);
				}
				declared[handle] = prefix;
				hasTags = true;
			}
		}
		this.tagHandles = { ...DEFAULT_TAG_HANDLES, ...declared };
		return { version, tags: hasTags ? { ...declared } : null };
	}

	// ------------------------------------------------------------------------
	// Nodes
	// ------------------------------------------------------------------------

	private parseBlockNode(): Event {
		return this.parseNode(true, false);
	}

	private parseFlowNode(): Event {
		return this.parseNode(false, false);
	}

	private parseBlockNodeOrIndentlessSequence(): Event {
		return this.parseNode(true, true);
	}

	private parseNode(block: boolean, indentlessSequence: boolean): Event {
		if (this.check("Alias")) {
			const token = this.next();
			this.state = this.popState();
			return {
				type: "Alias",
				anchor: token.type === "Alias" ? token.value : "",
				startMark: token.startMark,
				endMark: token.endMark,
			};
		}

		let anchor: string | null = null;
		let rawTag: TagToken | null = null;
		let start: Mark | null = null;
		let end: Mark | null = null;

		// Anchor and tag may come in either order, each at most once.
		while (this.check("Anchor", "Tag")) {
			const token = this.peek();
			if (token.type === "Anchor" && anchor === null) {
				anchor = token.value;
			} else if (token.type === "Tag" && rawTag === null) {
				rawTag = token;
			} else {
				break;
			}
			this.next();
			start ??= token.startMark;
			end = token.endMark;
		}

		const tag = this.expandTag(rawTag, start);
		const startMark: Mark = start ?? this.peek().startMark;
		const endMark: Mark = end ?? startMark;

		if (this.check("Alias")) {
			this.fail(
				"while parsing a node",
				startMark,
				"found an alias after node properties: an alias cannot carry an anchor or a tag",
				this.peek().startMark,
			);
		}

		const implicit = tag === null || tag === "!";

		if (indentlessSequence && this.check("BlockEntry")) {
			const token = this.peek();
			this.enterCollection(token.startMark);
			this.state = () => this.parseIndentlessSequenceEntry();
			return this.sequenceStart(anchor, tag, implicit, false, startMark, token.endMark);
		}

		if (this.check("Scalar")) {
			const token = this.next();
			this.state = this.popState();
			if (token.type !== "Scalar") {
				return this.processEmptyScalar(token.startMark);
			}
			let implicitTuple: ImplicitTuple;
			if (tag === "!") {
				implicitTuple = { plain: false, quoted: true };
			} else if (tag === null) {
				implicitTuple = token.plain
					? { plain: true, quoted: false }
					: { plain: false, quoted: true };
			} else {
				implicitTuple = { plain: false, quoted: false };
			}
			return this.scalar(
				anchor,
				tag,
				implicitTuple,
				token.value,
				token.style,
				startMark,
				token.endMark,
			);
		}

		const flowStart = (flowStyle: FlowStyle, next: State, isMapping: boolean): Event => {
			const token = this.peek();
			this.enterCollection(token.startMark);
			this.state = next;
			return isMapping
				? this.mappingStart(anchor, tag, implicit, flowStyle, startMark, token.endMark)
				: this.sequenceStart(anchor, tag, implicit, flowStyle, startMark, token.endMark);
		};

		if (this.check("FlowSequenceStart")) {
			return flowStart(true, () => this.parseFlowSequenceFirstEntry(), false);
		}
		if (this.check("FlowMappingStart")) {
			return flowStart(true, () => this.parseFlowMappingFirstKey(), true);
		}
		if (block && this.check("BlockSequenceStart")) {
			return flowStart(false, () => this.parseBlockSequenceFirstEntry(), false);
		}
		if (block && this.check("BlockMappingStart")) {
			return flowStart(false, () => this.parseBlockMappingFirstKey(), true);
		}
		if (anchor !== null || tag !== null) {
			// Properties with no content: an empty scalar.
			this.state = this.popState();
			return this.scalar(
				anchor,
				tag,
				tag === null ? { plain: true, quoted: false } : { plain: false, quoted: tag === "!" },
				"",
				"plain",
				startMark,
				endMark,
			);
		}

		const token = this.peek();
		return this.fail(
			`while parsing a ${block ? "block" : "flow"} node`,
			startMark,
			`expected the node content, but found '${describeToken(token.type)}'`,
			token.startMark,
		);
	}

	private expandTag(raw: TagToken | null, start: Mark | null): string | null {
		if (raw === null) {
			return null;
		}
		if (raw.handle === null) {
			return raw.suffix;
		}
		const prefix = this.tagHandles[raw.handle];
		if (prefix === undefined) {
			return this.fail(
				"while parsing a node",
				start ?? undefined,
				`found undefined tag handle '${raw.handle}'`,
				raw.startMark,
			);
		}
		return prefix + raw.suffix;
	}

	// ------------------------------------------------------------------------
	// Block sequences
	// ------------------------------------------------------------------------

	private parseBlockSequenceFirstEntry(): Event {
		this.marks.push(this.next().startMark);
		return this.parseBlockSequenceEntry();
	}

	private parseBlockSequenceEntry(): Event {
		if (this.check("BlockEntry")) {
			const token = this.next();
			if (!this.check("BlockEntry", "BlockEnd")) {
				this.states.push(() => this.parseBlockSequenceEntry());
				return this.parseBlockNode();
			}
			this.state = () => this.parseBlockSequenceEntry();
			return this.processEmptyScalar(token.endMark);
		}
		if (!this.check("BlockEnd")) {
			const token = this.peek();
			this.fail(
				"while parsing a block collection",
				this.marks.at(-1),
				`expected <block end>, but found '${describeToken(token.type)}'`,
				token.startMark,
			);
		}
		const token = this.next();
		this.state = this.popState();
		this.marks.pop();
		return this.collectionEnd("SequenceEnd", token.startMark, token.endMark);
	}

	private parseIndentlessSequenceEntry(): Event {
		if (this.check("BlockEntry")) {
			const token = this.next();
			if (!this.check("BlockEntry", "Key", "Value", "BlockEnd")) {
				this.states.push(() => this.parseIndentlessSequenceEntry());
				return this.parseBlockNode();
			}
			this.state = () => this.parseIndentlessSequenceEntry();
			return this.processEmptyScalar(token.endMark);
		}
		const token = this.peek();
		this.state = this.popState();
		return this.collectionEnd("SequenceEnd", token.startMark, token.startMark);
	}

	// ------------------------------------------------------------------------
	// Block mappings
	// ------------------------------------------------------------------------

	private parseBlockMappingFirstKey(): Event {
		this.marks.push(this.next().startMark);
		return this.parseBlockMappingKey();
	}

	private parseBlockMappingKey(): Event {
		if (this.check("Key")) {
			const token = this.next();
			if (!this.check("Key", "Value", "BlockEnd")) {
				this.states.push(() => this.parseBlockMappingValue());
				return this.parseBlockNodeOrIndentlessSequence();
			}
			this.state = () => this.parseBlockMappingValue();
			return this.processEmptyScalar(token.endMark);
		}
		if (!this.check("BlockEnd")) {
			const token = this.peek();
			this.fail(
				"while parsing a block mapping",
				this.marks.at(-1),
				`expected <block end>, but found '${describeToken(token.type)}'`,
				token.startMark,
			);
		}
		const token = this.next();
		this.state = this.popState();
		this.marks.pop();
		return this.collectionEnd("MappingEnd", token.startMark, token.endMark);
	}

	private parseBlockMappingValue(): Event {
		if (this.check("Value")) {
			const token = this.next();
			if (!this.check("Key", "Value", "BlockEnd")) {
				this.states.push(() => this.parseBlockMappingKey());
				return this.parseBlockNodeOrIndentlessSequence();
			}
			this.state = () => this.parseBlockMappingKey();
			return this.processEmptyScalar(token.endMark);
		}
		this.state = () => this.parseBlockMappingKey();
		return this.processEmptyScalar(this.peek().startMark);
	}

	// ------------------------------------------------------------------------
	// Flow sequences
	// ------------------------------------------------------------------------

	private parseFlowSequenceFirstEntry(): Event {
		this.marks.push(this.next().startMark);
		return this.parseFlowSequenceEntry(true);
	}

	private parseFlowSequenceEntry(first = false): Event {
		if (!this.check("FlowSequenceEnd")) {
			if (!first) {
				if (this.check("FlowEntry")) {
					this.next();
				} else {
					const token = this.peek();
					this.fail(
						"while parsing a flow sequence",
						this.marks.at(-1),
						`expected ',' or ']', but got '${describeToken(token.type)}'`,
						token.startMark,
					);
				}
			}
			if (this.check("Key")) {
				// A single-pair mapping inside a flow sequence: [a: b]
				const token = this.peek();
				this.enterCollection(token.startMark);
				this.state = () => this.parseFlowSequenceEntryMappingKey();
				return this.mappingStart(null, null, true, true, token.startMark, token.endMark);
			}
			if (!this.check("FlowSequenceEnd")) {
				this.states.push(() => this.parseFlowSequenceEntry());
				return this.parseFlowNode();
			}
		}
		const token = this.next();
		this.state = this.popState();
		this.marks.pop();
		return this.collectionEnd("SequenceEnd", token.startMark, token.endMark);
	}

	private parseFlowSequenceEntryMappingKey(): Event {
		const token = this.next();
		if (!this.check("Value", "FlowEntry", "FlowSequenceEnd")) {
			this.states.push(() => this.parseFlowSequenceEntryMappingValue());
			return this.parseFlowNode();
		}
		this.state = () => this.parseFlowSequenceEntryMappingValue();
		return this.processEmptyScalar(token.endMark);
	}

	private parseFlowSequenceEntryMappingValue(): Event {
		if (this.check("Value")) {
			const token = this.next();
			if (!this.check("FlowEntry", "FlowSequenceEnd")) {
				this.states.push(() => this.parseFlowSequenceEntryMappingEnd());
				return this.parseFlowNode();
			}
			this.state = () => this.parseFlowSequenceEntryMappingEnd();
			return this.processEmptyScalar(token.endMark);
		}
		this.state = () => this.parseFlowSequenceEntryMappingEnd();
		return this.processEmptyScalar(this.peek().startMark);
	}

	private parseFlowSequenceEntryMappingEnd(): Event {
		this.state = () => this.parseFlowSequenceEntry();
		const mark = this.peek().startMark;
		return this.collectionEnd("MappingEnd", mark, mark);
	}

	// ------------------------------------------------------------------------
	// Flow mappings
	// ------------------------------------------------------------------------

	private parseFlowMappingFirstKey(): Event {
		this.marks.push(this.next().startMark);
		return this.parseFlowMappingKey(true);
	}

	private parseFlowMappingKey(first = false): Event {
		if (!this.check("FlowMappingEnd")) {
			if (!first) {
				if (this.check("FlowEntry")) {
					this.next();
				} else {
					const token = this.peek();
					this.fail(
						"while parsing a flow mapping",
						this.marks.at(-1),
						`expected ',' or '}', but got '${describeToken(token.type)}'`,
						token.startMark,
					);
				}
			}
			if (this.check("Key")) {
				const token = this.next();
				if (!this.check("Value", "FlowEntry", "FlowMappingEnd")) {
					this.states.push(() => this.parseFlowMappingValue());
					return this.parseFlowNode();
				}
				this.state = () => this.parseFlowMappingValue();
				return this.processEmptyScalar(token.endMark);
			}
			if (!this.check("FlowMappingEnd")) {
				this.states.push(() => this.parseFlowMappingEmptyValue());
				return this.parseFlowNode();
			}
		}
		const token = this.next();
		this.state = this.popState();
		this.marks.pop();
		return this.collectionEnd("MappingEnd", token.startMark, token.endMark);
	}

	private parseFlowMappingValue(): Event {
		if (this.check("Value")) {
			const token = this.next();
			if (!this.check("FlowEntry", "FlowMappingEnd")) {
				this.states.push(() => this.parseFlowMappingKey());
				return this.parseFlowNode();
			}
			this.state = () => this.parseFlowMappingKey();
			return this.processEmptyScalar(token.endMark);
		}
		this.state = () => this.parseFlowMappingKey();
		return this.processEmptyScalar(this.peek().startMark);
	}

	private parseFlowMappingEmptyValue(): Event {
		this.state = () => this.parseFlowMappingKey();
		return this.processEmptyScalar(this.peek().startMark);
	}

	// ------------------------------------------------------------------------
	// Event builders
	// ------------------------------------------------------------------------

	private processEmptyScalar(mark: Mark): ScalarEvent {
		return this.scalar(null, null, { plain: true, quoted: false }, "", "plain", mark, mark);
	}

	private scalar(
		anchor: string | null,
		tag: string | null,
		implicit: ImplicitTuple,
		value: string,
		style: ScalarEvent["style"],
		startMark: Mark,
		endMark: Mark,
	): ScalarEvent {
		const resolved =
			tag === null || tag === "!"
				? this.options.resolver.resolve("scalar", value, implicit.plain)
				: tag;
		return {
			type: "Scalar",
			anchor,
			tag: resolved,
			implicit,
			value,
			style,
			startMark,
			endMark,
		};
	}

	private sequenceStart(
		anchor: string | null,
		tag: string | null,
		implicit: boolean,
		flowStyle: FlowStyle,
		startMark: Mark,
		endMark: Mark,
	): Event {
		return {
			type: "SequenceStart",
			anchor,
			tag: implicit ? this.options.resolver.resolve("sequence", null, true) : tag,
			implicit,
			flowStyle,
			startMark,
			endMark,
		};
	}

	private mappingStart(
		anchor: string | null,
		tag: string | null,
		implicit: boolean,
		flowStyle: FlowStyle,
		startMark: Mark,
		endMark: Mark,
	): Event {
		return {
			type: "MappingStart",
			anchor,
			tag: implicit ? this.options.resolver.resolve("mapping", null, true) : tag,
			implicit,
			flowStyle,
			startMark,
			endMark,
		};
	}

	private collectionEnd(
		type: "SequenceEnd" | "MappingEnd",
		startMark: Mark,
		endMark: Mark,
	): Event {
		this.depth--;
		return { type, startMark, endMark };
	}

	private enterCollection(mark: Mark): void {
		this.depth++;
		if (this.depth > this.options.maxNestingDepth) {
			throw new NestingDepthExceededError({
				limit: this.options.maxNestingDepth,
				mark,
				message: `Nesting Depth exceeded max ${this.options.maxNestingDepth}\n${mark.toString()}`,
			});
		}
	}

	// ------------------------------------------------------------------------
	// Errors
	// ------------------------------------------------------------------------

	private fail(
		context: string | undefined,
		contextMark: Mark | undefined,
		problem: string,
		problemMark: Mark | undefined,
	): never {
		throw new ParserError(
			marked({
				...(context !== undefined ? { context } : {}),
				...(contextMark !== undefined ? { contextMark } : {}),
				problem,
				...(problemMark !== undefined ? { problemMark } : {}),
			}),
		);
	}
}
