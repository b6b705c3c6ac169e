import { ComposerError, marked } from "../errors/yaml-errors.js";
import type {
	AliasEvent,
	Event,
	MappingStartEvent,
	ScalarEvent,
	SequenceStartEvent,
} from "../parser/events.js";
import type { Parser } from "../parser/parser.js";
import type { Mark } from "../reader/mark.js";
import { Tags } from "../resolver/tags.js";
import {
	type CollectionNode,
	isCollection,
	type MappingNode,
	mappingNode,
	type ScalarNode,
	scalarNode,
	type SequenceNode,
	sequenceNode,
	type YamlNode,
} from "./nodes.js";

// ============================================================================
// Types
// ============================================================================

export interface ComposerOptions {
	/** Aliases to collections accepted per document. */
	readonly maxAliasesForCollections: number;
	/** Accept a mapping key that contains the mapping itself. */
	readonly allowRecursiveKeys: boolean;
}

// ============================================================================
// Composer
// ============================================================================

/**
 * Builds one node graph per document from parser events.
 *
 * Anchored nodes are registered as soon as they are allocated, before their
 * children are composed, so an alias inside a collection's own subtree
 * resolves to the collection itself. Such collections are flagged `twoStep`.
 */
export class Composer implements Iterable<YamlNode> {
	private readonly anchors = new Map<string, { node: YamlNode; mark: Mark | null }>();
	/** Collections whose children are being composed, outermost first. */
	private readonly composing = new Set<CollectionNode>();
	private collectionAliases = 0;

	constructor(
		private readonly parser: Parser,
		private readonly options: ComposerOptions,
	) {}

	// ------------------------------------------------------------------------
	// Public interface
	// ------------------------------------------------------------------------

	/** Whether another document follows. */
	checkNode(): boolean {
		if (this.parser.checkEvent("StreamStart")) {
			this.parser.getEvent();
		}
		return !this.parser.checkEvent("StreamEnd");
	}

	/** The next document's root, or null once the stream is exhausted. */
	getNode(): YamlNode | null {
		return this.checkNode() ? this.composeDocument() : null;
	}

	/**
	 * The root of the only document in the stream, or null for an empty stream.
	 * Fails when a second document follows.
	 */
	getSingleNode(): YamlNode | null {
		this.expect("StreamStart");
		let document: YamlNode | null = null;
		if (!this.parser.checkEvent("StreamEnd")) {
			document = this.composeDocument();
		}
		if (!this.parser.checkEvent("StreamEnd")) {
			const next = this.parser.peekEvent();
			this.fail({
				context: "expected a single document in the stream",
				...(document?.startMark ? { contextMark: document.startMark } : {}),
				problem: "but found another document",
				...(next?.startMark ? { problemMark: next.startMark } : {}),
			});
		}
		this.expect("StreamEnd");
		return document;
	}

	*[Symbol.iterator](): Generator<YamlNode> {
		for (;;) {
			const node = this.getNode();
			if (node === null) {
				return;
			}
			yield node;
		}
	}

	// ------------------------------------------------------------------------
	// Documents
	// ------------------------------------------------------------------------

	private composeDocument(): YamlNode {
		this.expect("DocumentStart");
		const node = this.composeNode(null);
		this.expect("DocumentEnd");
		this.anchors.clear();
		this.collectionAliases = 0;
		return node;
	}

	private composeNode(parent: CollectionNode | null): YamlNode {
		const event = this.nextEvent();
		switch (event.type) {
			case "Alias":
				return this.composeAlias(event);
			case "Scalar":
				return this.composeScalar(event);
			case "SequenceStart":
				return this.composeSequence(event);
			case "MappingStart":
				return this.composeMapping(event);
			default:
				return this.fail({
					context: parent === null ? "while composing a document" : "while composing a collection",
					...(parent?.startMark ? { contextMark: parent.startMark } : {}),
					problem: `expected a node, but found ${event.type}`,
					...(event.startMark ? { problemMark: event.startMark } : {}),
				});
		}
	}

	// ------------------------------------------------------------------------
	// Nodes
	// ------------------------------------------------------------------------

	private composeAlias(event: AliasEvent): YamlNode {
		const entry = this.anchors.get(event.anchor);
		if (entry === undefined) {
			return this.fail({
				problem: `found undefined alias '${event.anchor}'`,
				...(event.startMark ? { problemMark: event.startMark } : {}),
			});
		}
		const node = entry.node;
		if (isCollection(node)) {
			this.collectionAliases++;
			if (this.collectionAliases > this.options.maxAliasesForCollections) {
				this.fail({
					problem: `Number of aliases for non-scalar nodes exceeds the specified max=${this.options.maxAliasesForCollections}`,
					...(event.startMark ? { problemMark: event.startMark } : {}),
				});
			}
			if (this.composing.has(node)) {
				node.twoStep = true;
			}
		}
		return node;
	}

	private composeScalar(event: ScalarEvent): ScalarNode {
		const node = scalarNode(event.tag ?? Tags.STR, event.value, {
			style: event.style,
			startMark: event.startMark,
			endMark: event.endMark,
			anchor: event.anchor,
		});
		this.register(event, node);
		return node;
	}

	private composeSequence(event: SequenceStartEvent): SequenceNode {
		const node = sequenceNode(event.tag ?? Tags.SEQ, [], {
			flowStyle: event.flowStyle,
			startMark: event.startMark,
			anchor: event.anchor,
		});
		this.register(event, node);
		this.composing.add(node);
		while (!this.parser.checkEvent("SequenceEnd")) {
			node.value.push(this.composeNode(node));
		}
		this.composing.delete(node);
		node.endMark = this.expect("SequenceEnd").endMark;
		return node;
	}

	private composeMapping(event: MappingStartEvent): MappingNode {
		const node = mappingNode(event.tag ?? Tags.MAP, [], {
			flowStyle: event.flowStyle,
			startMark: event.startMark,
			anchor: event.anchor,
		});
		this.register(event, node);
		this.composing.add(node);
		while (!this.parser.checkEvent("MappingEnd")) {
			const key = this.composeNode(node);
			if (key.tag === Tags.MERGE) {
				node.merged = true;
			}
			if (!this.options.allowRecursiveKeys && isCollection(key) && this.isRecursive(key)) {
				this.fail({
					context: "while composing a mapping",
					...(node.startMark ? { contextMark: node.startMark } : {}),
					problem: "found a recursive key for mapping; recursive keys are not allowed",
					...(key.startMark ? { problemMark: key.startMark } : {}),
				});
			}
			const value = this.composeNode(node);
			node.value.push([key, value]);
		}
		this.composing.delete(node);
		node.endMark = this.expect("MappingEnd").endMark;
		return node;
	}

	/** A key is recursive when it is, or is still composing inside, one of its ancestors. */
	private isRecursive(key: CollectionNode): boolean {
		return key.twoStep || this.composing.has(key);
	}

	private register(
		event: ScalarEvent | SequenceStartEvent | MappingStartEvent,
		node: YamlNode,
	): void {
		if (event.anchor === null) {
			return;
		}
		const previous = this.anchors.get(event.anchor);
		if (previous !== undefined) {
			this.fail({
				context: `found duplicate anchor '${event.anchor}'; first occurrence`,
				...(previous.mark ? { contextMark: previous.mark } : {}),
				problem: "second occurrence",
				...(event.startMark ? { problemMark: event.startMark } : {}),
			});
		}
		this.anchors.set(event.anchor, { node, mark: event.startMark });
	}

	// ------------------------------------------------------------------------
	// Event access
	// ------------------------------------------------------------------------

	private nextEvent(): Event {
		const event = this.parser.getEvent();
		if (event === undefined) {
			return this.fail({ problem: "unexpected end of the event stream" });
		}
		return event;
	}

	private expect<T extends Event["type"]>(type: T): Extract<Event, { type: T }> {
		const event = this.nextEvent();
		if (!isEventOf(event, type)) {
			return this.fail({
				problem: `expected ${type}, but found ${event.type}`,
				...(event.startMark ? { problemMark: event.startMark } : {}),
			});
		}
		return event;
	}

	private fail(input: Parameters<typeof marked>[0]): never {
		throw new ComposerError(marked(input));
	}
}

const isEventOf = <T extends Event["type"]>(
	event: Event,
	type: T,
): event is Extract<Event, { type: T }> => event.type === type;
