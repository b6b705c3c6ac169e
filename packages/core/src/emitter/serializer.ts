import type { YamlNode } from "../composer/nodes.js";
import { SerializerError } from "../errors/yaml-errors.js";
import { type Event, Events, type FlowStyle } from "../parser/events.js";
import type { Resolver } from "../resolver/resolver.js";
import type { ScalarStyle } from "../scanner/tokens.js";
import { isMultilineText } from "./analysis.js";

// ============================================================================
// Types
// ============================================================================

/** How collections without a flow style of their own are laid out. */
export type DefaultFlowStyle = "auto" | "flow" | "block";

export interface SerializerOptions {
	readonly resolver: Resolver;
	readonly explicitStart: boolean;
	readonly explicitEnd: boolean;
	readonly version: readonly [number, number] | null;
	readonly tags: Readonly<Record<string, string>> | null;
	/** Tag forced onto every document's root node. */
	readonly explicitRoot: string | null;
	readonly defaultFlowStyle: DefaultFlowStyle;
	/** Style for scalars without one; `plain` lets the emitter choose. */
	readonly defaultScalarStyle: ScalarStyle;
	/** Names the nth (1-based) anchor the serializer has to invent. */
	readonly anchorName?: (n: number) => string;
}

/** Anything that accepts events, usually an `Emitter`. */
export interface EventTarget {
	emit(event: Event): void;
}

export const defaultAnchorName = (n: number): string => `id${String(n).padStart(3, "0")}`;

// ============================================================================
// Anchor assignment
// ============================================================================

/**
 * Walks the graph once and names every node reached more than once, either
 * through two parents or through a cycle. A node keeps the anchor it was
 * loaded with when it has one.
 */
const assignAnchors = (
	root: YamlNode,
	anchorName: (n: number) => string,
): Map<YamlNode, string> => {
	const seen = new Set<YamlNode>();
	const shared: Array<YamlNode> = [];
	const sharedSet = new Set<YamlNode>();
	const pending: Array<YamlNode> = [root];

	while (pending.length > 0) {
		const node = pending.pop();
		if (node === undefined) {
			break;
		}
		if (seen.has(node)) {
			if (!sharedSet.has(node)) {
				sharedSet.add(node);
				shared.push(node);
			}
			continue;
		}
		seen.add(node);
		if (node.kind === "sequence") {
			pending.push(...[...node.value].reverse());
		} else if (node.kind === "mapping") {
			for (const [key, value] of [...node.value].reverse()) {
				pending.push(value, key);
			}
		}
	}

	const names = new Map<YamlNode, string>();
	const used = new Set<string>();
	for (const node of shared) {
		if (node.anchor !== null && !used.has(node.anchor)) {
			names.set(node, node.anchor);
			used.add(node.anchor);
		}
	}
	let counter = 0;
	for (const node of shared) {
		if (names.has(node)) {
			continue;
		}
		let name: string;
		do {
			counter++;
			name = anchorName(counter);
		} while (used.has(name));
		names.set(node, name);
		used.add(name);
	}
	return names;
};

// ============================================================================
// Event generation
// ============================================================================

const collectionFlowStyle = (
	style: FlowStyle,
	children: ReadonlyArray<YamlNode>,
	defaultFlowStyle: DefaultFlowStyle,
): FlowStyle => {
	if (style !== null) {
		return style;
	}
	switch (defaultFlowStyle) {
		case "flow":
			return true;
		case "block":
			return false;
		case "auto":
			return children.every(
				(child) =>
					child.kind === "scalar" &&
					(child.style === "plain" || (child.style === null && !isMultilineText(child.value))),
			);
	}
};

/**
 * Yields the events of one document. Shared nodes are written once with an
 * anchor and referenced through aliases afterwards; tags the resolver would
 * infer from the text are marked implicit so the emitter can leave them out.
 */
export function* documentEvents(node: YamlNode, options: SerializerOptions): Generator<Event> {
	const anchors = assignAnchors(node, options.anchorName ?? defaultAnchorName);
	const serialized = new Set<YamlNode>();
	const resolver = options.resolver;

	function* serializeNode(current: YamlNode, tag: string): Generator<Event> {
		const anchor = anchors.get(current) ?? null;
		if (serialized.has(current)) {
			if (anchor === null) {
				throw new SerializerError({ message: "a node was reached twice without an anchor" });
			}
			yield Events.alias(anchor);
			return;
		}
		serialized.add(current);

		switch (current.kind) {
			case "scalar": {
				const style =
					current.style ??
					(options.defaultScalarStyle === "plain" ? null : options.defaultScalarStyle);
				yield Events.scalar(current.value, {
					anchor,
					tag,
					implicit: {
						plain: tag === resolver.resolve("scalar", current.value, true),
						quoted: tag === resolver.resolve("scalar", current.value, false),
					},
					style,
				});
				return;
			}
			case "sequence": {
				yield Events.sequenceStart({
					anchor,
					tag,
					implicit: tag === resolver.resolve("sequence", null, true),
					flowStyle: collectionFlowStyle(
						current.flowStyle,
						current.value,
						options.defaultFlowStyle,
					),
				});
				for (const item of current.value) {
					yield* serializeNode(item, item.tag);
				}
				yield Events.sequenceEnd();
				return;
			}
			case "mapping": {
				yield Events.mappingStart({
					anchor,
					tag,
					implicit: tag === resolver.resolve("mapping", null, true),
					flowStyle: collectionFlowStyle(
						current.flowStyle,
						current.value.flatMap((pair) => pair),
						options.defaultFlowStyle,
					),
				});
				for (const [key, value] of current.value) {
					yield* serializeNode(key, key.tag);
					yield* serializeNode(value, value.tag);
				}
				yield Events.mappingEnd();
				return;
			}
		}
	}

	yield Events.documentStart({
		explicit: options.explicitStart,
		version: options.version,
		tags: options.tags,
	});
	yield* serializeNode(node, options.explicitRoot ?? node.tag);
	yield Events.documentEnd(options.explicitEnd);
}

/**
 * The full event stream for a sequence of documents.
 *
 * @example
 * ```typescript
 * const events = [...serializeEvents([load("a: 1")], options)]
 * events.map((e) => e.type)
 * // ["StreamStart", "DocumentStart", "MappingStart", "Scalar", "Scalar",
 * //  "MappingEnd", "DocumentEnd", "StreamEnd"]
 * ```
 */
export function* serializeEvents(
	nodes: Iterable<YamlNode>,
	options: SerializerOptions,
): Generator<Event> {
	yield Events.streamStart();
	for (const node of nodes) {
		yield* documentEvents(node, options);
	}
	yield Events.streamEnd();
}

// ============================================================================
// Serializer
// ============================================================================

/**
 * Pushes documents into an event target between one `open` and one `close`.
 */
export class Serializer {
	private phase: "new" | "open" | "closed" = "new";

	constructor(
		private readonly target: EventTarget,
		private readonly options: SerializerOptions,
	) {}

	open(): void {
		if (this.phase === "closed") {
			throw new SerializerError({ message: "serializer is closed" });
		}
		if (this.phase === "open") {
			throw new SerializerError({ message: "serializer is already opened" });
		}
		this.target.emit(Events.streamStart());
		this.phase = "open";
	}

	close(): void {
		if (this.phase === "new") {
			throw new SerializerError({ message: "serializer is not opened" });
		}
		if (this.phase === "open") {
			this.target.emit(Events.streamEnd());
			this.phase = "closed";
		}
	}

	serialize(node: YamlNode): void {
		if (this.phase === "new") {
			throw new SerializerError({ message: "serializer is not opened" });
		}
		if (this.phase === "closed") {
			throw new SerializerError({ message: "serializer is closed" });
		}
		for (const event of documentEvents(node, this.options)) {
			this.target.emit(event);
		}
	}
}
