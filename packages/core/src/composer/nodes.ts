import type { FlowStyle } from "../parser/events.js";
import type { Mark } from "../reader/mark.js";
import type { ScalarStyle } from "../scanner/tokens.js";
import { Tags } from "../resolver/tags.js";

// ============================================================================
// Node graph
// ============================================================================

interface NodeBase {
	/** Resolved tag; never empty once a node leaves the composer. */
	tag: string;
	readonly startMark: Mark | null;
	endMark: Mark | null;
	/** The anchor the node was declared with in the source, if any. */
	anchor: string | null;
}

export interface ScalarNode extends NodeBase {
	readonly kind: "scalar";
	value: string;
	style: ScalarStyle | null;
}

export interface SequenceNode extends NodeBase {
	readonly kind: "sequence";
	readonly value: Array<YamlNode>;
	flowStyle: FlowStyle;
	/** Set when the node contains itself through an alias. */
	twoStep: boolean;
}

export type NodeTuple = readonly [key: YamlNode, value: YamlNode];

export interface MappingNode extends NodeBase {
	readonly kind: "mapping";
	readonly value: Array<NodeTuple>;
	flowStyle: FlowStyle;
	twoStep: boolean;
	/** Whether the mapping carries `<<` merge keys to flatten on construction. */
	merged: boolean;
}

export type CollectionNode = SequenceNode | MappingNode;

/**
 * A node of the representation graph. Anchors and aliases are modelled by
 * identity: an aliased node appears at several places in the graph as the
 * same object, and a recursive collection contains itself.
 */
export type YamlNode = ScalarNode | SequenceNode | MappingNode;

// ============================================================================
// Factories
// ============================================================================

interface NodeOptions {
	readonly startMark?: Mark | null;
	readonly endMark?: Mark | null;
	readonly anchor?: string | null;
}

export const scalarNode = (
	tag: string,
	value: string,
	options: NodeOptions & { readonly style?: ScalarStyle | null } = {},
): ScalarNode => ({
	kind: "scalar",
	tag,
	value,
	style: options.style ?? null,
	startMark: options.startMark ?? null,
	endMark: options.endMark ?? null,
	anchor: options.anchor ?? null,
});

export const sequenceNode = (
	tag: string,
	value: Array<YamlNode> = [],
	options: NodeOptions & { readonly flowStyle?: FlowStyle } = {},
): SequenceNode => ({
	kind: "sequence",
	tag,
	value,
	flowStyle: options.flowStyle ?? null,
	twoStep: false,
	startMark: options.startMark ?? null,
	endMark: options.endMark ?? null,
	anchor: options.anchor ?? null,
});

export const mappingNode = (
	tag: string,
	value: Array<NodeTuple> = [],
	options: NodeOptions & { readonly flowStyle?: FlowStyle } = {},
): MappingNode => ({
	kind: "mapping",
	tag,
	value,
	flowStyle: options.flowStyle ?? null,
	twoStep: false,
	merged: false,
	startMark: options.startMark ?? null,
	endMark: options.endMark ?? null,
	anchor: options.anchor ?? null,
});

/** Shorthand for a `str` scalar. */
export const strNode = (value: string, style: ScalarStyle | null = null): ScalarNode =>
	scalarNode(Tags.STR, value, { style });

export const isCollection = (node: YamlNode): node is CollectionNode =>
	node.kind !== "scalar";

// ============================================================================
// Structural equality
// ============================================================================

export interface NodesEqualOptions {
	/** Compare scalar styles and flow styles as well. Defaults to ignoring them. */
	readonly ignoreStyle?: boolean;
}

/**
 * Compares two graphs by tag, kind and value, recursing into collections.
 * A pair of nodes already under comparison higher up is assumed equal, so
 * recursive graphs terminate.
 *
 * @example
 * ```typescript
 * nodesEqual(load("a: [1, 2]"), load("{a: [1, 2]}")) // true
 * nodesEqual(load("a: [1, 2]"), load("{a: [1, 2]}"), { ignoreStyle: false }) // false
 * ```
 */
export const nodesEqual = (
	a: YamlNode,
	b: YamlNode,
	options: NodesEqualOptions = {},
): boolean => {
	const ignoreStyle = options.ignoreStyle ?? true;
	const inProgress = new Map<YamlNode, Set<YamlNode>>();

	const visit = (left: YamlNode, right: YamlNode): boolean => {
		if (left === right) {
			return true;
		}
		if (left.tag !== right.tag) {
			return false;
		}
		if (left.kind === "scalar" || right.kind === "scalar") {
			return (
				left.kind === "scalar" &&
				right.kind === "scalar" &&
				left.value === right.value &&
				(ignoreStyle || left.style === right.style)
			);
		}
		if (left.kind !== right.kind || left.value.length !== right.value.length) {
			return false;
		}
		if (!ignoreStyle && left.flowStyle !== right.flowStyle) {
			return false;
		}

		const partners = inProgress.get(left) ?? new Set<YamlNode>();
		if (partners.has(right)) {
			return true;
		}
		partners.add(right);
		inProgress.set(left, partners);

		try {
			if (left.kind === "sequence" && right.kind === "sequence") {
				return left.value.every((item, i) => {
					const other = right.value[i];
					return other !== undefined && visit(item, other);
				});
			}
			if (left.kind === "mapping" && right.kind === "mapping") {
				return left.value.every(([key, value], i) => {
					const other = right.value[i];
					return other !== undefined && visit(key, other[0]) && visit(value, other[1]);
				});
			}
			return false;
		} finally {
			partners.delete(right);
		}
	};

	return visit(a, b);
};
