import type { Mark } from "../reader/mark.js";
import type { ScalarStyle } from "../scanner/tokens.js";

// ============================================================================
// Event types
// ============================================================================

/** `true` for `[...]`/`{...}`, `false` for block style, `null` to let the emitter decide. */
export type FlowStyle = boolean | null;

/**
 * Whether a scalar's tag can be left out: `plain` when it would be resolved
 * back from a plain scalar, `quoted` when it would be resolved back from a
 * quoted one.
 */
export interface ImplicitTuple {
	readonly plain: boolean;
	readonly quoted: boolean;
}

interface EventBase {
	readonly startMark: Mark | null;
	readonly endMark: Mark | null;
}

export interface StreamStartEvent extends EventBase {
	readonly type: "StreamStart";
}

export interface StreamEndEvent extends EventBase {
	readonly type: "StreamEnd";
}

export interface DocumentStartEvent extends EventBase {
	readonly type: "DocumentStart";
	readonly explicit: boolean;
	readonly version: readonly [number, number] | null;
	/** Tag handle to prefix, as declared by %TAG directives. */
	readonly tags: Readonly<Record<string, string>> | null;
}

export interface DocumentEndEvent extends EventBase {
	readonly type: "DocumentEnd";
	readonly explicit: boolean;
}

export interface AliasEvent extends EventBase {
	readonly type: "Alias";
	readonly anchor: string;
}

export interface ScalarEvent extends EventBase {
	readonly type: "Scalar";
	readonly anchor: string | null;
	readonly tag: string | null;
	readonly implicit: ImplicitTuple;
	readonly value: string;
	/** null lets the emitter choose */
	readonly style: ScalarStyle | null;
}

export interface SequenceStartEvent extends EventBase {
	readonly type: "SequenceStart";
	readonly anchor: string | null;
	readonly tag: string | null;
	readonly implicit: boolean;
	readonly flowStyle: FlowStyle;
}

export interface SequenceEndEvent extends EventBase {
	readonly type: "SequenceEnd";
}

export interface MappingStartEvent extends EventBase {
	readonly type: "MappingStart";
	readonly anchor: string | null;
	readonly tag: string | null;
	readonly implicit: boolean;
	readonly flowStyle: FlowStyle;
}

export interface MappingEndEvent extends EventBase {
	readonly type: "MappingEnd";
}

export type Event =
	| StreamStartEvent
	| StreamEndEvent
	| DocumentStartEvent
	| DocumentEndEvent
	| AliasEvent
	| ScalarEvent
	| SequenceStartEvent
	| SequenceEndEvent
	| MappingStartEvent
	| MappingEndEvent;

export type EventType = Event["type"];

export type CollectionStartEvent = SequenceStartEvent | MappingStartEvent;

// ============================================================================
// Constructors
// ============================================================================

/**
 * Event builders for producers that do not read text, such as the serializer
 * or an application streaming its own data into the emitter. Marks default
 * to null and anchors/tags to absent.
 *
 * @example
 * ```typescript
 * const events = [
 *   Events.streamStart(),
 *   Events.documentStart(),
 *   Events.scalar("hello"),
 *   Events.documentEnd(),
 *   Events.streamEnd(),
 * ]
 * ```
 */
export const Events = {
	streamStart: (): StreamStartEvent => ({
		type: "StreamStart",
		startMark: null,
		endMark: null,
	}),
	streamEnd: (): StreamEndEvent => ({
		type: "StreamEnd",
		startMark: null,
		endMark: null,
	}),
	documentStart: (
		options: {
			readonly explicit?: boolean;
			readonly version?: readonly [number, number] | null;
			readonly tags?: Readonly<Record<string, string>> | null;
		} = {},
	): DocumentStartEvent => ({
		type: "DocumentStart",
		explicit: options.explicit ?? false,
		version: options.version ?? null,
		tags: options.tags ?? null,
		startMark: null,
		endMark: null,
	}),
	documentEnd: (explicit = false): DocumentEndEvent => ({
		type: "DocumentEnd",
		explicit,
		startMark: null,
		endMark: null,
	}),
	alias: (anchor: string): AliasEvent => ({
		type: "Alias",
		anchor,
		startMark: null,
		endMark: null,
	}),
	scalar: (
		value: string,
		options: {
			readonly anchor?: string | null;
			readonly tag?: string | null;
			readonly implicit?: ImplicitTuple;
			readonly style?: ScalarStyle | null;
		} = {},
	): ScalarEvent => ({
		type: "Scalar",
		value,
		anchor: options.anchor ?? null,
		tag: options.tag ?? null,
		implicit: options.implicit ?? { plain: true, quoted: true },
		style: options.style ?? null,
		startMark: null,
		endMark: null,
	}),
	sequenceStart: (
		options: {
			readonly anchor?: string | null;
			readonly tag?: string | null;
			readonly implicit?: boolean;
			readonly flowStyle?: FlowStyle;
		} = {},
	): SequenceStartEvent => ({
		type: "SequenceStart",
		anchor: options.anchor ?? null,
		tag: options.tag ?? null,
		implicit: options.implicit ?? true,
		flowStyle: options.flowStyle ?? null,
		startMark: null,
		endMark: null,
	}),
	sequenceEnd: (): SequenceEndEvent => ({
		type: "SequenceEnd",
		startMark: null,
		endMark: null,
	}),
	mappingStart: (
		options: {
			readonly anchor?: string | null;
			readonly tag?: string | null;
			readonly implicit?: boolean;
			readonly flowStyle?: FlowStyle;
		} = {},
	): MappingStartEvent => ({
		type: "MappingStart",
		anchor: options.anchor ?? null,
		tag: options.tag ?? null,
		implicit: options.implicit ?? true,
		flowStyle: options.flowStyle ?? null,
		startMark: null,
		endMark: null,
	}),
	mappingEnd: (): MappingEndEvent => ({
		type: "MappingEnd",
		startMark: null,
		endMark: null,
	}),
} as const;
