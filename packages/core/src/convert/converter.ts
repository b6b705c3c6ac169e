import { Either, Schema } from "effect";
import { ConfigurationError } from "../errors/conversion-errors.js";

// ============================================================================
// Tag definitions
// ============================================================================

export type KeyValuePair = readonly [key: unknown, value: unknown];

interface TagDefinitionBase<A> {
	/** Full tag, e.g. `"!point"` or `"tag:example.com,2024:point"`. */
	readonly tag: string;
	/** Recognises values to write with this tag. Without it the tag is load-only. */
	identify?(value: unknown): value is A;
}

export interface ScalarTagDefinition<A> extends TagDefinitionBase<A> {
	readonly kind: "scalar";
	/** Builds the value from the scalar text, or describes why it cannot. */
	construct(text: string): Either.Either<A, string>;
	represent?(value: A): string;
}

export interface SequenceTagDefinition<A> extends TagDefinitionBase<A> {
	readonly kind: "sequence";
	/** Builds the value from the already constructed items. */
	construct(items: ReadonlyArray<unknown>): Either.Either<A, string>;
	represent?(value: A): ReadonlyArray<unknown>;
}

export interface MappingTagDefinition<A> extends TagDefinitionBase<A> {
	readonly kind: "mapping";
	/** Builds the value from the already constructed key/value pairs, in order. */
	construct(pairs: ReadonlyArray<KeyValuePair>): Either.Either<A, string>;
	represent?(value: A): ReadonlyArray<KeyValuePair>;
}

/**
 * How an application tag maps onto a JavaScript value, for one node kind.
 * Content is always constructed first, so `construct` sees plain values.
 */
export type TagDefinition<A = unknown> =
	| ScalarTagDefinition<A>
	| SequenceTagDefinition<A>
	| MappingTagDefinition<A>;

/**
 * Freezes a tag definition. Identity function otherwise; it exists so the
 * value type `A` is inferred once and checked against every method.
 *
 * @example
 * ```typescript
 * const point = defineTag<{ x: number; y: number }>({
 *   tag: "!point",
 *   kind: "sequence",
 *   construct: ([x, y]) =>
 *     typeof x === "number" && typeof y === "number"
 *       ? Either.right({ x, y })
 *       : Either.left("expected two numbers"),
 *   identify: (value): value is { x: number; y: number } =>
 *     typeof value === "object" && value !== null && "x" in value && "y" in value,
 *   represent: (p) => [p.x, p.y],
 * })
 * ```
 */
export const defineTag = <A>(definition: TagDefinition<A>): TagDefinition<A> =>
	Object.freeze({ ...definition });

// ============================================================================
// Converter configuration
// ============================================================================

export interface ConverterConfig {
	readonly tags: ReadonlyMap<string, TagDefinition>;
	/** Construct mappings as plain objects or as `Map`s. */
	readonly mapping: "object" | "map";
	readonly allowDuplicateKeys: boolean;
	/** `keep` constructs nodes with unregistered tags as their plain kind. */
	readonly unknownTags: "error" | "keep";
}

const isTagDefinition = (input: unknown): input is TagDefinition =>
	typeof input === "object" &&
	input !== null &&
	"tag" in input &&
	typeof input.tag === "string" &&
	"kind" in input &&
	(input.kind === "scalar" || input.kind === "sequence" || input.kind === "mapping") &&
	"construct" in input &&
	typeof input.construct === "function";

const ConverterOptionsSchema = Schema.Struct({
	tags: Schema.optionalWith(
		Schema.Array(Schema.declare(isTagDefinition, { identifier: "TagDefinition" })),
		{ default: () => [] },
	),
	mapping: Schema.optionalWith(Schema.Literal("object", "map"), {
		default: () => "object" as const,
	}),
	allowDuplicateKeys: Schema.optionalWith(Schema.Boolean, { default: () => true }),
	unknownTags: Schema.optionalWith(Schema.Literal("error", "keep"), {
		default: () => "error" as const,
	}),
});

export type ConverterOptions = Schema.Schema.Encoded<typeof ConverterOptionsSchema>;

const decodeConverterOptions = Schema.decodeUnknownEither(ConverterOptionsSchema);

/**
 * Builds an immutable converter configuration. A tag registered twice keeps
 * the later definition and logs a warning.
 *
 * @throws ConfigurationError when an option is malformed
 */
export const makeConverterConfig = (options: ConverterOptions = {}): ConverterConfig => {
	const decoded = decodeConverterOptions(options);
	if (Either.isLeft(decoded)) {
		throw new ConfigurationError({
			option: "converter",
			message: `Invalid converter options: ${decoded.left.message}`,
		});
	}
	const resolved = decoded.right;
	const tags = new Map<string, TagDefinition>();
	for (const definition of resolved.tags) {
		if (tags.has(definition.tag)) {
			console.warn(
				`Tag '${definition.tag}' is defined more than once. The last definition wins.`,
			);
		}
		tags.set(definition.tag, definition);
	}
	return Object.freeze({
		tags,
		mapping: resolved.mapping,
		allowDuplicateKeys: resolved.allowDuplicateKeys,
		unknownTags: resolved.unknownTags,
	});
};

export const defaultConverterConfig: ConverterConfig = makeConverterConfig();

/**
 * The converter as seen by a load: duplicate keys are rejected when either
 * the converter or the load options reject them.
 */
export const withLoadOptions = (
	config: ConverterConfig,
	load: { readonly allowDuplicateKeys: boolean },
): ConverterConfig =>
	config.allowDuplicateKeys && !load.allowDuplicateKeys
		? Object.freeze({ ...config, allowDuplicateKeys: false })
		: config;
