import { Either, Schema } from "effect";
import { ConfigurationError } from "../errors/conversion-errors.js";
import { Resolver } from "../resolver/resolver.js";

// ============================================================================
// Shared pieces
// ============================================================================

const ResolverSchema = Schema.declare(
	(input: unknown): input is Resolver => input instanceof Resolver,
	{ identifier: "Resolver" },
);

const AnchorNameSchema = Schema.declare(
	(input: unknown): input is (n: number) => string => typeof input === "function",
	{ identifier: "AnchorName" },
);

const flag = (value: boolean) =>
	Schema.optionalWith(Schema.Boolean, { default: () => value });

const int = (value: number, schema: Schema.Schema<number> = Schema.Int) =>
	Schema.optionalWith(schema, { default: () => value });

// ============================================================================
// Load options
// ============================================================================

/**
 * Options accepted by `load`, `loadAll`, `scan` and `parse`. Every field is
 * optional; defaults are filled in by {@link resolveLoadOptions}.
 */
export const LoadOptionsSchema = Schema.Struct({
	/** Name shown in error marks. */
	sourceName: Schema.optionalWith(Schema.String, { default: () => "<reader>" }),
	maxNestingDepth: int(50, Schema.Int.pipe(Schema.positive())),
	maxAliasesForCollections: int(50, Schema.Int.pipe(Schema.nonNegative())),
	allowRecursiveKeys: flag(false),
	allowDuplicateKeys: flag(true),
	codePointLimit: int(3 * 1024 * 1024, Schema.Int.pipe(Schema.positive())),
	processComments: flag(false),
	resolver: Schema.optionalWith(ResolverSchema, { default: () => Resolver.default }),
});

export type LoadOptions = Schema.Schema.Encoded<typeof LoadOptionsSchema>;
export type ResolvedLoadOptions = Schema.Schema.Type<typeof LoadOptionsSchema>;

// ============================================================================
// Dump options
// ============================================================================

export const DumpOptionsSchema = Schema.Struct({
	/** Preferred line width; zero or less disables folding. */
	width: int(80),
	indent: int(2, Schema.Int.pipe(Schema.between(1, 9))),
	indicatorIndent: int(0, Schema.Int.pipe(Schema.nonNegative())),
	indentWithIndicator: flag(false),
	defaultFlowStyle: Schema.optionalWith(Schema.Literal("auto", "flow", "block"), {
		default: () => "auto" as const,
	}),
	defaultScalarStyle: Schema.optionalWith(
		Schema.Literal("plain", "single-quoted", "double-quoted", "literal", "folded"),
		{ default: () => "plain" as const },
	),
	explicitStart: flag(false),
	explicitEnd: flag(false),
	canonical: flag(false),
	lineBreak: Schema.optionalWith(Schema.Literal("unix", "windows", "mac"), {
		default: () => "unix" as const,
	}),
	allowUnicode: flag(true),
	splitLines: flag(true),
	prettyFlow: flag(false),
	version: Schema.optionalWith(Schema.NullOr(Schema.Literal("1.0", "1.1")), {
		default: () => null,
	}),
	/** `%TAG` directives written at the start of every document, handle to prefix. */
	tags: Schema.optionalWith(
		Schema.NullOr(Schema.Record({ key: Schema.String, value: Schema.String })),
		{ default: () => null },
	),
	explicitRoot: Schema.optionalWith(Schema.NullOr(Schema.String), { default: () => null }),
	maxSimpleKeyLength: int(128, Schema.Int.pipe(Schema.between(1, 1024))),
	resolver: Schema.optionalWith(ResolverSchema, { default: () => Resolver.default }),
	anchorName: Schema.optional(AnchorNameSchema),
});

export type DumpOptions = Schema.Schema.Encoded<typeof DumpOptionsSchema>;
export type ResolvedDumpOptions = Schema.Schema.Type<typeof DumpOptionsSchema>;

// ============================================================================
// Decoding
// ============================================================================

const decodeLoad = Schema.decodeUnknownEither(LoadOptionsSchema);
const decodeDump = Schema.decodeUnknownEither(DumpOptionsSchema);

/**
 * Fills in defaults and validates load options.
 *
 * @example
 * ```typescript
 * resolveLoadOptions({ maxNestingDepth: 10 })
 * // Either.right({ sourceName: "<reader>", maxNestingDepth: 10, ... })
 * resolveLoadOptions({ maxNestingDepth: -1 })
 * // Either.left(ConfigurationError)
 * ```
 */
export const resolveLoadOptions = (
	options: LoadOptions = {},
): Either.Either<ResolvedLoadOptions, ConfigurationError> =>
	decodeLoad(options).pipe(
		Either.mapLeft(
			(parseError) =>
				new ConfigurationError({
					option: "load",
					message: `Invalid load options: ${parseError.message}`,
				}),
		),
	);

export const resolveDumpOptions = (
	options: DumpOptions = {},
): Either.Either<ResolvedDumpOptions, ConfigurationError> =>
	decodeDump(options).pipe(
		Either.mapLeft(
			(parseError) =>
				new ConfigurationError({
					option: "dump",
					message: `Invalid dump options: ${parseError.message}`,
				}),
		),
		Either.flatMap((resolved) =>
			resolved.indicatorIndent >= resolved.indent
				? Either.left(
						new ConfigurationError({
							option: "dump",
							message: `Invalid dump options: indicatorIndent (${resolved.indicatorIndent}) must be smaller than indent (${resolved.indent})`,
						}),
					)
				: Either.right(resolved),
		),
	);

/** Synchronous form of {@link resolveLoadOptions}; throws `ConfigurationError`. */
export const loadOptionsOrThrow = (options?: LoadOptions): ResolvedLoadOptions =>
	Either.getOrThrowWith(resolveLoadOptions(options), (error) => error);

/** Synchronous form of {@link resolveDumpOptions}; throws `ConfigurationError`. */
export const dumpOptionsOrThrow = (options?: DumpOptions): ResolvedDumpOptions =>
	Either.getOrThrowWith(resolveDumpOptions(options), (error) => error);

/** The `[major, minor]` pair for a `version` option. */
export const versionTuple = (
	version: ResolvedDumpOptions["version"],
): readonly [number, number] | null => (version === "1.0" ? [1, 0] : version === "1.1" ? [1, 1] : null);
