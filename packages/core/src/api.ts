import { Either } from "effect";
import { Composer } from "./composer/composer.js";
import type { YamlNode } from "./composer/nodes.js";
import {
	type DumpOptions,
	dumpOptionsOrThrow,
	type LoadOptions,
	loadOptionsOrThrow,
	type ResolvedDumpOptions,
	type ResolvedLoadOptions,
	versionTuple,
} from "./config/options.js";
import { construct } from "./convert/construct.js";
import {
	type ConverterConfig,
	defaultConverterConfig,
	withLoadOptions,
} from "./convert/converter.js";
import { represent } from "./convert/represent.js";
import { Emitter, type EmitterOptions } from "./emitter/emitter.js";
import { Serializer, type SerializerOptions } from "./emitter/serializer.js";
import { StringSink, type YamlSink } from "./emitter/sink.js";
import type { Event } from "./parser/events.js";
import { Parser } from "./parser/parser.js";
import { Reader, type YamlSource } from "./reader/reader.js";
import { Scanner } from "./scanner/scanner.js";
import type { Token } from "./scanner/tokens.js";

// ============================================================================
// Pipeline assembly
// ============================================================================

const makeScanner = (source: YamlSource, options: ResolvedLoadOptions): Scanner =>
	new Scanner(
		new Reader(source, { name: options.sourceName, codePointLimit: options.codePointLimit }),
		{ processComments: options.processComments },
	);

const makeParser = (source: YamlSource, options: ResolvedLoadOptions): Parser =>
	new Parser(makeScanner(source, options), {
		resolver: options.resolver,
		maxNestingDepth: options.maxNestingDepth,
	});

const makeComposer = (source: YamlSource, options: ResolvedLoadOptions): Composer =>
	new Composer(makeParser(source, options), {
		maxAliasesForCollections: options.maxAliasesForCollections,
		allowRecursiveKeys: options.allowRecursiveKeys,
	});

/** Emitter settings taken from resolved dump options. */
export const emitterOptions = (options: ResolvedDumpOptions): EmitterOptions => ({
	canonical: options.canonical,
	indent: options.indent,
	indicatorIndent: options.indicatorIndent,
	indentWithIndicator: options.indentWithIndicator,
	width: options.width,
	splitLines: options.splitLines,
	allowUnicode: options.allowUnicode,
	lineBreak: options.lineBreak,
	prettyFlow: options.prettyFlow,
	maxSimpleKeyLength: options.maxSimpleKeyLength,
});

/** Serializer settings taken from resolved dump options. */
export const serializerOptions = (options: ResolvedDumpOptions): SerializerOptions => ({
	resolver: options.resolver,
	explicitStart: options.explicitStart,
	explicitEnd: options.explicitEnd,
	version: versionTuple(options.version),
	tags: options.tags,
	explicitRoot: options.explicitRoot,
	defaultFlowStyle: options.defaultFlowStyle,
	defaultScalarStyle: options.defaultScalarStyle,
	anchorName: options.anchorName,
});

// ============================================================================
// Load
// ============================================================================

/**
 * Tokens of a document stream, produced lazily.
 *
 * @throws ConfigurationError, ReaderError or ScannerError
 */
export const scan = (source: YamlSource, options?: LoadOptions): Iterable<Token> =>
	makeScanner(source, loadOptionsOrThrow(options));

/**
 * Events of a document stream, produced lazily. Every scalar and collection
 * event carries its resolved tag.
 *
 * @example
 * ```typescript
 * [...parse("- x")].map((e) => e.type)
 * // ["StreamStart", "DocumentStart", "SequenceStart", "Scalar",
 * //  "SequenceEnd", "DocumentEnd", "StreamEnd"]
 * ```
 */
export const parse = (source: YamlSource, options?: LoadOptions): Iterable<Event> =>
	makeParser(source, loadOptionsOrThrow(options));

/**
 * Composes the only document of a stream.
 *
 * @returns the root node, or null when the stream holds no document
 * @throws ComposerError when the stream holds more than one document
 */
export const load = (source: YamlSource, options?: LoadOptions): YamlNode | null =>
	makeComposer(source, loadOptionsOrThrow(options)).getSingleNode();

/**
 * Composes every document of a stream, one per iteration. Options are checked
 * immediately; the source is read as the iterator advances.
 *
 * @example
 * ```typescript
 * const roots = [...loadAll("a\n---\nb\n")]
 * roots.map((node) => node.kind === "scalar" && node.value) // ["a", "b"]
 * ```
 */
export const loadAll = (
	source: YamlSource,
	options?: LoadOptions,
): IterableIterator<YamlNode> => {
	const composer = makeComposer(source, loadOptionsOrThrow(options));
	return composer[Symbol.iterator]();
};

/**
 * Loads a single document and constructs its JavaScript value. An empty
 * stream yields null.
 *
 * @throws a load error, ConversionError or ConfigurationError
 */
export const loadValue = (
	source: YamlSource,
	options?: LoadOptions,
	converter: ConverterConfig = defaultConverterConfig,
): unknown => {
	const resolved = loadOptionsOrThrow(options);
	const node = makeComposer(source, resolved).getSingleNode();
	return Either.getOrThrowWith(
		construct(node, withLoadOptions(converter, resolved)),
		(error) => error,
	);
};

// ============================================================================
// Dump
// ============================================================================

/**
 * Serializes documents into `sink`. Returns the number of lines written.
 *
 * @throws ConfigurationError, SerializerError or EmitterError
 */
export const dumpTo = (
	sink: YamlSink,
	nodes: Iterable<YamlNode>,
	options?: DumpOptions,
): number => {
	const resolved = dumpOptionsOrThrow(options);
	const emitter = new Emitter(sink, emitterOptions(resolved));
	const serializer = new Serializer(emitter, serializerOptions(resolved));
	serializer.open();
	for (const node of nodes) {
		serializer.serialize(node);
	}
	serializer.close();
	return emitter.lines;
};

/**
 * Writes every node as its own document.
 *
 * @example
 * ```typescript
 * dumpAll([strNode("a"), strNode("b")]) // "a\n--- b\n"
 * ```
 */
export const dumpAll = (nodes: Iterable<YamlNode>, options?: DumpOptions): string => {
	const sink = new StringSink();
	dumpTo(sink, nodes, options);
	return sink.toString();
};

/**
 * Writes one node graph as a single document.
 *
 * @example
 * ```typescript
 * dump(load("a: [1, 2, {b: true}]")) // "a: [1, 2, {b: true}]\n"
 * ```
 */
export const dump = (node: YamlNode, options?: DumpOptions): string => dumpAll([node], options);

/**
 * Represents a JavaScript value and dumps it.
 *
 * @example
 * ```typescript
 * dumpValue({ a: [1, 2, { b: true }] }) // "a:\n- 1\n- 2\n- {b: true}\n"
 * ```
 *
 * @throws ConversionError or a dump error
 */
export const dumpValue = (
	value: unknown,
	options?: DumpOptions,
	converter: ConverterConfig = defaultConverterConfig,
): string => dump(Either.getOrThrowWith(represent(value, converter), (error) => error), options);

/**
 * Writes an event stream produced elsewhere. The events must form a whole
 * stream, from `StreamStart` to `StreamEnd`.
 *
 * @throws EmitterError when the events are out of order or incomplete
 */
export const emit = (events: Iterable<Event>, options?: DumpOptions): string => {
	const sink = new StringSink();
	const emitter = new Emitter(sink, emitterOptions(dumpOptionsOrThrow(options)));
	for (const event of events) {
		emitter.emit(event);
	}
	return sink.toString();
};
