/**
 * Main entry point for the yamlpipe library.
 *
 * Exports the synchronous load and dump pipelines, the converter layer
 * between nodes and JavaScript values, and the Effect service over both.
 */

// ============================================================================
// Load and Dump API
// ============================================================================

export {
	dump,
	dumpAll,
	dumpTo,
	dumpValue,
	emit,
	emitterOptions,
	load,
	loadAll,
	loadValue,
	parse,
	scan,
	serializerOptions,
} from "./api.js";

// ============================================================================
// Effect Service
// ============================================================================

export {
	makeYamlCodecLayer,
	YamlCodec,
	YamlCodecLive,
} from "./service.js";
export type { YamlCodecOptions, YamlCodecShape } from "./service.js";

export { yamlCodec } from "./codec/format-codec.js";
export type { FormatCodec, FormatOptions } from "./codec/format-codec.js";

// ============================================================================
// Configuration
// ============================================================================

export {
	DumpOptionsSchema,
	dumpOptionsOrThrow,
	LoadOptionsSchema,
	loadOptionsOrThrow,
	resolveDumpOptions,
	resolveLoadOptions,
} from "./config/options.js";
export type {
	DumpOptions,
	LoadOptions,
	ResolvedDumpOptions,
	ResolvedLoadOptions,
} from "./config/options.js";

// ============================================================================
// Pipeline Stages
// ============================================================================

export { Mark } from "./reader/mark.js";
export { decodeSource, Reader } from "./reader/reader.js";
export type { ReaderOptions, SourceEncoding, YamlSource } from "./reader/reader.js";

export { Scanner } from "./scanner/scanner.js";
export type { ScannerOptions } from "./scanner/scanner.js";
export type { ScalarStyle, Token, TokenType } from "./scanner/tokens.js";

export { Parser } from "./parser/parser.js";
export type { ParserOptions } from "./parser/parser.js";
export { Events } from "./parser/events.js";
export type { Event, EventType, FlowStyle, ImplicitTuple } from "./parser/events.js";

export { Resolver } from "./resolver/resolver.js";
export type { ImplicitResolver, ResolverOptions } from "./resolver/resolver.js";
export { isCoreTag, TAG_PREFIX, Tags } from "./resolver/tags.js";
export type { CoreTag, NodeKind } from "./resolver/tags.js";

export { Composer } from "./composer/composer.js";
export type { ComposerOptions } from "./composer/composer.js";
export {
	isCollection,
	mappingNode,
	nodesEqual,
	scalarNode,
	sequenceNode,
	strNode,
} from "./composer/nodes.js";
export type {
	CollectionNode,
	MappingNode,
	NodeTuple,
	ScalarNode,
	SequenceNode,
	YamlNode,
} from "./composer/nodes.js";

export { defaultAnchorName, documentEvents, Serializer, serializeEvents } from "./emitter/serializer.js";
export type { DefaultFlowStyle, EventTarget, SerializerOptions } from "./emitter/serializer.js";
export { defaultEmitterOptions, Emitter } from "./emitter/emitter.js";
export type { EmitterOptions, LineBreak } from "./emitter/emitter.js";
export { StringSink } from "./emitter/sink.js";
export type { YamlSink } from "./emitter/sink.js";

// ============================================================================
// Converter
// ============================================================================

export { construct } from "./convert/construct.js";
export { represent } from "./convert/represent.js";
export {
	defaultConverterConfig,
	defineTag,
	makeConverterConfig,
	withLoadOptions,
} from "./convert/converter.js";
export type {
	ConverterConfig,
	ConverterOptions,
	KeyValuePair,
	MappingTagDefinition,
	ScalarTagDefinition,
	SequenceTagDefinition,
	TagDefinition,
} from "./convert/converter.js";

// ============================================================================
// Errors
// ============================================================================

export {
	ComposerError,
	ConfigurationError,
	ConversionError,
	EmitterError,
	marked,
	NestingDepthExceededError,
	ParserError,
	ReaderError,
	ResolverError,
	ScannerError,
	SerializerError,
} from "./errors/index.js";
export type {
	DumpError,
	LoadError,
	MarkedErrorFields,
	MarkedErrorInput,
	YamlError,
} from "./errors/index.js";
