import { Context, Effect, Layer } from "effect";
import * as Api from "./api.js";
import type { YamlNode } from "./composer/nodes.js";
import {
	type DumpOptions,
	type LoadOptions,
	resolveDumpOptions,
	resolveLoadOptions,
} from "./config/options.js";
import { construct } from "./convert/construct.js";
import {
	type ConverterOptions,
	makeConverterConfig,
	withLoadOptions,
} from "./convert/converter.js";
import { represent } from "./convert/represent.js";
import { ConfigurationError, type ConversionError } from "./errors/conversion-errors.js";
import {
	ComposerError,
	type DumpError,
	EmitterError,
	type LoadError,
	NestingDepthExceededError,
	ParserError,
	ReaderError,
	ScannerError,
	SerializerError,
} from "./errors/yaml-errors.js";
import type { YamlSource } from "./reader/reader.js";

// ============================================================================
// YamlCodec Effect Service
// ============================================================================

export interface YamlCodecShape {
	/** `sourceName`, when given, replaces the configured one in error marks. */
	readonly load: (
		source: YamlSource,
		sourceName?: string,
	) => Effect.Effect<YamlNode | null, LoadError>;
	readonly loadAll: (
		source: YamlSource,
		sourceName?: string,
	) => Effect.Effect<ReadonlyArray<YamlNode>, LoadError>;
	readonly dump: (node: YamlNode) => Effect.Effect<string, DumpError>;
	readonly dumpAll: (nodes: Iterable<YamlNode>) => Effect.Effect<string, DumpError>;
	/** Text to JavaScript value, through the configured converter. */
	readonly decode: (
		source: YamlSource,
		sourceName?: string,
	) => Effect.Effect<unknown, LoadError | ConversionError>;
	/** JavaScript value to text, through the configured converter. */
	readonly encode: (value: unknown) => Effect.Effect<string, DumpError | ConversionError>;
}

export class YamlCodec extends Context.Tag("YamlCodec")<YamlCodec, YamlCodecShape>() {}

export interface YamlCodecOptions {
	readonly load?: LoadOptions;
	readonly dump?: DumpOptions;
	readonly converter?: ConverterOptions;
}

// ============================================================================
// Error narrowing
// ============================================================================

const isLoadError = (error: unknown): error is LoadError =>
	error instanceof ReaderError ||
	error instanceof ScannerError ||
	error instanceof ParserError ||
	error instanceof ComposerError ||
	error instanceof NestingDepthExceededError;

const isDumpError = (error: unknown): error is DumpError =>
	error instanceof SerializerError || error instanceof EmitterError;

/**
 * Runs a synchronous pipeline step. Errors the step is known to throw become
 * typed failures; anything else is a defect.
 */
const attempt = <A, E>(
	run: () => A,
	isExpected: (error: unknown) => error is E,
): Effect.Effect<A, E> =>
	Effect.suspend(() => {
		try {
			return Effect.succeed(run());
		} catch (error) {
			return isExpected(error) ? Effect.fail(error) : Effect.die(error);
		}
	});

// ============================================================================
// Layer
// ============================================================================

/**
 * Builds the codec service. Options are validated when the layer is built,
 * so a bad option fails the layer with `ConfigurationError` rather than
 * every later call.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const codec = yield* YamlCodec
 *   return yield* codec.decode("a: [1, 2]")
 * })
 * Effect.runSync(program.pipe(Effect.provide(makeYamlCodecLayer())))
 * // { a: [1, 2] }
 * ```
 */
export const makeYamlCodecLayer = (
	options: YamlCodecOptions = {},
): Layer.Layer<YamlCodec, ConfigurationError> =>
	Layer.effect(
		YamlCodec,
		Effect.gen(function* () {
			const load = yield* resolveLoadOptions(options.load);
			yield* resolveDumpOptions(options.dump);
			const converter = yield* Effect.try({
				try: () => withLoadOptions(makeConverterConfig(options.converter), load),
				catch: (error) =>
					error instanceof ConfigurationError
						? error
						: new ConfigurationError({ option: "converter", message: String(error) }),
			});

			const loadOptionsFor = (sourceName: string | undefined): LoadOptions =>
				sourceName === undefined ? { ...options.load } : { ...options.load, sourceName };

			const logged =
				(message: string, sourceName = load.sourceName) =>
				<A, E>(effect: Effect.Effect<A, E>): Effect.Effect<A, E> =>
					effect.pipe(
						Effect.tap(() => Effect.logDebug(message)),
						Effect.annotateLogs({ module: "yamlpipe", source: sourceName }),
					);

			const loadNode = (source: YamlSource, sourceName: string | undefined) =>
				attempt(() => Api.load(source, loadOptionsFor(sourceName)), isLoadError);

			const dumpNodes = (nodes: Iterable<YamlNode>) =>
				attempt(() => Api.dumpAll(nodes, options.dump), isDumpError);

			const shape: YamlCodecShape = {
				load: (source, sourceName) =>
					loadNode(source, sourceName).pipe(logged("loaded document", sourceName)),

				loadAll: (source, sourceName) =>
					attempt(
						() => Array.from(Api.loadAll(source, loadOptionsFor(sourceName))),
						isLoadError,
					).pipe(
						Effect.tap((nodes) =>
							Effect.logDebug(`loaded ${nodes.length} documents`).pipe(
								Effect.annotateLogs({
									module: "yamlpipe",
									source: sourceName ?? load.sourceName,
								}),
							),
						),
					),

				dump: (node) => dumpNodes([node]).pipe(logged("dumped document")),

				dumpAll: (nodes) => dumpNodes(nodes).pipe(logged("dumped documents")),

				decode: (source, sourceName) =>
					loadNode(source, sourceName).pipe(
						Effect.flatMap((node) => construct(node, converter)),
						logged("decoded document", sourceName),
					),

				encode: (value) =>
					represent(value, converter).pipe(
						Effect.flatMap((node) => dumpNodes([node])),
						logged("encoded document"),
					),
			};
			return shape;
		}),
	);

/** The codec with default options. */
export const YamlCodecLive: Layer.Layer<YamlCodec, ConfigurationError> = makeYamlCodecLayer();
