import { dumpValue, loadValue } from "../api.js";
import { dumpOptionsOrThrow, loadOptionsOrThrow } from "../config/options.js";
import { makeConverterConfig } from "../convert/converter.js";
import type { YamlCodecOptions } from "../service.js";

// ============================================================================
// FormatCodec - plug-in shape for text formats
// ============================================================================

/**
 * Options for encoding data.
 */
export interface FormatOptions {
	readonly indent?: number;
}

/**
 * A FormatCodec defines a serialization format with:
 * - A human-readable name
 * - Supported file extensions without dots
 * - Synchronous encode/decode functions that throw on failure
 */
export interface FormatCodec {
	readonly name: string;
	readonly extensions: ReadonlyArray<string>;
	readonly encode: (data: unknown, options?: FormatOptions) => string;
	readonly decode: (raw: string) => unknown;
}

/**
 * Creates a YAML codec over the full load and dump pipelines.
 *
 * Options are validated once, here; `encode` and `decode` throw the typed
 * pipeline errors.
 *
 * @example
 * ```typescript
 * const codec = yamlCodec({ dump: { defaultFlowStyle: "block" } })
 * codec.encode({ a: [1, 2] }) // "a:\n- 1\n- 2\n"
 * codec.decode("a: [1, 2]") // { a: [1, 2] }
 * ```
 */
export const yamlCodec = (options: YamlCodecOptions = {}): FormatCodec => {
	loadOptionsOrThrow(options.load);
	dumpOptionsOrThrow(options.dump);
	const converter = makeConverterConfig(options.converter);
	return {
		name: "yaml",
		extensions: ["yaml", "yml"],
		encode: (data: unknown, formatOptions?: FormatOptions): string =>
			dumpValue(
				data,
				formatOptions?.indent === undefined
					? options.dump
					: { ...options.dump, indent: formatOptions.indent },
				converter,
			),
		decode: (raw: string): unknown => loadValue(raw, options.load, converter),
	};
};
