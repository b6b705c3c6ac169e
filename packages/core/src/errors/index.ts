// ============================================================================
// Pipeline Errors (re-exported from yaml-errors.ts)
// ============================================================================

export type {
	DumpError,
	LoadError,
	MarkedErrorFields,
	MarkedErrorInput,
} from "./yaml-errors.js";
export {
	ComposerError,
	EmitterError,
	marked,
	NestingDepthExceededError,
	ParserError,
	ReaderError,
	ResolverError,
	ScannerError,
	SerializerError,
} from "./yaml-errors.js";

// ============================================================================
// Converter Errors (re-exported from conversion-errors.ts)
// ============================================================================

export { ConfigurationError, ConversionError } from "./conversion-errors.js";

// ============================================================================
// Union Types
// ============================================================================

import type { ConfigurationError, ConversionError } from "./conversion-errors.js";
import type { DumpError, LoadError, ResolverError } from "./yaml-errors.js";

export type YamlError =
	| LoadError
	| DumpError
	| ResolverError
	| ConversionError
	| ConfigurationError;
