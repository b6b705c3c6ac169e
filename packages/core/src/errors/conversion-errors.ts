import { Data } from "effect";
import type { Mark } from "../reader/mark.js";

// ============================================================================
// Effect TaggedError converter and configuration error types
// ============================================================================

export class ConversionError extends Data.TaggedError("ConversionError")<{
	readonly tag: string;
	readonly mark?: Mark;
	readonly message: string;
	readonly cause?: unknown;
}> {}

export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
	readonly option: "load" | "dump" | "converter";
	readonly message: string;
}> {}
