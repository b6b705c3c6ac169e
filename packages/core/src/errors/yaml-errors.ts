import { Data } from "effect";
import type { Mark } from "../reader/mark.js";

// ============================================================================
// Marked error fields
// ============================================================================

/**
 * Diagnostic fields shared by every error raised while reading YAML text.
 * `context` describes the construct being processed when the problem was
 * found, `problem` what went wrong. `message` is rendered from both marks.
 */
export interface MarkedErrorFields {
	readonly context?: string;
	readonly contextMark?: Mark;
	readonly problem: string;
	readonly problemMark?: Mark;
	readonly note?: string;
	readonly message: string;
}

export type MarkedErrorInput = Omit<MarkedErrorFields, "message">;

/**
 * Fills in `message` from the context and problem, each followed by its mark.
 * The context mark is omitted when it points where the problem mark does.
 *
 * @example
 * ```typescript
 * throw new ScannerError(marked({
 *   context: "while scanning a quoted scalar",
 *   contextMark: start,
 *   problem: "found unexpected end of stream",
 *   problemMark: reader.getMark(),
 * }))
 * ```
 */
export const marked = (input: MarkedErrorInput): MarkedErrorFields => {
	const lines: Array<string> = [];
	if (input.context !== undefined) {
		lines.push(input.context);
	}
	if (
		input.contextMark !== undefined &&
		(input.problemMark === undefined ||
			!input.contextMark.samePosition(input.problemMark))
	) {
		lines.push(input.contextMark.toString());
	}
	lines.push(input.problem);
	if (input.problemMark !== undefined) {
		lines.push(input.problemMark.toString());
	}
	if (input.note !== undefined) {
		lines.push(input.note);
	}
	return { ...input, message: lines.join("\n") };
};

// ============================================================================
// Effect TaggedError pipeline error types
// ============================================================================

export class ReaderError extends Data.TaggedError("ReaderError")<{
	readonly source: string;
	readonly position: number;
	readonly codePoint: number;
	/** Where the offending character sits, for errors found while reading. */
	readonly mark?: Mark;
	readonly message: string;
}> {}

export class ScannerError extends Data.TaggedError("ScannerError")<MarkedErrorFields> {}

export class ParserError extends Data.TaggedError("ParserError")<MarkedErrorFields> {}

export class ComposerError extends Data.TaggedError("ComposerError")<MarkedErrorFields> {}

export class NestingDepthExceededError extends Data.TaggedError(
	"NestingDepthExceededError",
)<{
	readonly limit: number;
	readonly mark?: Mark;
	readonly message: string;
}> {}

export class ResolverError extends Data.TaggedError("ResolverError")<{
	readonly tag: string;
	readonly message: string;
}> {}

export class SerializerError extends Data.TaggedError("SerializerError")<{
	readonly message: string;
}> {}

export class EmitterError extends Data.TaggedError("EmitterError")<{
	readonly message: string;
}> {}

// ============================================================================
// Error unions
// ============================================================================

/** Everything that can go wrong turning YAML text into a node graph. */
export type LoadError =
	| ReaderError
	| ScannerError
	| ParserError
	| ComposerError
	| NestingDepthExceededError;

/** Everything that can go wrong turning a node graph into YAML text. */
export type DumpError = SerializerError | EmitterError;
