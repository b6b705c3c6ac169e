import type { Mark } from "../reader/mark.js";

// ============================================================================
// Token types
// ============================================================================

/** Scalar presentation styles shared by tokens, events and nodes. */
export type ScalarStyle =
	| "plain"
	| "single-quoted"
	| "double-quoted"
	| "literal"
	| "folded";

interface TokenBase {
	readonly startMark: Mark;
	readonly endMark: Mark;
}

export interface StreamStartToken extends TokenBase {
	readonly type: "StreamStart";
	readonly encoding: string;
}

export interface DirectiveToken extends TokenBase {
	readonly type: "Directive";
	readonly name: string;
	/** `[major, minor]` for %YAML, `[handle, prefix]` for %TAG, null otherwise */
	readonly value: readonly [number, number] | readonly [string, string] | null;
}

export interface AliasToken extends TokenBase {
	readonly type: "Alias";
	readonly value: string;
}

export interface AnchorToken extends TokenBase {
	readonly type: "Anchor";
	readonly value: string;
}

export interface TagToken extends TokenBase {
	readonly type: "Tag";
	/** null for verbatim tags (`!<...>`) */
	readonly handle: string | null;
	readonly suffix: string;
}

export interface ScalarToken extends TokenBase {
	readonly type: "Scalar";
	readonly value: string;
	readonly plain: boolean;
	readonly style: ScalarStyle;
}

export interface CommentToken extends TokenBase {
	readonly type: "Comment";
	readonly kind: "line" | "inline";
	readonly value: string;
}

export type SimpleTokenType =
	| "StreamEnd"
	| "DocumentStart"
	| "DocumentEnd"
	| "BlockSequenceStart"
	| "BlockMappingStart"
	| "BlockEnd"
	| "FlowSequenceStart"
	| "FlowMappingStart"
	| "FlowSequenceEnd"
	| "FlowMappingEnd"
	| "Key"
	| "Value"
	| "BlockEntry"
	| "FlowEntry";

export interface SimpleToken extends TokenBase {
	readonly type: SimpleTokenType;
}

export type Token =
	| StreamStartToken
	| DirectiveToken
	| AliasToken
	| AnchorToken
	| TagToken
	| ScalarToken
	| CommentToken
	| SimpleToken;

export type TokenType = Token["type"];

/** Narrows a token to the variant carrying the given `type`. */
export type TokenOf<T extends TokenType> = Extract<Token, { readonly type: T }> extends never
	? SimpleToken
	: Extract<Token, { readonly type: T }>;

export const simpleToken = (
	type: SimpleTokenType,
	startMark: Mark,
	endMark: Mark,
): SimpleToken => ({ type, startMark, endMark });

/** Human-readable token name used in diagnostics, e.g. `<block end>`. */
export const describeToken = (type: TokenType): string =>
	`<${type.replace(/([a-z])([A-Z])/g, "$1 $2").toLowerCase()}>`;
