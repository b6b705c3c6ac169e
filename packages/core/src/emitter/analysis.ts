import { LINE_SEPARATOR, PARAGRAPH_SEPARATOR } from "../scanner/chars.js";

// ============================================================================
// Scalar analysis
// ============================================================================

/**
 * What a scalar's text allows: which styles can represent it without loss
 * and whether it spans several lines.
 */
export interface ScalarAnalysis {
	/** The scalar split into code points. */
	readonly chars: ReadonlyArray<string>;
	readonly empty: boolean;
	readonly multiline: boolean;
	readonly allowFlowPlain: boolean;
	readonly allowBlockPlain: boolean;
	readonly allowSingleQuoted: boolean;
	readonly allowBlock: boolean;
}

const BREAKS = `\n\x85${LINE_SEPARATOR}${PARAGRAPH_SEPARATOR}`;
const WHITESPACE = `\0 \t\r${BREAKS}`;

export const isEmitterBreak = (ch: string | undefined): boolean =>
	ch !== undefined && ch.length === 1 && BREAKS.includes(ch);

const isWhitespace = (ch: string | undefined): boolean =>
	ch === undefined || (ch.length === 1 && WHITESPACE.includes(ch));

/** Printable characters outside ASCII that may appear unescaped. */
export const isPrintableUnicode = (ch: string): boolean => {
	const cp = ch.codePointAt(0) ?? 0;
	return (
		cp === 0x85 ||
		(cp >= 0xa0 && cp <= 0xd7ff) ||
		(cp >= 0xe000 && cp <= 0xfffd && cp !== 0xfeff) ||
		(cp >= 0x10000 && cp <= 0x10ffff)
	);
};

/**
 * Text spanning several lines whose breaks are all `\n`, the one break a
 * literal block scalar reads back unchanged.
 */
export const isMultilineText = (value: string): boolean =>
	value.includes("\n") && !/[\r\x85\u2028\u2029]/.test(value);

export const isPrintableAscii = (ch: string): boolean => ch >= " " && ch <= "~";

/**
 * Scans a scalar once and records the indicators, breaks and special
 * characters that rule styles out.
 *
 * @example
 * ```typescript
 * analyzeScalar("- item", true).allowBlockPlain // false
 * analyzeScalar("a: b", true).allowFlowPlain // false
 * ```
 */
export const analyzeScalar = (scalar: string, allowUnicode: boolean): ScalarAnalysis => {
	const chars = Array.from(scalar);
	if (chars.length === 0) {
		return {
			chars,
			empty: true,
			multiline: false,
			allowFlowPlain: false,
			allowBlockPlain: true,
			allowSingleQuoted: true,
			allowBlock: false,
		};
	}

	let blockIndicators = false;
	let flowIndicators = false;
	let lineBreaks = false;
	let specialCharacters = false;

	let leadingSpace = false;
	let leadingBreak = false;
	let trailingSpace = false;
	let trailingBreak = false;
	let breakSpace = false;
	let spaceBreak = false;
	// Read back as a line feed unless escaped.
	let nextLine = false;

	if (scalar.startsWith("---") || scalar.startsWith("...")) {
		blockIndicators = true;
		flowIndicators = true;
	}

	let precededByWhitespace = true;
	let followedByWhitespace = chars.length === 1 || isWhitespace(chars[1]);
	let previousSpace = false;
	let previousBreak = false;

	for (const [index, ch] of chars.entries()) {
		if (index === 0) {
			if ("#,[]{}&*!|>'\"%@`".includes(ch)) {
				flowIndicators = true;
				blockIndicators = true;
			}
			if (ch === "?" || ch === ":") {
				flowIndicators = true;
				if (followedByWhitespace) {
					blockIndicators = true;
				}
			}
			if (ch === "-" && followedByWhitespace) {
				flowIndicators = true;
				blockIndicators = true;
			}
		} else {
			if (",?[]{}".includes(ch)) {
				flowIndicators = true;
			}
			if (ch === ":") {
				flowIndicators = true;
				if (followedByWhitespace) {
					blockIndicators = true;
				}
			}
			if (ch === "#" && precededByWhitespace) {
				flowIndicators = true;
				blockIndicators = true;
			}
		}

		if (isEmitterBreak(ch)) {
			lineBreaks = true;
		}
		if (ch === "\x85") {
			nextLine = true;
		}
		if (!(ch === "\n" || isPrintableAscii(ch))) {
			if (isPrintableUnicode(ch)) {
				if (!allowUnicode) {
					specialCharacters = true;
				}
			} else {
				specialCharacters = true;
			}
		}

		if (ch === " ") {
			if (index === 0) {
				leadingSpace = true;
			}
			if (index === chars.length - 1) {
				trailingSpace = true;
			}
			if (previousBreak) {
				breakSpace = true;
			}
			previousSpace = true;
			previousBreak = false;
		} else if (isEmitterBreak(ch)) {
			if (index === 0) {
				leadingBreak = true;
			}
			if (index === chars.length - 1) {
				trailingBreak = true;
			}
			if (previousSpace) {
				spaceBreak = true;
			}
			previousSpace = false;
			previousBreak = true;
		} else {
			previousSpace = false;
			previousBreak = false;
		}

		precededByWhitespace = isWhitespace(ch);
		followedByWhitespace = index + 2 >= chars.length || isWhitespace(chars[index + 2]);
	}

	let allowFlowPlain = true;
	let allowBlockPlain = true;
	let allowSingleQuoted = true;
	let allowBlock = true;

	if (leadingSpace || leadingBreak || trailingSpace || trailingBreak) {
		allowFlowPlain = false;
		allowBlockPlain = false;
	}
	if (trailingSpace) {
		allowBlock = false;
	}
	if (breakSpace) {
		allowFlowPlain = false;
		allowBlockPlain = false;
		allowSingleQuoted = false;
	}
	if (spaceBreak || specialCharacters || nextLine) {
		allowFlowPlain = false;
		allowBlockPlain = false;
		allowSingleQuoted = false;
		allowBlock = false;
	}
	if (lineBreaks) {
		allowFlowPlain = false;
		allowBlockPlain = false;
	}
	if (flowIndicators) {
		allowFlowPlain = false;
	}
	if (blockIndicators) {
		allowBlockPlain = false;
	}

	return {
		chars,
		empty: false,
		multiline: lineBreaks,
		allowFlowPlain,
		allowBlockPlain,
		allowSingleQuoted,
		allowBlock,
	};
};
