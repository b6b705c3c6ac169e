// ============================================================================
// Character classes used by the scanner and the emitter
// ============================================================================

export const LINE_BREAKS = "\r\n\x85\u2028\u2029";

/** A line break or the end of the input. */
export const BREAK_OR_EOF = `\0${LINE_BREAKS}`;

/** A space, a line break or the end of the input. */
export const SPACE_BREAK_OR_EOF = ` ${BREAK_OR_EOF}`;

/** A space, a tab, a line break or the end of the input. */
export const BLANK_BREAK_OR_EOF = ` \t${BREAK_OR_EOF}`;

export const FLOW_INDICATORS = ",[]{}";

export const isBreak = (ch: string): boolean =>
	ch.length === 1 && LINE_BREAKS.includes(ch);

export const isBreakOrEof = (ch: string): boolean =>
	ch.length === 1 && BREAK_OR_EOF.includes(ch);

export const isBlankOrEof = (ch: string): boolean =>
	ch.length === 1 && BLANK_BREAK_OR_EOF.includes(ch);

/** Characters allowed in anchors' legacy form, directive names and tag handles. */
export const isWordChar = (ch: string): boolean => /^[0-9A-Za-z_-]$/.test(ch);

export const isDigit = (ch: string): boolean => ch >= "0" && ch <= "9";

export const isHexDigit = (ch: string): boolean => /^[0-9A-Fa-f]$/.test(ch);

/**
 * Renders a character for diagnostics the way it would be written in a
 * double-quoted scalar.
 *
 * @example
 * ```typescript
 * describeChar("\t") // "'\\t'"
 * ```
 */
export const describeChar = (ch: string): string =>
	`'${JSON.stringify(ch).slice(1, -1)}'`;

/** Escape letters of double-quoted scalars and the character each denotes. */
export const ESCAPE_REPLACEMENTS: Readonly<Record<string, string>> = {
	"0": "\0",
	a: "\x07",
	b: "\x08",
	t: "\t",
	"\t": "\t",
	n: "\n",
	v: "\x0B",
	f: "\x0C",
	r: "\r",
	e: "\x1B",
	" ": " ",
	'"': '"',
	"/": "/",
	"\\": "\\",
	N: "\x85",
	_: "\xA0",
	L: "\u2028",
	P: "\u2029",
};

/** Escape letters introducing a hexadecimal code and the number of digits. */
export const ESCAPE_CODES: Readonly<Record<string, number>> = {
	x: 2,
	u: 4,
	U: 8,
};

export const LINE_SEPARATOR = String.fromCharCode(0x2028);
export const PARAGRAPH_SEPARATOR = String.fromCharCode(0x2029);
export const BYTE_ORDER_MARK = String.fromCharCode(0xfeff);
