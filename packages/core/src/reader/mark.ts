// ============================================================================
// Mark - source position attached to tokens, events, nodes and errors
// ============================================================================

const SNIPPET_STOPS = "\0\r\n\x85\u2028\u2029";

/**
 * A position in a YAML source.
 *
 * `line` and `column` are zero-based; they are rendered one-based in
 * diagnostics. `buffer` is the decoded source the mark points into and
 * `pointer` the offset of the mark within it. Marks produced for events that
 * did not come from text (external producers) carry no buffer.
 */
export class Mark {
	constructor(
		readonly name: string,
		readonly index: number,
		readonly line: number,
		readonly column: number,
		readonly buffer: string | null = null,
		readonly pointer: number = index,
	) {}

	/**
	 * Renders the source line around the mark, clipped to `maxLength`
	 * characters, with a caret under the marked character.
	 *
	 * @example
	 * ```typescript
	 * new Mark("<reader>", 3, 0, 3, "a: [b").snippet()
	 * // "    a: [b\n       ^"
	 * ```
	 */
	snippet(indent = 4, maxLength = 75): string | null {
		if (this.buffer === null) {
			return null;
		}
		const buffer = this.buffer;
		const half = maxLength / 2 - 1;

		let head = "";
		let start = this.pointer;
		while (start > 0 && !SNIPPET_STOPS.includes(buffer.charAt(start - 1))) {
			start--;
			if (this.pointer - start > half) {
				head = " ... ";
				start += 5;
				break;
			}
		}

		let tail = "";
		let end = this.pointer;
		while (end < buffer.length && !SNIPPET_STOPS.includes(buffer.charAt(end))) {
			end++;
			if (end - this.pointer > half) {
				tail = " ... ";
				end -= 5;
				break;
			}
		}

		const line = buffer.slice(start, end);
		const caret = " ".repeat(indent + this.pointer - start + head.length);
		return `${" ".repeat(indent)}${head}${line}${tail}\n${caret}^`;
	}

	/** True when both marks point at the same place of the same source. */
	samePosition(other: Mark): boolean {
		return (
			this.name === other.name &&
			this.line === other.line &&
			this.column === other.column
		);
	}

	toString(): string {
		const where = ` in "${this.name}", line ${this.line + 1}, column ${this.column + 1}`;
		const snippet = this.snippet();
		return snippet === null ? where : `${where}:\n${snippet}`;
	}
}
