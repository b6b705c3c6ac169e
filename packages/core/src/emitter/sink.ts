// ============================================================================
// Output sinks
// ============================================================================

/** Where the emitter writes its text, chunk by chunk. */
export interface YamlSink {
	write(chunk: string): void;
}

/**
 * Collects emitted chunks in memory.
 *
 * @example
 * ```typescript
 * const sink = new StringSink()
 * dumpTo(sink, [node])
 * sink.toString() // "a: 1\n"
 * ```
 */
export class StringSink implements YamlSink {
	private readonly chunks: Array<string> = [];

	write(chunk: string): void {
		this.chunks.push(chunk);
	}

	toString(): string {
		return this.chunks.join("");
	}
}
