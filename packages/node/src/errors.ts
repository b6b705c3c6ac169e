import { Data } from "effect";

/** A file could not be read or written. */
export class FileError extends Data.TaggedError("FileError")<{
	readonly path: string;
	readonly operation: "read" | "write";
	readonly message: string;
	readonly cause?: unknown;
}> {}
