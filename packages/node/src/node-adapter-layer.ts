/**
 * Node.js filesystem access for YAML documents as an Effect Layer.
 * Provides atomic writes (temp file + rename) and retry with exponential backoff.
 */

import { randomBytes } from "node:crypto";
import { promises as fs } from "node:fs";
import { dirname } from "node:path";
import {
	type ConversionError,
	type DumpError,
	type LoadError,
	YamlCodec,
	type YamlCodecShape,
	type YamlNode,
} from "@yamlpipe/core";
import { Context, Effect, Layer, Schedule } from "effect";
import { FileError } from "./errors.js";

// ============================================================================
// Configuration
// ============================================================================

export interface NodeAdapterConfig {
	readonly maxRetries?: number;
	readonly baseDelay?: number; // milliseconds
	readonly createMissingDirectories?: boolean;
	readonly fileMode?: number;
	readonly dirMode?: number;
}

const defaultConfig: Required<NodeAdapterConfig> = {
	maxRetries: 3,
	baseDelay: 100,
	createMissingDirectories: true,
	fileMode: 0o644,
	dirMode: 0o755,
};

// ============================================================================
// YamlFiles Effect Service
// ============================================================================

export interface YamlFilesShape {
	/** The single document of a file, or null for a file without one. */
	readonly read: (path: string) => Effect.Effect<YamlNode | null, FileError | LoadError>;
	readonly readAll: (
		path: string,
	) => Effect.Effect<ReadonlyArray<YamlNode>, FileError | LoadError>;
	/** Replaces the file with one document per node. */
	readonly write: (
		path: string,
		nodes: Iterable<YamlNode>,
	) => Effect.Effect<void, FileError | DumpError>;
	readonly readValue: (
		path: string,
	) => Effect.Effect<unknown, FileError | LoadError | ConversionError>;
	readonly writeValue: (
		path: string,
		value: unknown,
	) => Effect.Effect<void, FileError | DumpError | ConversionError>;
}

export class YamlFiles extends Context.Tag("YamlFiles")<YamlFiles, YamlFilesShape>() {}

// ============================================================================
// Helpers
// ============================================================================

const toFileError = (
	path: string,
	operation: FileError["operation"],
	error: unknown,
): FileError =>
	new FileError({
		path,
		operation,
		message: error instanceof Error ? error.message : `Unknown ${operation} error`,
		cause: error,
	});

const retryPolicy = (config: Required<NodeAdapterConfig>) =>
	Schedule.intersect(Schedule.exponential(config.baseDelay), Schedule.recurs(config.maxRetries));

// ============================================================================
// File operations
// ============================================================================

// Bytes, not text: the reader detects the encoding from the BOM.
const makeReadBytes =
	(config: Required<NodeAdapterConfig>) =>
	(path: string): Effect.Effect<Uint8Array, FileError> =>
		Effect.tryPromise({
			try: () => fs.readFile(path),
			catch: (error) => toFileError(path, "read", error),
		}).pipe(Effect.retry(retryPolicy(config)));

const makeWriteText =
	(config: Required<NodeAdapterConfig>) =>
	(path: string, data: string): Effect.Effect<void, FileError> => {
		const tempPath = `${path}.tmp.${randomBytes(8).toString("hex")}`;

		const ensureParentDir = config.createMissingDirectories
			? Effect.tryPromise({
					try: () =>
						fs.mkdir(dirname(path), {
							recursive: true,
							mode: config.dirMode,
						}),
					catch: (error) => toFileError(dirname(path), "write", error),
				}).pipe(Effect.asVoid)
			: Effect.void;

		const writeAndRename = Effect.tryPromise({
			try: () => fs.writeFile(tempPath, data, { mode: config.fileMode }),
			catch: (error) => toFileError(path, "write", error),
		}).pipe(
			Effect.andThen(
				Effect.tryPromise({
					try: () => fs.rename(tempPath, path),
					catch: (error) => toFileError(path, "write", error),
				}),
			),
			Effect.catchAll((error) =>
				Effect.tryPromise({
					try: () => fs.unlink(tempPath),
					catch: () => error,
				}).pipe(Effect.ignore, Effect.andThen(Effect.fail(error))),
			),
		);

		return ensureParentDir.pipe(
			Effect.andThen(writeAndRename),
			Effect.retry(retryPolicy(config)),
		);
	};

const makeFiles = (config: Required<NodeAdapterConfig>, codec: YamlCodecShape): YamlFilesShape => {
	const readBytes = makeReadBytes(config);
	const writeText = makeWriteText(config);
	return {
		read: (path) =>
			readBytes(path).pipe(Effect.flatMap((bytes) => codec.load(bytes, path))),
		readAll: (path) =>
			readBytes(path).pipe(Effect.flatMap((bytes) => codec.loadAll(bytes, path))),
		write: (path, nodes) =>
			codec.dumpAll(nodes).pipe(Effect.flatMap((text) => writeText(path, text))),
		readValue: (path) =>
			readBytes(path).pipe(Effect.flatMap((bytes) => codec.decode(bytes, path))),
		writeValue: (path, value) =>
			codec.encode(value).pipe(Effect.flatMap((text) => writeText(path, text))),
	};
};

// ============================================================================
// Layer construction
// ============================================================================

/**
 * Creates a YamlFiles layer with custom configuration. Text is loaded and
 * dumped through whichever `YamlCodec` the layer is given.
 *
 * @example
 * ```typescript
 * const layer = makeNodeYamlFilesLayer({ maxRetries: 1 }).pipe(
 *   Layer.provide(makeYamlCodecLayer({ dump: { indent: 4 } })),
 * )
 * ```
 */
export const makeNodeYamlFilesLayer = (
	config: NodeAdapterConfig = {},
): Layer.Layer<YamlFiles, never, YamlCodec> => {
	const resolved = { ...defaultConfig, ...config };
	return Layer.effect(
		YamlFiles,
		Effect.map(YamlCodec, (codec) => makeFiles(resolved, codec)),
	);
};
