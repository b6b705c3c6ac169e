import { promises as fs } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { makeYamlCodecLayer, strNode, YamlCodecLive } from "@yamlpipe/core";
import { Effect, Layer } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { NodeYamlFilesLive } from "../src/index.js";
import { makeNodeYamlFilesLayer, YamlFiles } from "../src/node-adapter-layer.js";

// ============================================================================
// Helpers
// ============================================================================

let dir: string;

beforeEach(async () => {
	dir = await fs.mkdtemp(join(tmpdir(), "yamlpipe-"));
});

afterEach(async () => {
	await fs.rm(dir, { recursive: true, force: true });
});

const run = <A, E>(effect: Effect.Effect<A, E, YamlFiles>): Promise<A> =>
	Effect.runPromise(Effect.provide(effect, NodeYamlFilesLive));

// ============================================================================
// YamlFiles over the filesystem
// ============================================================================

describe("YamlFiles (filesystem)", () => {
	it("writes a value and reads it back", async () => {
		const path = join(dir, "config.yaml");
		const value = await run(
			Effect.gen(function* () {
				const files = yield* YamlFiles;
				yield* files.writeValue(path, { name: "test", ports: [80, 443] });
				return yield* files.readValue(path);
			}),
		);
		expect(value).toEqual({ name: "test", ports: [80, 443] });
		expect(await fs.readFile(path, "utf8")).toBe("name: test\nports: [80, 443]\n");
	});

	it("creates missing parent directories", async () => {
		const path = join(dir, "nested", "deeper", "doc.yaml");
		await run(Effect.flatMap(YamlFiles, (files) => files.write(path, [strNode("a")])));
		expect(await fs.readFile(path, "utf8")).toBe("a\n");
	});

	it("leaves no temporary files behind", async () => {
		const path = join(dir, "doc.yaml");
		await run(Effect.flatMap(YamlFiles, (files) => files.writeValue(path, [1, 2])));
		expect(await fs.readdir(dir)).toEqual(["doc.yaml"]);
	});

	it("reads every document of a file", async () => {
		const path = join(dir, "stream.yaml");
		await fs.writeFile(path, "a\n--- b\n");
		const nodes = await run(Effect.flatMap(YamlFiles, (files) => files.readAll(path)));
		expect(nodes.map((node) => node.kind === "scalar" && node.value)).toEqual(["a", "b"]);
	});

	it("reads an empty file as no document", async () => {
		const path = join(dir, "empty.yaml");
		await fs.writeFile(path, "");
		expect(await run(Effect.flatMap(YamlFiles, (files) => files.read(path)))).toBeNull();
	});

	it("decodes UTF-16 files by their byte order mark", async () => {
		const path = join(dir, "wide.yaml");
		await fs.writeFile(path, Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from("a: 1\n", "utf16le")]));
		expect(await run(Effect.flatMap(YamlFiles, (files) => files.readValue(path)))).toEqual({ a: 1 });
	});
});

describe("YamlFiles errors", () => {
	it("fails with FileError for a missing file", async () => {
		const layer = makeNodeYamlFilesLayer({ maxRetries: 0 }).pipe(Layer.provide(YamlCodecLive));
		const error = await Effect.runPromise(
			Effect.flip(Effect.flatMap(YamlFiles, (files) => files.read(join(dir, "missing.yaml")))).pipe(
				Effect.provide(layer),
			),
		);
		expect(error._tag).toBe("FileError");
		if (error._tag === "FileError") {
			expect(error.operation).toBe("read");
			expect(error.path).toBe(join(dir, "missing.yaml"));
		}
	});

	it("names the file in the marks of a load error", async () => {
		const path = join(dir, "broken.yaml");
		await fs.writeFile(path, "a: *x\n");
		const error = await run(Effect.flip(Effect.flatMap(YamlFiles, (files) => files.read(path))));
		expect(error._tag).toBe("ComposerError");
		if (error._tag === "ComposerError") {
			expect(error.problemMark?.name).toBe(path);
		}
	});
});

describe("YamlFiles with a configured codec", () => {
	it("dumps through the codec it is given", async () => {
		const path = join(dir, "block.yaml");
		const layer = makeNodeYamlFilesLayer().pipe(
			Layer.provide(makeYamlCodecLayer({ dump: { defaultFlowStyle: "block" } })),
		);
		await Effect.runPromise(
			Effect.flatMap(YamlFiles, (files) => files.writeValue(path, { a: [1, 2] })).pipe(
				Effect.provide(layer),
			),
		);
		expect(await fs.readFile(path, "utf8")).toBe("a:\n- 1\n- 2\n");
	});
});
