import { Either } from "effect";
import {
	mappingNode,
	type NodeTuple,
	scalarNode,
	sequenceNode,
	type YamlNode,
} from "../composer/nodes.js";
import { ConversionError } from "../errors/conversion-errors.js";
import { isMultilineText } from "../emitter/analysis.js";
import { Tags } from "../resolver/tags.js";
import { type ConverterConfig, defaultConverterConfig, type TagDefinition } from "./converter.js";

// ============================================================================
// Scalar representations
// ============================================================================

const BASE64_LINE = 76;

/** Formats a float so it reads back as a float. */
export const representFloat = (value: number): string => {
	if (Number.isNaN(value)) {
		return ".nan";
	}
	if (value === Number.POSITIVE_INFINITY) {
		return ".inf";
	}
	if (value === Number.NEGATIVE_INFINITY) {
		return "-.inf";
	}
	if (Object.is(value, -0)) {
		return "-0.0";
	}
	const text = String(value);
	return /[.e]/.test(text) ? text : `${text}.0`;
};

/** Base64 in lines of 76 characters, each ending with a line break. */
export const representBinary = (bytes: Uint8Array): string => {
	const encoded = btoa(Array.from(bytes, (byte) => String.fromCharCode(byte)).join(""));
	const lines: Array<string> = [];
	for (let start = 0; start < encoded.length; start += BASE64_LINE) {
		lines.push(encoded.slice(start, start + BASE64_LINE));
	}
	return lines.map((line) => `${line}\n`).join("");
};

const isPlainObject = (value: object): value is Record<string, unknown> => {
	const prototype: unknown = Object.getPrototypeOf(value);
	return prototype === Object.prototype || prototype === null;
};

// ============================================================================
// Representer
// ============================================================================

/**
 * Turns JavaScript values into a node graph. An object reached twice maps to
 * one node, which the serializer writes once with an anchor; an object that
 * contains itself becomes a recursive node.
 */
class Representer {
	private readonly represented = new Map<object, YamlNode>();

	constructor(private readonly config: ConverterConfig) {}

	represent(value: unknown): YamlNode {
		if (typeof value === "object" && value !== null) {
			const existing = this.represented.get(value);
			if (existing !== undefined) {
				return existing;
			}
		}
		for (const definition of this.config.tags.values()) {
			if (definition.identify?.(value) === true) {
				return this.representCustom(value, definition);
			}
		}
		return this.representBuiltin(value);
	}

	private representBuiltin(value: unknown): YamlNode {
		switch (typeof value) {
			case "undefined":
				return scalarNode(Tags.NULL, "null");
			case "boolean":
				return scalarNode(Tags.BOOL, value ? "true" : "false");
			case "number":
				return Number.isSafeInteger(value) && !Object.is(value, -0)
					? scalarNode(Tags.INT, String(value))
					: scalarNode(Tags.FLOAT, representFloat(value));
			case "bigint":
				return scalarNode(Tags.INT, value.toString());
			case "string":
				return isMultilineText(value)
					? scalarNode(Tags.STR, value, { style: "literal" })
					: scalarNode(Tags.STR, value);
			case "object":
				return value === null ? scalarNode(Tags.NULL, "null") : this.representObject(value);
			default:
				return this.fail(`cannot represent a value of type ${typeof value}`);
		}
	}

	private representObject(value: object): YamlNode {
		if (value instanceof Date) {
			if (Number.isNaN(value.getTime())) {
				return this.fail("cannot represent an invalid Date");
			}
			return this.remember(value, scalarNode(Tags.TIMESTAMP, value.toISOString()));
		}
		if (value instanceof Uint8Array) {
			return this.remember(
				value,
				scalarNode(Tags.BINARY, representBinary(value), { style: "literal" }),
			);
		}
		if (Array.isArray(value)) {
			const node = this.remember(value, sequenceNode(Tags.SEQ));
			for (const item of value) {
				node.value.push(this.represent(item));
			}
			return node;
		}
		if (value instanceof Map) {
			const node = this.remember(value, mappingNode(Tags.MAP));
			for (const [key, item] of value) {
				node.value.push([this.represent(key), this.represent(item)]);
			}
			return node;
		}
		if (value instanceof Set) {
			const node = this.remember(value, mappingNode(Tags.SET));
			for (const item of value) {
				node.value.push([this.represent(item), scalarNode(Tags.NULL, "null")]);
			}
			return node;
		}
		if (isPlainObject(value)) {
			const node = this.remember(value, mappingNode(Tags.MAP));
			for (const [key, item] of Object.entries(value)) {
				node.value.push([scalarNode(Tags.STR, key), this.represent(item)]);
			}
			return node;
		}
		return this.fail(`cannot represent an instance of ${value.constructor.name}`);
	}

	private representCustom(value: unknown, definition: TagDefinition): YamlNode {
		const missing = () => this.fail(`the tag '${definition.tag}' has no representation`);
		switch (definition.kind) {
			case "scalar": {
				const text = definition.represent?.(value) ?? missing();
				return this.rememberIfObject(value, scalarNode(definition.tag, text));
			}
			case "sequence": {
				const items = definition.represent?.(value) ?? missing();
				const node = this.rememberIfObject(value, sequenceNode(definition.tag));
				for (const item of items) {
					node.value.push(this.represent(item));
				}
				return node;
			}
			case "mapping": {
				const pairs = definition.represent?.(value) ?? missing();
				const node = this.rememberIfObject(value, mappingNode(definition.tag));
				for (const [key, item] of pairs) {
					const pair: NodeTuple = [this.represent(key), this.represent(item)];
					node.value.push(pair);
				}
				return node;
			}
		}
	}

	private remember<N extends YamlNode>(value: object, node: N): N {
		this.represented.set(value, node);
		return node;
	}

	private rememberIfObject<N extends YamlNode>(value: unknown, node: N): N {
		return typeof value === "object" && value !== null ? this.remember(value, node) : node;
	}

	private fail(message: string): never {
		throw new ConversionError({ tag: "", message });
	}
}

/**
 * Converts a JavaScript value into a node graph ready to dump.
 *
 * @example
 * ```typescript
 * const shared = { x: 1 }
 * const node = Either.getOrThrow(represent({ a: shared, b: shared }))
 * dump(node) // "a: &id001 {x: 1}\nb: *id001\n"
 * ```
 */
export const represent = (
	value: unknown,
	config: ConverterConfig = defaultConverterConfig,
): Either.Either<YamlNode, ConversionError> => {
	try {
		return Either.right(new Representer(config).represent(value));
	} catch (error) {
		if (error instanceof ConversionError) {
			return Either.left(error);
		}
		return Either.left(
			new ConversionError({
				tag: "",
				message: error instanceof Error ? error.message : String(error),
				cause: error,
			}),
		);
	}
};
