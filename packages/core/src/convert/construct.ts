import { Either } from "effect";
import type { MappingNode, SequenceNode, YamlNode } from "../composer/nodes.js";
import { ConversionError } from "../errors/conversion-errors.js";
import { isCoreTag, Tags } from "../resolver/tags.js";
import {
	type ConverterConfig,
	defaultConverterConfig,
	type KeyValuePair,
	type TagDefinition,
} from "./converter.js";

// ============================================================================
// Scalar constructors
// ============================================================================

const BOOL_VALUES: Readonly<Record<string, boolean>> = {
	yes: true,
	no: false,
	true: true,
	false: false,
	on: true,
	off: false,
};

const INT_FORM = /^[-+]?(?:0b[01]+|0x[0-9a-fA-F]+|[0-9]+(?::[0-5]?[0-9])*)$/;
const FLOAT_FORM = /^[-+]?(?:[0-9]*\.?[0-9]*(?:[eE][-+]?[0-9]+)?|[0-9]+(?::[0-5]?[0-9])+\.[0-9]*)$/;
const BASE64_FORM = /^[A-Za-z0-9+/]*={0,2}$/;
const DATE_ONLY = /^([0-9]{4})-([0-9]{2})-([0-9]{2})$/;
const TIMESTAMP_FORM =
	/^([0-9]{4})-([0-9]{1,2})-([0-9]{1,2})(?:[Tt]|[ \t]+)([0-9]{1,2}):([0-9]{2}):([0-9]{2})(?:\.([0-9]*))?(?:[ \t]*(Z|([-+])([0-9]{1,2})(?::([0-9]{2}))?))?$/;

const sexagesimal = (text: string): bigint =>
	text
		.split(":")
		.reduce((total, part) => total * 60n + BigInt(part), 0n);

/** An exact integer: a number when it is a safe integer, a bigint beyond that. */
export const constructInt = (text: string): Either.Either<number | bigint, string> => {
	const cleaned = text.replaceAll("_", "");
	if (!INT_FORM.test(cleaned)) {
		return Either.left(`invalid integer '${text}'`);
	}
	const negative = cleaned.startsWith("-");
	const digits = cleaned.replace(/^[-+]/, "");
	let magnitude: bigint;
	if (digits.startsWith("0b")) {
		magnitude = BigInt(digits);
	} else if (digits.startsWith("0x")) {
		magnitude = BigInt(digits);
	} else if (digits.includes(":")) {
		magnitude = sexagesimal(digits);
	} else if (digits.length > 1 && digits.startsWith("0")) {
		if (!/^[0-7]+$/.test(digits)) {
			return Either.left(`invalid octal integer '${text}'`);
		}
		magnitude = BigInt(`0o${digits.slice(1)}`);
	} else {
		magnitude = BigInt(digits);
	}
	const value = negative ? -magnitude : magnitude;
	return Either.right(
		value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
			? Number(value)
			: value,
	);
};

export const constructFloat = (text: string): Either.Either<number, string> => {
	const cleaned = text.replaceAll("_", "").toLowerCase();
	const sign = cleaned.startsWith("-") ? -1 : 1;
	const body = cleaned.replace(/^[-+]/, "");
	if (body === ".inf") {
		return Either.right(sign * Number.POSITIVE_INFINITY);
	}
	if (body === ".nan") {
		return Either.right(Number.NaN);
	}
	if (!FLOAT_FORM.test(cleaned) || !/[0-9]/.test(body)) {
		return Either.left(`invalid float '${text}'`);
	}
	if (body.includes(":")) {
		const parts = body.split(":");
		const value = parts.reduce((total, part) => total * 60 + Number(part), 0);
		return Either.right(sign * value);
	}
	return Either.right(sign * Number(body));
};

export const constructBool = (text: string): Either.Either<boolean, string> => {
	const value = BOOL_VALUES[text.toLowerCase()];
	return value === undefined ? Either.left(`invalid boolean '${text}'`) : Either.right(value);
};

/** Dates without a time are midnight UTC; times without a zone are UTC. */
// Date.UTC reads the years 0 to 99 as 1900 to 1999.
const utcTime = (
	year: number,
	month: number,
	day: number,
	hour = 0,
	minute = 0,
	second = 0,
	millis = 0,
): number => {
	const date = new Date(0);
	date.setUTCFullYear(year, month, day);
	return date.setUTCHours(hour, minute, second, millis);
};

export const constructTimestamp = (text: string): Either.Either<Date, string> => {
	const dateOnly = DATE_ONLY.exec(text);
	if (dateOnly !== null) {
		const [, year, month, day] = dateOnly;
		return Either.right(new Date(utcTime(Number(year), Number(month) - 1, Number(day))));
	}
	const match = TIMESTAMP_FORM.exec(text);
	if (match === null) {
		return Either.left(`invalid timestamp '${text}'`);
	}
	const [, year, month, day, hour, minute, second, fraction, zone, zoneSign, zoneHour, zoneMinute] =
		match;
	const millis = Number((fraction ?? "").padEnd(3, "0").slice(0, 3));
	let time = utcTime(
		Number(year),
		Number(month) - 1,
		Number(day),
		Number(hour),
		Number(minute),
		Number(second),
		millis,
	);
	if (zone !== undefined && zone !== "Z") {
		const offset = (Number(zoneHour) * 60 + Number(zoneMinute ?? "0")) * 60_000;
		time -= zoneSign === "-" ? -offset : offset;
	}
	return Either.right(new Date(time));
};

export const constructBinary = (text: string): Either.Either<Uint8Array, string> => {
	const cleaned = text.replace(/[\s]/g, "");
	if (!BASE64_FORM.test(cleaned) || cleaned.length % 4 === 1) {
		return Either.left("invalid base64 data");
	}
	const binary = atob(cleaned);
	return Either.right(Uint8Array.from(binary, (ch) => ch.charCodeAt(0)));
};

const constructNull = (text: string): Either.Either<null, string> =>
	/^(?:~|null|Null|NULL|)$/.test(text) ? Either.right(null) : Either.left(`invalid null '${text}'`);

const SCALAR_CONSTRUCTORS: ReadonlyMap<string, (text: string) => Either.Either<unknown, string>> =
	new Map<string, (text: string) => Either.Either<unknown, string>>([
		[Tags.NULL, constructNull],
		[Tags.BOOL, constructBool],
		[Tags.INT, constructInt],
		[Tags.FLOAT, constructFloat],
		[Tags.TIMESTAMP, constructTimestamp],
		[Tags.BINARY, constructBinary],
		[Tags.STR, Either.right],
		[Tags.MERGE, Either.right],
		[Tags.VALUE, Either.right],
	]);

// ============================================================================
// Merge keys
// ============================================================================

interface FlatPair {
	readonly key: YamlNode;
	readonly value: YamlNode;
	/** Came in through a `<<` merge; later pairs override it silently. */
	readonly merged: boolean;
}

// ============================================================================
// Constructor
// ============================================================================

/**
 * Converts one node graph into JavaScript values. Sequences and mappings are
 * allocated before their content is constructed, so a collection that
 * contains itself becomes a value that contains itself. Every other value is
 * built only once its content is complete, and meeting it again while it is
 * still being built is an error.
 */
class Constructor {
	private readonly constructed = new Map<YamlNode, unknown>();
	private readonly inProgress = new Set<YamlNode>();

	constructor(private readonly config: ConverterConfig) {}

	construct(node: YamlNode): unknown {
		if (this.constructed.has(node)) {
			return this.constructed.get(node);
		}
		if (this.inProgress.has(node)) {
			this.fail(node, "found unconstructable recursive node");
		}
		this.inProgress.add(node);
		const value = this.dispatch(node);
		this.inProgress.delete(node);
		this.constructed.set(node, value);
		return value;
	}

	private dispatch(node: YamlNode): unknown {
		const definition = this.config.tags.get(node.tag);
		if (definition !== undefined) {
			return this.constructCustom(node, definition);
		}
		switch (node.kind) {
			case "scalar": {
				const scalar = SCALAR_CONSTRUCTORS.get(node.tag);
				if (scalar === undefined) {
					return this.unknown(node, () => node.value);
				}
				return this.unwrap(node, scalar(node.value));
			}
			case "sequence":
				if (node.tag === Tags.SEQ) {
					return this.constructSequence(node);
				}
				if (node.tag === Tags.OMAP || node.tag === Tags.PAIRS) {
					return this.constructPairs(node);
				}
				return this.unknown(node, () => this.constructSequence(node));
			case "mapping":
				if (node.tag === Tags.MAP) {
					return this.constructMapping(node);
				}
				if (node.tag === Tags.SET) {
					return new Set(this.flatten(node).map((pair) => this.construct(pair.key)));
				}
				return this.unknown(node, () => this.constructMapping(node));
		}
	}

	private unknown(node: YamlNode, fallback: () => unknown): unknown {
		if (this.config.unknownTags === "keep") {
			return fallback();
		}
		return this.fail(
			node,
			isCoreTag(node.tag)
				? `the tag '${node.tag}' does not apply to a ${node.kind}`
				: `could not determine a constructor for the tag '${node.tag}'`,
		);
	}

	private constructCustom(node: YamlNode, definition: TagDefinition): unknown {
		if (definition.kind !== node.kind) {
			return this.fail(
				node,
				`the tag '${node.tag}' is defined for a ${definition.kind}, but found a ${node.kind}`,
			);
		}
		switch (definition.kind) {
			case "scalar":
				return node.kind === "scalar"
					? this.unwrap(node, definition.construct(node.value))
					: undefined;
			case "sequence":
				return node.kind === "sequence"
					? this.unwrap(node, definition.construct(node.value.map((item) => this.construct(item))))
					: undefined;
			case "mapping":
				return node.kind === "mapping"
					? this.unwrap(
							node,
							definition.construct(
								this.flatten(node).map(
									(pair): KeyValuePair => [this.construct(pair.key), this.construct(pair.value)],
								),
							),
						)
					: undefined;
		}
	}

	// ------------------------------------------------------------------------
	// Collections
	// ------------------------------------------------------------------------

	private constructSequence(node: SequenceNode): Array<unknown> {
		const items: Array<unknown> = [];
		this.constructed.set(node, items);
		for (const item of node.value) {
			items.push(this.construct(item));
		}
		return items;
	}

	private constructPairs(node: SequenceNode): Array<KeyValuePair> {
		const pairs: Array<KeyValuePair> = [];
		this.constructed.set(node, pairs);
		for (const item of node.value) {
			const entry = item.kind === "mapping" && item.value.length === 1 ? item.value[0] : undefined;
			if (entry === undefined) {
				this.fail(
					item,
					`expected a mapping of length 1 in '${node.tag}', but found a ${item.kind}`,
				);
			}
			pairs.push([this.construct(entry[0]), this.construct(entry[1])]);
		}
		return pairs;
	}

	private constructMapping(node: MappingNode): unknown {
		const pairs = this.flatten(node);
		if (this.config.mapping === "map") {
			const map = new Map<unknown, unknown>();
			const explicit = new Set<unknown>();
			this.constructed.set(node, map);
			for (const pair of pairs) {
				const key = this.construct(pair.key);
				this.checkDuplicate(pair, explicit, key);
				map.set(key, this.construct(pair.value));
			}
			return map;
		}
		const target: Record<string, unknown> = {};
		const explicit = new Set<unknown>();
		this.constructed.set(node, target);
		for (const pair of pairs) {
			const key = this.propertyKey(pair.key, this.construct(pair.key));
			this.checkDuplicate(pair, explicit, key);
			const value = this.construct(pair.value);
			if (key === "__proto__") {
				Object.defineProperty(target, key, {
					value,
					enumerable: true,
					writable: true,
					configurable: true,
				});
			} else {
				target[key] = value;
			}
		}
		return target;
	}

	/** Only keys written in the mapping itself count; merged keys are overridable. */
	private checkDuplicate(pair: FlatPair, explicit: Set<unknown>, key: unknown): void {
		if (pair.merged) {
			return;
		}
		if (explicit.has(key) && !this.config.allowDuplicateKeys) {
			this.fail(pair.key, `found duplicate key ${String(key)}`);
		}
		explicit.add(key);
	}

	private propertyKey(node: YamlNode, key: unknown): string {
		if (typeof key === "string") {
			return key;
		}
		if (
			key === null ||
			typeof key === "number" ||
			typeof key === "bigint" ||
			typeof key === "boolean"
		) {
			return String(key);
		}
		if (key instanceof Date) {
			return key.toISOString();
		}
		return this.fail(
			node,
			`found a ${node.kind} key, which an object cannot hold; construct mappings as Maps instead`,
		);
	}

	/**
	 * The mapping's pairs with `<<` merge keys replaced by the pairs they
	 * reference. Merged pairs come first so explicit keys override them, and
	 * of several merged mappings the first listed wins.
	 */
	private flatten(node: MappingNode, visiting: ReadonlySet<MappingNode> = new Set()): Array<FlatPair> {
		if (!node.merged) {
			return node.value.map(([key, value]) => ({ key, value, merged: false }));
		}
		if (visiting.has(node)) {
			return this.fail(node, "found a recursive merge");
		}
		const inner = new Set(visiting).add(node);
		const merged: Array<FlatPair> = [];
		const own: Array<FlatPair> = [];
		for (const [key, value] of node.value) {
			if (key.tag !== Tags.MERGE) {
				own.push({ key, value, merged: false });
				continue;
			}
			if (value.kind === "mapping") {
				merged.push(...this.flattenSource(value, inner));
			} else if (value.kind === "sequence") {
				const sources = value.value.map((source) => {
					if (source.kind !== "mapping") {
						return this.fail(
							source,
							`expected a mapping for merging, but found a ${source.kind}`,
						);
					}
					return this.flattenSource(source, inner);
				});
				for (const source of sources.reverse()) {
					merged.push(...source);
				}
			} else {
				this.fail(
					value,
					"expected a mapping or list of mappings for merging, but found a scalar",
				);
			}
		}
		return [...merged, ...own];
	}

	private flattenSource(source: MappingNode, visiting: ReadonlySet<MappingNode>): Array<FlatPair> {
		return this.flatten(source, visiting).map((pair) => ({ ...pair, merged: true }));
	}

	// ------------------------------------------------------------------------
	// Errors
	// ------------------------------------------------------------------------

	private unwrap<A>(node: YamlNode, result: Either.Either<A, string>): A {
		if (Either.isLeft(result)) {
			return this.fail(node, result.left);
		}
		return result.right;
	}

	private fail(node: YamlNode, message: string): never {
		const mark = node.startMark;
		throw new ConversionError({
			tag: node.tag,
			...(mark !== null ? { mark } : {}),
			message: mark !== null ? `${message}\n${mark.toString()}` : message,
		});
	}
}

/**
 * Converts a node graph to JavaScript values.
 *
 * @example
 * ```typescript
 * const node = load("a: [1, 2, {b: true}]")
 * construct(node) // Either.right({ a: [1, 2, { b: true }] })
 * ```
 */
export const construct = (
	node: YamlNode | null,
	config: ConverterConfig = defaultConverterConfig,
): Either.Either<unknown, ConversionError> => {
	if (node === null) {
		return Either.right(null);
	}
	const constructor = new Constructor(config);
	try {
		return Either.right(constructor.construct(node));
	} catch (error) {
		if (error instanceof ConversionError) {
			return Either.left(error);
		}
		return Either.left(
			new ConversionError({
				tag: node.tag,
				message: error instanceof Error ? error.message : String(error),
				cause: error,
			}),
		);
	}
};
