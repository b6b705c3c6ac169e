import { ResolverError } from "../errors/yaml-errors.js";
import { isCoreTag, type NodeKind, Tags } from "./tags.js";

// ============================================================================
// Types
// ============================================================================

/**
 * One row of the implicit-tag table. `first` lists the characters a matching
 * scalar may start with (`"\0"` stands for the empty scalar); null means the
 * row is tried for every scalar after the rows keyed by first character.
 */
export interface ImplicitResolver {
	readonly tag: string;
	readonly regexp: RegExp;
	readonly first: string | null;
}

export interface ResolverOptions {
	/** Accept `_` digit separators in ints and floats, e.g. `1_000`. */
	readonly underscores?: boolean;
}

// ============================================================================
// Default table
// ============================================================================

const BOOL =
	/^(?:yes|Yes|YES|no|No|NO|true|True|TRUE|false|False|FALSE|on|On|ON|off|Off|OFF)$/;

const intPattern = (digits: string, octal: string, binary: string, hex: string) =>
	new RegExp(
		`^(?:[-+]?0b${binary}+|[-+]?0${octal}+|[-+]?(?:0|[1-9]${digits}*)|[-+]?0x${hex}+|[-+]?[1-9]${digits}*(?::[0-5]?[0-9])+)$`,
	);

const floatPattern = (digits: string) =>
	new RegExp(
		`^(?:[-+]?(?:\\.[0-9]+|${digits}+(?:\\.${digits}*)?)(?:[eE][-+]?[0-9]+)?|[-+]?[0-9]${digits}*(?::[0-5]?[0-9])+\\.${digits}*|[-+]?\\.(?:inf|Inf|INF)|\\.(?:nan|NaN|NAN))$`,
	);

const MERGE = /^(?:<<)$/;
const NULL = /^(?:~|null|Null|NULL)$/;
const EMPTY = /^$/;
const TIMESTAMP =
	/^(?:[0-9][0-9][0-9][0-9]-[0-9][0-9]-[0-9][0-9]|[0-9][0-9][0-9][0-9]-[0-9][0-9]?-[0-9][0-9]?(?:[Tt]|[ \t]+)[0-9][0-9]?:[0-9][0-9]:[0-9][0-9](?:\.[0-9]*)?(?:[ \t]*(?:Z|[-+][0-9][0-9]?(?::[0-9][0-9])?))?)$/;
const VALUE = /^(?:=)$/;

const defaultTable = (options: ResolverOptions): ReadonlyArray<ImplicitResolver> => {
	const underscores = options.underscores === true;
	const digits = underscores ? "[0-9_]" : "[0-9]";
	return [
		{ tag: Tags.BOOL, regexp: BOOL, first: "yYnNtTfFoO" },
		{
			tag: Tags.INT,
			regexp: underscores
				? intPattern(digits, "[0-7_]", "[0-1_]", "[0-9a-fA-F_]")
				: intPattern(digits, "[0-7]", "[0-1]", "[0-9a-fA-F]"),
			first: "-+0123456789",
		},
		{ tag: Tags.FLOAT, regexp: floatPattern(digits), first: "-+0123456789." },
		{ tag: Tags.MERGE, regexp: MERGE, first: "<" },
		{ tag: Tags.NULL, regexp: NULL, first: "~nN\0" },
		{ tag: Tags.NULL, regexp: EMPTY, first: null },
		{ tag: Tags.TIMESTAMP, regexp: TIMESTAMP, first: "0123456789" },
		{ tag: Tags.VALUE, regexp: VALUE, first: "=" },
	];
};

// ============================================================================
// Resolver
// ============================================================================

/**
 * Assigns tags to nodes that carry none in the source.
 *
 * The table is immutable: `withImplicit` and `withoutImplicit` return new
 * resolvers, so one instance can be shared by any number of loads and dumps.
 *
 * @example
 * ```typescript
 * const resolver = Resolver.default.withImplicit(
 *   "!color",
 *   /^#[0-9a-f]{6}$/,
 *   "#",
 * )
 * resolver.resolve("scalar", "#ff0000", true) // "!color"
 * resolver.resolve("scalar", "#ff0000", false) // "tag:yaml.org,2002:str"
 * ```
 */
export class Resolver {
	static readonly default: Resolver = new Resolver(defaultTable({}));

	private constructor(readonly implicitResolvers: ReadonlyArray<ImplicitResolver>) {
		Object.freeze(this.implicitResolvers);
	}

	static create(options: ResolverOptions = {}): Resolver {
		return new Resolver(defaultTable(options));
	}

	/** A resolver with no implicit rows: every scalar resolves to `str`. */
	static empty(): Resolver {
		return new Resolver([]);
	}

	/**
	 * Adds a row. Appended rows are tried after the existing ones; prepended
	 * rows take precedence over them.
	 */
	withImplicit(
		tag: string,
		regexp: RegExp,
		first: string | null,
		position: "append" | "prepend" = "append",
	): Resolver {
		if (regexp.global || regexp.sticky) {
			throw new ResolverError({
				tag,
				message: `Implicit resolver for '${tag}' must not use the global or sticky flag`,
			});
		}
		const entry: ImplicitResolver = { tag, regexp, first };
		return new Resolver(
			position === "append"
				? [...this.implicitResolvers, entry]
				: [entry, ...this.implicitResolvers],
		);
	}

	withoutImplicit(tag: string): Resolver {
		return new Resolver(this.implicitResolvers.filter((entry) => entry.tag !== tag));
	}

	/**
	 * Resolves the tag of a node that has none.
	 *
	 * Only scalars with `implicit` set (plain scalars) are matched against the
	 * table; any other scalar is a string. Collections always resolve to the
	 * generic `seq` and `map` tags.
	 */
	resolve(kind: NodeKind, value: string | null, implicit: boolean): string {
		if (kind === "sequence") {
			return Tags.SEQ;
		}
		if (kind === "mapping") {
			return Tags.MAP;
		}
		if (implicit && value !== null) {
			const first = value.length === 0 ? "\0" : value.charAt(0);
			for (const entry of this.implicitResolvers) {
				if (entry.first !== null && entry.first.includes(first) && entry.regexp.test(value)) {
					return entry.tag;
				}
			}
			for (const entry of this.implicitResolvers) {
				if (entry.first === null && entry.regexp.test(value)) {
					return entry.tag;
				}
			}
		}
		return Tags.STR;
	}

	/** Every tag some row of the table can produce. */
	implicitTags(): ReadonlySet<string> {
		return new Set(this.implicitResolvers.map((entry) => entry.tag));
	}

	/**
	 * Fails with `ResolverError` unless `tag` is a core tag, produced by this
	 * resolver, or listed in `known`.
	 */
	requireKnownTag(tag: string, known: ReadonlySet<string> = new Set()): string {
		if (isCoreTag(tag) || known.has(tag) || this.implicitTags().has(tag)) {
			return tag;
		}
		throw new ResolverError({
			tag,
			message: `could not determine a constructor for the tag '${tag}'`,
		});
	}
}
