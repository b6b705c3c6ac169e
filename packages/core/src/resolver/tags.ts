// ============================================================================
// Core tags
// ============================================================================

export const TAG_PREFIX = "tag:yaml.org,2002:";

/** The tags of the default schema, in their full `tag:yaml.org,2002:` form. */
export const Tags = {
	NULL: `${TAG_PREFIX}null`,
	BOOL: `${TAG_PREFIX}bool`,
	INT: `${TAG_PREFIX}int`,
	FLOAT: `${TAG_PREFIX}float`,
	STR: `${TAG_PREFIX}str`,
	TIMESTAMP: `${TAG_PREFIX}timestamp`,
	BINARY: `${TAG_PREFIX}binary`,
	MERGE: `${TAG_PREFIX}merge`,
	VALUE: `${TAG_PREFIX}value`,
	YAML: `${TAG_PREFIX}yaml`,
	SEQ: `${TAG_PREFIX}seq`,
	MAP: `${TAG_PREFIX}map`,
	OMAP: `${TAG_PREFIX}omap`,
	PAIRS: `${TAG_PREFIX}pairs`,
	SET: `${TAG_PREFIX}set`,
} as const;

export type CoreTag = (typeof Tags)[keyof typeof Tags];

const CORE_TAGS: ReadonlySet<string> = new Set(Object.values(Tags));

export const isCoreTag = (tag: string): tag is CoreTag => CORE_TAGS.has(tag);

/** The three node shapes; tags resolve differently for each. */
export type NodeKind = "scalar" | "sequence" | "mapping";

/** Tag handles every document starts with. */
export const DEFAULT_TAG_HANDLES: Readonly<Record<string, string>> = {
	"!": "!",
	"!!": TAG_PREFIX,
};
