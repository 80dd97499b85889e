/**
 * Library-wide constants: single source of truth for the separator, fallback
 * ids and heading levels shared by the slugifier, the id registry and the
 * Markdown adapters.
 */

/** Separator used by the id registry when joining slug words and suffixes */
const DEFAULT_SEPARATOR = "-";

/** Ids handed out when a heading or other element slugifies to nothing */
const FALLBACK_IDS = {
  heading: "heading",
  other: "id",
} as const;

/** Every Markdown / HTML heading level */
const HEADING_LEVELS = [1, 2, 3, 4, 5, 6] as const;

type HeadingLevel = (typeof HEADING_LEVELS)[number];

export { DEFAULT_SEPARATOR, FALLBACK_IDS, HEADING_LEVELS };
export type { HeadingLevel };
