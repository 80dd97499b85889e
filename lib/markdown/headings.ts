import matter from "gray-matter";
import type { Heading } from "mdast";
import { toString } from "mdast-util-to-string";
import remarkGfm from "remark-gfm";
import remarkParse from "remark-parse";
import { unified } from "unified";
import { visit } from "unist-util-visit";
import { HEADING_LEVELS, type HeadingLevel } from "../config";
import { createIds } from "../ids";
import { log } from "../platform/logger";
import { splitExplicitId } from "./explicit-id";

/** A heading entry for a table of contents / jump rail */
type HeadingItem = {
  id: string;
  label: string;
  level: HeadingLevel;
};

type ExtractHeadingsOptions = {
  /** Heading levels to include (default: all six). Must match rehypeSlug's `levels`. */
  levels?: readonly HeadingLevel[];
};

type ScannedHeading = {
  level: HeadingLevel;
  label: string;
  explicitId?: string;
};

/** Same parser react-markdown runs, so TOC and page see the same headings and text */
const parser = unified().use(remarkParse).use(remarkGfm);

/** Drop YAML front matter; a document whose front matter does not parse is scanned whole */
function stripFrontMatter(markdown: string): string {
  try {
    return matter(markdown).content;
  } catch (err) {
    log.error("markdown.headings", "Unreadable front matter, scanning whole document", undefined, err);
    return markdown;
  }
}

/** Trailing `{#id}` in the heading's last text node, removed from the text */
function takeExplicitId(node: Heading): string | undefined {
  const last = node.children[node.children.length - 1];
  if (last?.type !== "text") return undefined;
  const { text, id } = splitExplicitId(last.value);
  if (id === undefined) return undefined;
  last.value = text.trimEnd();
  return id;
}

/** ATX and setext headings in document order, with their rendered text */
function scanHeadings(content: string): ScannedHeading[] {
  const headings: ScannedHeading[] = [];
  visit(parser.parse(content), "heading", (node: Heading) => {
    const explicitId = takeExplicitId(node);
    // Image alt text is not part of the rendered heading text.
    const label = toString(node, { includeImageAlt: false }).trim();
    headings.push({ level: node.depth, label, ...(explicitId ? { explicitId } : {}) });
  });
  return headings;
}

/**
 * Extract headings with their anchor ids from a markdown document.
 *
 * Authored `{#id}` attributes are reserved first, so an auto id never takes
 * one of them even when the authored heading comes later. Duplicate labels
 * get -1, -2, etc. in document order, the same ids rehypeSlug writes.
 */
function extractHeadings(markdown: string, options: ExtractHeadingsOptions = {}): HeadingItem[] {
  const levels: readonly HeadingLevel[] = options.levels ?? HEADING_LEVELS;
  const headings = scanHeadings(stripFrontMatter(markdown)).filter((h) => levels.includes(h.level));

  const ids = createIds();
  for (const { explicitId } of headings) {
    if (explicitId === undefined) continue;
    if (ids.has(explicitId)) {
      log.warn("markdown.headings", "Duplicate explicit heading id", { id: explicitId });
    }
    ids.put(explicitId);
  }

  return headings.map(({ level, label, explicitId }) => ({
    id: explicitId ?? ids.generate(label, "heading"),
    label,
    level,
  }));
}

export { extractHeadings };
export type { HeadingItem, ExtractHeadingsOptions };
