import { HEADING_LEVELS, type HeadingLevel } from "../config";
import { createIds, type Ids } from "../ids";
import { log } from "../platform/logger";
import { splitExplicitId } from "./explicit-id";

/** Minimal hast-like types so we don't depend on @types/hast */
type TextNode = { type: "text"; value: string };
type ElementNode = {
  type: "element";
  tagName: string;
  properties: Record<string, unknown>;
  children: HastNode[];
};
type RootNode = { type: "root"; children: HastNode[] };
type LiteralNode = { type: "comment" | "doctype" | "raw"; value?: string };
type HastNode = TextNode | ElementNode | RootNode | LiteralNode;

type RehypeSlugOptions = {
  /** Heading levels that get ids (default: all six). Must match extractHeadings' `levels`. */
  levels?: readonly HeadingLevel[];
};

type Heading = { node: ElementNode; level: HeadingLevel };

function getTextContent(node: HastNode): string {
  if (node.type === "text") return node.value;
  if (node.type === "element" || node.type === "root") {
    return node.children.map(getTextContent).join("");
  }
  return "";
}

function headingLevel(node: ElementNode): HeadingLevel | null {
  return HEADING_LEVELS.find((level) => node.tagName === `h${level}`) ?? null;
}

/** Headings in document order; headings never contain headings */
function collectHeadings(node: HastNode, out: Heading[]): Heading[] {
  if (node.type === "element") {
    const level = headingLevel(node);
    if (level !== null) {
      out.push({ node, level });
      return out;
    }
  }
  if (node.type === "element" || node.type === "root") {
    for (const child of node.children) collectHeadings(child, out);
  }
  return out;
}

/**
 * Authored id of a heading: an existing `id` property, or a trailing `{#id}`
 * in its last text node, which is removed from the rendered text.
 */
function takeExplicitId(node: ElementNode): string | undefined {
  const existing = node.properties.id;
  if (typeof existing === "string" && existing.length > 0) return existing;

  const last = node.children[node.children.length - 1];
  if (last?.type !== "text") return undefined;
  const { text, id } = splitExplicitId(last.value);
  if (id === undefined) return undefined;
  last.value = text.trimEnd();
  node.properties.id = id;
  return id;
}

function reserve(ids: Ids, id: string): void {
  if (ids.has(id)) {
    log.warn("markdown.rehype-slug", "Duplicate explicit heading id", { id });
  }
  ids.put(id);
}

/**
 * Rehype plugin: add id to headings from their text (slug).
 * Authored ids are reserved before any id is generated, and duplicate slugs
 * get -1, -2, etc., so anchors match extractHeadings.
 */
export function rehypeSlug(options: RehypeSlugOptions = {}) {
  const levels: readonly HeadingLevel[] = options.levels ?? HEADING_LEVELS;

  return function transformer(tree: HastNode) {
    const headings = collectHeadings(tree, []).filter((h) => levels.includes(h.level));
    const ids = createIds();

    const pending: ElementNode[] = [];
    for (const { node } of headings) {
      const explicit = takeExplicitId(node);
      if (explicit === undefined) pending.push(node);
      else reserve(ids, explicit);
    }

    for (const node of pending) {
      node.properties.id = ids.generate(getTextContent(node).trim(), "heading");
    }
  };
}

export type { RehypeSlugOptions };
