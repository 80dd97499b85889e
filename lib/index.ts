export { slugify } from "./slug";
export { transliterate } from "./transliteration";
export { createIds, uniqueHeadingIds } from "./ids";
export type { Ids, ElementKind } from "./ids";
export type { HeadingLevel } from "./config";
export { extractHeadings } from "./markdown/headings";
export type { HeadingItem, ExtractHeadingsOptions } from "./markdown/headings";
export { rehypeSlug } from "./markdown/rehype-slug";
export type { RehypeSlugOptions } from "./markdown/rehype-slug";
