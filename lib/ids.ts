import { DEFAULT_SEPARATOR, FALLBACK_IDS } from "./config";
import { slugify } from "./slug";

/** Kind of element an id is generated for; only picks the fallback id */
export type ElementKind = "heading" | "other";

/**
 * Ids issued within one document. Every generated or reserved id is kept,
 * and `generate` never hands out one already in the set.
 *
 * Not safe to share between concurrent renders: create one per document.
 */
export interface Ids {
  /** Slugify `text` into a new id, suffixing -1, -2, ... until it is unused */
  generate(text: string | Uint8Array, kind: ElementKind): string;
  /** Reserve an id as written (e.g. an authored `{#id}`) so generate avoids it */
  put(id: string): void;
  /** Whether `id` was already generated or reserved */
  has(id: string): boolean;
  /** Number of distinct ids generated or reserved so far */
  readonly size: number;
}

class IdRegistry implements Ids {
  private readonly values = new Set<string>();

  generate(text: string | Uint8Array, kind: ElementKind): string {
    const base = slugify(text, DEFAULT_SEPARATOR) || FALLBACK_IDS[kind];
    if (!this.values.has(base)) {
      this.values.add(base);
      return base;
    }
    for (let n = 1; ; n++) {
      const candidate = `${base}${DEFAULT_SEPARATOR}${n}`;
      if (!this.values.has(candidate)) {
        this.values.add(candidate);
        return candidate;
      }
    }
  }

  put(id: string): void {
    this.values.add(id);
  }

  has(id: string): boolean {
    return this.values.has(id);
  }

  get size(): number {
    return this.values.size;
  }
}

export function createIds(): Ids {
  return new IdRegistry();
}

/**
 * Return unique ids for a list of labels in order.
 * Duplicates get -1, -2, etc. so TOC and rehype-slug stay in sync.
 */
export function uniqueHeadingIds(labels: string[]): { id: string; label: string }[] {
  const ids = createIds();
  return labels.map((label) => ({ id: ids.generate(label, "heading"), label }));
}
