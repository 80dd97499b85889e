import table from "./data/transliteration.json";

const ASCII_LETTERS = /^[a-z]+$/;

/**
 * Build the lookup once at load. Keys are single lowercase code points,
 * values lowercase ASCII letters; anything else means the bundled data is broken.
 */
function buildTable(entries: Record<string, string>): ReadonlyMap<string, string> {
  const map = new Map<string, string>();
  for (const [char, replacement] of Object.entries(entries)) {
    if ([...char].length !== 1 || char.toLowerCase() !== char || char.charCodeAt(0) < 0x80) {
      throw new Error(`Invalid transliteration key "${char}"`);
    }
    if (!ASCII_LETTERS.test(replacement)) {
      throw new Error(`Invalid transliteration for "${char}": "${replacement}"`);
    }
    map.set(char, replacement);
  }
  return map;
}

const TRANSLITERATIONS = buildTable(table);

/**
 * ASCII replacement for a single non-ASCII character, or undefined when the
 * table has none. The character is lowercased first, so "É" and "é" both give "e".
 */
export function transliterate(char: string): string | undefined {
  return TRANSLITERATIONS.get(char.toLowerCase());
}
