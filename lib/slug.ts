import { DEFAULT_SEPARATOR } from "./config";
import { transliterate } from "./transliteration";

const decoder = new TextDecoder("utf-8");

/** Separator is one ASCII character that is neither a letter nor a digit */
function assertSeparator(separator: string): void {
  if (separator.length !== 1 || separator.charCodeAt(0) >= 0x80 || /[a-z0-9]/i.test(separator)) {
    throw new Error(
      `Separator must be a single non-alphanumeric ASCII character (got "${separator}")`
    );
  }
}

/**
 * Slugify text for use as an id (anchor): lowercase ASCII letters and digits
 * joined by `separator`, with common accented letters transliterated.
 *
 * Byte input is decoded as UTF-8; malformed sequences become U+FFFD and are
 * treated like any other symbol. Runs of anything that is not a letter or
 * digit collapse into one separator, and the result never starts or ends with one.
 */
export function slugify(text: string | Uint8Array, separator: string = DEFAULT_SEPARATOR): string {
  assertSeparator(separator);
  const input = typeof text === "string" ? text : decoder.decode(text);
  if (input.length === 0) return "";

  let out = "";
  let prevSep = false;

  const pushSeparator = () => {
    if (!prevSep && out.length > 0) {
      out += separator;
      prevSep = true;
    }
  };

  for (const char of input) {
    const code = char.charCodeAt(0);

    if (code < 0x80) {
      if (code >= 0x41 && code <= 0x5a) {
        out += String.fromCharCode(code + 0x20);
        prevSep = false;
      } else if ((code >= 0x61 && code <= 0x7a) || (code >= 0x30 && code <= 0x39)) {
        out += char;
        prevSep = false;
      } else {
        pushSeparator();
      }
      continue;
    }

    const replacement = transliterate(char);
    if (replacement !== undefined) {
      out += replacement;
      prevSep = false;
      continue;
    }

    // Letters and digits of other scripts are dropped like symbols: no decomposition.
    pushSeparator();
  }

  if (out.endsWith(separator)) out = out.slice(0, -1);
  if (out.startsWith(separator)) out = out.slice(1);
  return out;
}
