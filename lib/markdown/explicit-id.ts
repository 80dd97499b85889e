/** Trailing `{#custom-id}` heading attribute, as in `## Setup {#install}` */
const EXPLICIT_ID = /[ \t]*\{#([^\s{}]+)\}[ \t]*$/;

/** Split an authored `{#id}` off the end of heading text */
export function splitExplicitId(text: string): { text: string; id?: string } {
  const match = EXPLICIT_ID.exec(text);
  if (!match) return { text };
  return { text: text.slice(0, match.index), id: match[1] };
}
