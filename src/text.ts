// src/text.ts — Name normalization shared by every stage
// Entity ids, dedup keys and query text all go through these helpers.

const UNSAFE_CHARS = /[<>"'&\\]/g;

export const STOP_WORDS: ReadonlySet<string> = new Set([
  "the", "a", "an", "and", "or", "for", "of", "in", "on", "to", "with", "by",
]);

/**
 * Trim, strip markup-unsafe characters and collapse inner whitespace.
 * Returns "" for blank input.
 */
export function cleanName(raw: string): string {
  return raw.replace(UNSAFE_CHARS, "").replace(/\s+/g, " ").trim();
}

/** Case-insensitive dedup key for a cleaned name. */
export function normalizeKey(name: string): string {
  return cleanName(name).toLowerCase();
}

export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

export function toUrlPath(...segments: string[]): string {
  const parts = segments.map(slugify).filter(Boolean);
  return parts.length > 0 ? `/${parts.join("/")}/` : "/";
}

/** Lowercase word tokens with stop words removed. */
export function tokenize(name: string): string[] {
  return normalizeKey(name)
    .split(/[\s\-_/]+/)
    .filter((w) => w.length > 0 && !STOP_WORDS.has(w));
}

/** Crude singular form used only for token comparison ("widgets" → "widget"). */
export function singular(word: string): string {
  if (word.length > 4 && word.endsWith("ies")) return `${word.slice(0, -3)}y`;
  if (word.length > 3 && word.endsWith("s") && !word.endsWith("ss")) return word.slice(0, -1);
  return word;
}

/** Tokens shared by two names, compared in singular form, in `a`'s order. */
export function sharedTokens(a: string, b: string): string[] {
  const right = new Set(tokenize(b).map(singular));
  const shared: string[] = [];
  for (const token of tokenize(a)) {
    const s = singular(token);
    if (right.has(s) && !shared.includes(s)) shared.push(s);
  }
  return shared;
}

/** True when `needle` occurs in `haystack` as a whole-word sequence. */
export function containsPhrase(haystack: string, needle: string): boolean {
  const h = ` ${normalizeKey(haystack)} `;
  const n = ` ${normalizeKey(needle)} `;
  return n.trim().length > 0 && h.includes(n);
}

export function round(value: number, decimals = 4): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/** Fill `{key}` placeholders from own properties of `values`; unknown keys stay as written. */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template
    .replace(/\{(\w+)\}/g, (match, key: string) => (Object.hasOwn(values, key) ? values[key] : match))
    .replace(/\s+/g, " ")
    .trim();
}
