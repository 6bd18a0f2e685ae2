import { UNDETERMINED_LANG, type LocalizedText } from "./types.js";

/**
 * Module: Multilingual Field Encoding
 * Purpose: Decompose `lang:text|lang:text` cells into ordered language/text pairs
 * and render pairs back into the same convention.
 * Rules:
 * - Segments are split on `|` and trimmed; empty segments are dropped.
 * - The first `:` separates the language tag from the text when the tag is non-empty.
 * - Untagged segments, and segments with an empty tag (`:value`), fall back to `und`.
 */

const SEGMENT_SEPARATOR = "|";
const TERM_SEPARATOR = ";";

/**
 * Parse one multilingual cell. Output order follows segment order; the same input
 * always yields the same output and empty input yields `[]`.
 */
export function parseMultilingualField(raw: string): LocalizedText[] {
  const out: LocalizedText[] = [];
  if (!raw) return out;
  for (const piece of raw.split(SEGMENT_SEPARATOR)) {
    const segment = piece.trim();
    if (!segment) continue;
    const colon = segment.indexOf(":");
    if (colon < 0) {
      out.push({ lang: UNDETERMINED_LANG, text: segment });
      continue;
    }
    const tag = segment.slice(0, colon).trim();
    const text = segment.slice(colon + 1).trim();
    if (!tag) {
      if (text) out.push({ lang: UNDETERMINED_LANG, text });
      continue;
    }
    // "fr:" carries no text; keeping it would emit a blank entry
    if (!text) continue;
    out.push({ lang: tag, text });
  }
  return out;
}

/** Split a `;`-separated term list, dropping blank terms. */
export function splitTerms(text: string): string[] {
  return text
    .split(TERM_SEPARATOR)
    .map((t) => t.trim())
    .filter(Boolean);
}

// An untagged text containing ":" is written as ":text" so it parses back untagged
const renderSegment = (lang: string, text: string): string => {
  if (lang !== UNDETERMINED_LANG) return `${lang}:${text}`;
  return text.includes(":") ? `:${text}` : text;
};

export function formatMultilingualField(texts: readonly LocalizedText[]): string {
  return texts
    .filter((t) => t.text.trim() !== "")
    .map((t) => renderSegment(t.lang, t.text.trim()))
    .join(SEGMENT_SEPARATOR);
}

/**
 * Render keyword pairs grouped by language (first-seen order) as
 * `fr:a;b|en:x;y`. One pair per term is expected on input.
 */
export function formatKeywordField(texts: readonly LocalizedText[]): string {
  const groups = new Map<string, string[]>();
  for (const { lang, text } of texts) {
    const term = text.trim();
    if (!term) continue;
    const bucket = groups.get(lang);
    if (bucket) bucket.push(term);
    else groups.set(lang, [term]);
  }
  const segments: string[] = [];
  for (const [lang, terms] of groups) {
    segments.push(renderSegment(lang, terms.join(TERM_SEPARATOR)));
  }
  return segments.join(SEGMENT_SEPARATOR);
}

/** Languages present in a cell, deduplicated in first-seen order. */
export function languagesOf(raw: string): string[] {
  return [...new Set(parseMultilingualField(raw).map((t) => t.lang))];
}
