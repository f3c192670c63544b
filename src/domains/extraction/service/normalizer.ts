/**
 * Canonicalize text for substring and whole-word keyword matching.
 * Regex-based extractors work on the original text instead, so extracted
 * values keep their casing.
 */

const SEPARATORS = /[_\-:;,.\n\r\t]/g;
const WHITESPACE_RUN = /\s+/g;

export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(SEPARATORS, ' ')
    .replace(WHITESPACE_RUN, ' ');
}
