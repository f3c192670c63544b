/**
 * Category keyword matching.
 */

import { normalizeText } from './normalizer.js';
import { escapeRegExp } from './patterns.js';
import type { KeywordCatalog } from '../types.js';

function wholeWordPattern(keyword: string): RegExp | undefined {
  const normalized = normalizeText(keyword).trim();
  if (!normalized) return undefined;
  return new RegExp(`\\b${escapeRegExp(normalized)}\\b`);
}

/**
 * Return, per category, the catalog keywords that occur as whole words in
 * `text`. Matching runs on normalized text, so case and separators such as
 * `-`, `_` or `:` do not matter. Categories without a match are omitted.
 */
export function categorizeKeywords(text: string, catalog: KeywordCatalog): Record<string, string[]> {
  const normalized = normalizeText(text);
  const result: Record<string, string[]> = {};

  for (const [category, keywords] of catalog) {
    const matches = keywords.filter((keyword) => wholeWordPattern(keyword)?.test(normalized) ?? false);
    if (matches.length > 0) {
      result[category] = matches;
    }
  }

  return result;
}
