/**
 * Labeled value extraction.
 *
 * Mail bodies mix "Label: value", "Label = value", "Label - value" and
 * prose conventions; the cascade tries them from most to least explicit and
 * only falls back to the positional "value for Label" form last.
 */

import { normalizeText } from './normalizer.js';
import { escapeRegExp, firstCapture } from './patterns.js';
import type { LabelMatches } from '../types.js';

/** Value text: no colon, ends at a line break or end of input. */
const VALUE = '([^:\\n\\r]+?)';
const LINE_END = '(?:\\n|\\r|$)';

type CascadeStep = (label: string) => string;

const CASCADE: readonly CascadeStep[] = [
  (label) => `${label}[:\\s]+${VALUE}${LINE_END}`,
  (label) => `${label}\\s*=\\s*${VALUE}${LINE_END}`,
  (label) => `${label}\\s*-\\s*${VALUE}${LINE_END}`,
  (label) => `${label}\\s+is\\s+${VALUE}${LINE_END}`,
  (label) => `${VALUE}\\s+for\\s+${label}${LINE_END}`,
];

/**
 * Find the value associated with `label` in `text`.
 * Returns undefined when no step of the cascade matches.
 */
export function extractLabeledValue(text: string, label: string): string | undefined {
  const escaped = escapeRegExp(label);

  for (const step of CASCADE) {
    const pattern = new RegExp(step(escaped), 'i');
    if (pattern.test(text)) {
      return firstCapture(pattern, text);
    }
  }

  return undefined;
}

/**
 * Match a flat label list against `text`.
 *
 * A label counts as matched when its lower-cased form occurs in the
 * normalized text; each matched label then gets a value lookup.
 */
export function matchLabels(text: string, labels: readonly string[]): LabelMatches {
  const normalized = normalizeText(text);
  const matchedKeywords: string[] = [];
  const extractedData: Record<string, string> = {};

  for (const label of labels) {
    if (!label.trim() || !normalized.includes(label.toLowerCase())) continue;

    matchedKeywords.push(label);
    const value = extractLabeledValue(text, label);
    if (value !== undefined) {
      extractedData[label] = value;
    }
  }

  return { matchedKeywords, extractedData };
}
