/**
 * @fileoverview Structured extraction for one message.
 *
 * Runs every extractor the profile enables and merges their output into one
 * ExtractionResult. Extractors that find nothing simply leave their key out.
 */

import { createLogger } from '../../../utils/observability/index.js';
import { resolveCompany } from './company.js';
import { extractDateTime } from './datetime.js';
import { categorizeKeywords } from './keywords.js';
import { extractLabeledValue, matchLabels } from './labeled-value.js';
import { extractReference } from './reference.js';
import type { ExtractionProfile, ExtractionResult, FieldRule } from '../types.js';

const log = createLogger({ domain: 'extraction' });

function applyFieldRule(text: string, rule: FieldRule): string | undefined {
  switch (rule.kind) {
    case 'label':
      return extractLabeledValue(text, rule.label);
    case 'pattern':
      // First pattern that matches wins, even with a blank capture.
      for (const pattern of rule.patterns) {
        const match = pattern.exec(text);
        if (match) return (match[1] ?? '').trim();
      }
      return undefined;
  }
}

/**
 * Extract a structured record from `text` using a prebuilt profile.
 * Pure: the same text and profile always give the same result.
 */
export function extractStructured(text: string, profile: ExtractionProfile): ExtractionResult {
  const result: ExtractionResult = {
    ...matchLabels(text, profile.labels),
    keywordsByCategory: {},
    fields: {},
  };

  if (profile.companies) {
    const company = resolveCompany(text, profile.companies);
    if (company !== undefined) result.company = company;
  }

  const reference = extractReference(text);
  if (reference !== undefined) result.reference = reference;

  const datetime = extractDateTime(text);
  if (datetime !== undefined) result.datetime = datetime;

  if (profile.keywords) {
    result.keywordsByCategory = categorizeKeywords(text, profile.keywords);
  }

  for (const rule of profile.fields) {
    const value = applyFieldRule(text, rule);
    if (value !== undefined) result.fields[rule.field] = value;
  }

  log.debug('extraction_completed', {
    hasCompany: result.company !== undefined,
    hasReference: result.reference !== undefined,
    hasDatetime: result.datetime !== undefined,
    categories: Object.keys(result.keywordsByCategory),
    fields: Object.keys(result.fields),
    matchedLabels: result.matchedKeywords.length,
  });

  return result;
}
