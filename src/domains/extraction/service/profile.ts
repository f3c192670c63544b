/**
 * @fileoverview Extraction profile construction and validation.
 *
 * Catalog data arrives as plain JSON-ish objects. This module turns it into
 * immutable catalogs plus precompiled field rules once per configuration
 * load, so a bad pattern is reported to whoever loads the configuration
 * instead of failing (or being silently skipped) on every message.
 */

import { ConfigurationError, type ValidationError } from '../../../utils/errors.js';
import { sortCompaniesByLength } from './company.js';
import { countCaptureGroups } from './patterns.js';
import type {
  CompanyCatalog,
  ExtractionProfile,
  ExtractionProfileInput,
  FieldRule,
  FieldRuleInput,
  KeywordCatalog,
} from '../types.js';

export function createCompanyCatalog(companies: readonly string[]): CompanyCatalog {
  return Object.freeze(sortCompaniesByLength(companies.filter((name) => name.trim().length > 0)));
}

export function createKeywordCatalog(categories: Readonly<Record<string, readonly string[]>>): KeywordCatalog {
  return new Map(
    Object.entries(categories).map(([category, keywords]) => [category, Object.freeze([...keywords])])
  );
}

function compilePattern(
  field: string,
  index: number,
  source: string,
  problems: ValidationError[]
): RegExp | undefined {
  const location = `fields.${field}[${index}]`;
  let pattern: RegExp;
  try {
    pattern = new RegExp(source, 'i');
  } catch (error) {
    problems.push({
      field: location,
      message: `invalid regular expression: ${error instanceof Error ? error.message : String(error)}`,
    });
    return undefined;
  }

  const groups = countCaptureGroups(source);
  if (groups !== 1) {
    problems.push({
      field: location,
      message: `pattern must contain exactly one capture group, found ${groups}`,
    });
    return undefined;
  }

  return pattern;
}

function compileFieldRule(field: string, input: FieldRuleInput, problems: ValidationError[]): FieldRule | undefined {
  if ('label' in input) {
    if (!input.label.trim()) {
      problems.push({ field: `fields.${field}.label`, message: 'label must be a non-empty string' });
      return undefined;
    }
    return { kind: 'label', field, label: input.label };
  }

  if (input.length === 0) {
    problems.push({ field: `fields.${field}`, message: 'at least one pattern is required' });
    return undefined;
  }

  const before = problems.length;
  const patterns = input
    .map((source, index) => compilePattern(field, index, source, problems))
    .filter((pattern): pattern is RegExp => pattern !== undefined);

  if (problems.length > before) return undefined;
  return { kind: 'pattern', field, patterns: Object.freeze(patterns) };
}

/**
 * Validate and compile loosely-typed catalog data.
 *
 * @throws ConfigurationError (code INVALID_FIELD_PATTERN) listing every
 *   field pattern that does not compile or lacks exactly one capture group
 */
export function buildExtractionProfile(input: ExtractionProfileInput): ExtractionProfile {
  const problems: ValidationError[] = [];
  const fields: FieldRule[] = [];

  for (const [field, ruleInput] of Object.entries(input.fields ?? {})) {
    const rule = compileFieldRule(field, ruleInput, problems);
    if (rule) fields.push(rule);
  }

  if (problems.length > 0) {
    throw new ConfigurationError(
      `Invalid field patterns: ${problems.map((p) => `${p.field}: ${p.message}`).join('; ')}`,
      'INVALID_FIELD_PATTERN',
      problems
    );
  }

  return Object.freeze({
    companies: input.companies ? createCompanyCatalog(input.companies) : undefined,
    keywords: input.keywords ? createKeywordCatalog(input.keywords) : undefined,
    fields: Object.freeze(fields),
    labels: Object.freeze((input.labels ?? []).filter((label) => label.trim().length > 0)),
  });
}
