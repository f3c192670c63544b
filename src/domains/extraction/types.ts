/**
 * @fileoverview Extraction engine type definitions.
 *
 * Catalogs are immutable value objects built once per configuration load
 * (see buildExtractionProfile) and shared by every extraction call.
 */

/** Known company names, longest first; entries are returned verbatim. */
export type CompanyCatalog = readonly string[];

/** Category name → keywords, in catalog order. */
export type KeywordCatalog = ReadonlyMap<string, readonly string[]>;

/**
 * How a configured output field finds its value.
 *
 * - `pattern`: ordered regular expressions, each with one capture group;
 *   the first one that captures a non-blank value wins.
 * - `label`: the labeled-value cascade ("Label: value", "Label = value", ...).
 */
export type FieldRule =
  | { kind: 'pattern'; field: string; patterns: readonly RegExp[] }
  | { kind: 'label'; field: string; label: string };

/** Raw shape of a field rule as it appears in catalog JSON. */
export type FieldRuleInput = readonly string[] | { label: string };

/** Loosely-typed profile data, as read from catalog files or a request. */
export type ExtractionProfileInput = {
  companies?: readonly string[];
  keywords?: Readonly<Record<string, readonly string[]>>;
  fields?: Readonly<Record<string, FieldRuleInput>>;
  labels?: readonly string[];
};

/** Validated, precompiled extraction configuration. */
export type ExtractionProfile = {
  readonly companies?: CompanyCatalog;
  readonly keywords?: KeywordCatalog;
  readonly fields: readonly FieldRule[];
  readonly labels: readonly string[];
};

/** Flat label matching output. */
export type LabelMatches = {
  matchedKeywords: string[];
  extractedData: Record<string, string>;
};

/** Structured record produced for one message. */
export type ExtractionResult = LabelMatches & {
  company?: string;
  reference?: string;
  datetime?: Date;
  keywordsByCategory: Record<string, string[]>;
  fields: Record<string, string>;
};
