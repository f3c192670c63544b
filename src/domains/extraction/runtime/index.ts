/**
 * @fileoverview Extraction engine public API.
 */

export { extractStructured } from '../service/aggregator.js';
export { buildExtractionProfile, createCompanyCatalog, createKeywordCatalog } from '../service/profile.js';
export { normalizeText } from '../service/normalizer.js';
export { extractLabeledValue, matchLabels } from '../service/labeled-value.js';
export { resolveCompany } from '../service/company.js';
export { extractReference } from '../service/reference.js';
export { extractDateTime, parseDateTime } from '../service/datetime.js';
export { categorizeKeywords } from '../service/keywords.js';
export type * from '../types.js';
