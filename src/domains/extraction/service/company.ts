/**
 * Company name resolution against a catalog of known names.
 */

import { escapeRegExp } from './patterns.js';
import type { CompanyCatalog } from '../types.js';

/** "Company: ..." style labels, each capturing up to the next comma or line break. */
const COMPANY_LABEL_PATTERNS: readonly RegExp[] = [
  /company[:\s]+([^,\n\r]+)/i,
  /organization[:\s]+([^,\n\r]+)/i,
  /client[:\s]+([^,\n\r]+)/i,
  /customer[:\s]+([^,\n\r]+)/i,
];

/**
 * Order company names longest first so "ABC Corporation" is tried before
 * "ABC". Array#sort is stable, so equal lengths keep catalog order.
 */
export function sortCompaniesByLength(companies: readonly string[]): string[] {
  return [...companies].sort((a, b) => b.length - a.length);
}

function findInLabeledText(text: string, sorted: readonly string[]): string | undefined {
  for (const pattern of COMPANY_LABEL_PATTERNS) {
    const captured = pattern.exec(text)?.[1];
    if (captured === undefined) continue;

    const candidate = captured.trim().toLowerCase();
    const company = sorted.find((name) => candidate.includes(name.toLowerCase()));
    if (company !== undefined) return company;
  }
  return undefined;
}

function findStandalone(text: string, sorted: readonly string[]): string | undefined {
  const lowered = text.toLowerCase();
  return sorted.find((name) =>
    lowered.includes(name.toLowerCase()) &&
    new RegExp(`\\b${escapeRegExp(name)}\\b`, 'i').test(text)
  );
}

/**
 * Resolve which catalog company `text` refers to.
 *
 * Labeled mentions ("Client: Example Corp") are checked first; otherwise the
 * first catalog name found as a whole word anywhere in the text wins. The
 * returned value is always a catalog entry, verbatim.
 */
export function resolveCompany(text: string, companies: CompanyCatalog): string | undefined {
  const sorted = sortCompaniesByLength(companies.filter((name) => name.trim().length > 0));
  return findInLabeledText(text, sorted) ?? findStandalone(text, sorted);
}
