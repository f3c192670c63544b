/**
 * @fileoverview Report record and spreadsheet row construction.
 */

import { DateTime } from 'luxon';
import type { ReportMapping } from '../../catalogs/runtime/index.js';
import type { IncidentReport, ReportRecord } from '../types.js';

const REPORT_DATE_FORMAT = 'yyyy-MM-dd HH:mm';

/** "Incident Type" → "incident_type" */
export function slugify(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

function formatDate(date: Date): string {
  return DateTime.fromJSDate(date).toFormat(REPORT_DATE_FORMAT);
}

/**
 * Look up a reference's description. A catalog code matches the whole
 * reference (case-insensitive) or its prefix before a hyphen, so "INC"
 * describes "INC-2025-001"; the longest matching code wins.
 */
export function describeReference(
  reference: string | undefined,
  codes: Readonly<Record<string, string>>
): string | undefined {
  if (!reference) return undefined;
  const wanted = reference.toUpperCase();

  let best: string | undefined;
  for (const code of Object.keys(codes)) {
    const upper = code.toUpperCase();
    if (upper === wanted) return codes[code];
    if (wanted.startsWith(`${upper}-`) && (best === undefined || code.length > best.length)) {
      best = code;
    }
  }
  return best === undefined ? undefined : codes[best];
}

/**
 * Flatten an extracted message into report fields. Field rule values come
 * last and may override the built-in keys.
 */
export function toReportRecord(report: IncidentReport): ReportRecord {
  const { email, result } = report;
  const record: ReportRecord = {
    date: formatDate(result.datetime ?? email.receivedAt),
    received: formatDate(email.receivedAt),
    sender: email.from,
    subject: email.subject,
    description: email.subject,
    company: result.company ?? '',
    reference: result.reference ?? '',
    reference_description: report.referenceDescription ?? '',
    keywords: Object.values(result.keywordsByCategory).flat().join(', '),
  };

  for (const [category, keywords] of Object.entries(result.keywordsByCategory)) {
    record[slugify(category)] = keywords.join(', ');
  }

  return { ...record, ...result.fields };
}

/** Column headers in mapping order. */
export function buildHeaderRow(mapping: ReportMapping): string[] {
  return Object.values(mapping.columns);
}

/** Cell values in mapping order; unknown keys become empty cells. */
export function buildSheetRow(record: ReportRecord, mapping: ReportMapping): string[] {
  return Object.keys(mapping.columns).map((key) => record[key] ?? '');
}
