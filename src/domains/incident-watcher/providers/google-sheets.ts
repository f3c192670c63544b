/**
 * @fileoverview Google Sheets report sink.
 */

import { google, type sheets_v4 } from 'googleapis';
import type { OAuth2Client } from 'google-auth-library';
import type { ReportMapping } from '../../catalogs/runtime/index.js';
import { createLogger } from '../../../utils/observability/index.js';
import { withRetry } from './google-auth.js';
import { buildHeaderRow, buildSheetRow, toReportRecord } from '../service/report-row.js';
import type { IncidentReport, ReportSink } from '../types.js';

const log = createLogger({ domain: 'sheets-sink' });

/** A1 range for a whole sheet; quotes in sheet names are doubled. */
export function sheetRange(sheetName: string, cells = 'A1'): string {
  return `'${sheetName.replace(/'/g, "''")}'!${cells}`;
}

export class SheetsReportSink implements ReportSink {
  private sheets: sheets_v4.Sheets;

  constructor(
    auth: OAuth2Client,
    private readonly spreadsheetId: string,
    private readonly mapping: ReportMapping
  ) {
    this.sheets = google.sheets({ version: 'v4', auth });
  }

  async append(reports: IncidentReport[]): Promise<number> {
    if (reports.length === 0) return 0;

    const rows = reports.map((report) => buildSheetRow(toReportRecord(report), this.mapping));
    const needsHeader = await this.isSheetEmpty();
    const values = needsHeader ? [buildHeaderRow(this.mapping), ...rows] : rows;

    const response = await withRetry(
      () =>
        this.sheets.spreadsheets.values.append({
          spreadsheetId: this.spreadsheetId,
          range: sheetRange(this.mapping.sheet_name),
          valueInputOption: 'USER_ENTERED',
          insertDataOption: 'INSERT_ROWS',
          requestBody: { values },
        }),
      'Sheets'
    );

    log.info('rows_appended', {
      sheet: this.mapping.sheet_name,
      rows: rows.length,
      headerWritten: needsHeader,
      updatedRange: response.data.updates?.updatedRange ?? undefined,
    });

    return rows.length;
  }

  private async isSheetEmpty(): Promise<boolean> {
    const response = await withRetry(
      () =>
        this.sheets.spreadsheets.values.get({
          spreadsheetId: this.spreadsheetId,
          range: sheetRange(this.mapping.sheet_name, 'A1:1'),
        }),
      'Sheets'
    );
    return (response.data.values ?? []).length === 0;
  }
}
