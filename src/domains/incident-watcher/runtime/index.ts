/**
 * @fileoverview Incident watcher service lifecycle.
 *
 * Polls Gmail for new messages, runs them through the extraction engine and
 * appends one report row per message to the configured spreadsheet.
 *
 * Catalogs are reloaded on every run so edits take effect without a restart.
 */

import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { DateTime } from 'luxon';
import config from '../../../config.js';
import { createIntervalPoller, type Poller } from '../../../utils/poller.js';
import { AppError } from '../../../utils/errors.js';
import { createLogger, createRunId, withLogContext } from '../../../utils/observability/index.js';
import {
  getCatalogStore,
  INCIDENT_REPORT_TYPE,
  toProfileInput,
} from '../../catalogs/runtime/index.js';
import { buildExtractionProfile } from '../../extraction/runtime/index.js';
import { getGoogleClient } from '../providers/google-auth.js';
import { GmailMailSource } from '../providers/gmail.js';
import { SheetsReportSink } from '../providers/google-sheets.js';
import { getProcessedMessageStore, resetProcessedMessageStore, type ProcessedMessageStore } from '../repo/sqlite.js';
import { processIncomingEmails } from '../service/processor.js';

// Re-export domain public API
export { processIncomingEmails, buildIncidentReport, extractionText } from '../service/processor.js';
export { toReportRecord, buildSheetRow, buildHeaderRow, slugify, describeReference } from '../service/report-row.js';
export { GmailMailSource, prepareIncomingEmail } from '../providers/gmail.js';
export { SheetsReportSink } from '../providers/google-sheets.js';
export { ProcessedMessageStore, getProcessedMessageStore, resetProcessedMessageStore } from '../repo/sqlite.js';
export type * from '../types.js';

let poller: Poller | null = null;
let db: Database.Database | null = null;
const log = createLogger({ domain: 'incident-watcher-runtime' });

function openProcessedStore(): ProcessedMessageStore {
  if (!db) {
    fs.mkdirSync(path.dirname(config.processedDbPath), { recursive: true });
    db = new Database(config.processedDbPath);
  }
  return getProcessedMessageStore(db);
}

async function runOnce(): Promise<void> {
  const startedAt = Date.now();
  const catalogs = getCatalogStore().loadAll();
  const profile = buildExtractionProfile(toProfileInput(catalogs));

  const mapping = catalogs.reportMapping[INCIDENT_REPORT_TYPE];
  if (!mapping) {
    throw new AppError(`Report mapping "${INCIDENT_REPORT_TYPE}" is not configured`, 'REPORT_MAPPING_MISSING');
  }
  const spreadsheetId = config.google.spreadsheetId;
  if (!spreadsheetId) {
    throw new AppError('REPORT_SPREADSHEET_ID is not configured', 'SPREADSHEET_MISSING');
  }

  const auth = getGoogleClient();
  const since = DateTime.now().minus({ days: config.incidentWatcher.lookbackDays }).toJSDate();

  const summary = await processIncomingEmails(
    {
      source: new GmailMailSource(auth, config.incidentWatcher.query),
      sink: new SheetsReportSink(auth, spreadsheetId, mapping),
      store: openProcessedStore(),
      profile,
      referenceCodes: catalogs.referenceCodes.incident_codes,
    },
    { since, batchSize: config.incidentWatcher.batchSize }
  );

  log.info('run_completed', { ...summary, durationMs: Date.now() - startedAt });
}

/**
 * Start the incident watcher background service.
 */
export function startIncidentWatcher(): void {
  if (!config.incidentWatcher.enabled) {
    log.info('watcher_disabled');
    return;
  }

  if (poller) {
    log.info('watcher_already_running');
    return;
  }

  poller = createIntervalPoller(
    () => withLogContext({ runId: createRunId('incidents') }, runOnce),
    config.incidentWatcher.intervalMs,
    'incident-watcher'
  );
  poller.start();

  log.info('watcher_started', { intervalMs: config.incidentWatcher.intervalMs });
}

/**
 * Stop the incident watcher background service.
 * Waits for any in-flight run to complete.
 */
export async function stopIncidentWatcher(): Promise<void> {
  if (poller) {
    await poller.stop();
    poller = null;
    log.info('watcher_stopped');
  }
  if (db) {
    db.close();
    db = null;
    resetProcessedMessageStore();
  }
}
