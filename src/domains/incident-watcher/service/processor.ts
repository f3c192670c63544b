/**
 * @fileoverview One watcher cycle: fetch, extract, report, remember.
 */

import { extractStructured, type ExtractionProfile } from '../../extraction/runtime/index.js';
import { safeExecute } from '../../../utils/errors.js';
import { createLogger, withLogContext } from '../../../utils/observability/index.js';
import type { ProcessedMessageStore } from '../repo/sqlite.js';
import { describeReference } from './report-row.js';
import type { IncidentReport, IncomingEmail, MailSource, ReportSink, WatcherRunSummary } from '../types.js';

const log = createLogger({ domain: 'incident-processor' });

export type ProcessorDeps = {
  source: MailSource;
  sink: ReportSink;
  store: ProcessedMessageStore;
  profile: ExtractionProfile;
  referenceCodes: Readonly<Record<string, string>>;
};

export type ProcessorOptions = {
  since: Date;
  batchSize: number;
};

/** Subject and body are extracted together; references often sit in the subject. */
export function extractionText(email: IncomingEmail): string {
  return email.subject ? `${email.subject}\n${email.body}` : email.body;
}

export function buildIncidentReport(
  email: IncomingEmail,
  profile: ExtractionProfile,
  referenceCodes: Readonly<Record<string, string>>
): IncidentReport {
  const result = extractStructured(extractionText(email), profile);
  return {
    email,
    result,
    referenceDescription: describeReference(result.reference, referenceCodes),
  };
}

/**
 * Process new messages. Messages are marked processed only after the sink
 * accepted their rows; a sink failure propagates and leaves them for the
 * next run.
 *
 * `batchSize` counts unprocessed messages only, so a backlog larger than one
 * batch drains over successive runs.
 */
export async function processIncomingEmails(
  deps: ProcessorDeps,
  options: ProcessorOptions
): Promise<WatcherRunSummary> {
  let alreadyProcessed = 0;
  const isProcessed = (messageId: string): boolean => {
    const seen = deps.store.isProcessed(messageId);
    if (seen) alreadyProcessed += 1;
    return seen;
  };

  const emails = await deps.source.fetchNewMessages(options.since, options.batchSize, isProcessed);
  const fresh = emails.filter((email) => !isProcessed(email.messageId));

  const summary: WatcherRunSummary = {
    fetched: emails.length,
    alreadyProcessed,
    reported: 0,
    failed: 0,
  };

  const reports: IncidentReport[] = [];
  for (const email of fresh) {
    const outcome = await withLogContext({ messageId: email.messageId }, () =>
      safeExecute(async () => buildIncidentReport(email, deps.profile, deps.referenceCodes), 'extract_message')
    );

    if (outcome.success) {
      reports.push(outcome.data);
      log.debug('message_extracted', {
        messageId: email.messageId,
        reference: outcome.data.result.reference,
        company: outcome.data.result.company,
      });
    } else {
      summary.failed += 1;
    }
  }

  if (reports.length === 0) return summary;

  summary.reported = await deps.sink.append(reports);

  for (const report of reports) {
    deps.store.markProcessed(report.email.messageId, report.result.reference);
  }

  return summary;
}
