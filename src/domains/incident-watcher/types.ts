/**
 * @fileoverview Incident watcher type definitions.
 */

import type { ExtractionResult } from '../extraction/runtime/index.js';

/** Email representation after fetch + normalization */
export type IncomingEmail = {
  messageId: string;
  from: string;
  subject: string;
  receivedAt: Date;
  body: string;
};

/** One extracted message, ready to be written to the report */
export type IncidentReport = {
  email: IncomingEmail;
  result: ExtractionResult;
  /** Description of the extracted reference from the reference-code catalog */
  referenceDescription?: string;
};

/** Flat report record keyed by report field name */
export type ReportRecord = Record<string, string>;

export interface MailSource {
  /**
   * Messages received at or after `since`, newest first. Ids for which
   * `isProcessed` returns true are skipped without being fetched and do not
   * count towards `limit`.
   */
  fetchNewMessages(
    since: Date,
    limit: number,
    isProcessed: (messageId: string) => boolean
  ): Promise<IncomingEmail[]>;
}

export interface ReportSink {
  /** Append one row per report. Returns the number of rows written. */
  append(reports: IncidentReport[]): Promise<number>;
}

export type WatcherRunSummary = {
  fetched: number;
  alreadyProcessed: number;
  reported: number;
  failed: number;
};
