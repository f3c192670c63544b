/**
 * @fileoverview Gmail mail source + email normalization.
 *
 * Lists recent INBOX messages matching the configured search query and
 * normalizes them into IncomingEmail format for extraction.
 */

import { google, type gmail_v1 } from 'googleapis';
import type { OAuth2Client } from 'google-auth-library';
import { errorMessage } from '../../../utils/errors.js';
import { createLogger } from '../../../utils/observability/index.js';
import { withRetry } from './google-auth.js';
import type { IncomingEmail, MailSource } from '../types.js';

const log = createLogger({ domain: 'gmail-source' });

/** Longest body kept per message */
export const MAX_BODY_CHARS = 20000;

export class GmailMailSource implements MailSource {
  private gmail: gmail_v1.Gmail;

  constructor(auth: OAuth2Client, private readonly query: string) {
    this.gmail = google.gmail({ version: 'v1', auth });
  }

  async fetchNewMessages(
    since: Date,
    limit: number,
    isProcessed: (messageId: string) => boolean
  ): Promise<IncomingEmail[]> {
    const messageIds = await this.listMessageIds(since, limit, isProcessed);
    if (messageIds.length === 0) return [];

    const emails: IncomingEmail[] = [];
    for (const id of messageIds) {
      try {
        const response = await withRetry(
          () => this.gmail.users.messages.get({ userId: 'me', id, format: 'full' }),
          'Gmail'
        );
        emails.push(prepareIncomingEmail(response.data));
      } catch (err) {
        log.warn('message_fetch_failed', { messageId: id, error: errorMessage(err) });
      }
    }

    log.info('messages_fetched', { listed: messageIds.length, fetched: emails.length });
    return emails;
  }

  /**
   * Page through matching INBOX message ids until `limit` unprocessed ids
   * are collected or the listing runs out.
   */
  private async listMessageIds(
    since: Date,
    limit: number,
    isProcessed: (messageId: string) => boolean
  ): Promise<string[]> {
    const q = `${this.query} after:${Math.floor(since.getTime() / 1000)}`.trim();
    const ids: string[] = [];
    let skipped = 0;
    let pageToken: string | undefined;

    do {
      const response = await withRetry(
        () =>
          this.gmail.users.messages.list({
            userId: 'me',
            q,
            labelIds: ['INBOX'],
            maxResults: Math.min(limit, 100),
            pageToken,
          }),
        'Gmail'
      );

      for (const message of response.data.messages ?? []) {
        if (!message.id || ids.length >= limit) continue;
        if (isProcessed(message.id)) {
          skipped += 1;
        } else {
          ids.push(message.id);
        }
      }
      pageToken = response.data.nextPageToken ?? undefined;
    } while (pageToken && ids.length < limit);

    if (skipped > 0) log.debug('processed_messages_skipped', { skipped });
    return ids;
  }
}

/**
 * Normalize a Gmail message into an IncomingEmail.
 *
 * Decodes body content (preferring text/plain), strips HTML tags,
 * normalizes whitespace and truncates.
 */
export function prepareIncomingEmail(message: gmail_v1.Schema$Message): IncomingEmail {
  const headers = message.payload?.headers ?? [];
  const getHeader = (name: string): string =>
    headers.find(h => h.name?.toLowerCase() === name.toLowerCase())?.value ?? '';

  return {
    messageId: message.id ?? '',
    from: getHeader('From'),
    subject: getHeader('Subject'),
    receivedAt: receivedAt(message, getHeader('Date')),
    body: normalizeWhitespace(extractBody(message.payload)).slice(0, MAX_BODY_CHARS),
  };
}

/** Gmail's internalDate (epoch ms) is authoritative; the Date header is a fallback. */
function receivedAt(message: gmail_v1.Schema$Message, dateHeader: string): Date {
  const internal = Number(message.internalDate);
  if (message.internalDate && Number.isFinite(internal)) return new Date(internal);

  const parsed = dateHeader ? new Date(dateHeader) : new Date(NaN);
  return Number.isNaN(parsed.getTime()) ? new Date() : parsed;
}

/**
 * Walk MIME parts to collect body text. Prefers text/plain over text/html;
 * attachments (parts with a filename) are ignored.
 */
function extractBody(payload: gmail_v1.Schema$MessagePart | undefined | null): string {
  let plainText = '';
  let htmlText = '';

  if (!payload) return '';

  function walkParts(part: gmail_v1.Schema$MessagePart): void {
    const mimeType = part.mimeType ?? '';
    const bodyData = part.body?.data;

    if (bodyData && !part.filename) {
      if (mimeType === 'text/plain') {
        plainText += decodeBodyData(bodyData);
      } else if (mimeType === 'text/html') {
        htmlText += decodeBodyData(bodyData);
      }
    }

    for (const child of part.parts ?? []) {
      walkParts(child);
    }
  }

  walkParts(payload);
  return plainText || stripHtmlTags(htmlText);
}

/**
 * Decode base64url-encoded body data from Gmail API.
 */
function decodeBodyData(data: string): string {
  return Buffer.from(data, 'base64url').toString('utf-8');
}

/**
 * Strip HTML tags from a string. Block-level closers become line breaks so
 * "Label: value" lines stay on their own line.
 */
export function stripHtmlTags(html: string): string {
  if (!html) return '';

  return html
    .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, ' ')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|div|tr|li|h[1-6])>/gi, '\n')
    .replace(/<[^>]+>/g, ' ')
    .replace(/&nbsp;/gi, ' ')
    .replace(/&amp;/gi, '&')
    .replace(/&lt;/gi, '<')
    .replace(/&gt;/gi, '>')
    .replace(/&quot;/gi, '"')
    .replace(/&#39;/gi, "'");
}

/**
 * Collapse runs of spaces and blank lines; keeps single line breaks.
 */
export function normalizeWhitespace(text: string): string {
  return text
    .replace(/\r\n/g, '\n')
    .replace(/[ \t]+/g, ' ')
    .replace(/ ?\n ?/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
