/**
 * @fileoverview Date/time extraction from free-form mail text.
 *
 * Finds a date token, looks for a time token close to it, and parses the
 * pair with Luxon against a fixed, ordered format list. All values are
 * naive local times; no timezone is read from the text.
 *
 * Known limitation: `03/04/2025` is ambiguous. Day-first formats are tried
 * before month-first ones, so it reads as 3 April 2025. Month-first only
 * wins when day-first is impossible (e.g. `03/15/2025`).
 *
 * Known limitation: the bare `H:mm` time token is tried before the AM/PM
 * one, so `2025-03-15 2:30 PM` reads as 02:30, not 14:30.
 */

import { DateTime } from 'luxon';

const MONTH_NAMES =
  'January|February|March|April|May|June|July|August|September|October|November|December';

/** Date tokens, tried in order; only the first occurrence of each is used. */
const DATE_PATTERNS: readonly RegExp[] = [
  /\d{4}-\d{2}-\d{2}/,
  /\d{1,2}[/.-]\d{1,2}[/.-]\d{4}/,
  new RegExp(`(?:${MONTH_NAMES})\\s+\\d{1,2},?\\s+\\d{4}`, 'i'),
];

/** Time tokens searched inside the window around a date. */
const TIME_PATTERNS: readonly RegExp[] = [
  /\d{1,2}:\d{2}/,
  /\d{1,2}:\d{2}:\d{2}/,
  /\d{1,2}:\d{2}\s*[AP]M/i,
];

/** Characters on either side of a date token searched for a time token. */
export const TIME_WINDOW_CHARS = 20;

/** Luxon formats, in priority order. */
export const DATETIME_FORMATS: readonly string[] = [
  'yyyy-MM-dd H:mm',
  'yyyy-MM-dd H:mm:ss',
  'yyyy-MM-dd h:mm a',
  'yyyy-MM-dd',
  'd/M/yyyy H:mm',
  'M/d/yyyy H:mm',
  'd/M/yyyy',
  'M/d/yyyy',
  'MMMM d, yyyy H:mm',
  'MMMM d, yyyy',
  'MMMM d yyyy',
];

/**
 * Parse a date or date-time string against DATETIME_FORMATS.
 * Returns undefined when no format accepts it.
 */
export function parseDateTime(value: string): Date | undefined {
  const candidate = value.trim().replace(/\s+/g, ' ');

  for (const format of DATETIME_FORMATS) {
    const parsed = DateTime.fromFormat(candidate, format, { locale: 'en-US' });
    if (parsed.isValid) {
      return parsed.toJSDate();
    }
  }

  return undefined;
}

function timeTokensNear(text: string, start: number, end: number): string[] {
  const window = text.slice(Math.max(0, start - TIME_WINDOW_CHARS), end + TIME_WINDOW_CHARS);
  const tokens: string[] = [];
  for (const pattern of TIME_PATTERNS) {
    const match = pattern.exec(window);
    if (match) tokens.push(match[0]);
  }
  return tokens;
}

/**
 * Extract the first parseable date (with a nearby time when present).
 *
 * For each date pattern in turn: combine its first match with each time
 * token found within TIME_WINDOW_CHARS, then fall back to the date alone,
 * then move on to the next date pattern.
 */
export function extractDateTime(text: string): Date | undefined {
  for (const pattern of DATE_PATTERNS) {
    const match = pattern.exec(text);
    if (!match) continue;

    const date = match[0];
    const end = match.index + date.length;

    for (const time of timeTokensNear(text, match.index, end)) {
      const combined = parseDateTime(`${date} ${time}`);
      if (combined) return combined;
    }

    const dateOnly = parseDateTime(date);
    if (dateOnly) return dateOnly;
  }

  return undefined;
}
