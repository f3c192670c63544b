import type { LogData } from './types.js';

const SECRET_KEY_PATTERN = /(token|secret|password|api[_-]?key|authorization|cookie|credential|client[_-]?secret)/i;
const ADDRESS_KEY_PATTERN = /^(from|to|cc|sender|recipient|replyTo)$/i;
const CONTENT_KEY_PATTERN = /^(body|text|content|emailBody|htmlBody|snippet)$/i;

const EMAIL_PATTERN = /([A-Za-z0-9._%+-]+)@([A-Za-z0-9.-]+\.[A-Za-z]{2,})/g;
const CONTAINS_EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/;

const MAX_DEPTH = 6;

function maskAddressMatch(_match: string, local: string, host: string): string {
  return `${local.slice(0, 1)}***@${host}`;
}

function redactStringByKey(key: string | undefined, value: string): string {
  if (key && SECRET_KEY_PATTERN.test(key)) {
    return '[REDACTED]';
  }
  if (key && CONTENT_KEY_PATTERN.test(key)) {
    return `[REDACTED_TEXT len=${value.length}]`;
  }
  return value.replace(EMAIL_PATTERN, maskAddressMatch);
}

function redactUnknown(value: unknown, key: string | undefined, depth: number): unknown {
  if (depth > MAX_DEPTH) return '[TRUNCATED]';

  if (value === null || value === undefined) return value;

  if (value instanceof Error) {
    return {
      name: value.name,
      message: redactStringByKey(key, value.message),
      stack: process.env.NODE_ENV === 'development' ? value.stack : undefined,
    };
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (typeof value === 'string') {
    return redactStringByKey(key, value);
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (Array.isArray(value)) {
    if (key && CONTENT_KEY_PATTERN.test(key)) {
      return `[REDACTED_ARRAY len=${value.length}]`;
    }
    return value.map((item) => redactUnknown(item, key, depth + 1));
  }

  if (typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [childKey, childValue] of Object.entries(value)) {
      result[childKey] = SECRET_KEY_PATTERN.test(childKey)
        ? '[REDACTED]'
        : redactUnknown(childValue, childKey, depth + 1);
    }
    return result;
  }

  return String(value);
}

/**
 * Mask the local part of an e-mail address, keeping its first character
 * and the domain: `jane.doe@example.com` becomes `j***@example.com`.
 */
export function redactEmailAddress(address: string): string {
  if (!CONTAINS_EMAIL_PATTERN.test(address)) return '***';
  return address.replace(EMAIL_PATTERN, maskAddressMatch);
}

export function redactSecrets(data: LogData): LogData {
  const result: LogData = {};
  for (const [key, value] of Object.entries(data)) {
    if (SECRET_KEY_PATTERN.test(key)) {
      result[key] = '[REDACTED]';
    } else if (typeof value === 'string' && ADDRESS_KEY_PATTERN.test(key)) {
      result[key] = redactEmailAddress(value);
    } else {
      result[key] = redactUnknown(value, key, 0);
    }
  }
  return result;
}
