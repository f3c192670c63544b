import { randomUUID } from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';
import type { LogContext } from './types.js';

const storage = new AsyncLocalStorage<LogContext>();

/**
 * Run `fn` with `context` merged over the current one. Every log line
 * written inside, including from awaited work, carries these fields.
 */
export function withLogContext<T>(context: LogContext, fn: () => T): T {
  return storage.run({ ...getLogContext(), ...context }, fn);
}

export function getLogContext(): LogContext {
  return storage.getStore() ?? {};
}

function shortId(prefix: string): string {
  return `${prefix}_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}

/** Id for one HTTP request, e.g. `req_3f9a0c1b2d4e`. */
export const createRequestId = (prefix = 'req'): string => shortId(prefix);

/** Id for one watcher run, e.g. `incidents_3f9a0c1b2d4e`. */
export const createRunId = (prefix = 'run'): string => shortId(prefix);
