export type * from './types.js';

export {
  createRequestId,
  createRunId,
  withLogContext,
  getLogContext,
} from './context.js';

export {
  createLogger,
  closeLogSinks,
} from './logger.js';

export {
  redactEmailAddress,
  redactSecrets,
} from './redaction.js';
