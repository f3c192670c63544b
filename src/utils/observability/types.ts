export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Fields attached to every record written inside withLogContext. */
export type LogContext = {
  domain?: string;
  requestId?: string;
  runId?: string;
  messageId?: string;
  [key: string]: unknown;
};

export type LogData = Record<string, unknown>;

export type LogRecord = LogContext &
  LogData & {
    timestamp: string;
    level: LogLevel;
    event: string;
  };

export interface Logger {
  debug(event: string, data?: LogData): void;
  info(event: string, data?: LogData): void;
  warn(event: string, data?: LogData): void;
  error(event: string, data?: LogData): void;
  child(context: LogContext): Logger;
}
