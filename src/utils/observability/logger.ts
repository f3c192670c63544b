import { WriteStream, createWriteStream, existsSync, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import { getLogContext } from './context.js';
import { redactSecrets } from './redaction.js';
import type { Logger, LogRecord, LogContext, LogData, LogLevel } from './types.js';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let fileSink: { path: string; stream: WriteStream } | null = null;

function thresholdLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error') {
    return raw;
  }
  return 'info';
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[thresholdLevel()];
}

function shouldWriteFileSink(): boolean {
  if (process.env.NODE_ENV !== 'development') return false;
  return process.env.APP_LOG_FILE !== 'off';
}

function resolveLogFilePath(): string {
  if (process.env.APP_LOG_FILE) return process.env.APP_LOG_FILE;

  const baseDir = process.env.APP_LOG_DIR || './logs';
  const dateDir = new Date().toISOString().slice(0, 10);
  return join(baseDir, dateDir, 'app.ndjson');
}

function ensureFileSink(): WriteStream | null {
  if (!shouldWriteFileSink()) return null;

  const filePath = resolveLogFilePath();
  if (fileSink?.path === filePath) {
    return fileSink.stream;
  }

  closeLogSinks();

  const dir = dirname(filePath);
  try {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const stream = createWriteStream(filePath, { flags: 'a', encoding: 'utf-8' });
    stream.on('error', (error) => {
      process.stderr.write(`${JSON.stringify({ level: 'warn', event: 'log_sink_failed', error: error.message })}\n`);
    });
    fileSink = { path: filePath, stream };
    return stream;
  } catch (error) {
    process.stderr.write(`${JSON.stringify({
      level: 'warn',
      event: 'log_sink_unavailable',
      path: filePath,
      error: error instanceof Error ? error.message : String(error),
    })}\n`);
    return null;
  }
}

function writeToStd(level: LogLevel, line: string): void {
  if (level === 'error' || level === 'warn') {
    process.stderr.write(`${line}\n`);
    return;
  }
  process.stdout.write(`${line}\n`);
}

function toRecord(
  level: LogLevel,
  event: string,
  baseContext: LogContext,
  data?: LogData,
): LogRecord {
  const payload = data ? redactSecrets(data) : {};
  return {
    timestamp: new Date().toISOString(),
    level,
    event,
    ...getLogContext(),
    ...baseContext,
    ...payload,
  };
}

function emitRecord(record: LogRecord): void {
  const line = JSON.stringify(record);
  writeToStd(record.level, line);
  ensureFileSink()?.write(`${line}\n`);
}

/** Flush and close the development file sink, if one is open. */
export function closeLogSinks(): void {
  if (!fileSink) return;
  fileSink.stream.end();
  fileSink = null;
}

export function createLogger(baseContext: LogContext = {}): Logger {
  const log = (level: LogLevel, event: string, data?: LogData): void => {
    if (!isEnabled(level)) return;
    emitRecord(toRecord(level, event, baseContext, data));
  };

  return {
    debug: (event: string, data?: LogData) => log('debug', event, data),
    info: (event: string, data?: LogData) => log('info', event, data),
    warn: (event: string, data?: LogData) => log('warn', event, data),
    error: (event: string, data?: LogData) => log('error', event, data),
    child: (context: LogContext) => createLogger({ ...baseContext, ...context }),
  };
}
