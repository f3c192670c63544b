/**
 * @fileoverview SQLite store for processed message ids.
 *
 * A message id is recorded only after its report row was written, so a
 * message is reported at most once across restarts.
 */

import type Database from 'better-sqlite3';

type CountRow = { count: number };

export class ProcessedMessageStore {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS processed_messages (
        message_id    TEXT PRIMARY KEY,
        reference     TEXT,
        processed_at  INTEGER NOT NULL
      )
    `);
  }

  isProcessed(messageId: string): boolean {
    const row = this.db
      .prepare('SELECT 1 FROM processed_messages WHERE message_id = ?')
      .get(messageId);
    return row !== undefined;
  }

  markProcessed(messageId: string, reference?: string): void {
    this.db
      .prepare(
        `INSERT OR IGNORE INTO processed_messages (message_id, reference, processed_at)
         VALUES (?, ?, ?)`
      )
      .run(messageId, reference ?? null, Date.now());
  }

  count(): number {
    const row = this.db
      .prepare('SELECT COUNT(*) AS count FROM processed_messages')
      .get() as CountRow;
    return row.count;
  }
}

let instance: ProcessedMessageStore | null = null;

export function getProcessedMessageStore(db?: Database.Database): ProcessedMessageStore {
  if (instance) return instance;
  if (!db) throw new Error('ProcessedMessageStore not initialized. Provide db on first call.');
  instance = new ProcessedMessageStore(db);
  return instance;
}

export function resetProcessedMessageStore(): void {
  instance = null;
}
