import * as fs from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import type { Logger } from '../logger/logger.js';

export type SqliteDatabase = Database.Database;

/**
 * Open (creating if needed) the SQLite database shared by the segment store and the log sink.
 */
export function openDatabase(dbPath: string, logger?: Logger): SqliteDatabase {
  if (dbPath !== ':memory:') {
    const existed = fs.existsSync(dbPath);
    fs.mkdirSync(dirname(dbPath), { recursive: true });
    logger?.info(
      'database',
      existed
        ? `Opening existing database at ${dbPath}`
        : `Creating new database at ${dbPath}`,
    );
  }
  const db = new Database(dbPath);
  // WAL lets export queries read while the bot keeps appending
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('busy_timeout = 5000');
  return db;
}

/** Double-quote an identifier for interpolation into SQL text. */
export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}
