/**
 * LogSink: append-only operational log stored next to the segment tables.
 *
 * Delivery is best-effort. A failed write is reported on the console fallback
 * and never reaches the caller.
 */

import type Database from 'better-sqlite3';
import { errorMessage } from '../../core/errors.js';
import type { SqliteDatabase } from '../storage/database.js';
import { quoteIdent } from '../storage/database.js';
import { exportQueryCsv } from '../storage/csvExport.js';
import { formatStoreTime } from '../time/storeTime.js';
import { shouldLog, type LogLevel, type Logger } from './logger.js';

export interface LogEntry {
  timestamp: string;
  level: string;
  content: string;
}

export interface LogSink {
  append(level: LogLevel, content: string): void;
}

export interface DatabaseLogSinkOptions {
  tableName: string;
  utcOffsetHours: number;
  now?: () => Date;
}

export class DatabaseLogSink implements LogSink {
  private readonly table: string;
  private insertStmt: Database.Statement | null = null;
  private readonly now: () => Date;

  constructor(
    private readonly db: SqliteDatabase,
    private readonly fallback: Logger,
    private readonly options: DatabaseLogSinkOptions,
  ) {
    this.table = quoteIdent(options.tableName);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Create the log table. Errors here propagate: the bootstrap decides what to do
   * when the database is unusable at startup.
   */
  initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ${this.table} (
        auto_id INTEGER PRIMARY KEY,
        timestamp TEXT NOT NULL,
        level TEXT NOT NULL,
        content TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS ${quoteIdent(`${this.options.tableName}_timestamp_idx`)}
        ON ${this.table}(timestamp);
    `);
  }

  append(level: LogLevel, content: string): void {
    const timestamp = formatStoreTime(this.now(), this.options.utcOffsetHours);
    try {
      if (!this.insertStmt) {
        this.insertStmt = this.db.prepare(
          `INSERT INTO ${this.table} (timestamp, level, content) VALUES (?, ?, ?)`,
        );
      }
      this.insertStmt.run(timestamp, level.toUpperCase(), content);
    } catch (error) {
      this.fallback.error(
        'log-sink',
        `Write bot log to database failed: ${errorMessage(error)}\nLog: ${content}`,
      );
    }
  }

  /** Entries whose timestamp is among the `n` most recent distinct timestamps, oldest first. */
  recentQuery(): string {
    return `
      SELECT timestamp, level, content
      FROM ${this.table}
      WHERE timestamp IN (
        SELECT DISTINCT timestamp FROM ${this.table} ORDER BY timestamp DESC LIMIT ?
      )
      ORDER BY timestamp ASC, auto_id ASC
    `;
  }

  loadRecent(n: number): LogEntry[] {
    if (!Number.isInteger(n) || n < 1) return [];
    return this.db.prepare<[number], LogEntry>(this.recentQuery()).all(n);
  }

  async exportRecentCsv(n: number, destinationPath: string): Promise<void> {
    await exportQueryCsv(this.db, this.recentQuery(), destinationPath, [Math.max(0, Math.floor(n))]);
  }
}

/**
 * Logger that prints through `base` and persists entries at or above `persistLevel`.
 */
export function createPersistentLogger(
  base: Logger,
  sink: LogSink,
  persistLevel: LogLevel = 'info',
): Logger {
  const tee = (level: LogLevel) => (context: string, message: string) => {
    base[level](context, message);
    if (shouldLog(level, persistLevel)) {
      sink.append(level, `[${context}] ${message}`);
    }
  };
  return {
    debug: tee('debug'),
    info: tee('info'),
    warn: tee('warn'),
    error: tee('error'),
  };
}
