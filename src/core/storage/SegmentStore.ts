/**
 * SegmentStore: one append-only segment table per channel.
 *
 * - Tables are created lazily on first write (`<prefix><channelId>`)
 * - Rows are never updated or deleted; `auto_id` is the ordering key
 * - "Recent N" counts distinct timestamps (message events), not rows
 */

import type { Logger } from '../../infra/logger/logger.js';
import type { SqliteDatabase } from '../../infra/storage/database.js';
import { quoteIdent } from '../../infra/storage/database.js';
import { exportQueryCsv } from '../../infra/storage/csvExport.js';
import { StoreError, errorMessage } from '../errors.js';
import { isSegmentKind, type Segment } from '../model/Segment.js';

interface SegmentRow {
  message_id: number;
  timestamp: string;
  sender_id: number;
  sender_name: string;
  kind: string;
  content: string;
  interpretation: string;
}

const SELECT_COLUMNS =
  'message_id, timestamp, sender_id, sender_name, kind, content, interpretation';

export class SegmentStore {
  /** Tables known to exist; avoids repeating DDL on every insert. */
  private readonly knownTables = new Set<string>();

  constructor(
    private readonly db: SqliteDatabase,
    private readonly logger: Logger,
    private readonly tablePrefix: string = 'message',
  ) {}

  tableName(channelId: number): string {
    if (!Number.isSafeInteger(channelId) || channelId < 0) {
      throw new StoreError('tableName', `invalid channel id ${channelId}`);
    }
    return `${this.tablePrefix}${channelId}`;
  }

  /**
   * Create the channel table and its indexes if absent. Safe to call any number of times,
   * including by several first writers of the same channel at once.
   */
  async ensureChannelTable(channelId: number): Promise<void> {
    const name = this.tableName(channelId);
    if (this.knownTables.has(name)) return;

    const table = quoteIdent(name);
    const create = this.db.transaction(() => {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS ${table} (
          auto_id INTEGER PRIMARY KEY,
          message_id INTEGER NOT NULL,
          timestamp TEXT NOT NULL,
          sender_id INTEGER NOT NULL,
          sender_name TEXT NOT NULL,
          kind TEXT NOT NULL,
          content TEXT NOT NULL,
          interpretation TEXT NOT NULL
        );
        CREATE INDEX IF NOT EXISTS ${quoteIdent(`${name}_message_id_idx`)} ON ${table}(message_id);
        CREATE INDEX IF NOT EXISTS ${quoteIdent(`${name}_timestamp_idx`)} ON ${table}(timestamp);
      `);
    });
    try {
      create.immediate();
    } catch (error) {
      throw new StoreError('ensureChannelTable', `${name}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    if (!this.knownTables.has(name)) {
      this.knownTables.add(name);
      this.logger.debug('segment-store', `Channel table ${name} ready`);
    }
  }

  /** Append one segment. Storage errors propagate to the caller. */
  async insert(channelId: number, segment: Segment): Promise<void> {
    await this.ensureChannelTable(channelId);
    const table = quoteIdent(this.tableName(channelId));
    try {
      this.db
        .prepare(
          `INSERT INTO ${table} (${SELECT_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          segment.messageId,
          segment.timestamp,
          segment.senderId,
          segment.senderName,
          segment.kind,
          segment.content,
          segment.interpretation,
        );
    } catch (error) {
      throw new StoreError('insert', errorMessage(error), { cause: error });
    }
  }

  /**
   * Every segment whose timestamp is among the `n` most recent distinct timestamps,
   * in ascending order. One multi-part message is never cut in half.
   */
  async loadRecent(channelId: number, n: number): Promise<Segment[]> {
    if (!Number.isInteger(n) || n < 1) return [];
    const name = this.tableName(channelId);
    if (!this.hasTable(name)) return [];
    return this.select('loadRecent', recentSegmentsQuery(name), [n]);
  }

  /** All segments recorded under `messageId`, in storage order. */
  async findByMessageId(channelId: number, messageId: number): Promise<Segment[]> {
    const name = this.tableName(channelId);
    if (!this.hasTable(name)) return [];
    const table = quoteIdent(name);
    return this.select(
      'findByMessageId',
      `SELECT ${SELECT_COLUMNS} FROM ${table} WHERE message_id = ? ORDER BY auto_id ASC`,
      [messageId],
    );
  }

  /** Run a read query and write it as CSV. Nothing is written unless the query succeeds. */
  async exportCsv(query: string, destinationPath: string, params: readonly unknown[] = []): Promise<void> {
    await exportQueryCsv(this.db, query, destinationPath, params);
  }

  async exportRecentCsv(channelId: number, n: number, destinationPath: string): Promise<void> {
    // Ensure the table so an unknown channel exports a header-only file
    await this.ensureChannelTable(channelId);
    await this.exportCsv(recentSegmentsQuery(this.tableName(channelId)), destinationPath, [
      Math.max(0, Math.floor(n)),
    ]);
  }

  private hasTable(name: string): boolean {
    if (this.knownTables.has(name)) return true;
    try {
      const row = this.db
        .prepare<[string], { name: string }>(
          "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?",
        )
        .get(name);
      return row !== undefined;
    } catch (error) {
      throw new StoreError('hasTable', errorMessage(error), { cause: error });
    }
  }

  private select(operation: string, query: string, params: unknown[]): Segment[] {
    let rows: SegmentRow[];
    try {
      rows = this.db.prepare<unknown[], SegmentRow>(query).all(...params);
    } catch (error) {
      throw new StoreError(operation, errorMessage(error), { cause: error });
    }
    const segments: Segment[] = [];
    for (const row of rows) {
      if (!isSegmentKind(row.kind)) {
        this.logger.warn('segment-store', `Skip stored row with unknown kind "${row.kind}"`);
        continue;
      }
      segments.push({
        messageId: row.message_id,
        timestamp: row.timestamp,
        senderId: row.sender_id,
        senderName: row.sender_name,
        kind: row.kind,
        content: row.content,
        interpretation: row.interpretation,
      });
    }
    return segments;
  }
}

export function recentSegmentsQuery(tableName: string): string {
  const table = quoteIdent(tableName);
  return `
    SELECT ${SELECT_COLUMNS}
    FROM ${table}
    WHERE timestamp IN (
      SELECT DISTINCT timestamp FROM ${table} ORDER BY timestamp DESC LIMIT ?
    )
    ORDER BY timestamp ASC, auto_id ASC
  `;
}
