import { randomUUID } from 'node:crypto';
import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { StoreError, errorMessage } from '../../core/errors.js';
import type { SqliteDatabase } from './database.js';

const LINE_END = '\r\n';

/**
 * Format a single CSV field (RFC 4180): quote when the value contains a comma,
 * a quote, CR/LF, or leading/trailing whitespace.
 */
export function formatCsvField(value: unknown): string {
  if (value === null || value === undefined) return '';
  let text: string;
  if (Buffer.isBuffer(value)) {
    text = value.toString('base64');
  } else if (typeof value === 'string') {
    text = value;
  } else {
    text = String(value);
  }
  if (/[",\r\n]/.test(text) || text !== text.trim()) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function toCsv(header: readonly string[], rows: readonly (readonly unknown[])[]): string {
  const lines = [header.map(formatCsvField).join(',')];
  for (const row of rows) {
    lines.push(row.map(formatCsvField).join(','));
  }
  return lines.join(LINE_END) + LINE_END;
}

/**
 * Run a read query and write header + rows to `destinationPath`.
 *
 * The file only appears once the query has fully succeeded: rows are rendered in memory,
 * written to a sibling temp file and renamed into place.
 */
export async function exportQueryCsv(
  db: SqliteDatabase,
  query: string,
  destinationPath: string,
  params: readonly unknown[] = [],
): Promise<void> {
  let csv: string;
  try {
    const stmt = db.prepare(query);
    if (!stmt.reader) {
      throw new StoreError('exportCsv', 'query does not return rows');
    }
    const header = stmt.columns().map((column) => column.name);
    const rows = stmt.raw(true).all(...params);
    const cells = rows.map((row) => (Array.isArray(row) ? row : [row]));
    csv = toCsv(header, cells);
  } catch (error) {
    if (error instanceof StoreError) throw error;
    throw new StoreError('exportCsv', errorMessage(error), { cause: error });
  }

  const dir = dirname(destinationPath);
  const tmpPath = join(dir, `.${basename(destinationPath)}.${process.pid}.${randomUUID()}.tmp`);
  try {
    await mkdir(dir, { recursive: true });
    await writeFile(tmpPath, csv, 'utf-8');
    await rename(tmpPath, destinationPath);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw new StoreError('exportCsv', `write ${destinationPath} failed: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}
