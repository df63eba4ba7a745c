/**
 * Cumulative download database.
 *
 * A single CSV file with one row per `ContentDocumentId`. It is loaded whole,
 * indexed in memory, and rewritten whole once per run.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { BASELINE_COLUMNS, type DocumentRecord, type RecordIndex } from '../types.js';

const csvTableSchema = z.array(z.array(z.string()));

export interface LegacyMergeResult {
  rows: DocumentRecord[];
  /** The primary database was empty and was replaced by the legacy rows. */
  seeded: boolean;
  /** Legacy rows appended because their id was unknown to the primary database. */
  added: number;
}

/** Trimmed value of a column, '' when absent. */
export function field(row: DocumentRecord, column: string): string {
  return (row[column] ?? '').trim();
}

export function externalId(row: DocumentRecord): string {
  return field(row, 'ContentDocumentId');
}

/**
 * Rows keyed by the header line. Short rows leave trailing columns absent;
 * fields beyond the header are dropped with a warning.
 */
export function loadRecords(csvPath: string): DocumentRecord[] {
  if (!fs.existsSync(csvPath)) return [];

  const table: unknown = parse(fs.readFileSync(csvPath, 'utf-8'), {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  const [header = [], ...body] = csvTableSchema.parse(table);

  let oversized = 0;
  const rows = body.map(cells => {
    if (cells.length > header.length) oversized++;

    const row: DocumentRecord = {};
    header.forEach((column, i) => {
      if (i < cells.length) row[column] = cells[i];
    });
    return row;
  });

  if (oversized > 0) {
    console.warn(
      `${csvPath}: ${oversized} row(s) have more fields than the ${header.length}-column header; extra fields ignored`,
    );
  }
  return rows;
}

/** Rows without an id are left out, and so are not written back on save. */
export function indexById(rows: DocumentRecord[]): RecordIndex {
  const byId: RecordIndex = new Map();
  for (const row of rows) {
    const id = externalId(row);
    if (id) {
      byId.set(id, row);
    }
  }
  return byId;
}

function compareOrdinal(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function sortRecords(rows: DocumentRecord[]): DocumentRecord[] {
  return [...rows].sort(
    (a, b) =>
      compareOrdinal(a.agency_id ?? '', b.agency_id ?? '') ||
      compareOrdinal(a.ContentDocumentId ?? '', b.ContentDocumentId ?? ''),
  );
}

/** Every key seen across the rows in first-seen order, then any missing baseline column. */
export function collectColumns(rows: DocumentRecord[]): string[] {
  const columns: string[] = [];
  const seen = new Set<string>();

  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (key && !seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }
  for (const column of BASELINE_COLUMNS) {
    if (!seen.has(column)) {
      columns.push(column);
    }
  }

  return columns;
}

/**
 * Rewrite the CSV at `csvPath`. Row order is the caller's; use
 * {@link saveRecords} for the sorted cumulative database.
 */
export function writeRecords(csvPath: string, rows: DocumentRecord[]): void {
  fs.mkdirSync(path.dirname(csvPath) || '.', { recursive: true });

  const columns = collectColumns(rows);
  const header = stringify([columns]);
  const body = stringify(rows.map(row => columns.map(column => row[column] ?? '')));

  fs.writeFileSync(csvPath, header + body, 'utf-8');
}

/** Full, deterministic rewrite sorted by `(agency_id, ContentDocumentId)`. */
export function saveRecords(csvPath: string, rows: DocumentRecord[]): void {
  writeRecords(csvPath, sortRecords(rows));
}

/**
 * Reconcile the legacy metadata file with the primary database.
 *
 * An empty primary database is seeded wholesale from the legacy rows. A
 * non-empty one only gains legacy rows whose id it does not already hold;
 * existing rows are never overwritten.
 */
export function mergeLegacyRecords(primary: DocumentRecord[], legacy: DocumentRecord[]): LegacyMergeResult {
  if (primary.length === 0) {
    return { rows: [...legacy], seeded: legacy.length > 0, added: 0 };
  }

  const rows = [...primary];
  const currentIds = new Set(rows.map(externalId).filter(id => id !== ''));
  let added = 0;

  for (const row of legacy) {
    const id = externalId(row);
    if (id && !currentIds.has(id)) {
      rows.push(row);
      currentIds.add(id);
      added++;
    }
  }

  return { rows, seeded: false, added };
}

export function loadRecordDatabase(primaryPath: string, legacyPath?: string): LegacyMergeResult {
  const primary = loadRecords(primaryPath);

  if (!legacyPath || path.resolve(legacyPath) === path.resolve(primaryPath) || !fs.existsSync(legacyPath)) {
    return { rows: primary, seeded: false, added: 0 };
  }

  return mergeLegacyRecords(primary, loadRecords(legacyPath));
}

function isFile(candidate: string): boolean {
  try {
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
}

/**
 * Locate the file a row refers to, trying in order: absolute
 * `downloaded_path`, `downloaded_path` under `downloadDir`,
 * `downloaded_filename`, then `generated_filename`.
 */
export function resolveLocalFilePath(row: DocumentRecord, downloadDir: string): string | null {
  const downloadedPath = field(row, 'downloaded_path');
  const downloadedFilename = field(row, 'downloaded_filename');
  const generatedFilename = field(row, 'generated_filename');

  const candidates: string[] = [];
  if (downloadedPath) {
    candidates.push(path.isAbsolute(downloadedPath) ? downloadedPath : path.join(downloadDir, downloadedPath));
  }
  if (downloadedFilename) {
    candidates.push(path.join(downloadDir, downloadedFilename));
  }
  if (generatedFilename) {
    candidates.push(path.join(downloadDir, generatedFilename));
  }

  return candidates.find(isFile) ?? null;
}
