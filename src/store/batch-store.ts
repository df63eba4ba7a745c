/**
 * Append-only store of page-text batches.
 *
 * Each ingestion run that produced new text writes one gzip-compressed JSON
 * Lines file named `<YYYYMMDD_HHMMSS>_pdf_text.jsonl.gz`. Files are never
 * rewritten; the union of all files is the dedup set keyed by content hash.
 */

import * as fs from 'fs';
import * as path from 'path';
import { gunzipSync, gzipSync } from 'zlib';
import { z } from 'zod';
import { PipelineError, formatError } from '../errors.js';
import type { TextBatchRecord } from '../types.js';
import { isValidHash } from '../utils/hash.js';

export const BATCH_FILE_SUFFIX = '_pdf_text.jsonl.gz';

const textBatchRecordSchema = z.object({
  content_hash: z.string().refine(isValidHash, 'content_hash must be a 64-character lowercase hex sha256'),
  pages: z.array(z.string()),
  processed_at: z.string(),
});

export interface BatchScanOptions {
  /** Raise instead of skipping a batch file that cannot be read. */
  strict?: boolean;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** Local-time `YYYYMMDD_HHMMSS`, the batch file name prefix. */
export function formatBatchTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

const SEQUENCE_PATTERN = /^(\d{8}_\d{6})(?:_(\d+))?$/;

/** Orders `<stamp>` before `<stamp>_2` before `<stamp>_10`. */
function compareBatchNames(a: string, b: string): number {
  const [, stampA = a, seqA] = SEQUENCE_PATTERN.exec(a.slice(0, -BATCH_FILE_SUFFIX.length)) ?? [];
  const [, stampB = b, seqB] = SEQUENCE_PATTERN.exec(b.slice(0, -BATCH_FILE_SUFFIX.length)) ?? [];
  if (stampA !== stampB) return stampA < stampB ? -1 : 1;
  return Number(seqA ?? 1) - Number(seqB ?? 1);
}

/** Batch files in write order: timestamp, then same-second sequence number. */
export function listBatchFiles(batchDir: string): string[] {
  if (!fs.existsSync(batchDir)) return [];

  return fs
    .readdirSync(batchDir)
    .filter(name => name.endsWith(BATCH_FILE_SUFFIX))
    .sort(compareBatchNames)
    .map(name => path.join(batchDir, name));
}

export function readBatchFile(filePath: string): TextBatchRecord[] {
  const content = gunzipSync(fs.readFileSync(filePath)).toString('utf-8');
  const records: TextBatchRecord[] = [];

  const lines = content.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;

    const parsed = textBatchRecordSchema.safeParse(JSON.parse(line));
    if (!parsed.success) {
      throw new Error(`line ${i + 1}: ${parsed.error.issues[0]?.message ?? 'invalid record'}`);
    }
    records.push(parsed.data);
  }

  return records;
}

function scanBatches(
  batchDir: string,
  options: BatchScanOptions,
  visit: (record: TextBatchRecord) => void,
): void {
  for (const filePath of listBatchFiles(batchDir)) {
    let records: TextBatchRecord[];
    try {
      records = readBatchFile(filePath);
    } catch (error) {
      if (options.strict) {
        throw new PipelineError(
          `Could not read batch file ${filePath}: ${formatError(error)}`,
          'BATCH_UNREADABLE',
          error,
        );
      }
      console.warn(`Could not read ${filePath}: ${formatError(error)}`);
      continue;
    }

    for (const record of records) {
      visit(record);
    }
  }
}

/** Hashes of every document already present in any batch file. */
export function loadHashSet(batchDir: string, options: BatchScanOptions = {}): Set<string> {
  const hashes = new Set<string>();
  scanBatches(batchDir, options, record => {
    hashes.add(record.content_hash);
  });
  return hashes;
}

/** All batch records by hash; a hash found in several files resolves to the later file. */
export function loadAllRecords(batchDir: string, options: BatchScanOptions = {}): Map<string, TextBatchRecord> {
  const records = new Map<string, TextBatchRecord>();
  scanBatches(batchDir, options, record => {
    records.set(record.content_hash, record);
  });
  return records;
}

function nextBatchPath(batchDir: string, now: Date): string {
  const stamp = formatBatchTimestamp(now);
  let candidate = path.join(batchDir, `${stamp}${BATCH_FILE_SUFFIX}`);
  for (let n = 2; fs.existsSync(candidate); n++) {
    candidate = path.join(batchDir, `${stamp}_${n}${BATCH_FILE_SUFFIX}`);
  }
  return candidate;
}

/**
 * Write one new batch file holding `records`.
 *
 * Returns the written path, or null when there was nothing to write.
 */
export function writeBatch(batchDir: string, records: TextBatchRecord[], now: Date = new Date()): string | null {
  if (records.length === 0) return null;

  fs.mkdirSync(batchDir, { recursive: true });
  const batchPath = nextBatchPath(batchDir, now);
  const body = records.map(record => JSON.stringify(record)).join('\n') + '\n';

  fs.writeFileSync(batchPath, gzipSync(body), { flag: 'wx' });
  return batchPath;
}
