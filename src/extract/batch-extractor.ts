/**
 * Page-text extraction into one new batch per invocation.
 *
 * A PDF is extracted only if its content hash is absent from every existing
 * batch file in the target directory; the check is independent of the
 * download database.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { PipelineError, formatError } from '../errors.js';
import { loadHashSet, writeBatch } from '../store/batch-store.js';
import type { PageTextExtractor, TextBatchRecord } from '../types.js';
import { hashFile } from '../utils/hash.js';
import { stageFiles, type StagingStrategy } from './staging.js';

export interface ExtractionOptions {
  extractor: PageTextExtractor;
  /** Maximum number of files to extract; already-processed files do not count. */
  limit?: number | null;
  /** Fail on unreadable batch files instead of skipping them. */
  strictBatches?: boolean;
  verbose?: boolean;
  now?: () => Date;
}

export interface ExtractionSummary {
  processed: number;
  skipped: number;
  errors: number;
  batchPath: string | null;
}

export function formatDuration(seconds: number): string {
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  if (seconds < 3600) return `${(seconds / 60).toFixed(1)}m`;
  return `${(seconds / 3600).toFixed(1)}h`;
}

export function assertDirectory(dir: string): void {
  if (!fs.existsSync(dir)) {
    throw new PipelineError(`Directory '${dir}' does not exist`, 'SOURCE_DIR_INVALID');
  }
  if (!fs.statSync(dir).isDirectory()) {
    throw new PipelineError(`'${dir}' is not a directory`, 'SOURCE_DIR_INVALID');
  }
}

/** `*.pdf` and `*.PDF` files directly inside `dir`, sorted by name. */
export function listPdfFiles(dir: string): string[] {
  return fs
    .readdirSync(dir)
    .filter(name => name.endsWith('.pdf') || name.endsWith('.PDF'))
    .sort()
    .map(name => path.join(dir, name));
}

async function tryHash(filePath: string): Promise<string | null> {
  try {
    return await hashFile(filePath);
  } catch (error) {
    console.error(`Could not hash ${path.basename(filePath)}: ${formatError(error)}`);
    return null;
  }
}

/**
 * Extract every not-yet-processed PDF in `pdfDir` and write the results as a
 * single new batch file in `batchDir`.
 */
export async function processPdfDirectory(
  pdfDir: string,
  batchDir: string,
  options: ExtractionOptions,
): Promise<ExtractionSummary> {
  assertDirectory(pdfDir);
  fs.mkdirSync(batchDir, { recursive: true });

  const now = options.now ?? (() => new Date());
  const limit = options.limit ?? null;

  const processedHashes = loadHashSet(batchDir, { strict: options.strictBatches });
  console.log(`Found ${processedHashes.size} already processed PDFs across existing batch files`);

  const pdfFiles = listPdfFiles(pdfDir);
  console.log(`Found ${pdfFiles.length} PDF files in directory`);

  const hashes = new Map<string, string | null>();
  let newFilesCount = 0;
  for (const pdfPath of pdfFiles) {
    const hash = await tryHash(pdfPath);
    hashes.set(pdfPath, hash);
    if (hash === null || !processedHashes.has(hash)) {
      newFilesCount++;
    }
  }

  const toProcessCount = limit === null ? newFilesCount : Math.min(newFilesCount, limit);
  if (limit === null) {
    console.log(`Found ${newFilesCount} new PDFs to process`);
  } else {
    console.log(`Found ${newFilesCount} new PDFs, will process up to ${toProcessCount} (limit: ${limit})`);
  }

  const summary: ExtractionSummary = { processed: 0, skipped: 0, errors: 0, batchPath: null };
  if (toProcessCount === 0) {
    console.log('No new PDFs to process!');
    return summary;
  }

  const records: TextBatchRecord[] = [];
  const startedAt = Date.now();

  for (let i = 0; i < pdfFiles.length; i++) {
    const pdfPath = pdfFiles[i];
    const name = path.basename(pdfPath);
    const position = `[${i + 1}/${pdfFiles.length}]`;

    const hash = hashes.get(pdfPath) ?? null;
    if (hash === null) {
      summary.errors++;
      continue;
    }

    if (processedHashes.has(hash)) {
      if (options.verbose) console.debug(`${position} Skipping (already processed): ${name}`);
      summary.skipped++;
      continue;
    }

    if (limit !== null && summary.processed >= limit) {
      console.log(`Reached processing limit of ${limit} PDFs, stopping`);
      break;
    }

    try {
      console.log(`${position} Processing: ${name}`);
      const pages = await options.extractor(pdfPath);

      records.push({ content_hash: hash, pages, processed_at: now().toISOString() });
      processedHashes.add(hash);
      summary.processed++;

      const elapsed = (Date.now() - startedAt) / 1000;
      const remaining = (elapsed / summary.processed) * (toProcessCount - summary.processed);
      console.log(`  -> Processed ${pages.length} pages`);
      console.log(`  -> Time: ${formatDuration(elapsed)} elapsed, ~${formatDuration(remaining)} remaining (est.)`);
    } catch (error) {
      console.error(`Error processing ${name}: ${formatError(error)}`);
      summary.errors++;
    }
  }

  summary.batchPath = writeBatch(batchDir, records, now());
  if (summary.batchPath) {
    console.log(`Saved ${records.length} records to ${summary.batchPath}`);
  } else {
    console.log('No new records to save');
  }

  console.log('Summary:');
  console.log(`  Processed: ${summary.processed}`);
  console.log(`  Skipped: ${summary.skipped}`);
  console.log(`  Errors: ${summary.errors}`);

  return summary;
}

export interface NewDownloadsOptions extends ExtractionOptions {
  stagingStrategy?: StagingStrategy;
}

/**
 * Extract only the given files: they are staged into a fresh temporary
 * directory so nothing else on disk is considered. Returns null when none of
 * the files could be staged.
 */
export async function extractNewDownloads(
  files: string[],
  batchDir: string,
  options: NewDownloadsOptions,
): Promise<ExtractionSummary | null> {
  if (files.length === 0) {
    console.log('No new downloads in this run; skipping PDF text extraction.');
    return null;
  }

  const stagingDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mcyj_new_downloads_'));
  try {
    const staging = stageFiles(files, stagingDir, options.stagingStrategy);
    if (staging.staged.length === 0) {
      console.log('No valid downloaded files available for extraction; skipping PDF text extraction.');
      return null;
    }

    console.log(`Running PDF text extraction on ${staging.staged.length} newly downloaded files (${staging.strategy})...`);
    return await processPdfDirectory(stagingDir, batchDir, options);
  } finally {
    fs.rmSync(stagingDir, { recursive: true, force: true });
  }
}
