/**
 * End-to-end harvesting run.
 *
 * Preflight repairs the download database, discovery downloads what is new,
 * the cumulative database and the run output are rewritten, and this run's
 * downloads are extracted into one new text batch.
 */

import * as fs from 'fs';
import { extractNewDownloads, type ExtractionSummary } from './extract/batch-extractor.js';
import { discoverAndDownload, type DiscoveryResult } from './ingest/driver.js';
import { preflightBackfillMissingHashes } from './ingest/preflight.js';
import {
  field,
  indexById,
  loadRecordDatabase,
  saveRecords,
  writeRecords,
} from './store/record-database.js';
import type { AgencyDirectory, FileDownloader, PageTextExtractor } from './types.js';

export interface PipelineOptions {
  metadataOutputDir: string;
  downloadDir: string;
  batchDir: string;
  /** Cumulative download database CSV. */
  databaseCsv: string;
  /** Older metadata CSV merged into the database on load. */
  legacyCsv?: string;
  /** CSV holding only the rows downloaded in this run. */
  runOutputCsv: string;
  limit: number | null;
  sleepMs: number;
  skipTextExtraction: boolean;
  strictBatches?: boolean;
}

export interface PipelineDeps {
  directory: AgencyDirectory;
  download: FileDownloader;
  extractor: PageTextExtractor;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface PipelineSummary {
  loadedRecords: number;
  seededFromLegacy: boolean;
  mergedLegacyRecords: number;
  preflightUpdated: number;
  discovery: DiscoveryResult;
  extraction: ExtractionSummary | null;
}

export async function runPipeline(options: PipelineOptions, deps: PipelineDeps): Promise<PipelineSummary> {
  for (const dir of [options.metadataOutputDir, options.downloadDir, options.batchDir]) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const database = loadRecordDatabase(options.databaseCsv, options.legacyCsv);
  if (database.seeded) {
    console.log(
      `Seeded download database from legacy metadata file: ${options.legacyCsv} (${database.rows.length} rows)`,
    );
  } else if (database.added > 0) {
    console.log(
      `Merged ${database.added} legacy records from ${options.legacyCsv} into download database in memory.`,
    );
  }

  const index = indexById(database.rows);
  const loadedRecords = index.size;
  console.log(`Loaded ${loadedRecords} records from download database: ${options.databaseCsv}`);

  const preflight = await preflightBackfillMissingHashes(index, options.downloadDir);
  if (preflight.updated > 0) {
    console.log(`Preflight backfill updated sha256 for ${preflight.updated} existing rows.`);
  }

  const discovery = await discoverAndDownload(
    index,
    { downloadDir: options.downloadDir, limit: options.limit, sleepMs: options.sleepMs },
    { directory: deps.directory, download: deps.download, now: deps.now, sleep: deps.sleep },
  );

  saveRecords(options.databaseCsv, [...index.values()]);

  let extraction: ExtractionSummary | null = null;
  if (!options.skipTextExtraction) {
    extraction = await extractNewDownloads(
      discovery.newRecords.map(row => field(row, 'downloaded_path')),
      options.batchDir,
      { extractor: deps.extractor, strictBatches: options.strictBatches, now: deps.now },
    );
  }

  writeRecords(options.runOutputCsv, discovery.newRecords);

  if (options.limit !== null && discovery.newRecords.length < options.limit) {
    console.log(
      `Limit requested ${options.limit}, but only ${discovery.newRecords.length} new downloadable files were found.`,
    );
  }

  console.log('');
  console.log('Run Summary');
  console.log('-----------');
  console.log(`Attempted new downloads: ${discovery.attemptedNew}`);
  console.log(`New files downloaded:    ${discovery.newRecords.length}`);
  console.log(`Backfilled existing:     ${discovery.backfilledExisting}`);
  console.log(`Agencies skipped:        ${discovery.agenciesSkipped}`);
  console.log(`Batch output directory:  ${options.batchDir}`);
  console.log(`Download database:       ${options.databaseCsv}`);
  console.log(`Run output (new files):  ${options.runOutputCsv}`);

  return {
    loadedRecords,
    seededFromLegacy: database.seeded,
    mergedLegacyRecords: database.added,
    preflightUpdated: preflight.updated,
    discovery,
    extraction,
  };
}
