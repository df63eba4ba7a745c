#!/usr/bin/env node
/**
 * Incremental harvest of licensing documents.
 *
 * Steps:
 * 1. Preflight: backfill sha256 for database rows whose file is already on disk.
 * 2. Fetch the agency list, then each agency's content listing.
 * 3. Download documents with an unknown id, stopping after --limit new files.
 * 4. Rewrite the cumulative download database and the run output CSV.
 * 5. Extract page text for this run's downloads into one new batch file.
 *
 * Usage:
 *   npx tsx scripts/run-pipeline.ts [--limit N] [--sleep SECONDS] [--skip-text-extraction]
 */

import * as path from 'path';
import { fileURLToPath } from 'url';
import { formatError, isPipelineError } from '../src/errors.js';
import { createPageTextExtractor } from '../src/extract/pdf-text.js';
import { runPipeline } from '../src/pipeline.js';
import { parsePipelineArgs } from './lib/cli.js';
import { LicensingApiClient, readLicensingApiConfig } from './lib/licensing-api.js';

const __filename = fileURLToPath(import.meta.url);
const ROOT_DIR = path.resolve(path.dirname(__filename), '..');

async function main(): Promise<void> {
  const { options, extractor } = parsePipelineArgs(process.argv.slice(2), ROOT_DIR);
  const client = new LicensingApiClient(readLicensingApiConfig());

  console.log('Licensing Document Harvest');
  console.log('==========================');
  if (options.limit !== null) console.log(`Limit: ${options.limit} new downloads`);
  if (options.sleepMs > 0) console.log(`Delay between downloads: ${options.sleepMs}ms`);
  if (options.skipTextExtraction) console.log('Text extraction: skipped');
  console.log('');

  await runPipeline(options, {
    directory: client,
    download: client.download,
    extractor: createPageTextExtractor(extractor),
  });
}

main().catch(error => {
  if (isPipelineError(error, 'INVALID_ARGUMENT')) {
    console.error(`Usage error: ${error.message}`);
  } else {
    console.error('\nFatal pipeline error:', formatError(error));
  }
  process.exit(1);
});
