#!/usr/bin/env node
/**
 * Extract per-page text from a directory of PDFs into a new compressed batch
 * file, skipping any PDF whose sha256 is already present in an earlier batch.
 *
 * With --spot-check N, re-extracts N random already-processed PDFs instead and
 * compares them with their stored pages; exits 1 if any comparison fails.
 *
 * Usage:
 *   npx tsx scripts/extract-pdf-text.ts --pdf-dir Downloads [-o pdf_parsing/batches] [--limit N]
 *   npx tsx scripts/extract-pdf-text.ts --pdf-dir Downloads --spot-check 10
 */

import { formatError, isPipelineError } from '../src/errors.js';
import { processPdfDirectory } from '../src/extract/batch-extractor.js';
import { createPageTextExtractor } from '../src/extract/pdf-text.js';
import { spotCheck } from '../src/extract/spot-check.js';
import { parseExtractArgs } from './lib/cli.js';

async function main(): Promise<void> {
  const args = parseExtractArgs(process.argv.slice(2));
  const extractor = createPageTextExtractor(args.extractor);

  if (args.spotCheck !== null) {
    const summary = await spotCheck(args.pdfDir, args.batchDir, args.spotCheck, {
      extractor,
      strictBatches: args.strictBatches,
    });
    if (summary.failed > 0) {
      process.exit(1);
    }
    return;
  }

  await processPdfDirectory(args.pdfDir, args.batchDir, {
    extractor,
    limit: args.limit,
    strictBatches: args.strictBatches,
    verbose: args.verbose,
  });
}

main().catch(error => {
  if (isPipelineError(error, 'INVALID_ARGUMENT')) {
    console.error(`Usage error: ${error.message}`);
  } else {
    console.error('Fatal error:', formatError(error));
  }
  process.exit(1);
});
