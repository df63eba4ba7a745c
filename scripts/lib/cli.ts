/**
 * Argument parsing for the command-line entry points.
 */

import * as path from 'path';
import { PipelineError } from '../../src/errors.js';
import { parseExtractorName, type ExtractorName } from '../../src/extract/pdf-text.js';
import type { PipelineOptions } from '../../src/pipeline.js';

export const DEFAULT_METADATA_OUTPUT_DIR = 'metadata_output';
export const DEFAULT_DOWNLOAD_DIR = 'Downloads';
export const DEFAULT_BATCH_DIR = 'pdf_parsing/batches';
export const LEGACY_METADATA_FILENAME = 'facility_information_metadata.csv';
export const DEFAULT_DOWNLOAD_DB_FILENAME = 'downloaded_files_database.csv';
export const DEFAULT_RUN_OUTPUT_FILENAME = 'latest_downloaded_metadata.csv';

export interface PipelineCliArgs {
  options: PipelineOptions;
  extractor: ExtractorName;
}

export interface ExtractCliArgs {
  pdfDir: string;
  batchDir: string;
  limit: number | null;
  spotCheck: number | null;
  strictBatches: boolean;
  extractor: ExtractorName;
  verbose: boolean;
}

function requireValue(args: string[], i: number): string {
  const value = args[i + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new PipelineError(`${args[i]} requires a value`, 'INVALID_ARGUMENT');
  }
  return value;
}

function parseCount(flag: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new PipelineError(`${flag} must be a non-negative integer, got "${value}"`, 'INVALID_ARGUMENT');
  }
  return parsed;
}

function parseSeconds(flag: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new PipelineError(`${flag} must be a non-negative number of seconds, got "${value}"`, 'INVALID_ARGUMENT');
  }
  return parsed;
}

/**
 * Parse `run-pipeline` arguments. Relative directories resolve against
 * `rootDir`; explicit CSV paths resolve against the working directory.
 */
export function parsePipelineArgs(args: string[], rootDir: string): PipelineCliArgs {
  let metadataOutputDir = DEFAULT_METADATA_OUTPUT_DIR;
  let downloadDir = DEFAULT_DOWNLOAD_DIR;
  let batchDir = DEFAULT_BATCH_DIR;
  let metadataCsv: string | null = null;
  let downloadDbCsv: string | null = null;
  let runOutputCsv: string | null = null;
  let sleepSeconds = 0;
  let limit: number | null = null;
  let skipTextExtraction = false;
  let strictBatches = false;
  let extractor: ExtractorName = 'auto';

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--metadata-output-dir') {
      metadataOutputDir = requireValue(args, i++);
    } else if (arg === '--download-dir') {
      downloadDir = requireValue(args, i++);
    } else if (arg === '--metadata-csv') {
      metadataCsv = requireValue(args, i++);
    } else if (arg === '--download-db-csv') {
      downloadDbCsv = requireValue(args, i++);
    } else if (arg === '--run-output-csv') {
      runOutputCsv = requireValue(args, i++);
    } else if (arg === '--sleep') {
      sleepSeconds = parseSeconds(arg, requireValue(args, i++));
    } else if (arg === '--limit') {
      limit = parseCount(arg, requireValue(args, i++));
    } else if (arg === '--batch-dir') {
      batchDir = requireValue(args, i++);
    } else if (arg === '--skip-text-extraction') {
      skipTextExtraction = true;
    } else if (arg === '--strict-batches') {
      strictBatches = true;
    } else if (arg === '--extractor') {
      extractor = parseExtractorName(requireValue(args, i++));
    } else {
      throw new PipelineError(`Unknown argument: ${arg}`, 'INVALID_ARGUMENT');
    }
  }

  const resolvedMetadataDir = path.resolve(rootDir, metadataOutputDir);
  const resolvedDownloadDir = path.resolve(rootDir, downloadDir);

  const databaseCsv = path.resolve(
    downloadDbCsv ?? metadataCsv ?? path.join(resolvedMetadataDir, DEFAULT_DOWNLOAD_DB_FILENAME),
  );

  return {
    options: {
      metadataOutputDir: resolvedMetadataDir,
      downloadDir: resolvedDownloadDir,
      batchDir: path.resolve(rootDir, batchDir),
      databaseCsv,
      legacyCsv: path.join(resolvedDownloadDir, LEGACY_METADATA_FILENAME),
      runOutputCsv: path.resolve(runOutputCsv ?? path.join(resolvedMetadataDir, DEFAULT_RUN_OUTPUT_FILENAME)),
      limit,
      sleepMs: Math.round(sleepSeconds * 1000),
      skipTextExtraction,
      strictBatches,
    },
    extractor,
  };
}

export function parseExtractArgs(args: string[]): ExtractCliArgs {
  let pdfDir: string | null = null;
  let batchDir = DEFAULT_BATCH_DIR;
  let limit: number | null = null;
  let spotCheck: number | null = null;
  let strictBatches = false;
  let extractor: ExtractorName = 'auto';
  let verbose = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--pdf-dir') {
      pdfDir = requireValue(args, i++);
    } else if (arg === '-o' || arg === '--batch-dir') {
      batchDir = requireValue(args, i++);
    } else if (arg === '--limit') {
      limit = parseCount(arg, requireValue(args, i++));
    } else if (arg === '--spot-check') {
      spotCheck = parseCount(arg, requireValue(args, i++));
    } else if (arg === '--strict-batches') {
      strictBatches = true;
    } else if (arg === '--extractor') {
      extractor = parseExtractorName(requireValue(args, i++));
    } else if (arg === '--verbose') {
      verbose = true;
    } else {
      throw new PipelineError(`Unknown argument: ${arg}`, 'INVALID_ARGUMENT');
    }
  }

  if (!pdfDir) {
    throw new PipelineError('--pdf-dir is required', 'INVALID_ARGUMENT');
  }

  return { pdfDir, batchDir, limit, spotCheck, strictBatches, extractor, verbose };
}
