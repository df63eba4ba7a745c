/**
 * Spot-check audit: re-extract a random sample of already-processed PDFs and
 * compare the pages against their stored batch record.
 */

import * as path from 'path';
import { formatError } from '../errors.js';
import { loadAllRecords } from '../store/batch-store.js';
import type { PageTextExtractor, TextBatchRecord } from '../types.js';
import { hashFile } from '../utils/hash.js';
import { assertDirectory, listPdfFiles } from './batch-extractor.js';

export interface SpotCheckOptions {
  extractor: PageTextExtractor;
  strictBatches?: boolean;
  /** Uniform source in [0, 1); defaults to Math.random. */
  random?: () => number;
}

export type SpotCheckOutcome =
  | { status: 'pass'; file: string; hash: string; pages: number }
  | {
      status: 'fail';
      file: string;
      hash: string;
      expectedPages: number;
      actualPages: number;
      /** 1-based page numbers; only reported when the page counts agree. */
      differingPages: number[];
    }
  | { status: 'error'; file: string; hash: string; message: string };

export interface SpotCheckSummary {
  records: number;
  candidates: number;
  sampled: number;
  passed: number;
  failed: number;
  outcomes: SpotCheckOutcome[];
}

/** Draw `size` distinct items, uniformly, via a partial Fisher-Yates shuffle. */
export function sampleWithoutReplacement<T>(items: T[], size: number, random: () => number = Math.random): T[] {
  const pool = [...items];
  const count = Math.min(Math.max(size, 0), pool.length);

  for (let i = 0; i < count; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }

  return pool.slice(0, count);
}

/** 1-based numbers of pages whose text differs; assumes equal lengths. */
export function findDifferingPages(expected: string[], actual: string[]): number[] {
  const differing: number[] = [];
  for (let i = 0; i < expected.length; i++) {
    if (expected[i] !== actual[i]) {
      differing.push(i + 1);
    }
  }
  return differing;
}

export function comparePages(file: string, record: TextBatchRecord, actual: string[]): SpotCheckOutcome {
  const expected = record.pages;
  const hash = record.content_hash;

  if (expected.length !== actual.length) {
    return {
      status: 'fail',
      file,
      hash,
      expectedPages: expected.length,
      actualPages: actual.length,
      differingPages: [],
    };
  }

  const differingPages = findDifferingPages(expected, actual);
  if (differingPages.length === 0) {
    return { status: 'pass', file, hash, pages: actual.length };
  }
  return {
    status: 'fail',
    file,
    hash,
    expectedPages: expected.length,
    actualPages: actual.length,
    differingPages,
  };
}

function logOutcome(outcome: SpotCheckOutcome): void {
  switch (outcome.status) {
    case 'pass':
      console.log(`  PASS - ${outcome.pages} pages match`);
      break;
    case 'fail':
      console.error('  FAIL - Text mismatch!');
      console.error(`    Expected ${outcome.expectedPages} pages, got ${outcome.actualPages} pages`);
      for (const page of outcome.differingPages) {
        console.error(`    Page ${page} differs`);
      }
      break;
    case 'error':
      console.error(`  ERROR: ${outcome.message}`);
      break;
  }
}

export async function spotCheck(
  pdfDir: string,
  batchDir: string,
  sampleSize: number,
  options: SpotCheckOptions,
): Promise<SpotCheckSummary> {
  assertDirectory(pdfDir);

  console.log(`Loading existing records from ${batchDir}...`);
  const records = loadAllRecords(batchDir, { strict: options.strictBatches });
  console.log(`Loaded ${records.size} existing records`);

  const summary: SpotCheckSummary = {
    records: records.size,
    candidates: 0,
    sampled: 0,
    passed: 0,
    failed: 0,
    outcomes: [],
  };

  if (records.size === 0) {
    console.log('No records to spot check!');
    return summary;
  }

  const candidates: Array<{ file: string; record: TextBatchRecord }> = [];
  for (const file of listPdfFiles(pdfDir)) {
    try {
      const record = records.get(await hashFile(file));
      if (record) candidates.push({ file, record });
    } catch (error) {
      console.warn(`Could not hash ${path.basename(file)}: ${formatError(error)}`);
    }
  }
  summary.candidates = candidates.length;

  if (candidates.length === 0) {
    console.log('No PDFs found that match existing records!');
    return summary;
  }

  const sample = sampleWithoutReplacement(candidates, sampleSize, options.random);
  summary.sampled = sample.length;
  console.log(`Spot checking ${sample.length} PDFs...`);

  for (const { file, record } of sample) {
    console.log(`Checking: ${path.basename(file)}`);

    let outcome: SpotCheckOutcome;
    try {
      outcome = comparePages(file, record, await options.extractor(file));
    } catch (error) {
      outcome = { status: 'error', file, hash: record.content_hash, message: formatError(error) };
    }

    logOutcome(outcome);
    summary.outcomes.push(outcome);
    if (outcome.status === 'pass') {
      summary.passed++;
    } else {
      summary.failed++;
    }
  }

  console.log('Spot Check Summary:');
  console.log(`  Passed: ${summary.passed}/${summary.sampled}`);
  console.log(`  Failed: ${summary.failed}/${summary.sampled}`);
  if (summary.failed === 0) {
    console.log('All spot checks passed!');
  } else {
    console.error(`${summary.failed} spot check(s) failed`);
  }

  return summary;
}
