/**
 * Per-page PDF text extraction.
 *
 * Two backends: poppler's `pdftotext` when it is installed, and pdfjs-dist
 * otherwise. Both return one string per page, '' for a page without text.
 */

import * as fs from 'fs';
import { spawnSync } from 'child_process';
import { PipelineError } from '../errors.js';
import type { PageTextExtractor } from '../types.js';

export type ExtractorName = 'auto' | 'pdftotext' | 'pdfjs';

export const EXTRACTOR_NAMES: readonly ExtractorName[] = ['auto', 'pdftotext', 'pdfjs'];

export function hasCommand(commandName: string): boolean {
  const result = spawnSync('which', [commandName], { stdio: 'ignore' });
  return result.status === 0;
}

/**
 * Split `pdftotext` output into pages. Pages are separated by form feeds and
 * the output ends with one, so the trailing empty segment is dropped.
 */
export function splitPdftotextPages(output: string): string[] {
  const pages = output.split('\f');
  if (pages.length > 1 && pages[pages.length - 1] === '') {
    pages.pop();
  }
  return pages;
}

export async function extractPagesWithPdftotext(pdfPath: string): Promise<string[]> {
  const result = spawnSync('pdftotext', ['-layout', '-enc', 'UTF-8', pdfPath, '-'], {
    encoding: 'utf8',
    maxBuffer: 128 * 1024 * 1024,
  });

  if (result.error) {
    throw result.error;
  }
  if (result.status !== 0) {
    throw new Error(`pdftotext failed (${result.status}): ${result.stderr || 'unknown error'}`);
  }

  return splitPdftotextPages(result.stdout);
}

export async function extractPagesWithPdfjs(pdfPath: string): Promise<string[]> {
  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');
  const data = new Uint8Array(fs.readFileSync(pdfPath));

  const loadingTask = pdfjs.getDocument({
    data,
    isEvalSupported: false,
    disableFontFace: true,
    useSystemFonts: false,
    verbosity: pdfjs.VerbosityLevel.ERRORS,
  });
  const document = await loadingTask.promise;

  const pages: string[] = [];
  try {
    for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
      const page = await document.getPage(pageNumber);
      const content = await page.getTextContent();

      let text = '';
      for (const item of content.items) {
        if (!('str' in item)) continue;
        text += item.str;
        if (item.hasEOL) text += '\n';
      }
      pages.push(text.trim());
      page.cleanup();
    }
  } finally {
    await loadingTask.destroy();
  }

  return pages;
}

export function createPageTextExtractor(name: ExtractorName = 'auto'): PageTextExtractor {
  switch (name) {
    case 'pdftotext':
      return extractPagesWithPdftotext;
    case 'pdfjs':
      return extractPagesWithPdfjs;
    case 'auto':
      return hasCommand('pdftotext') ? extractPagesWithPdftotext : extractPagesWithPdfjs;
  }
}

export function parseExtractorName(value: string): ExtractorName {
  const match = EXTRACTOR_NAMES.find(name => name === value);
  if (!match) {
    throw new PipelineError(
      `Unknown extractor "${value}" (expected one of: ${EXTRACTOR_NAMES.join(', ')})`,
      'INVALID_ARGUMENT',
    );
  }
  return match;
}
