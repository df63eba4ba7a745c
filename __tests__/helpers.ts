/**
 * Shared fixtures: temporary directories and in-process collaborators.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { vi } from 'vitest';
import type { Agency, AgencyDirectory, ContentItem, DownloadRequest, FileDownloader } from '../src/types.js';

export function makeTempDir(prefix = 'mcyj-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeFile(dir: string, name: string, content: string): string {
  fs.mkdirSync(dir, { recursive: true });
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, content);
  return filePath;
}

export function contentItem(id: string, overrides: Partial<ContentItem> = {}): ContentItem {
  return {
    ContentDocumentId: id,
    Title: `Inspection ${id}`,
    CreatedDate: '2024-03-05T10:20:30.000Z',
    FileExtension: 'pdf',
    ContentBodyId: `body-${id}`,
    Id: `ver-${id}`,
    ...overrides,
  };
}

/** Agency directory backed by a fixed map; agencies listed in `failing` throw. */
export class FakeDirectory implements AgencyDirectory {
  readonly contentCalls: string[] = [];

  constructor(
    private readonly agencies: Agency[],
    private readonly content: Record<string, ContentItem[]>,
    private readonly failing: Set<string> = new Set(),
  ) {}

  async listAgencies(): Promise<Agency[]> {
    return this.agencies;
  }

  async listContent(agencyId: string): Promise<ContentItem[]> {
    this.contentCalls.push(agencyId);
    if (this.failing.has(agencyId)) {
      throw new Error(`HTTP 503 for ${agencyId}`);
    }
    return this.content[agencyId] ?? [];
  }
}

/**
 * Downloader writing `%PDF-fake <documentId>` to `<outputDir>/<documentId>.pdf`.
 * Ids in `unavailable` resolve to null.
 */
export function fakeDownloader(unavailable: Set<string> = new Set()): FileDownloader & { calls: DownloadRequest[] } {
  const calls: DownloadRequest[] = [];
  const download = async (request: DownloadRequest): Promise<string | null> => {
    calls.push(request);
    if (unavailable.has(request.documentId)) return null;
    return writeFile(request.outputDir, `${request.documentId}.pdf`, `%PDF-fake ${request.documentId}`);
  };
  return Object.assign(download, { calls });
}

/** Page texts are the file's content split on '|'. */
export async function pipeSplitExtractor(filePath: string): Promise<string[]> {
  return fs.readFileSync(filePath, 'utf-8').split('|');
}

export function silenceConsole(): void {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
  vi.spyOn(console, 'debug').mockImplementation(() => undefined);
}
