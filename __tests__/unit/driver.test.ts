import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as path from 'path';
import { isPipelineError } from '../../src/errors.js';
import { discoverAndDownload, parseCreatedDateToIso, type DiscoveryDeps } from '../../src/ingest/driver.js';
import { indexById } from '../../src/store/record-database.js';
import type { AgencyDirectory, DownloadRequest, FileDownloader, RecordIndex } from '../../src/types.js';
import { hashBuffer, hashFile } from '../../src/utils/hash.js';
import {
  FakeDirectory,
  contentItem,
  fakeDownloader,
  makeTempDir,
  removeDir,
  silenceConsole,
  writeFile,
} from '../helpers.js';

vi.mock('../../src/utils/hash.js', async importOriginal => {
  const actual = await importOriginal<typeof import('../../src/utils/hash.js')>();
  return { ...actual, hashFile: vi.fn(actual.hashFile) };
});

const NOW = new Date('2025-02-03T04:05:06.000Z');

describe('parseCreatedDateToIso', () => {
  it('normalizes timestamp and plain date forms', () => {
    expect(parseCreatedDateToIso('2024-03-05T10:20:30.000Z')).toBe('2024-03-05');
    expect(parseCreatedDateToIso(' 2024-03-05 ')).toBe('2024-03-05');
  });

  it('returns null for empty or unrecognized values', () => {
    expect(parseCreatedDateToIso('')).toBeNull();
    expect(parseCreatedDateToIso(undefined)).toBeNull();
    expect(parseCreatedDateToIso('03/05/2024')).toBeNull();
    expect(parseCreatedDateToIso('2024-02-30')).toBeNull();
  });
});

describe('discoverAndDownload', () => {
  let downloadDir: string;

  beforeEach(() => {
    downloadDir = makeTempDir();
    silenceConsole();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeDir(downloadDir);
  });

  function deps(directory: AgencyDirectory, download: FileDownloader = fakeDownloader()): DiscoveryDeps {
    return { directory, download, now: () => NOW, sleep: async () => undefined };
  }

  it('downloads new documents and records them', async () => {
    const directory = new FakeDirectory([{ agencyId: 'AG1', agencyName: 'North Home' }], {
      AG1: [contentItem('d1')],
    });
    const download = fakeDownloader();
    const index: RecordIndex = new Map();

    const result = await discoverAndDownload(index, { downloadDir, limit: null, sleepMs: 0 }, deps(directory, download));

    const outPath = path.join(downloadDir, 'd1.pdf');
    expect(download.calls).toEqual([
      { documentId: 'd1', agencyName: 'North Home', title: 'Inspection d1', createdDate: '2024-03-05', outputDir: downloadDir },
    ]);
    expect(result.newRecords).toEqual([
      {
        generated_filename: 'd1.pdf',
        agency_name: 'North Home',
        agency_id: 'AG1',
        FileExtension: 'pdf',
        CreatedDate: '2024-03-05T10:20:30.000Z',
        Title: 'Inspection d1',
        ContentBodyId: 'body-d1',
        Id: 'ver-d1',
        ContentDocumentId: 'd1',
        downloaded_filename: 'd1.pdf',
        downloaded_path: outPath,
        sha256: hashBuffer('%PDF-fake d1'),
        downloaded_at_utc: '2025-02-03T04:05:06.000Z',
        download_status: 'downloaded',
        id_match_checked: 'true',
      },
    ]);
    expect(index.get('d1')).toBe(result.newRecords[0]);
    expect(result.attemptedNew).toBe(1);
  });

  it('stops both loops once the limit of genuine downloads is reached', async () => {
    const directory = new FakeDirectory(
      [
        { agencyId: 'AG1', agencyName: 'One' },
        { agencyId: 'AG2', agencyName: 'Two' },
      ],
      { AG1: [contentItem('d1'), contentItem('d2'), contentItem('d3')], AG2: [contentItem('d4')] },
    );

    const result = await discoverAndDownload(new Map(), { downloadDir, limit: 2, sleepMs: 0 }, deps(directory));

    expect(result.newRecords.map(r => r.ContentDocumentId)).toEqual(['d1', 'd2']);
    expect(result.limitReached).toBe(true);
    expect(directory.contentCalls).toEqual(['AG1']);
  });

  it('performs no downloads with a limit of zero', async () => {
    const directory = new FakeDirectory([{ agencyId: 'AG1', agencyName: 'One' }], { AG1: [contentItem('d1')] });
    const download = fakeDownloader();

    const result = await discoverAndDownload(new Map(), { downloadDir, limit: 0, sleepMs: 0 }, deps(directory, download));

    expect(result.newRecords).toEqual([]);
    expect(download.calls).toEqual([]);
  });

  it('skips documents already known with a hash', async () => {
    const index = indexById([{ ContentDocumentId: 'd1', sha256: 'known' }]);
    const directory = new FakeDirectory([{ agencyId: 'AG1', agencyName: 'One' }], { AG1: [contentItem('d1')] });
    const download = fakeDownloader();

    const result = await discoverAndDownload(index, { downloadDir, limit: null, sleepMs: 0 }, deps(directory, download));

    expect(download.calls).toEqual([]);
    expect(result.attemptedNew).toBe(0);
    expect(index.get('d1')).toEqual({ ContentDocumentId: 'd1', sha256: 'known' });
  });

  it('backfills known documents found on disk without counting them against the limit', async () => {
    const existingFile = writeFile(downloadDir, 'old-name.pdf', 'already here');
    const index = indexById([{ ContentDocumentId: 'd1', agency_id: 'AG1', downloaded_filename: 'old-name.pdf' }]);
    const directory = new FakeDirectory([{ agencyId: 'AG1', agencyName: 'One' }], {
      AG1: [contentItem('d1'), contentItem('d2')],
    });
    const download = fakeDownloader();

    const result = await discoverAndDownload(index, { downloadDir, limit: 1, sleepMs: 0 }, deps(directory, download));

    expect(result.backfilledExisting).toBe(1);
    expect(result.newRecords.map(r => r.ContentDocumentId)).toEqual(['d2']);
    expect(download.calls.map(call => call.documentId)).toEqual(['d2']);
    expect(index.get('d1')).toMatchObject({
      downloaded_path: existingFile,
      sha256: hashBuffer('already here'),
      download_status: 'backfilled_existing',
      id_match_checked: 'true',
    });
  });

  it('skips a known document whose local file cannot be hashed', async () => {
    const existingFile = writeFile(downloadDir, 'old-name.pdf', 'already here');
    const row = { ContentDocumentId: 'd1', agency_id: 'AG1', downloaded_filename: 'old-name.pdf' };
    const index = indexById([{ ...row }]);
    const directory = new FakeDirectory([{ agencyId: 'AG1', agencyName: 'One' }], {
      AG1: [contentItem('d1'), contentItem('d2')],
    });
    const download = fakeDownloader();
    vi.mocked(hashFile).mockRejectedValueOnce(new Error('EIO: i/o error, read'));

    const result = await discoverAndDownload(index, { downloadDir, limit: null, sleepMs: 0 }, deps(directory, download));

    expect(download.calls.map(call => call.documentId)).toEqual(['d2']);
    expect(result.attemptedNew).toBe(1);
    expect(result.backfilledExisting).toBe(0);
    expect(result.downloadFailures).toBe(0);
    expect(index.get('d1')).toEqual(row);
    expect(console.warn).toHaveBeenCalledWith(
      `  Could not hash existing file ${existingFile}: EIO: i/o error, read`,
    );
  });

  it('downloads a known document again when its file is gone', async () => {
    const index = indexById([{ ContentDocumentId: 'd1', downloaded_filename: 'vanished.pdf', note: 'stale' }]);
    const directory = new FakeDirectory([{ agencyId: 'AG1', agencyName: 'One' }], { AG1: [contentItem('d1')] });

    const result = await discoverAndDownload(index, { downloadDir, limit: null, sleepMs: 0 }, deps(directory));

    expect(result.newRecords).toHaveLength(1);
    expect(index.get('d1')?.download_status).toBe('downloaded');
    expect(index.get('d1')?.note).toBeUndefined();
  });

  it('aborts when the agency list cannot be fetched', async () => {
    const directory: AgencyDirectory = {
      listAgencies: async () => {
        throw new Error('HTTP 500');
      },
      listContent: async () => [],
    };

    const error = await discoverAndDownload(new Map(), { downloadDir, limit: null, sleepMs: 0 }, deps(directory)).catch(
      (caught: unknown) => caught,
    );

    expect(isPipelineError(error, 'AGENCY_LISTING_FAILED')).toBe(true);
  });

  it('skips an agency whose content listing fails and continues', async () => {
    const directory = new FakeDirectory(
      [
        { agencyId: 'AG1', agencyName: 'Broken' },
        { agencyId: 'AG2', agencyName: 'Working' },
      ],
      { AG2: [contentItem('d2')] },
      new Set(['AG1']),
    );

    const result = await discoverAndDownload(new Map(), { downloadDir, limit: null, sleepMs: 0 }, deps(directory));

    expect(result.agenciesSkipped).toBe(1);
    expect(result.newRecords.map(r => r.ContentDocumentId)).toEqual(['d2']);
  });

  it('ignores agencies and items without ids', async () => {
    const directory = new FakeDirectory(
      [
        { agencyId: '  ', agencyName: 'Nameless' },
        { agencyId: 'AG1', agencyName: '' },
      ],
      { AG1: [contentItem(''), contentItem('d1')] },
    );
    const download = fakeDownloader();

    await discoverAndDownload(new Map(), { downloadDir, limit: null, sleepMs: 0 }, deps(directory, download));

    expect(directory.contentCalls).toEqual(['AG1']);
    expect(download.calls).toHaveLength(1);
    expect(download.calls[0].agencyName).toBeNull();
  });

  it('does not count failed downloads toward the limit', async () => {
    const directory = new FakeDirectory([{ agencyId: 'AG1', agencyName: 'One' }], {
      AG1: [contentItem('d1'), contentItem('d2'), contentItem('d3')],
    });

    const result = await discoverAndDownload(
      new Map(),
      { downloadDir, limit: 2, sleepMs: 0 },
      deps(directory, fakeDownloader(new Set(['d1']))),
    );

    expect(result.attemptedNew).toBe(3);
    expect(result.downloadFailures).toBe(1);
    expect(result.newRecords.map(r => r.ContentDocumentId)).toEqual(['d2', 'd3']);
  });

  it('treats a throwing downloader as a skipped item', async () => {
    const directory = new FakeDirectory([{ agencyId: 'AG1', agencyName: 'One' }], {
      AG1: [contentItem('d1'), contentItem('d2')],
    });
    const flaky = fakeDownloader();
    const download = async (request: DownloadRequest): Promise<string | null> => {
      if (request.documentId === 'd1') throw new Error('socket hang up');
      return flaky(request);
    };

    const result = await discoverAndDownload(new Map(), { downloadDir, limit: null, sleepMs: 0 }, deps(directory, download));

    expect(result.downloadFailures).toBe(1);
    expect(result.newRecords.map(r => r.ContentDocumentId)).toEqual(['d2']);
  });

  it('pauses after each successful download only', async () => {
    const directory = new FakeDirectory([{ agencyId: 'AG1', agencyName: 'One' }], {
      AG1: [contentItem('d1'), contentItem('d2'), contentItem('d3')],
    });
    const sleep = vi.fn(async (_ms: number) => undefined);

    await discoverAndDownload(
      new Map(),
      { downloadDir, limit: null, sleepMs: 1500 },
      { directory, download: fakeDownloader(new Set(['d2'])), now: () => NOW, sleep },
    );

    expect(sleep.mock.calls).toEqual([[1500], [1500]]);
  });

  it('downloads nothing on a second pass over unchanged sources', async () => {
    const directory = new FakeDirectory([{ agencyId: 'AG1', agencyName: 'One' }], {
      AG1: [contentItem('d1'), contentItem('d2')],
    });
    const index: RecordIndex = new Map();

    await discoverAndDownload(index, { downloadDir, limit: null, sleepMs: 0 }, deps(directory));
    const download = fakeDownloader();
    const second = await discoverAndDownload(index, { downloadDir, limit: null, sleepMs: 0 }, deps(directory, download));

    expect(second.newRecords).toEqual([]);
    expect(download.calls).toEqual([]);
  });
});
