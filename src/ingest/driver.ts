/**
 * Incremental discovery and download.
 *
 * Walks every agency's content listing and fetches only documents whose id is
 * unknown, or known but neither hashed nor present on disk. Known rows with a
 * local file are repaired in place instead of downloaded again.
 */

import * as path from 'path';
import { PipelineError, formatError } from '../errors.js';
import { field, resolveLocalFilePath } from '../store/record-database.js';
import type {
  Agency,
  AgencyDirectory,
  ContentItem,
  DocumentRecord,
  FileDownloader,
  RecordIndex,
} from '../types.js';
import { hashFile } from '../utils/hash.js';
import { applyLocalFile } from './preflight.js';

export interface DiscoveryOptions {
  downloadDir: string;
  /** Maximum number of genuine new downloads; null for no cap. */
  limit: number | null;
  /** Pause after each successful download. */
  sleepMs: number;
}

export interface DiscoveryDeps {
  directory: AgencyDirectory;
  download: FileDownloader;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface DiscoveryResult {
  agencies: number;
  /** Rows for files downloaded in this run, in download order. */
  newRecords: DocumentRecord[];
  attemptedNew: number;
  backfilledExisting: number;
  agenciesSkipped: number;
  downloadFailures: number;
  limitReached: boolean;
}

const CREATED_DATE_PATTERNS: RegExp[] = [
  /^(\d{4}-\d{2}-\d{2})T\d{2}:\d{2}:\d{2}\.\d+Z$/,
  /^(\d{4}-\d{2}-\d{2})$/,
];

function isCalendarDate(isoDate: string): boolean {
  const parsed = new Date(`${isoDate}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(isoDate);
}

/** `YYYY-MM-DD` for the two date shapes the directory returns, otherwise null. */
export function parseCreatedDateToIso(createdDate: string | undefined): string | null {
  const value = (createdDate ?? '').trim();
  if (!value) return null;

  for (const pattern of CREATED_DATE_PATTERNS) {
    const match = value.match(pattern);
    if (match && isCalendarDate(match[1])) {
      return match[1];
    }
  }
  return null;
}

export function buildDownloadedRecord(
  item: ContentItem,
  agency: Agency,
  outPath: string,
  sha256: string,
  downloadedAt: Date,
): DocumentRecord {
  const fileName = path.basename(outPath);
  return {
    generated_filename: fileName,
    agency_name: agency.agencyName,
    agency_id: agency.agencyId,
    FileExtension: item.FileExtension,
    CreatedDate: item.CreatedDate,
    Title: item.Title,
    ContentBodyId: item.ContentBodyId,
    Id: item.Id,
    ContentDocumentId: item.ContentDocumentId,
    downloaded_filename: fileName,
    downloaded_path: outPath,
    sha256,
    downloaded_at_utc: downloadedAt.toISOString(),
    download_status: 'downloaded',
    id_match_checked: 'true',
  };
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Discover new documents and download them, mutating `index` in place.
 *
 * The limit bounds genuine downloads only: backfilled rows and failed
 * downloads do not count. A failed agency listing aborts the run; a failed
 * content listing skips that agency.
 */
export async function discoverAndDownload(
  index: RecordIndex,
  options: DiscoveryOptions,
  deps: DiscoveryDeps,
): Promise<DiscoveryResult> {
  const now = deps.now ?? (() => new Date());
  const sleep = deps.sleep ?? defaultSleep;
  const { downloadDir, limit, sleepMs } = options;

  let agencies: Agency[];
  try {
    agencies = await deps.directory.listAgencies();
  } catch (error) {
    throw new PipelineError(
      `Failed to fetch agency information from API: ${formatError(error)}`,
      'AGENCY_LISTING_FAILED',
      error,
    );
  }

  const result: DiscoveryResult = {
    agencies: agencies.length,
    newRecords: [],
    attemptedNew: 0,
    backfilledExisting: 0,
    agenciesSkipped: 0,
    downloadFailures: 0,
    limitReached: false,
  };

  console.log(`Fetched ${agencies.length} agencies. Starting incremental discovery/download.`);

  const limitHit = (): boolean => limit !== null && result.newRecords.length >= limit;

  for (const agency of agencies) {
    if (limitHit()) break;

    const agencyId = agency.agencyId.trim();
    const agencyName = agency.agencyName.trim();
    if (!agencyId) continue;

    let items: ContentItem[];
    try {
      items = await deps.directory.listContent(agencyId);
    } catch (error) {
      console.warn(`  Skipping agency ${agencyId}: ${formatError(error)}`);
      result.agenciesSkipped++;
      continue;
    }

    for (const item of items) {
      if (limitHit()) break;

      const documentId = item.ContentDocumentId.trim();
      if (!documentId) continue;

      const existing = index.get(documentId);
      if (existing) {
        if (field(existing, 'sha256')) continue;

        const localPath = resolveLocalFilePath(existing, downloadDir);
        if (localPath) {
          try {
            applyLocalFile(existing, localPath, await hashFile(localPath), 'backfilled_existing');
            result.backfilledExisting++;
          } catch (error) {
            console.warn(`  Could not hash existing file ${localPath}: ${formatError(error)}`);
          }
          continue;
        }
      }

      result.attemptedNew++;

      let outPath: string | null;
      let sha256: string;
      try {
        outPath = await deps.download({
          documentId,
          agencyName: agencyName || null,
          title: item.Title || null,
          createdDate: parseCreatedDateToIso(item.CreatedDate),
          outputDir: downloadDir,
        });
        if (!outPath) {
          result.downloadFailures++;
          continue;
        }
        sha256 = await hashFile(outPath);
      } catch (error) {
        console.warn(`  Download failed for ${documentId}: ${formatError(error)}`);
        result.downloadFailures++;
        continue;
      }

      const row = buildDownloadedRecord(
        { ...item, ContentDocumentId: documentId },
        { agencyId, agencyName },
        outPath,
        sha256,
        now(),
      );
      result.newRecords.push(row);
      index.set(documentId, row);

      console.log(`Downloaded new file ${result.newRecords.length}/${limit ?? '?'}: ${documentId}`);

      if (sleepMs > 0) {
        await sleep(sleepMs);
      }
    }
  }

  result.limitReached = limitHit();
  return result;
}
