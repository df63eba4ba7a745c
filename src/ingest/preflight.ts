/**
 * Preflight repair pass.
 *
 * Fills in `sha256` for indexed rows that already point at a file on disk, so
 * the id -> hash index is complete before discovery decides what to download.
 */

import * as path from 'path';
import { formatError } from '../errors.js';
import { field, resolveLocalFilePath } from '../store/record-database.js';
import type { DocumentRecord, DownloadStatus, RecordIndex } from '../types.js';
import { hashFile } from '../utils/hash.js';

export interface PreflightResult {
  updated: number;
  failed: number;
}

/**
 * Record a local file and its hash on a row, as a repair rather than a download.
 * `generated_filename` is only filled when it was empty.
 */
export function applyLocalFile(
  row: DocumentRecord,
  localPath: string,
  sha256: string,
  status: DownloadStatus,
): void {
  const fileName = path.basename(localPath);
  row.downloaded_path = localPath;
  row.downloaded_filename = fileName;
  row.generated_filename = field(row, 'generated_filename') || fileName;
  row.sha256 = sha256;
  row.download_status = status;
  row.id_match_checked = 'true';
}

export async function preflightBackfillMissingHashes(
  index: RecordIndex,
  downloadDir: string,
): Promise<PreflightResult> {
  let updated = 0;
  let failed = 0;

  for (const [id, row] of index) {
    if (field(row, 'sha256')) continue;

    const localPath = resolveLocalFilePath(row, downloadDir);
    if (!localPath) continue;

    try {
      const sha256 = await hashFile(localPath);
      applyLocalFile(row, localPath, sha256, 'backfilled_preflight');
      updated++;
    } catch (error) {
      console.warn(`  Preflight could not hash ${localPath} (${id}): ${formatError(error)}`);
      failed++;
    }
  }

  return { updated, failed };
}
