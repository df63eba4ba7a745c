/**
 * Shared types for the harvesting pipeline.
 */

/**
 * Columns every saved download database carries, in output order.
 * Rows may hold further enrichment columns; those are preserved on save.
 */
export const BASELINE_COLUMNS = [
  'generated_filename',
  'agency_name',
  'agency_id',
  'FileExtension',
  'CreatedDate',
  'Title',
  'ContentBodyId',
  'Id',
  'ContentDocumentId',
  'downloaded_filename',
  'downloaded_path',
  'sha256',
  'downloaded_at_utc',
  'download_status',
  'id_match_checked',
] as const;

export type BaselineColumn = (typeof BASELINE_COLUMNS)[number];

/**
 * One row of the download database, keyed by `ContentDocumentId`.
 *
 * Values are kept as strings because the database is a CSV file; an absent
 * column and an empty cell mean the same thing.
 */
export type DocumentRecord = { [K in BaselineColumn]?: string } & Record<string, string | undefined>;

export type DownloadStatus = 'downloaded' | 'backfilled_preflight' | 'backfilled_existing';

/** In-memory lookup threaded through preflight, discovery and save. */
export type RecordIndex = Map<string, DocumentRecord>;

/** One page-extracted document inside a batch file. */
export interface TextBatchRecord {
  content_hash: string;
  pages: string[];
  processed_at: string;
}

export interface Agency {
  agencyId: string;
  agencyName: string;
}

/** A document listed for an agency by the remote directory. */
export interface ContentItem {
  ContentDocumentId: string;
  Title: string;
  CreatedDate: string;
  FileExtension: string;
  ContentBodyId: string;
  Id: string;
}

export interface DownloadRequest {
  documentId: string;
  agencyName: string | null;
  title: string | null;
  createdDate: string | null;
  outputDir: string;
}

/** Remote directory collaborator. */
export interface AgencyDirectory {
  listAgencies(): Promise<Agency[]>;
  listContent(agencyId: string): Promise<ContentItem[]>;
}

/** Writes one remote file to disk; resolves to its local path, or null when nothing was fetched. */
export type FileDownloader = (request: DownloadRequest) => Promise<string | null>;

/** Ordered page texts of one file; a page without text is an empty string. */
export type PageTextExtractor = (filePath: string) => Promise<string[]>;
