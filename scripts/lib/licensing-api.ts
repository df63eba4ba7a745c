/**
 * HTTP implementation of the agency directory and file download collaborators.
 *
 * Endpoints are configured through the environment:
 *   LICENSING_API_AGENCIES_URL   agency listing
 *   LICENSING_API_CONTENT_URL    content listing, `{agencyId}` placeholder
 *   LICENSING_API_DOWNLOAD_URL   file download, `{documentId}` placeholder
 *   LICENSING_API_MIN_DELAY_MS   minimum gap between requests (default 500)
 *   LICENSING_API_RETRIES        retries on 429/5xx and network errors (default 0)
 *   LICENSING_API_TIMEOUT_MS     per-request timeout (default 60000)
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { PipelineError } from '../../src/errors.js';
import type { Agency, AgencyDirectory, ContentItem, DownloadRequest, FileDownloader } from '../../src/types.js';
import { createFetcher, type Fetcher, type FetcherConfig } from './fetcher.js';

export interface LicensingApiConfig extends FetcherConfig {
  agenciesUrl: string;
  contentUrlTemplate: string;
  downloadUrlTemplate: string;
}

const optionalText = z.string().nullish();

const agencyListSchema = z.object({
  returnValue: z
    .object({
      objectData: z
        .object({
          responseResult: z
            .array(z.object({ agencyId: optionalText, AgencyName: optionalText }).passthrough())
            .default([]),
        })
        .default({}),
    })
    .default({}),
});

const contentListSchema = z.object({
  returnValue: z
    .object({
      contentVersionRes: z
        .array(
          z
            .object({
              ContentDocumentId: optionalText,
              Title: optionalText,
              CreatedDate: optionalText,
              FileExtension: optionalText,
              ContentBodyId: optionalText,
              Id: optionalText,
            })
            .passthrough(),
        )
        .default([]),
    })
    .default({}),
});

const PDF_MAGIC = '%PDF-';
const SLUG_MAX_LENGTH = 60;

function readInteger(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new PipelineError(`${name} must be a non-negative integer, got "${raw}"`, 'INVALID_ARGUMENT');
  }
  return value;
}

function readRequired(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new PipelineError(`${name} is not set`, 'INVALID_ARGUMENT');
  }
  return value;
}

export function readLicensingApiConfig(env: NodeJS.ProcessEnv = process.env): LicensingApiConfig {
  return {
    agenciesUrl: readRequired(env, 'LICENSING_API_AGENCIES_URL'),
    contentUrlTemplate: readRequired(env, 'LICENSING_API_CONTENT_URL'),
    downloadUrlTemplate: readRequired(env, 'LICENSING_API_DOWNLOAD_URL'),
    minDelayMs: readInteger(env, 'LICENSING_API_MIN_DELAY_MS', 500),
    maxRetries: readInteger(env, 'LICENSING_API_RETRIES', 0),
    timeoutMs: readInteger(env, 'LICENSING_API_TIMEOUT_MS', 60_000),
  };
}

export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, key: string) => {
    const value = values[key];
    return value === undefined ? placeholder : encodeURIComponent(value);
  });
}

function slugify(value: string | null): string {
  const slug = (value ?? '')
    .normalize('NFKD')
    .replace(/[^A-Za-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, SLUG_MAX_LENGTH)
    .replace(/-+$/, '');
  return slug || 'unknown';
}

/** `<YYYY-MM-DD|undated>_<agency>_<title>_<documentId>.pdf` */
export function buildDownloadFilename(request: Omit<DownloadRequest, 'outputDir'>): string {
  const date = request.createdDate ?? 'undated';
  const documentId = request.documentId.replace(/[^A-Za-z0-9]+/g, '');
  return `${date}_${slugify(request.agencyName)}_${slugify(request.title)}_${documentId}.pdf`;
}

function parseJson(body: string, url: string): unknown {
  try {
    return JSON.parse(body);
  } catch (error) {
    throw new PipelineError(`Response from ${url} is not JSON`, 'API_RESPONSE_INVALID', error);
  }
}

export class LicensingApiClient implements AgencyDirectory {
  private readonly fetcher: Fetcher;

  constructor(
    private readonly config: LicensingApiConfig,
    fetcher?: Fetcher,
  ) {
    this.fetcher = fetcher ?? createFetcher(config);
  }

  private async fetchJson(url: string): Promise<unknown> {
    const response = await this.fetcher.fetchText(url);
    if (response.status !== 200) {
      throw new Error(`Failed to fetch ${url}: HTTP ${response.status}`);
    }
    return parseJson(response.body, url);
  }

  async listAgencies(): Promise<Agency[]> {
    const parsed = agencyListSchema.safeParse(await this.fetchJson(this.config.agenciesUrl));
    if (!parsed.success) {
      throw new PipelineError(
        `Unexpected agency listing shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        'API_RESPONSE_INVALID',
      );
    }

    return parsed.data.returnValue.objectData.responseResult.map(agency => ({
      agencyId: agency.agencyId ?? '',
      agencyName: agency.AgencyName ?? '',
    }));
  }

  async listContent(agencyId: string): Promise<ContentItem[]> {
    const url = fillTemplate(this.config.contentUrlTemplate, { agencyId });
    const parsed = contentListSchema.safeParse(await this.fetchJson(url));
    if (!parsed.success) {
      throw new PipelineError(
        `Unexpected content listing shape for agency ${agencyId}: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        'API_RESPONSE_INVALID',
      );
    }

    return parsed.data.returnValue.contentVersionRes.map(item => ({
      ContentDocumentId: item.ContentDocumentId ?? '',
      Title: item.Title ?? '',
      CreatedDate: item.CreatedDate ?? '',
      FileExtension: item.FileExtension ?? '',
      ContentBodyId: item.ContentBodyId ?? '',
      Id: item.Id ?? '',
    }));
  }

  /** Resolves to null when the server answers with something other than a PDF. */
  readonly download: FileDownloader = async request => {
    const url = fillTemplate(this.config.downloadUrlTemplate, { documentId: request.documentId });
    const response = await this.fetcher.fetchBinary(url);

    if (response.status !== 200) {
      console.warn(`  Download of ${request.documentId} failed: HTTP ${response.status}`);
      return null;
    }
    if (response.body.subarray(0, PDF_MAGIC.length).toString('latin1') !== PDF_MAGIC) {
      console.warn(`  Download of ${request.documentId} is not a PDF (${response.contentType || 'unknown type'})`);
      return null;
    }

    fs.mkdirSync(request.outputDir, { recursive: true });
    const outPath = path.join(request.outputDir, buildDownloadFilename(request));
    fs.writeFileSync(outPath, response.body);
    return outPath;
  };
}
