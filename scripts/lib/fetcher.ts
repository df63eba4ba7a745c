/**
 * Rate-limited HTTP client for the licensing directory API.
 */

const USER_AGENT = 'mcyj-document-harvester/0.1 (+incremental licensing document archive)';

export interface FetcherConfig {
  /** Minimum gap between the start of two requests. */
  minDelayMs: number;
  /** Retries on 429/5xx responses and network errors; 0 disables retrying. */
  maxRetries: number;
  timeoutMs: number;
}

export interface TextFetchResult {
  status: number;
  body: string;
  contentType: string;
  url: string;
}

export interface BinaryFetchResult {
  status: number;
  body: Buffer;
  contentType: string;
  url: string;
}

export interface Fetcher {
  fetchText(url: string): Promise<TextFetchResult>;
  fetchBinary(url: string): Promise<BinaryFetchResult>;
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function createFetcher(config: FetcherConfig, fetchImpl: typeof fetch = fetch): Fetcher {
  let lastRequestAt = 0;

  async function rateLimit(): Promise<void> {
    const elapsed = Date.now() - lastRequestAt;
    if (elapsed < config.minDelayMs) {
      await delay(config.minDelayMs - elapsed);
    }
    lastRequestAt = Date.now();
  }

  async function fetchWithRetry(url: string): Promise<Response> {
    for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
      await rateLimit();

      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), config.timeoutMs);

      try {
        const response = await fetchImpl(url, {
          headers: {
            'User-Agent': USER_AGENT,
            'Accept': '*/*',
          },
          redirect: 'follow',
          signal: controller.signal,
        });

        if ((response.status === 429 || response.status >= 500) && attempt < config.maxRetries) {
          const backoffMs = Math.pow(2, attempt + 1) * 1000;
          console.log(`  HTTP ${response.status} on ${url}, backing off ${backoffMs}ms (attempt ${attempt + 1}/${config.maxRetries})`);
          await delay(backoffMs);
          continue;
        }

        return response;
      } catch (error) {
        if (attempt < config.maxRetries) {
          const backoffMs = Math.pow(2, attempt + 1) * 2000;
          const reason = error instanceof Error ? error.message : String(error);
          console.log(`  Fetch error on ${url}: ${reason}, backing off ${backoffMs}ms (attempt ${attempt + 1}/${config.maxRetries})`);
          await delay(backoffMs);
          continue;
        }
        throw error;
      } finally {
        clearTimeout(timeoutId);
      }
    }

    throw new Error(`Failed to fetch ${url}`);
  }

  return {
    async fetchText(url: string): Promise<TextFetchResult> {
      const response = await fetchWithRetry(url);
      return {
        status: response.status,
        body: await response.text(),
        contentType: response.headers.get('content-type') ?? '',
        url: response.url || url,
      };
    },

    async fetchBinary(url: string): Promise<BinaryFetchResult> {
      const response = await fetchWithRetry(url);
      return {
        status: response.status,
        body: Buffer.from(await response.arrayBuffer()),
        contentType: response.headers.get('content-type') ?? '',
        url: response.url || url,
      };
    },
  };
}
