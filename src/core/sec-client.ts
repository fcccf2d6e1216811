import { z } from 'zod';
import { RateLimiter } from './rate-limiter.js';
import { getCached, setCache } from './cache.js';
import { SecApiError, NotFoundError, RateLimitError, DataParseError } from './errors.js';
import type { InstitutionSubmissions, SubmissionFilingColumns } from './types.js';

/**
 * SEC EDGAR archive client.
 *
 * Uses the free EDGAR endpoints:
 * - data.sec.gov/submissions/ for an institution's filing index and its shards
 * - www.sec.gov/Archives/edgar/data/ for filing documents
 *
 * Every request goes through one shared RateLimiter and carries the
 * identifying User-Agent SEC requires. Failures are terminal for the
 * document that failed; only 429 responses are retried, with exponential
 * backoff, since they are the host asking us to slow down.
 */

export interface ArchiveClient {
  getSubmissions(cik: string): Promise<InstitutionSubmissions>;
  /** Fetch one archived index shard, named by the submissions `files[]` list */
  getSubmissionsShard(name: string): Promise<SubmissionFilingColumns>;
  getFilingDocument(cik: string, accessionNumber: string, filename: string): Promise<string>;
}

export interface ResponseCache {
  get(url: string): string | null;
  set(url: string, body: string, ttlHours: number): void;
}

export interface ArchiveClientOptions {
  userAgent: string;
  dataUrl?: string;
  archivesUrl?: string;
  rateLimiter?: RateLimiter;
  maxRetries?: number;
  timeoutMs?: number;
  backoffBaseMs?: number;
  /** null disables caching */
  cache?: ResponseCache | null;
  fetch?: typeof fetch;
}

export const sqliteResponseCache: ResponseCache = {
  get: getCached,
  set: setCache,
};

const SUBMISSIONS_TTL_HOURS = 24;
const DOCUMENT_TTL_HOURS = 720; // filings are immutable

const filingColumnsSchema = z.object({
  accessionNumber: z.array(z.string()).default([]),
  filingDate: z.array(z.string()).default([]),
  form: z.array(z.string()).default([]),
});

const submissionsSchema = z.object({
  cik: z.union([z.string(), z.number()]).transform(String).default(''),
  name: z.string().default(''),
  filings: z.object({
    recent: filingColumnsSchema.default({}),
    files: z.array(z.object({
      name: z.string(),
      filingCount: z.number().optional(),
    })).default([]),
  }),
});

export function createArchiveClient(options: ArchiveClientOptions): ArchiveClient {
  const dataUrl = (options.dataUrl ?? 'https://data.sec.gov').replace(/\/+$/, '');
  const archivesUrl = (options.archivesUrl ?? 'https://www.sec.gov/Archives/edgar/data').replace(/\/+$/, '');
  const rateLimiter = options.rateLimiter ?? new RateLimiter();
  const maxRetries = options.maxRetries ?? 3;
  const timeoutMs = options.timeoutMs ?? 15_000;
  const backoffBaseMs = options.backoffBaseMs ?? 1000;
  const cache = options.cache === undefined ? sqliteResponseCache : options.cache;
  const doFetch = options.fetch ?? fetch;

  async function fetchWithRateLimit(url: string, cacheTtlHours: number): Promise<string> {
    if (cache) {
      try {
        const cached = cache.get(url);
        if (cached !== null) return cached;
      } catch {
        // Cache read failed (corruption, locked); fetch without it
      }
    }

    let lastError: SecApiError | null = null;

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      await rateLimiter.acquire();

      let response: Response;
      try {
        response = await doFetch(url, {
          headers: {
            'User-Agent': options.userAgent,
            'Accept-Encoding': 'gzip, deflate',
          },
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (err) {
        throw new SecApiError(
          `Network error fetching ${url}: ${err instanceof Error ? err.message : String(err)}`,
          0,
          url
        );
      }

      if (response.ok) {
        const body = await response.text();
        if (cache) {
          try {
            cache.set(url, body, cacheTtlHours);
          } catch {
            // Cache write failed; the response is still returned
          }
        }
        return body;
      }

      if (response.status === 404) {
        throw new NotFoundError(url);
      }

      if (response.status === 429) {
        lastError = new RateLimitError(url);
        if (attempt < maxRetries - 1) await sleep(backoffMs(attempt, backoffBaseMs));
        continue;
      }

      if (response.status === 403) {
        throw new SecApiError(
          'SEC rejected request (403 Forbidden). Check SEC_USER_AGENT: SEC requires a User-Agent with contact info.',
          403,
          url
        );
      }

      throw new SecApiError(
        `SEC archive error: ${response.status} ${response.statusText}`,
        response.status,
        url
      );
    }

    throw lastError ?? new SecApiError(`Failed after ${maxRetries} attempts`, 0, url);
  }

  async function fetchJson<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string): Promise<T> {
    const body = await fetchWithRateLimit(url, SUBMISSIONS_TTL_HOURS);

    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch {
      throw new DataParseError(`Failed to parse ${what}: response is not JSON.`, url);
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new DataParseError(`Unexpected shape for ${what}: ${parsed.error.issues[0].message}`, url);
    }
    return parsed.data;
  }

  return {
    getSubmissions(cik: string): Promise<InstitutionSubmissions> {
      const paddedCik = cik.padStart(10, '0');
      return fetchJson(`${dataUrl}/submissions/CIK${paddedCik}.json`, submissionsSchema, `submissions for CIK ${cik}`);
    },

    getSubmissionsShard(name: string): Promise<SubmissionFilingColumns> {
      return fetchJson(`${dataUrl}/submissions/${name}`, filingColumnsSchema, `submissions shard ${name}`);
    },

    getFilingDocument(cik: string, accessionNumber: string, filename: string): Promise<string> {
      const url = filingDocumentUrl(archivesUrl, cik, accessionNumber, filename);
      return fetchWithRateLimit(url, DOCUMENT_TTL_HOURS);
    },
  };
}

export function filingDocumentUrl(archivesUrl: string, cik: string, accessionNumber: string, filename: string): string {
  const paddedCik = cik.padStart(10, '0');
  const accessionNoDashes = accessionNumber.replace(/-/g, '');
  return `${archivesUrl}/${paddedCik}/${accessionNoDashes}/${filename}`;
}

/** Exponential backoff with jitter: 1s, 2s, 4s at the default base */
function backoffMs(attempt: number, baseMs: number): number {
  const base = baseMs * Math.pow(2, attempt);
  const jitter = Math.random() * baseMs / 2;
  return base + jitter;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
