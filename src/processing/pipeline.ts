/**
 * Holdings history pipeline.
 *
 * For each institution: crawl the filing index, run the parser cascade on
 * every filing, normalize the result and keep holdings of the target
 * tickers. Institutions run concurrently; they share the archive client and
 * therefore its rate limiter.
 *
 * Failures stay local. A bad shard, filing or institution contributes
 * nothing and the run carries on. The abort signal is checked between
 * filings, and each filing is committed to the store as soon as it is
 * parsed.
 */

import type { ArchiveClient } from '../core/sec-client.js';
import type { IdentifierResolver } from '../core/resolver.js';
import type { HoldingsStore } from '../core/holdings-store.js';
import type {
  FilingContext,
  FilingIndexEntry,
  Holding,
  Institution,
  YearRange,
} from '../core/types.js';
import { logger as defaultLogger, type Logger } from '../core/logger.js';
import { listHoldingsFilings } from './filing-index.js';
import { runCascade, type ExtractionStrategy } from './parser-cascade.js';
import { normalize } from './normalizer.js';

export interface PipelineDeps {
  client: ArchiveClient;
  resolver: IdentifierResolver;
  store?: HoldingsStore;
  strategies?: readonly ExtractionStrategy[];
  logger?: Logger;
}

export interface TrackOptions {
  tickers: readonly string[];
  range: YearRange;
  institutions: readonly Institution[];
  /** Institutions processed at once; requests are rate limited regardless */
  concurrency?: number;
  /** Newest N filings per institution; all when unset */
  maxFilingsPerInstitution?: number;
  signal?: AbortSignal;
  onProgress?: (event: ProgressEvent) => void;
}

export type ProgressEvent =
  | { type: 'institution_start'; institution: Institution; filings: number }
  | { type: 'filing_done'; institution: Institution; filing: FilingIndexEntry; holdings: number; skipped: boolean }
  | { type: 'institution_done'; result: InstitutionRunResult };

export interface InstitutionRunResult {
  institution: Institution;
  filingsFound: number;
  filingsProcessed: number;
  /** Already processed in an earlier run */
  filingsSkipped: number;
  /** Filings where every extraction strategy came up empty */
  misses: number;
  /** Filings no document could be fetched for; left unmarked so a rerun retries them */
  filingsFailed: number;
  holdings: number;
  error?: string;
}

export interface TrackResult {
  /** Holdings extracted during this run (earlier runs' holdings stay in the store) */
  holdings: Holding[];
  entries: FilingIndexEntry[];
  institutions: InstitutionRunResult[];
  interrupted: boolean;
}

export async function trackHoldingsHistory(deps: PipelineDeps, options: TrackOptions): Promise<TrackResult> {
  const log = deps.logger ?? defaultLogger;
  const tickers = Array.from(new Set(options.tickers.map(t => t.toUpperCase())));
  const concurrency = Math.max(1, options.concurrency ?? 2);

  const holdings: Holding[] = [];
  const entries: FilingIndexEntry[] = [];
  const results: InstitutionRunResult[] = new Array(options.institutions.length);

  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < options.institutions.length) {
      if (options.signal?.aborted) return;
      const index = next++;
      const institution = options.institutions[index];
      try {
        results[index] = await processInstitution(deps, options, tickers, institution, holdings, entries, log);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        log.error({ cik: institution.cik, err: message }, 'institution failed');
        results[index] = {
          institution,
          filingsFound: 0,
          filingsProcessed: 0,
          filingsSkipped: 0,
          misses: 0,
          filingsFailed: 0,
          holdings: 0,
          error: message,
        };
      }
      options.onProgress?.({ type: 'institution_done', result: results[index] });
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, options.institutions.length) }, worker));

  return {
    holdings,
    entries,
    institutions: results.filter((r): r is InstitutionRunResult => r !== undefined),
    interrupted: options.signal?.aborted ?? false,
  };
}

async function processInstitution(
  deps: PipelineDeps,
  options: TrackOptions,
  tickers: string[],
  institution: Institution,
  holdings: Holding[],
  entries: FilingIndexEntry[],
  log: Logger
): Promise<InstitutionRunResult> {
  const found = await listHoldingsFilings({ client: deps.client, logger: log }, institution.cik, options.range);
  deps.store?.saveFilingIndex(found);
  entries.push(...found);

  const filings = options.maxFilingsPerInstitution !== undefined
    ? found.slice(0, options.maxFilingsPerInstitution)
    : found;

  log.info({ cik: institution.cik, institution: institution.name, filings: filings.length }, 'processing institution');
  options.onProgress?.({ type: 'institution_start', institution, filings: filings.length });

  const result: InstitutionRunResult = {
    institution,
    filingsFound: found.length,
    filingsProcessed: 0,
    filingsSkipped: 0,
    misses: 0,
    filingsFailed: 0,
    holdings: 0,
  };

  for (const filing of filings) {
    if (options.signal?.aborted) break;

    if (deps.store?.isProcessed(filing.accessionNumber, tickers)) {
      result.filingsSkipped++;
      options.onProgress?.({ type: 'filing_done', institution, filing, holdings: 0, skipped: true });
      continue;
    }

    const context: FilingContext = {
      cik: filing.cik,
      institutionName: institution.name,
      accessionNumber: filing.accessionNumber,
      filingDate: filing.filingDate,
      filingYear: filing.filingYear,
      filingQuarter: filing.filingQuarter,
    };

    const cascade = await runCascade(
      { client: deps.client, resolver: deps.resolver, strategies: deps.strategies, logger: log },
      filing.cik,
      filing.accessionNumber,
      tickers
    );

    if (cascade.attempts.length > 0 && cascade.attempts.every(a => a.outcome === 'error')) {
      log.warn({ cik: filing.cik, accessionNumber: filing.accessionNumber }, 'no filing document could be fetched; will retry on next run');
      result.filingsFailed++;
      options.onProgress?.({ type: 'filing_done', institution, filing, holdings: 0, skipped: false });
      continue;
    }

    const normalized = cascade.holdings
      .map(raw => normalize(raw, context, { resolver: deps.resolver, targetTickers: tickers }))
      .filter(h => h.ticker !== null && tickers.includes(h.ticker));

    deps.store?.recordFiling(context, tickers, normalized, cascade.strategy);
    holdings.push(...normalized);

    result.filingsProcessed++;
    result.holdings += normalized.length;
    if (cascade.strategy === null) result.misses++;

    options.onProgress?.({ type: 'filing_done', institution, filing, holdings: normalized.length, skipped: false });
  }

  return result;
}
