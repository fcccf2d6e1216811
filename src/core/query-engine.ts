/**
 * Shared entry points for the CLI and the read API.
 *
 * Builds the runtime (archive client, resolver, store) from startup
 * configuration and answers queries from the store. Returns data, never
 * prints to console.
 */

import type Database from 'better-sqlite3';
import type { AppConfig } from './config.js';
import { configureCache, getDb } from './cache.js';
import { HoldingsStore } from './holdings-store.js';
import { RateLimiter } from './rate-limiter.js';
import { IdentifierResolver } from './resolver.js';
import { createArchiveClient, type ArchiveClient } from './sec-client.js';
import { UnknownTickerError } from './errors.js';
import { analyzeInstitutions, summarize } from '../processing/aggregator.js';
import type { Holding, InstitutionActivity, Roster, YearlySummary, YearRange } from './types.js';

export interface Runtime {
  roster: Roster;
  resolver: IdentifierResolver;
  client: ArchiveClient;
  store: HoldingsStore;
}

export function createRuntime(config: AppConfig, roster: Roster, db?: Database.Database): Runtime {
  let handle = db;
  if (!handle) {
    configureCache(config.HOLDINGS_HOME);
    handle = getDb();
  }

  return {
    roster,
    resolver: new IdentifierResolver(roster.securities),
    client: createArchiveClient({
      userAgent: config.SEC_USER_AGENT,
      dataUrl: config.SEC_DATA_URL,
      archivesUrl: config.SEC_ARCHIVES_URL,
      rateLimiter: new RateLimiter(config.SEC_MIN_INTERVAL_MS),
      maxRetries: config.SEC_MAX_RETRIES,
      timeoutMs: config.SEC_TIMEOUT_MS,
    }),
    store: new HoldingsStore(handle),
  };
}

/** Upper-cased tickers, all of which must be in the roster */
export function validateTickers(resolver: IdentifierResolver, tickers: readonly string[]): string[] {
  const upper = tickers.map(t => t.trim().toUpperCase()).filter(Boolean);
  for (const ticker of upper) {
    if (!resolver.isTracked(ticker)) {
      throw new UnknownTickerError(ticker, resolver.tickers);
    }
  }
  return Array.from(new Set(upper));
}

export function resolveYearRange(since: number | undefined, until: number | undefined, now: Date = new Date()): YearRange {
  const endYear = until ?? now.getFullYear();
  const startYear = since ?? endYear - 20;
  if (startYear > endYear) {
    throw new RangeError(`Start year ${startYear} is after end year ${endYear}`);
  }
  return { startYear, endYear };
}

export interface TickerHistory {
  ticker: string;
  holdings: Holding[];
  summaries: YearlySummary[];
}

export function getTickerHistory(store: HoldingsStore, ticker: string, range?: Partial<YearRange>): TickerHistory {
  const upper = ticker.toUpperCase();
  const holdings = store.getHoldings(upper, range);
  return {
    ticker: upper,
    holdings,
    summaries: summarize(holdings, { ticker: upper, startYear: range?.startYear, endYear: range?.endYear }),
  };
}

export function getInstitutionActivity(store: HoldingsStore, roster: Roster): InstitutionActivity[] {
  return analyzeInstitutions(roster.institutions, store.getFilingIndex());
}
