/**
 * Document resolver and parser cascade.
 *
 * A filing's holdings live in different places depending on its age:
 * 1. a dedicated information-table XML document (modern filings)
 * 2. the primary document, with the table embedded
 * 3. nowhere machine-readable, only the combined submission text
 *
 * Strategies are tried in order and the first one that yields at least one
 * holding wins. A strategy that fails (HTTP error, unreadable markup) counts
 * as empty. Exhausting the list returns an empty result, never an error.
 */

import type { ArchiveClient } from '../core/sec-client.js';
import type { IdentifierResolver } from '../core/resolver.js';
import type { ExtractionSource, RawHolding } from '../core/types.js';
import { logger as defaultLogger, type Logger } from '../core/logger.js';
import { NotFoundError } from '../core/errors.js';
import { parseInfoTable } from './info-table-parser.js';
import { parseFullText } from './full-text-parser.js';

export interface ExtractionContext {
  cik: string;
  accessionNumber: string;
  targetTickers: readonly string[];
  client: ArchiveClient;
  resolver: IdentifierResolver;
}

export interface ExtractionStrategy {
  readonly name: ExtractionSource;
  attempt(ctx: ExtractionContext): Promise<RawHolding[]>;
}

/** Information table file names seen in the archive, most common first */
export const INFO_TABLE_DOCUMENTS = ['infotable.xml', 'form13fInfoTable.xml'];
export const PRIMARY_DOCUMENT = 'primary_doc.xml';

export const infoTableStrategy: ExtractionStrategy = {
  name: 'info_table',
  async attempt(ctx) {
    for (const filename of INFO_TABLE_DOCUMENTS) {
      let xml: string;
      try {
        xml = await ctx.client.getFilingDocument(ctx.cik, ctx.accessionNumber, filename);
      } catch (err) {
        if (err instanceof NotFoundError) continue;
        throw err;
      }
      return parseInfoTable(xml, ctx, 'info_table');
    }
    return [];
  },
};

export const primaryDocStrategy: ExtractionStrategy = {
  name: 'primary_doc',
  async attempt(ctx) {
    const xml = await ctx.client.getFilingDocument(ctx.cik, ctx.accessionNumber, PRIMARY_DOCUMENT);
    return parseInfoTable(xml, ctx, 'primary_doc');
  },
};

export const fullTextStrategy: ExtractionStrategy = {
  name: 'full_text',
  async attempt(ctx) {
    const targets = ctx.targetTickers.length > 0 ? ctx.targetTickers : ctx.resolver.tickers;
    const text = await ctx.client.getFilingDocument(ctx.cik, ctx.accessionNumber, `${ctx.accessionNumber}.txt`);
    return parseFullText(text, targets, ctx.resolver);
  },
};

export const DEFAULT_STRATEGIES: readonly ExtractionStrategy[] = [
  infoTableStrategy,
  primaryDocStrategy,
  fullTextStrategy,
];

export interface StrategyAttempt {
  strategy: ExtractionSource;
  outcome: 'hit' | 'empty' | 'error';
  error?: string;
}

export interface CascadeResult {
  holdings: RawHolding[];
  /** Strategy that produced the holdings, null when every one came up empty */
  strategy: ExtractionSource | null;
  attempts: StrategyAttempt[];
}

export interface CascadeDeps {
  client: ArchiveClient;
  resolver: IdentifierResolver;
  strategies?: readonly ExtractionStrategy[];
  logger?: Logger;
}

export async function runCascade(
  deps: CascadeDeps,
  cik: string,
  accessionNumber: string,
  targetTickers: readonly string[]
): Promise<CascadeResult> {
  const log = deps.logger ?? defaultLogger;
  const strategies = deps.strategies ?? DEFAULT_STRATEGIES;
  const ctx: ExtractionContext = {
    cik,
    accessionNumber,
    targetTickers,
    client: deps.client,
    resolver: deps.resolver,
  };
  const attempts: StrategyAttempt[] = [];

  for (const strategy of strategies) {
    let holdings: RawHolding[];
    try {
      holdings = await strategy.attempt(ctx);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.debug({ cik, accessionNumber, strategy: strategy.name, err: message }, 'extraction strategy failed');
      attempts.push({ strategy: strategy.name, outcome: 'error', error: message });
      continue;
    }

    if (holdings.length > 0) {
      attempts.push({ strategy: strategy.name, outcome: 'hit' });
      return { holdings, strategy: strategy.name, attempts };
    }
    attempts.push({ strategy: strategy.name, outcome: 'empty' });
  }

  log.info({ cik, accessionNumber, attempts: attempts.map(a => `${a.strategy}:${a.outcome}`) }, 'no holdings extracted from filing');
  return { holdings: [], strategy: null, attempts };
}

/**
 * Raw holdings for one filing, from the first strategy that finds any.
 */
export async function extractHoldings(
  deps: CascadeDeps,
  cik: string,
  accessionNumber: string,
  targetTickers: readonly string[]
): Promise<RawHolding[]> {
  const result = await runCascade(deps, cik, accessionNumber, targetTickers);
  return result.holdings;
}
