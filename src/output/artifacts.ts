import { mkdirSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import type { HoldingsStore } from '../core/holdings-store.js';
import { getInstitutionActivity, getTickerHistory } from '../core/query-engine.js';
import type { Roster, YearRange } from '../core/types.js';
import { renderHoldingsCsv, renderInstitutionsCsv, renderSummaryCsv } from './csv-renderer.js';

/**
 * Writes {TICKER}_historical_holdings.csv, {TICKER}_yearly_summary.csv and
 * institution_activity.csv into `outDir`, creating it if needed. Returns the
 * paths written.
 */
export function writeArtifacts(
  store: HoldingsStore,
  roster: Roster,
  ticker: string,
  outDir: string,
  range?: Partial<YearRange>
): string[] {
  const dir = resolve(outDir);
  mkdirSync(dir, { recursive: true });

  const history = getTickerHistory(store, ticker, range);
  const holdingsFile = join(dir, `${history.ticker}_historical_holdings.csv`);
  const summaryFile = join(dir, `${history.ticker}_yearly_summary.csv`);
  const institutionsFile = join(dir, 'institution_activity.csv');

  writeFileSync(holdingsFile, renderHoldingsCsv(history.holdings) + '\n');
  writeFileSync(summaryFile, renderSummaryCsv(history.summaries) + '\n');
  writeFileSync(institutionsFile, renderInstitutionsCsv(getInstitutionActivity(store, roster)) + '\n');

  return [holdingsFile, summaryFile, institutionsFile];
}
