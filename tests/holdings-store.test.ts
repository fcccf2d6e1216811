import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { HoldingsStore } from '../src/core/holdings-store.js';
import type { FilingContext } from '../src/core/types.js';
import { makeEntry, makeHolding } from './helpers/fake-archive.js';

function contextOf(cik: string, accession: string, date: string): FilingContext {
  const h = makeHolding({ cik, accession, date, shares: 0 });
  const { source: _source, confidence: _confidence, ...context } = h.provenance;
  return context;
}

describe('HoldingsStore', () => {
  let db: Database.Database;
  let store: HoldingsStore;

  beforeEach(() => {
    db = new Database(':memory:');
    store = new HoldingsStore(db);
  });

  afterEach(() => {
    db.close();
  });

  it('round-trips holdings with their provenance', () => {
    const holding = makeHolding({ cik: '0000000001', name: 'Alpha Capital', accession: 'A-1', date: '2021-11-15', shares: 1200, value: 56000 });
    store.recordFiling(contextOf('0000000001', 'A-1', '2021-11-15'), ['NVDA'], [holding], 'info_table');

    expect(store.getHoldings('nvda')).toEqual([holding]);
  });

  it('keeps unparsed flags and low confidence', () => {
    const base = makeHolding({ cik: '0000000001', accession: 'A-1', date: '2003-05-15', shares: 0 });
    const holding = {
      ...base,
      sharesParsed: false,
      provenance: { ...base.provenance, source: 'full_text' as const, confidence: 'low' as const },
    };
    store.recordFiling(contextOf('0000000001', 'A-1', '2003-05-15'), ['NVDA'], [holding], 'full_text');

    const [stored] = store.getHoldings('NVDA');
    expect(stored.sharesParsed).toBe(false);
    expect(stored.valueParsed).toBe(true);
    expect(stored.provenance.source).toBe('full_text');
    expect(stored.provenance.confidence).toBe('low');
  });

  it('marks a filing processed for each ticker', () => {
    store.recordFiling(contextOf('0000000001', 'A-1', '2021-11-15'), ['NVDA'], [], null);

    expect(store.isProcessed('A-1', ['NVDA'])).toBe(true);
    expect(store.isProcessed('A-1', ['nvda'])).toBe(true);
    expect(store.isProcessed('A-1', ['NVDA', 'AAPL'])).toBe(false);
    expect(store.isProcessed('A-2', ['NVDA'])).toBe(false);
    expect(store.isProcessed('A-1', [])).toBe(false);
  });

  it('replaces a filing recorded twice', () => {
    const ctx = contextOf('0000000001', 'A-1', '2021-11-15');
    store.recordFiling(ctx, ['NVDA'], [makeHolding({ cik: '0000000001', accession: 'A-1', date: '2021-11-15', shares: 10 })], 'info_table');
    store.recordFiling(ctx, ['NVDA'], [makeHolding({ cik: '0000000001', accession: 'A-1', date: '2021-11-15', shares: 20 })], 'info_table');

    expect(store.getHoldings('NVDA').map(h => h.shares)).toEqual([20]);
  });

  it('stores only holdings of the recorded tickers', () => {
    const ctx = contextOf('0000000001', 'A-1', '2021-11-15');
    store.recordFiling(ctx, ['NVDA'], [
      makeHolding({ cik: '0000000001', accession: 'A-1', date: '2021-11-15', shares: 10 }),
      makeHolding({ cik: '0000000001', accession: 'A-1', date: '2021-11-15', shares: 99, ticker: 'AAPL' }),
    ], 'info_table');

    expect(store.getHoldings('AAPL')).toEqual([]);
    expect(store.isProcessed('A-1', ['AAPL'])).toBe(false);
  });

  it('returns holdings newest first within the year range', () => {
    for (const [accession, date] of [['A-1', '2019-05-15'], ['A-2', '2021-05-15'], ['A-3', '2020-05-15']]) {
      store.recordFiling(contextOf('0000000001', accession, date), ['NVDA'],
        [makeHolding({ cik: '0000000001', accession, date, shares: 1 })], 'info_table');
    }

    expect(store.getHoldings('NVDA').map(h => h.provenance.accessionNumber)).toEqual(['A-2', 'A-3', 'A-1']);
    expect(store.getHoldings('NVDA', { startYear: 2020 }).map(h => h.provenance.accessionNumber)).toEqual(['A-2', 'A-3']);
    expect(store.getHoldings('NVDA', { endYear: 2019 }).map(h => h.provenance.accessionNumber)).toEqual(['A-1']);
  });

  it('clears a ticker so it is processed again', () => {
    const ctx = contextOf('0000000001', 'A-1', '2021-11-15');
    store.recordFiling(ctx, ['NVDA'], [makeHolding({ cik: '0000000001', accession: 'A-1', date: '2021-11-15', shares: 10 })], 'info_table');
    store.clearTicker('nvda');

    expect(store.getHoldings('NVDA')).toEqual([]);
    expect(store.isProcessed('A-1', ['NVDA'])).toBe(false);
  });

  it('stores the filing index', () => {
    store.saveFilingIndex([
      makeEntry('0000000001', 'A-1', '2020-05-15'),
      makeEntry('0000000001', 'A-2', '2021-05-15'),
      makeEntry('0000000002', 'B-1', '2021-08-14'),
    ]);
    store.saveFilingIndex([makeEntry('0000000001', 'A-2', '2021-05-15')]);

    expect(store.getFilingIndex().map(e => e.accessionNumber)).toEqual(['B-1', 'A-2', 'A-1']);
    expect(store.getFilingIndex('1')).toEqual([
      makeEntry('0000000001', 'A-2', '2021-05-15'),
      makeEntry('0000000001', 'A-1', '2020-05-15'),
    ]);
  });

  it('reports stats', () => {
    store.saveFilingIndex([makeEntry('0000000001', 'A-1', '2021-05-15')]);
    store.recordFiling(contextOf('0000000001', 'A-1', '2021-05-15'), ['NVDA', 'AAPL'],
      [makeHolding({ cik: '0000000001', accession: 'A-1', date: '2021-05-15', shares: 5 })], 'info_table');

    expect(store.stats()).toEqual({ filings: 1, holdings: 1, processedFilings: 1, tickers: ['AAPL', 'NVDA'] });
  });
});
