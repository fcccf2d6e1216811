import type Database from 'better-sqlite3';
import type {
  ExtractionSource,
  FilingContext,
  FilingIndexEntry,
  Holding,
  Quarter,
  YearRange,
} from './types.js';

/**
 * SQLite store for normalized holdings.
 *
 * Each filing is committed in one transaction together with a marker per
 * target ticker, so a run stopped between filings leaves only complete
 * filings behind and a rerun picks up where it stopped. The Holding rows
 * are the source of truth; summaries are always recomputed from them.
 */

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS filing_index (
    accession_number TEXT PRIMARY KEY,
    cik TEXT NOT NULL,
    filing_date TEXT NOT NULL,
    form_type TEXT NOT NULL,
    filing_year INTEGER NOT NULL,
    filing_quarter INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_filing_index_cik ON filing_index (cik);

  CREATE TABLE IF NOT EXISTS holdings (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    ticker TEXT NOT NULL,
    security_name TEXT NOT NULL,
    cusip TEXT NOT NULL,
    shares REAL NOT NULL,
    market_value REAL NOT NULL,
    shares_parsed INTEGER NOT NULL,
    value_parsed INTEGER NOT NULL,
    cik TEXT NOT NULL,
    institution_name TEXT NOT NULL,
    accession_number TEXT NOT NULL,
    filing_date TEXT NOT NULL,
    filing_year INTEGER NOT NULL,
    filing_quarter INTEGER NOT NULL,
    source TEXT NOT NULL,
    confidence TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_holdings_ticker ON holdings (ticker, filing_date);
  CREATE INDEX IF NOT EXISTS idx_holdings_accession ON holdings (accession_number, ticker);

  CREATE TABLE IF NOT EXISTS processed_filings (
    accession_number TEXT NOT NULL,
    ticker TEXT NOT NULL,
    cik TEXT NOT NULL,
    strategy TEXT,
    holdings_count INTEGER NOT NULL,
    processed_at TEXT NOT NULL,
    PRIMARY KEY (accession_number, ticker)
  );
`;

interface HoldingRow {
  ticker: string;
  security_name: string;
  cusip: string;
  shares: number;
  market_value: number;
  shares_parsed: number;
  value_parsed: number;
  cik: string;
  institution_name: string;
  accession_number: string;
  filing_date: string;
  filing_year: number;
  filing_quarter: number;
  source: string;
  confidence: string;
}

interface FilingIndexRow {
  accession_number: string;
  cik: string;
  filing_date: string;
  form_type: string;
  filing_year: number;
  filing_quarter: number;
}

export interface StoreStats {
  filings: number;
  holdings: number;
  processedFilings: number;
  tickers: string[];
}

const SOURCES: readonly ExtractionSource[] = ['info_table', 'primary_doc', 'full_text'];
const QUARTERS: readonly Quarter[] = [1, 2, 3, 4];

export class HoldingsStore {
  constructor(private readonly db: Database.Database) {
    db.exec(SCHEMA);
  }

  saveFilingIndex(entries: readonly FilingIndexEntry[]): void {
    const insert = this.db.prepare(`
      INSERT OR REPLACE INTO filing_index (accession_number, cik, filing_date, form_type, filing_year, filing_quarter)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
    const tx = this.db.transaction((rows: readonly FilingIndexEntry[]) => {
      for (const e of rows) {
        insert.run(e.accessionNumber, e.cik, e.filingDate, e.formType, e.filingYear, e.filingQuarter);
      }
    });
    tx(entries);
  }

  getFilingIndex(cik?: string): FilingIndexEntry[] {
    const rows = (cik
      ? this.db.prepare('SELECT * FROM filing_index WHERE cik = ? ORDER BY filing_date DESC').all(cik.padStart(10, '0'))
      : this.db.prepare('SELECT * FROM filing_index ORDER BY filing_date DESC').all()) as FilingIndexRow[];

    return rows.map(r => ({
      cik: r.cik,
      accessionNumber: r.accession_number,
      filingDate: r.filing_date,
      formType: r.form_type,
      filingYear: r.filing_year,
      filingQuarter: toQuarter(r.filing_quarter),
    }));
  }

  /** True when the filing was already processed for every one of `tickers` */
  isProcessed(accessionNumber: string, tickers: readonly string[]): boolean {
    if (tickers.length === 0) return false;
    const stmt = this.db.prepare(
      'SELECT 1 FROM processed_filings WHERE accession_number = ? AND ticker = ?'
    );
    return tickers.every(t => stmt.get(accessionNumber, t.toUpperCase()) !== undefined);
  }

  /**
   * Replace the stored holdings of one filing for `tickers` and mark it
   * processed, atomically.
   */
  recordFiling(
    filing: FilingContext,
    tickers: readonly string[],
    holdings: readonly Holding[],
    strategy: ExtractionSource | null
  ): void {
    const upper = tickers.map(t => t.toUpperCase());
    const deleteHoldings = this.db.prepare('DELETE FROM holdings WHERE accession_number = ? AND ticker = ?');
    const insertHolding = this.db.prepare(`
      INSERT INTO holdings (
        ticker, security_name, cusip, shares, market_value, shares_parsed, value_parsed,
        cik, institution_name, accession_number, filing_date, filing_year, filing_quarter,
        source, confidence
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const markProcessed = this.db.prepare(`
      INSERT OR REPLACE INTO processed_filings (accession_number, ticker, cik, strategy, holdings_count, processed_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    const tx = this.db.transaction(() => {
      const now = new Date().toISOString();
      for (const ticker of upper) {
        deleteHoldings.run(filing.accessionNumber, ticker);
        const forTicker = holdings.filter(h => h.ticker === ticker);
        for (const h of forTicker) {
          const p = h.provenance;
          insertHolding.run(
            ticker, h.securityName, h.cusip, h.shares, h.marketValue,
            h.sharesParsed ? 1 : 0, h.valueParsed ? 1 : 0,
            p.cik, p.institutionName, p.accessionNumber, p.filingDate, p.filingYear, p.filingQuarter,
            p.source, p.confidence
          );
        }
        markProcessed.run(filing.accessionNumber, ticker, filing.cik, strategy, forTicker.length, now);
      }
    });
    tx();
  }

  /** Stored holdings for a ticker, newest filing first */
  getHoldings(ticker: string, range?: Partial<YearRange>): Holding[] {
    const rows = this.db.prepare(`
      SELECT * FROM holdings
      WHERE ticker = ? AND filing_year >= ? AND filing_year <= ?
      ORDER BY filing_date DESC, cik, id
    `).all(
      ticker.toUpperCase(),
      range?.startYear ?? 0,
      range?.endYear ?? 9999
    ) as HoldingRow[];

    return rows.map(rowToHolding);
  }

  /** Forget everything stored for a ticker so the next run starts over */
  clearTicker(ticker: string): void {
    const upper = ticker.toUpperCase();
    const tx = this.db.transaction(() => {
      this.db.prepare('DELETE FROM holdings WHERE ticker = ?').run(upper);
      this.db.prepare('DELETE FROM processed_filings WHERE ticker = ?').run(upper);
    });
    tx();
  }

  stats(): StoreStats {
    const count = (sql: string): number => (this.db.prepare(sql).get() as { count: number }).count;
    const tickers = (this.db.prepare('SELECT DISTINCT ticker FROM processed_filings ORDER BY ticker').all() as Array<{ ticker: string }>)
      .map(r => r.ticker);

    return {
      filings: count('SELECT COUNT(*) as count FROM filing_index'),
      holdings: count('SELECT COUNT(*) as count FROM holdings'),
      processedFilings: count('SELECT COUNT(DISTINCT accession_number) as count FROM processed_filings'),
      tickers,
    };
  }
}

function rowToHolding(r: HoldingRow): Holding {
  return {
    securityName: r.security_name,
    cusip: r.cusip,
    ticker: r.ticker,
    shares: r.shares,
    marketValue: r.market_value,
    sharesParsed: r.shares_parsed === 1,
    valueParsed: r.value_parsed === 1,
    provenance: {
      cik: r.cik,
      institutionName: r.institution_name,
      accessionNumber: r.accession_number,
      filingDate: r.filing_date,
      filingYear: r.filing_year,
      filingQuarter: toQuarter(r.filing_quarter),
      source: toSource(r.source),
      confidence: r.confidence === 'low' ? 'low' : 'high',
    },
  };
}

function toQuarter(value: number): Quarter {
  return QUARTERS.find(q => q === value) ?? 1;
}

function toSource(value: string): ExtractionSource {
  return SOURCES.find(s => s === value) ?? 'full_text';
}
