/**
 * Historical aggregator: folds normalized holdings into per-year summaries
 * for one ticker, and filing indexes into per-institution activity.
 *
 * Filing-activity figures count every distinct filing in the year.
 * Position figures use one filing per institution per year: the most
 * recent one. Older filings from the same year are discarded, not averaged.
 */

import type {
  FilingConsistency,
  FilingIndexEntry,
  Holding,
  Institution,
  InstitutionActivity,
  YearlySummary,
} from '../core/types.js';

export interface SummaryOptions {
  ticker: string;
  startYear?: number;
  endYear?: number;
}

interface InstitutionPosition {
  name: string;
  accessionNumber: string;
  shares: number;
  marketValue: number;
}

interface FilingRef {
  cik: string;
  name: string;
  quarter: number;
}

/**
 * One summary per year that has holdings for `ticker`, newest year first.
 */
export function summarize(holdings: readonly Holding[], options: SummaryOptions): YearlySummary[] {
  const ticker = options.ticker.toUpperCase();
  const startYear = options.startYear ?? Number.NEGATIVE_INFINITY;
  const endYear = options.endYear ?? Number.POSITIVE_INFINITY;

  const relevant = holdings
    .filter(h => h.ticker === ticker)
    .filter(h => h.provenance.filingYear >= startYear && h.provenance.filingYear <= endYear)
    .slice()
    .sort((a, b) => b.provenance.filingDate.localeCompare(a.provenance.filingDate));

  const byYear = new Map<number, Holding[]>();
  for (const h of relevant) {
    const list = byYear.get(h.provenance.filingYear);
    if (list) list.push(h);
    else byYear.set(h.provenance.filingYear, [h]);
  }

  const years = Array.from(byYear.keys()).sort((a, b) => b - a);
  return years.map(year => summarizeYear(year, ticker, byYear.get(year) ?? []));
}

function summarizeYear(year: number, ticker: string, holdings: Holding[]): YearlySummary {
  // Distinct filings, in date-descending order of first appearance
  const filings = new Map<string, FilingRef>();
  for (const h of holdings) {
    const p = h.provenance;
    if (!filings.has(p.accessionNumber)) {
      filings.set(p.accessionNumber, { cik: p.cik, name: p.institutionName || p.cik, quarter: p.filingQuarter });
    }
  }

  const filingCounts = new Map<string, { name: string; count: number }>();
  for (const filing of filings.values()) {
    const entry = filingCounts.get(filing.cik);
    if (entry) entry.count++;
    else filingCounts.set(filing.cik, { name: filing.name, count: 1 });
  }

  let mostActive = '';
  let mostActiveCount = 0;
  for (const { name, count } of filingCounts.values()) {
    if (count > mostActiveCount) {
      mostActive = name;
      mostActiveCount = count;
    }
  }

  const quarters = new Set(Array.from(filings.values()).map(f => f.quarter));

  // Latest filing per institution; all of its lines for the ticker are summed
  const positions = new Map<string, InstitutionPosition>();
  for (const h of holdings) {
    const p = h.provenance;
    const position = positions.get(p.cik);
    if (!position) {
      positions.set(p.cik, {
        name: p.institutionName || p.cik,
        accessionNumber: p.accessionNumber,
        shares: h.shares,
        marketValue: h.marketValue,
      });
    } else if (position.accessionNumber === p.accessionNumber) {
      position.shares += h.shares;
      position.marketValue += h.marketValue;
    }
  }

  const ranked = Array.from(positions.values()).sort((a, b) => b.shares - a.shares);
  const totalShares = ranked.reduce((sum, p) => sum + p.shares, 0);
  const totalMarketValue = ranked.reduce((sum, p) => sum + p.marketValue, 0);
  const top3Shares = ranked.slice(0, 3).reduce((sum, p) => sum + p.shares, 0);
  const largest = ranked.length > 0 ? ranked[0] : null;

  const activeInstitutions = filingCounts.size;

  return {
    year,
    ticker,
    totalFilings: filings.size,
    activeInstitutions,
    avgFilingsPerInstitution: activeInstitutions > 0 ? filings.size / activeInstitutions : 0,
    mostActiveInstitution: mostActive,
    quartersWithActivity: quarters.size,
    totalShares,
    totalMarketValue,
    avgHoldingSize: ranked.length > 0 ? totalShares / ranked.length : 0,
    largestHolder: largest?.name ?? '',
    largestHoldingShares: largest?.shares ?? 0,
    concentrationTop3: concentration(top3Shares, totalShares),
  };
}

/** Percentage of `total` held by `part`; 0 when there is nothing held */
export function concentration(part: number, total: number): number {
  if (!(total > 0)) return 0;
  return (part / total) * 100;
}

export function classifyConsistency(avgFilingsPerYear: number): FilingConsistency {
  if (avgFilingsPerYear >= 4) return 'High';
  if (avgFilingsPerYear >= 2) return 'Medium';
  return 'Low';
}

/**
 * Filing cadence per institution, in roster order. Institutions without
 * any filing in `entries` are left out.
 */
export function analyzeInstitutions(
  institutions: readonly Institution[],
  entries: readonly FilingIndexEntry[]
): InstitutionActivity[] {
  const byCik = new Map<string, FilingIndexEntry[]>();
  for (const entry of entries) {
    const key = entry.cik.padStart(10, '0');
    const list = byCik.get(key);
    if (list) list.push(entry);
    else byCik.set(key, [entry]);
  }

  const results: InstitutionActivity[] = [];
  for (const institution of institutions) {
    const filings = byCik.get(institution.cik.padStart(10, '0'));
    if (!filings || filings.length === 0) continue;

    const dates = filings.map(f => f.filingDate).sort();
    const yearsActive = new Set(filings.map(f => f.filingYear)).size;
    const avgFilingsPerYear = filings.length / yearsActive;

    results.push({
      cik: institution.cik,
      name: institution.name,
      totalFilings: filings.length,
      yearsActive,
      avgFilingsPerYear,
      firstFilingDate: dates[0],
      lastFilingDate: dates[dates.length - 1],
      consistency: classifyConsistency(avgFilingsPerYear),
    });
  }

  return results;
}
