/**
 * Renders holdings, yearly summaries and institution activity as CSV for
 * downstream reporting and spreadsheet import.
 */

import type { Holding, InstitutionActivity, YearlySummary } from '../core/types.js';
import { csvEscape } from './format-utils.js';

export const HOLDINGS_COLUMNS = [
  'filing_date',
  'filing_year',
  'filing_quarter',
  'institution_name',
  'institution_cik',
  'accession_number',
  'ticker',
  'cusip',
  'security_name',
  'shares',
  'market_value',
  'shares_parsed',
  'value_parsed',
  'source',
  'confidence',
] as const;

export const SUMMARY_COLUMNS = [
  'year',
  'ticker',
  'total_filings',
  'active_institutions',
  'avg_filings_per_institution',
  'most_active_institution',
  'quarters_with_activity',
  'total_institutional_shares',
  'total_market_value',
  'avg_holding_size',
  'largest_holder',
  'largest_holding_shares',
  'concentration_top3',
] as const;

export const INSTITUTION_COLUMNS = [
  'institution_name',
  'institution_cik',
  'total_filings',
  'years_active',
  'avg_filings_per_year',
  'first_filing_date',
  'last_filing_date',
  'filing_consistency',
] as const;

function row(values: Array<string | number | boolean>): string {
  return values.map(v => csvEscape(String(v))).join(',');
}

function round(n: number, digits: number): number {
  const f = Math.pow(10, digits);
  return Math.round(n * f) / f;
}

export function renderHoldingsCsv(holdings: readonly Holding[]): string {
  const lines = [HOLDINGS_COLUMNS.join(',')];
  for (const h of holdings) {
    const p = h.provenance;
    lines.push(row([
      p.filingDate,
      p.filingYear,
      p.filingQuarter,
      p.institutionName,
      p.cik,
      p.accessionNumber,
      h.ticker ?? '',
      h.cusip,
      h.securityName,
      h.shares,
      h.marketValue,
      h.sharesParsed,
      h.valueParsed,
      p.source,
      p.confidence,
    ]));
  }
  return lines.join('\n');
}

export function renderSummaryCsv(summaries: readonly YearlySummary[]): string {
  const lines = [SUMMARY_COLUMNS.join(',')];
  for (const s of summaries) {
    lines.push(row([
      s.year,
      s.ticker,
      s.totalFilings,
      s.activeInstitutions,
      round(s.avgFilingsPerInstitution, 2),
      s.mostActiveInstitution,
      s.quartersWithActivity,
      s.totalShares,
      s.totalMarketValue,
      round(s.avgHoldingSize, 2),
      s.largestHolder,
      s.largestHoldingShares,
      round(s.concentrationTop3, 2),
    ]));
  }
  return lines.join('\n');
}

export function renderInstitutionsCsv(activity: readonly InstitutionActivity[]): string {
  const lines = [INSTITUTION_COLUMNS.join(',')];
  for (const a of activity) {
    lines.push(row([
      a.name,
      a.cik,
      a.totalFilings,
      a.yearsActive,
      round(a.avgFilingsPerYear, 2),
      a.firstFilingDate,
      a.lastFilingDate,
      a.consistency,
    ]));
  }
  return lines.join('\n');
}
