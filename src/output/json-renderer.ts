import type { Holding, InstitutionActivity, YearlySummary } from '../core/types.js';

/**
 * Structured JSON shapes, shared by the CLI's --json output and the read API.
 */

export function serializeHolding(h: Holding) {
  return {
    ticker: h.ticker,
    cusip: h.cusip,
    security_name: h.securityName,
    shares: h.shares,
    market_value: h.marketValue,
    shares_parsed: h.sharesParsed,
    value_parsed: h.valueParsed,
    provenance: {
      institution_cik: h.provenance.cik,
      institution_name: h.provenance.institutionName,
      accession_number: h.provenance.accessionNumber,
      filing_date: h.provenance.filingDate,
      filing_year: h.provenance.filingYear,
      filing_quarter: h.provenance.filingQuarter,
      source: h.provenance.source,
      confidence: h.provenance.confidence,
    },
  };
}

export function serializeSummary(s: YearlySummary) {
  return {
    year: s.year,
    ticker: s.ticker,
    total_filings: s.totalFilings,
    active_institutions: s.activeInstitutions,
    avg_filings_per_institution: s.avgFilingsPerInstitution,
    most_active_institution: s.mostActiveInstitution,
    quarters_with_activity: s.quartersWithActivity,
    total_shares: s.totalShares,
    total_market_value: s.totalMarketValue,
    avg_holding_size: s.avgHoldingSize,
    largest_holder: s.largestHolder,
    largest_holding_shares: s.largestHoldingShares,
    concentration_top3: s.concentrationTop3,
  };
}

export function serializeInstitution(a: InstitutionActivity) {
  return {
    institution_cik: a.cik,
    institution_name: a.name,
    total_filings: a.totalFilings,
    years_active: a.yearsActive,
    avg_filings_per_year: a.avgFilingsPerYear,
    first_filing_date: a.firstFilingDate,
    last_filing_date: a.lastFilingDate,
    filing_consistency: a.consistency,
  };
}

export function renderJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
