/**
 * Core data model for holdings-history.
 *
 * Design principles:
 * - FilingIndexEntry and Holding are immutable value records
 * - YearlySummary is derived from the Holding set, never stored as truth
 * - Every Holding carries the filing it came from
 */

export interface Institution {
  readonly cik: string;
  readonly name: string;
}

export interface TrackedSecurity {
  readonly ticker: string;
  readonly cusip: string;
  /** Company-name fragments matched against free-text issuer names */
  readonly aliases: readonly string[];
}

export interface Roster {
  readonly securities: readonly TrackedSecurity[];
  readonly institutions: readonly Institution[];
}

export interface YearRange {
  startYear: number;
  endYear: number;
}

export type Quarter = 1 | 2 | 3 | 4;

export interface FilingIndexEntry {
  readonly cik: string;
  readonly accessionNumber: string;
  readonly filingDate: string;
  readonly formType: string;
  readonly filingYear: number;
  readonly filingQuarter: Quarter;
}

/** Which document a holding was extracted from */
export type ExtractionSource = 'info_table' | 'primary_doc' | 'full_text';

/** Parser output before numeric coercion and identifier resolution */
export interface RawHolding {
  readonly securityName: string;
  readonly cusip: string;
  readonly shares: string;
  readonly value: string;
  readonly source: ExtractionSource;
  /** Ticker the full-text scan matched on; structured parsers leave it unset */
  readonly matchedTicker?: string;
}

export interface FilingContext {
  readonly cik: string;
  readonly institutionName: string;
  readonly accessionNumber: string;
  readonly filingDate: string;
  readonly filingYear: number;
  readonly filingQuarter: Quarter;
}

export interface HoldingProvenance extends FilingContext {
  readonly source: ExtractionSource;
  /** 'low' for full-text scans, whose value unit is ambiguous */
  readonly confidence: 'high' | 'low';
}

export interface Holding {
  readonly securityName: string;
  readonly cusip: string;
  readonly ticker: string | null;
  readonly shares: number;
  readonly marketValue: number;
  /** False when `shares` is a defaulted zero rather than a parsed value */
  readonly sharesParsed: boolean;
  readonly valueParsed: boolean;
  readonly provenance: HoldingProvenance;
}

export interface YearlySummary {
  year: number;
  ticker: string;
  totalFilings: number;
  activeInstitutions: number;
  avgFilingsPerInstitution: number;
  mostActiveInstitution: string;
  quartersWithActivity: number;
  totalShares: number;
  totalMarketValue: number;
  avgHoldingSize: number;
  largestHolder: string;
  largestHoldingShares: number;
  concentrationTop3: number;
}

export type FilingConsistency = 'High' | 'Medium' | 'Low';

export interface InstitutionActivity {
  cik: string;
  name: string;
  totalFilings: number;
  yearsActive: number;
  avgFilingsPerYear: number;
  firstFilingDate: string;
  lastFilingDate: string;
  consistency: FilingConsistency;
}

/** Shape of the SEC submissions API filing columns */
export interface SubmissionFilingColumns {
  accessionNumber: string[];
  filingDate: string[];
  form: string[];
}

/** Shape of the SEC submissions API response */
export interface InstitutionSubmissions {
  cik: string;
  name: string;
  filings: {
    recent: SubmissionFilingColumns;
    files: Array<{ name: string; filingCount?: number }>;
  };
}
