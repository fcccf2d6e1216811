/**
 * Filing index crawler.
 *
 * An institution's submissions document holds a "recent" filing list inline
 * plus references to any number of archived index shards with older
 * filings. All of them are read, filtered to 13F-HR holdings reports in the
 * requested years, and merged newest first.
 *
 * A shard that cannot be fetched is logged and skipped; the rest of the
 * index is still returned.
 */

import type { ArchiveClient } from '../core/sec-client.js';
import type {
  FilingIndexEntry,
  InstitutionSubmissions,
  Quarter,
  SubmissionFilingColumns,
  YearRange,
} from '../core/types.js';
import { logger as defaultLogger, type Logger } from '../core/logger.js';

export const HOLDINGS_REPORT_FORM = '13F-HR';

export interface CrawlerDeps {
  client: ArchiveClient;
  logger?: Logger;
}

/** Calendar quarter of a YYYY-MM-DD date */
export function filingQuarter(filingDate: string): Quarter {
  const month = parseInt(filingDate.slice(5, 7), 10);
  if (!(month >= 1 && month <= 12)) {
    throw new RangeError(`Invalid filing date: ${filingDate}`);
  }
  const quarters: readonly Quarter[] = [1, 2, 3, 4];
  return quarters[Math.floor((month - 1) / 3)];
}

/**
 * Holdings-report entries from one filing column set (the recent list or a
 * shard). Rows with an unreadable date are dropped.
 */
export function toFilingIndexEntries(
  cik: string,
  columns: SubmissionFilingColumns,
  range: YearRange
): FilingIndexEntry[] {
  const entries: FilingIndexEntry[] = [];
  const { form, accessionNumber, filingDate } = columns;

  for (let i = 0; i < form.length; i++) {
    if (form[i] !== HOLDINGS_REPORT_FORM) continue;

    const date = filingDate[i];
    const accession = accessionNumber[i];
    if (!date || !accession || !/^\d{4}-\d{2}-\d{2}$/.test(date)) continue;

    const year = parseInt(date.slice(0, 4), 10);
    if (year < range.startYear || year > range.endYear) continue;

    let quarter: Quarter;
    try {
      quarter = filingQuarter(date);
    } catch {
      continue;
    }

    entries.push({
      cik,
      accessionNumber: accession,
      filingDate: date,
      formType: form[i],
      filingYear: year,
      filingQuarter: quarter,
    });
  }

  return entries;
}

/**
 * All 13F-HR filings for an institution within `range`, newest first.
 */
export async function listHoldingsFilings(
  deps: CrawlerDeps,
  cik: string,
  range: YearRange
): Promise<FilingIndexEntry[]> {
  const log = deps.logger ?? defaultLogger;
  const paddedCik = cik.padStart(10, '0');

  let submissions: InstitutionSubmissions;
  try {
    submissions = await deps.client.getSubmissions(paddedCik);
  } catch (err) {
    log.warn({ cik: paddedCik, err: err instanceof Error ? err.message : String(err) }, 'could not fetch filing index');
    return [];
  }

  const entries = toFilingIndexEntries(paddedCik, submissions.filings.recent, range);

  for (const shard of submissions.filings.files) {
    try {
      const columns = await deps.client.getSubmissionsShard(shard.name);
      entries.push(...toFilingIndexEntries(paddedCik, columns, range));
    } catch (err) {
      log.warn(
        { cik: paddedCik, shard: shard.name, err: err instanceof Error ? err.message : String(err) },
        'skipping filing index shard'
      );
    }
  }

  const seen = new Set<string>();
  const unique = entries.filter(entry => {
    if (seen.has(entry.accessionNumber)) return false;
    seen.add(entry.accessionNumber);
    return true;
  });

  unique.sort((a, b) => b.filingDate.localeCompare(a.filingDate));
  return unique;
}
