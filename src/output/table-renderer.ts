/**
 * Renders yearly summaries and filing activity as formatted terminal tables.
 */

import chalk from 'chalk';
import type { FilingIndexEntry, InstitutionActivity, YearlySummary } from '../core/types.js';
import type { InstitutionRunResult } from '../processing/pipeline.js';
import { formatShares, formatValue, padLeft, padRight, truncate } from './format-utils.js';

export function renderSummaryTable(ticker: string, summaries: readonly YearlySummary[]): string {
  const lines: string[] = [];
  const header = `Institutional Holdings — ${ticker.toUpperCase()} — Yearly Summary`;
  lines.push(chalk.bold(header));
  lines.push(chalk.dim('='.repeat(header.length)));
  lines.push('');

  if (summaries.length === 0) {
    lines.push(chalk.dim('  No stored holdings for this ticker. Run `track` first.'));
    return lines.join('\n');
  }

  const cols = { year: 6, filings: 9, inst: 7, qtrs: 6, shares: 18, value: 12, top3: 8, largest: 30 };

  lines.push('  ' + chalk.underline(
    padRight('Year', cols.year) +
    padLeft('Filings', cols.filings) +
    padLeft('Inst', cols.inst) +
    padLeft('Qtrs', cols.qtrs) +
    padLeft('Shares', cols.shares) +
    padLeft('Value', cols.value) +
    padLeft('Top3', cols.top3) + '  ' +
    padRight('Largest holder', cols.largest)
  ));

  for (const s of summaries) {
    const top3 = `${s.concentrationTop3.toFixed(1)}%`;
    const top3Colored = s.concentrationTop3 >= 90 ? chalk.yellow(top3) : top3;
    lines.push('  ' +
      padRight(String(s.year), cols.year) +
      padLeft(String(s.totalFilings), cols.filings) +
      padLeft(String(s.activeInstitutions), cols.inst) +
      padLeft(String(s.quartersWithActivity), cols.qtrs) +
      padLeft(formatShares(s.totalShares), cols.shares) +
      padLeft(formatValue(s.totalMarketValue), cols.value) +
      padLeft(top3Colored, cols.top3) + '  ' +
      padRight(truncate(s.largestHolder, cols.largest), cols.largest)
    );
  }

  lines.push('');
  lines.push(chalk.dim('  -- Notes ' + '-'.repeat(50)));
  lines.push(chalk.dim('  Source:   SEC EDGAR 13F-HR filings'));
  lines.push(chalk.dim('  Shares:   latest filing per institution per year'));
  lines.push(chalk.dim('  Top3:     share of the year\'s total held by the three largest holders'));

  return lines.join('\n');
}

export function renderFilingsTable(cik: string, entries: readonly FilingIndexEntry[]): string {
  const lines: string[] = [];
  const header = `13F-HR Filings — CIK ${cik.padStart(10, '0')}`;
  lines.push(chalk.bold(header));
  lines.push(chalk.dim('='.repeat(header.length)));
  lines.push('');

  if (entries.length === 0) {
    lines.push(chalk.dim('  No holdings reports in this period.'));
    return lines.join('\n');
  }

  lines.push('  ' + chalk.underline(padRight('Filed', 12) + padRight('Quarter', 10) + padRight('Accession', 24)));
  for (const e of entries) {
    lines.push('  ' +
      padRight(e.filingDate, 12) +
      padRight(`Q${e.filingQuarter} ${e.filingYear}`, 10) +
      padRight(e.accessionNumber, 24)
    );
  }
  lines.push('');
  lines.push(chalk.dim(`  ${entries.length} filing(s)`));

  return lines.join('\n');
}

export function renderInstitutionsTable(activity: readonly InstitutionActivity[]): string {
  const lines: string[] = [];
  lines.push(chalk.bold('Institution Filing Activity'));
  lines.push('');

  if (activity.length === 0) {
    lines.push(chalk.dim('  No filing index stored. Run `track` first.'));
    return lines.join('\n');
  }

  lines.push('  ' + chalk.underline(
    padRight('Institution', 34) + padLeft('Filings', 8) + padLeft('Years', 7) +
    padLeft('Per yr', 8) + '  ' + padRight('First', 12) + padRight('Last', 12) + 'Consistency'
  ));

  for (const a of activity) {
    const consistency = a.consistency === 'High' ? chalk.green(a.consistency)
      : a.consistency === 'Medium' ? chalk.yellow(a.consistency)
      : chalk.red(a.consistency);
    lines.push('  ' +
      padRight(truncate(a.name, 32), 34) +
      padLeft(String(a.totalFilings), 8) +
      padLeft(String(a.yearsActive), 7) +
      padLeft(a.avgFilingsPerYear.toFixed(1), 8) + '  ' +
      padRight(a.firstFilingDate, 12) +
      padRight(a.lastFilingDate, 12) +
      consistency
    );
  }

  return lines.join('\n');
}

export function renderRunReport(results: readonly InstitutionRunResult[], interrupted: boolean): string {
  const lines: string[] = [];
  for (const r of results) {
    const status = r.error ? chalk.red('failed')
      : r.filingsFailed > 0 ? chalk.yellow(`${r.filingsFailed} unreachable, rerun to retry`)
      : r.misses > 0 ? chalk.yellow(`${r.misses} miss(es)`)
      : chalk.green('ok');
    lines.push(
      `  ${padRight(truncate(r.institution.name, 32), 34)}` +
      `${padLeft(String(r.filingsProcessed), 5)} parsed` +
      `${padLeft(String(r.filingsSkipped), 5)} cached` +
      `${padLeft(String(r.holdings), 6)} holdings  ${status}`
    );
    if (r.error) lines.push(chalk.dim(`    ${r.error}`));
  }
  if (interrupted) {
    lines.push('');
    lines.push(chalk.yellow('  Interrupted. Filings processed so far are saved; rerun to continue.'));
  }
  return lines.join('\n');
}
