#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, loadRoster, type AppConfig } from './core/config.js';
import { ConfigError, UnknownTickerError } from './core/errors.js';
import { closeCache, clearCache, getCacheStats, getCacheLocation } from './core/cache.js';
import {
  createRuntime,
  getInstitutionActivity,
  getTickerHistory,
  resolveYearRange,
  validateTickers,
  type Runtime,
} from './core/query-engine.js';
import { listHoldingsFilings } from './processing/filing-index.js';
import { trackHoldingsHistory } from './processing/pipeline.js';
import { renderHoldingsCsv, renderSummaryCsv } from './output/csv-renderer.js';
import { writeArtifacts } from './output/artifacts.js';
import { renderJson, serializeHolding, serializeInstitution, serializeSummary } from './output/json-renderer.js';
import {
  renderFilingsTable,
  renderInstitutionsTable,
  renderRunReport,
  renderSummaryTable,
} from './output/table-renderer.js';
import type { Roster } from './core/types.js';

interface GlobalOptions {
  roster?: string;
}

interface RangeOptions {
  since?: string;
  until?: string;
}

function fail(message: string): never {
  console.error(chalk.red(message));
  process.exit(1);
}

function parseYear(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const year = parseInt(value, 10);
  if (isNaN(year) || year < 1993 || year > 2100) fail(`${flag} must be a year, got "${value}"`);
  return year;
}

function parsePositiveInt(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const n = parseInt(value, 10);
  if (isNaN(n) || n < 1) fail(`${flag} must be a positive integer, got "${value}"`);
  return n;
}

/** Startup: configuration problems end the process here, before any work */
function bootstrap(): { config: AppConfig; roster: Roster; runtime: Runtime } {
  const globals = program.opts<GlobalOptions>();
  try {
    const config = loadConfig();
    const roster = loadRoster(globals.roster ?? config.ROSTER_PATH);
    return { config, roster, runtime: createRuntime(config, roster) };
  } catch (err) {
    if (err instanceof ConfigError) fail(`Configuration error: ${err.message}`);
    throw err;
  }
}

/** Roster only; for commands that never touch the archive */
function bootstrapOffline(): Roster {
  const globals = program.opts<GlobalOptions>();
  try {
    return loadRoster(globals.roster ?? process.env.ROSTER_PATH);
  } catch (err) {
    if (err instanceof ConfigError) fail(`Configuration error: ${err.message}`);
    throw err;
  }
}

const program = new Command();

program
  .name('holdings-history')
  .description('Quarterly institutional holdings history from SEC EDGAR 13F filings')
  .version('0.1.0')
  .option('-r, --roster <path>', 'Roster file of tracked securities and institutions');

program
  .command('track')
  .description('Crawl 13F-HR filings of the roster institutions and store holdings of the given tickers')
  .argument('<tickers...>', 'Tickers to track (must be in the roster)')
  .option('-s, --since <year>', 'First filing year (default: 20 years back)')
  .option('-u, --until <year>', 'Last filing year (default: this year)')
  .option('-i, --institutions <ciks>', 'Comma-separated CIKs (default: every roster institution)')
  .option('-l, --limit <n>', 'Newest N filings per institution')
  .option('-c, --concurrency <n>', 'Institutions processed at once', '2')
  .option('-o, --out <dir>', 'Directory for the CSV artifacts', '.')
  .option('--no-csv', 'Skip writing the CSV files')
  .option('--fresh', 'Discard stored holdings for these tickers first')
  .action(async (tickerArgs: string[], options: RangeOptions & {
    institutions?: string;
    limit?: string;
    concurrency?: string;
    out: string;
    csv: boolean;
    fresh?: boolean;
  }) => {
    const { runtime } = bootstrap();
    const controller = new AbortController();
    const onSigint = () => {
      if (controller.signal.aborted) process.exit(130);
      console.error(chalk.yellow('\nStopping after the current filing... (Ctrl+C again to quit now)'));
      controller.abort();
    };
    process.on('SIGINT', onSigint);

    try {
      const tickers = validateTickers(runtime.resolver, tickerArgs);
      const range = resolveYearRange(parseYear(options.since, '--since'), parseYear(options.until, '--until'));

      let institutions = runtime.roster.institutions;
      if (options.institutions) {
        const wanted = new Set(options.institutions.split(',').map(c => c.trim().padStart(10, '0')));
        institutions = institutions.filter(i => wanted.has(i.cik));
        if (institutions.length === 0) fail('None of the given CIKs are in the roster.');
      }

      if (options.fresh) {
        for (const t of tickers) runtime.store.clearTicker(t);
      }

      console.error(chalk.dim(
        `Tracking ${tickers.join(', ')} across ${institutions.length} institution(s), ${range.startYear}-${range.endYear}`
      ));

      const result = await trackHoldingsHistory(
        { client: runtime.client, resolver: runtime.resolver, store: runtime.store },
        {
          tickers,
          range,
          institutions,
          concurrency: parsePositiveInt(options.concurrency, '--concurrency'),
          maxFilingsPerInstitution: parsePositiveInt(options.limit, '--limit'),
          signal: controller.signal,
          onProgress: event => {
            if (event.type === 'institution_start') {
              console.error(chalk.dim(`  ${event.institution.name}: ${event.filings} filing(s)`));
            }
          },
        }
      );

      console.log('');
      console.log(renderRunReport(result.institutions, result.interrupted));
      console.log('');

      for (const ticker of tickers) {
        const history = getTickerHistory(runtime.store, ticker, range);
        console.log(renderSummaryTable(ticker, history.summaries));
        console.log('');
        if (options.csv) {
          for (const file of writeArtifacts(runtime.store, runtime.roster, ticker, options.out, range)) {
            console.error(chalk.green(`Wrote ${file}`));
          }
        }
      }
    } catch (err) {
      if (err instanceof UnknownTickerError || err instanceof RangeError) fail(err.message);
      fail(`Error: ${err instanceof Error ? err.message : String(err)}`);
    } finally {
      process.off('SIGINT', onSigint);
      closeCache();
    }
  });

program
  .command('filings')
  .description('List an institution\'s 13F-HR filings, including archived index shards')
  .argument('<cik>', 'Institution CIK')
  .option('-s, --since <year>', 'First filing year')
  .option('-u, --until <year>', 'Last filing year')
  .option('-j, --json', 'Output as JSON')
  .action(async (cik: string, options: RangeOptions & { json?: boolean }) => {
    const { runtime } = bootstrap();
    try {
      if (!/^\d{1,10}$/.test(cik)) fail(`Not a CIK: "${cik}"`);
      const range = resolveYearRange(parseYear(options.since, '--since'), parseYear(options.until, '--until'));
      const entries = await listHoldingsFilings({ client: runtime.client }, cik, range);
      runtime.store.saveFilingIndex(entries);

      if (options.json) {
        console.log(renderJson(entries));
      } else {
        console.log('');
        console.log(renderFilingsTable(cik, entries));
        console.log('');
      }
    } catch (err) {
      fail(`Error: ${err instanceof Error ? err.message : String(err)}`);
    } finally {
      closeCache();
    }
  });

program
  .command('summary')
  .description('Yearly ownership summary for a ticker from stored holdings')
  .argument('<ticker>', 'Ticker symbol')
  .option('-s, --since <year>', 'First year')
  .option('-u, --until <year>', 'Last year')
  .option('-j, --json', 'Output as JSON')
  .option('--csv', 'Output as CSV')
  .option('--holdings', 'Print the holdings rows instead of the yearly summary')
  .action((ticker: string, options: RangeOptions & { json?: boolean; csv?: boolean; holdings?: boolean }) => {
    const { runtime } = bootstrap();
    try {
      const range = {
        startYear: parseYear(options.since, '--since'),
        endYear: parseYear(options.until, '--until'),
      };
      const history = getTickerHistory(runtime.store, ticker, range);

      if (options.holdings) {
        if (options.json) console.log(renderJson(history.holdings.map(serializeHolding)));
        else console.log(renderHoldingsCsv(history.holdings));
      } else if (options.json) {
        console.log(renderJson(history.summaries.map(serializeSummary)));
      } else if (options.csv) {
        console.log(renderSummaryCsv(history.summaries));
      } else {
        console.log('');
        console.log(renderSummaryTable(history.ticker, history.summaries));
        console.log('');
      }
    } finally {
      closeCache();
    }
  });

program
  .command('export')
  .description('Write the holdings and yearly summary CSV artifacts for a ticker')
  .argument('<ticker>', 'Ticker symbol')
  .requiredOption('-o, --out <dir>', 'Output directory')
  .option('-s, --since <year>', 'First year')
  .option('-u, --until <year>', 'Last year')
  .action((ticker: string, options: RangeOptions & { out: string }) => {
    const { runtime } = bootstrap();
    try {
      const range = resolveYearRange(parseYear(options.since, '--since'), parseYear(options.until, '--until'));
      for (const file of writeArtifacts(runtime.store, runtime.roster, ticker, options.out, range)) {
        console.log(chalk.green(`Wrote ${file}`));
      }
    } finally {
      closeCache();
    }
  });

program
  .command('institutions')
  .description('Filing cadence of roster institutions from the stored filing index')
  .option('-j, --json', 'Output as JSON')
  .action((options: { json?: boolean }) => {
    const { runtime } = bootstrap();
    try {
      const activity = getInstitutionActivity(runtime.store, runtime.roster);
      if (options.json) {
        console.log(renderJson(activity.map(serializeInstitution)));
      } else {
        console.log('');
        console.log(renderInstitutionsTable(activity));
        console.log('');
      }
    } finally {
      closeCache();
    }
  });

program
  .command('roster')
  .description('Show tracked securities and institutions')
  .action(() => {
    const roster = bootstrapOffline();
    console.log(chalk.bold('\nTracked Securities\n'));
    for (const s of roster.securities) {
      const aliases = s.aliases.length > 0 ? chalk.dim(` (${s.aliases.join(', ')})`) : '';
      console.log(`  ${chalk.cyan(s.ticker.padEnd(8))} ${s.cusip}${aliases}`);
    }
    console.log(chalk.bold('\nInstitutions\n'));
    for (const i of roster.institutions) {
      console.log(`  ${chalk.cyan(i.cik)}  ${i.name}`);
    }
    console.log('');
  });

program
  .command('cache')
  .description('Manage the local response cache')
  .option('--clear', 'Clear cached HTTP responses (stored holdings are kept)')
  .option('--stats', 'Show cache and store statistics')
  .action((options: { clear?: boolean; stats?: boolean }) => {
    const { runtime } = bootstrap();
    try {
      if (options.clear) {
        clearCache();
        console.log(chalk.green('Cache cleared.'));
        return;
      }
      const stats = getCacheStats();
      const sizeMb = (stats.sizeBytes / 1024 / 1024).toFixed(1);
      if (options.stats) {
        const store = runtime.store.stats();
        console.log(`\n  Cache entries:     ${stats.entries}`);
        console.log(`  Cache size:        ${sizeMb} MB`);
        console.log(`  Indexed filings:   ${store.filings}`);
        console.log(`  Parsed filings:    ${store.processedFilings}`);
        console.log(`  Stored holdings:   ${store.holdings}`);
        console.log(`  Tickers:           ${store.tickers.join(', ') || '-'}`);
        console.log(`  Location:          ${getCacheLocation()}\n`);
      } else {
        console.log(`\n  Cache: ${stats.entries} entries, ${sizeMb} MB`);
        console.log(`  Use --clear to reset, --stats for details\n`);
      }
    } finally {
      closeCache();
    }
  });

await program.parseAsync();
