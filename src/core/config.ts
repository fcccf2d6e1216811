import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { Roster } from './types.js';

/**
 * Startup configuration.
 *
 * Environment variables and the roster file are validated once, before any
 * crawl begins. Problems surface as ConfigError here and nowhere else.
 */

const __dirname = dirname(fileURLToPath(import.meta.url));

/** src/core → ../../config, and likewise from dist/core */
export const DEFAULT_ROSTER_PATH = join(__dirname, '..', '..', 'config', 'roster.json');

const envSchema = z.object({
  SEC_USER_AGENT: z
    .string({ required_error: 'SEC_USER_AGENT is required (e.g. "Your Name you@example.com")' })
    .trim()
    .min(1, 'SEC_USER_AGENT must not be empty'),
  SEC_DATA_URL: z.string().url().default('https://data.sec.gov'),
  SEC_ARCHIVES_URL: z.string().url().default('https://www.sec.gov/Archives/edgar/data'),
  SEC_MIN_INTERVAL_MS: z.coerce.number().int().nonnegative().default(200),
  SEC_MAX_RETRIES: z.coerce.number().int().positive().default(3),
  SEC_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  HOLDINGS_HOME: z.string().default(join(homedir(), '.holdings-history')),
  ROSTER_PATH: z.string().default(DEFAULT_ROSTER_PATH),
  PORT: z.coerce.number().int().positive().default(3005),
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue.path.join('.') || 'env';
    throw new ConfigError(`Invalid configuration for ${key}: ${issue.message}`, key);
  }
  return result.data;
}

const rosterSchema = z.object({
  securities: z
    .array(z.object({
      ticker: z.string().trim().min(1).transform(t => t.toUpperCase()),
      cusip: z.string().trim().length(9, 'CUSIP must be 9 characters').transform(c => c.toUpperCase()),
      aliases: z.array(z.string().trim().min(1)).default([]),
    }))
    .min(1, 'roster needs at least one security'),
  institutions: z
    .array(z.object({
      cik: z.string().regex(/^\d{1,10}$/, 'CIK must be 1-10 digits').transform(c => c.padStart(10, '0')),
      name: z.string().trim().min(1),
    }))
    .min(1, 'roster needs at least one institution'),
});

/** Validate an already-parsed roster document */
export function parseRoster(data: unknown, source: string = 'roster'): Roster {
  const result = rosterSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(
      `Invalid roster in ${source} at ${issue.path.join('.') || '(root)'}: ${issue.message}`,
      'ROSTER_PATH'
    );
  }

  const tickers = new Set<string>();
  for (const s of result.data.securities) {
    if (tickers.has(s.ticker)) {
      throw new ConfigError(`Duplicate ticker ${s.ticker} in ${source}`, 'ROSTER_PATH');
    }
    tickers.add(s.ticker);
  }

  const ciks = new Set<string>();
  const institutions = result.data.institutions.filter(inst => {
    if (ciks.has(inst.cik)) return false;
    ciks.add(inst.cik);
    return true;
  });

  return { securities: result.data.securities, institutions };
}

export function loadRoster(path: string = DEFAULT_ROSTER_PATH): Roster {
  const fullPath = resolve(path);
  let body: string;
  try {
    body = readFileSync(fullPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `Could not read roster file ${fullPath}: ${err instanceof Error ? err.message : String(err)}`,
      'ROSTER_PATH'
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    throw new ConfigError(`Roster file ${fullPath} is not valid JSON`, 'ROSTER_PATH');
  }

  return parseRoster(data, fullPath);
}
