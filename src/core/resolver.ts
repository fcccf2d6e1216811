import type { TrackedSecurity } from './types.js';

/**
 * Identifier resolver: ticker <-> CUSIP for the tracked roster.
 *
 * Lookups are exact (after trimming and upper-casing); there is no fuzzy
 * matching. A miss returns null, which callers keep as "unresolved".
 *
 * Name matching is separate and looser: a target's ticker or one of its
 * aliases appearing anywhere in a free-text issuer name.
 */
export class IdentifierResolver {
  private readonly byTicker = new Map<string, TrackedSecurity>();
  private readonly byCusip = new Map<string, TrackedSecurity>();

  constructor(securities: readonly TrackedSecurity[]) {
    for (const security of securities) {
      this.byTicker.set(normalizeKey(security.ticker), security);
      this.byCusip.set(normalizeKey(security.cusip), security);
    }
  }

  resolveTicker(cusip: string): string | null {
    if (!cusip) return null;
    return this.byCusip.get(normalizeKey(cusip))?.ticker ?? null;
  }

  resolveCusip(ticker: string): string | null {
    if (!ticker) return null;
    return this.byTicker.get(normalizeKey(ticker))?.cusip ?? null;
  }

  isTracked(ticker: string): boolean {
    return this.byTicker.has(normalizeKey(ticker));
  }

  get tickers(): string[] {
    return Array.from(this.byTicker.keys());
  }

  /**
   * First target whose ticker or alias is a case-insensitive substring of
   * the security name.
   */
  matchTickerByName(securityName: string, targets: readonly string[]): string | null {
    const name = securityName.toLowerCase();
    if (!name) return null;

    for (const target of targets) {
      const ticker = normalizeKey(target);
      if (name.includes(ticker.toLowerCase())) return ticker;

      const aliases = this.byTicker.get(ticker)?.aliases ?? [];
      if (aliases.some(alias => name.includes(alias.toLowerCase()))) return ticker;
    }

    return null;
  }
}

function normalizeKey(value: string): string {
  return value.trim().toUpperCase();
}
