/**
 * Line-scan extraction for filings that predate machine-readable
 * information tables.
 *
 * Low precision: any line naming a target ticker as a whole word yields a
 * candidate holding, with the first number on the line read as shares and
 * the last as value. The value unit is unknown.
 */

import type { IdentifierResolver } from '../core/resolver.js';
import type { RawHolding } from '../core/types.js';

const NUMBER_TOKEN = /\d+(?:,\d{3})*(?:\.\d+)?/g;

export function parseFullText(
  text: string,
  targetTickers: readonly string[],
  resolver: IdentifierResolver
): RawHolding[] {
  const holdings: RawHolding[] = [];
  const patterns = targetTickers.map(ticker => ({
    ticker: ticker.toUpperCase(),
    regex: new RegExp(`\\b${escapeRegExp(ticker)}\\b`, 'i'),
  }));

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    for (const { ticker, regex } of patterns) {
      if (!regex.test(line)) continue;

      const numbers = line.match(NUMBER_TOKEN);
      if (!numbers) continue;

      holdings.push({
        securityName: line,
        cusip: resolver.resolveCusip(ticker) ?? '',
        shares: numbers[0],
        value: numbers.length > 1 ? numbers[numbers.length - 1] : '',
        source: 'full_text',
        matchedTicker: ticker,
      });
    }
  }

  return holdings;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
