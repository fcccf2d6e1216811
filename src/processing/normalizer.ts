/**
 * Holdings normalizer: raw parser output → canonical Holding.
 *
 * Numeric coercion never throws. A value that cannot be read becomes 0 and
 * is flagged as unparsed, so a defaulted zero can be told apart from a
 * reported one without changing the numbers downstream code sees.
 */

import type { IdentifierResolver } from '../core/resolver.js';
import type { ExtractionSource, FilingContext, Holding, RawHolding } from '../core/types.js';

export interface CoercedNumber {
  value: number;
  parsed: boolean;
}

/** Structured tables report value in thousands of dollars */
const THOUSANDS_SOURCES: ReadonlySet<ExtractionSource> = new Set(['info_table', 'primary_doc']);

/**
 * Coerce a reported figure to a number.
 *
 * Footnote markers like "(1)" are dropped, as are thousands separators,
 * currency symbols and whitespace. "(1)" on its own is therefore 0 and
 * unparsed.
 */
export function coerceNumber(raw: string | null | undefined): CoercedNumber {
  if (raw == null) return { value: 0, parsed: false };

  const cleaned = raw
    .replace(/\(\s*\d*\s*\)/g, '')
    .replace(/[$€£¥,\s]/g, '');

  if (!/^-?(?:\d+\.?\d*|\.\d+)$/.test(cleaned)) return { value: 0, parsed: false };

  const value = parseFloat(cleaned);
  if (!Number.isFinite(value)) return { value: 0, parsed: false };
  return { value, parsed: true };
}

export interface NormalizeOptions {
  resolver: IdentifierResolver;
  targetTickers: readonly string[];
}

export function normalize(raw: RawHolding, filing: FilingContext, options: NormalizeOptions): Holding {
  const shares = coerceNumber(raw.shares);
  const value = coerceNumber(raw.value);

  // A negative share count is a parse defect, never a real position
  const shareCount = shares.value < 0 ? 0 : shares.value;
  const sharesParsed = shares.parsed && shares.value >= 0;

  const scale = THOUSANDS_SOURCES.has(raw.source) ? 1000 : 1;

  return {
    securityName: raw.securityName,
    cusip: raw.cusip,
    ticker: resolveHoldingTicker(raw, options),
    shares: shareCount,
    marketValue: value.value * scale,
    sharesParsed,
    valueParsed: value.parsed,
    provenance: {
      ...filing,
      source: raw.source,
      confidence: raw.source === 'full_text' ? 'low' : 'high',
    },
  };
}

function resolveHoldingTicker(raw: RawHolding, options: NormalizeOptions): string | null {
  const byCusip = options.resolver.resolveTicker(raw.cusip);
  if (byCusip) return byCusip;

  if (raw.matchedTicker) return raw.matchedTicker;

  return options.resolver.matchTickerByName(raw.securityName, options.targetTickers);
}
