/**
 * 13F information table parser.
 *
 * Uses regex-based extraction rather than an XML parser: archive documents
 * span two decades of schema revisions, carry arbitrary namespace prefixes
 * (ns1:, n1:, none) and are not always well-formed. Tag names are matched
 * case-insensitively and prefix-blind.
 */

import type { IdentifierResolver } from '../core/resolver.js';
import type { ExtractionSource, RawHolding } from '../core/types.js';

/** Most specific first: a <holdings> element may wrap <holding> rows */
const ROW_TAGS = ['infoTable', 'holding', 'holdings'];
const NAME_TAGS = ['nameOfIssuer', 'issuer', 'security'];
const CUSIP_TAGS = ['cusip'];
const SHARES_TAGS = ['sshPrnamt', 'shares', 'amount'];
const VALUE_TAGS = ['value', 'marketValue'];

const KNOWN_ENTITY = /&(?!(?:amp|lt|gt|quot|apos|#\d+|#x[0-9a-f]+);)/gi;

/** Escape every bare `&` that does not start a recognised entity reference */
export function repairEntities(xml: string): string {
  return xml.replace(KNOWN_ENTITY, '&amp;');
}

export function decodeEntities(text: string): string {
  return text
    .replace(/&#x([0-9a-f]+);/gi, (ref: string, hex: string) => fromCodePoint(parseInt(hex, 16), ref))
    .replace(/&#(\d+);/g, (ref: string, dec: string) => fromCodePoint(parseInt(dec, 10), ref))
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, '&');
}

/** Out-of-range references are left as written */
function fromCodePoint(codePoint: number, ref: string): string {
  return codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : ref;
}

export interface InfoTableFilter {
  targetTickers: readonly string[];
  resolver: IdentifierResolver;
}

/**
 * Parse holdings out of an information table (or a primary document that
 * embeds one). Rows need both an issuer name and a CUSIP. When targets are
 * given, only rows whose CUSIP resolves to a target, or whose issuer name
 * mentions one, are kept.
 */
export function parseInfoTable(
  xml: string,
  filter: InfoTableFilter,
  source: ExtractionSource = 'info_table'
): RawHolding[] {
  const repaired = repairEntities(stripComments(xml));
  const holdings: RawHolding[] = [];

  for (const row of findRows(repaired)) {
    const securityName = firstTagText(row, NAME_TAGS);
    const cusip = firstTagText(row, CUSIP_TAGS);
    if (!securityName || !cusip) continue;

    if (!matchesTargets(securityName, cusip, filter)) continue;

    holdings.push({
      securityName,
      cusip,
      shares: firstTagText(row, SHARES_TAGS) ?? '',
      value: firstTagText(row, VALUE_TAGS) ?? '',
      source,
    });
  }

  return holdings;
}

function matchesTargets(securityName: string, cusip: string, filter: InfoTableFilter): boolean {
  const { targetTickers, resolver } = filter;
  if (targetTickers.length === 0) return true;

  const ticker = resolver.resolveTicker(cusip);
  if (ticker && targetTickers.some(t => t.toUpperCase() === ticker)) return true;

  return resolver.matchTickerByName(securityName, targetTickers) !== null;
}

function findRows(xml: string): string[] {
  for (const tag of ROW_TAGS) {
    const rows = findElements(xml, [tag]);
    if (rows.length > 0) return rows;
  }
  return [];
}

function tagPattern(names: readonly string[]): string {
  return `(?:[\\w.-]+:)?(?:${names.join('|')})`;
}

/**
 * Inner content of every non-nested element whose local name is one of
 * `names`. A row tag that never closes is ignored.
 */
function findElements(xml: string, names: readonly string[]): string[] {
  const tag = tagPattern(names);
  const regex = new RegExp(`<(${tag})(?:\\s[^>]*)?>([\\s\\S]*?)</\\1\\s*>`, 'gi');
  const blocks: string[] = [];
  let match: RegExpExecArray | null;
  while ((match = regex.exec(xml)) !== null) {
    blocks.push(match[2]);
  }
  return blocks;
}

/**
 * Text of the first leaf element named by any of `names`, in document
 * order. Wrappers such as <shrsOrPrnAmt> are looked through, since the
 * regex only matches elements whose content holds no further tags.
 */
function firstTagText(xml: string, names: readonly string[]): string | null {
  const tag = tagPattern(names);
  const regex = new RegExp(`<(${tag})(?:\\s[^>]*)?>([^<]*)</\\1\\s*>`, 'i');
  const match = xml.match(regex);
  if (!match) return null;
  const text = decodeEntities(match[2]).trim();
  return text || null;
}

function stripComments(xml: string): string {
  return xml.replace(/<!--[\s\S]*?-->/g, '');
}
