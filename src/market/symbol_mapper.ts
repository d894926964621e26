/**
 * Heuristic mapping from free-text holding names to ticker symbols.
 *
 * Rules run in order and the first match wins:
 *   1. name already carries a known exchange suffix
 *   2. curated alias for the currency, matched on token boundaries
 *   3. first 2-6 character alphanumeric token plus the currency's suffix
 */

import type { SymbolConfig } from '@/core/config';
import type { SymbolMapping } from '@/types/market';
import type { CurrencyCode } from '@/types/portfolio';

const SEPARATORS = /[\s\-:|]+/;
const TICKER_TOKEN = /^[A-Z0-9]{2,6}$/;

function tokenize(value: string): string[] {
  return value.split(SEPARATORS).filter((token) => token.length > 0);
}

function containsTokens(haystack: string[], needle: string[]): boolean {
  if (needle.length === 0 || needle.length > haystack.length) return false;
  for (let start = 0; start + needle.length <= haystack.length; start++) {
    if (needle.every((token, offset) => haystack[start + offset] === token)) {
      return true;
    }
  }
  return false;
}

export class SymbolMapper {
  private readonly knownSuffixes: string[];

  constructor(private readonly config: SymbolConfig) {
    this.knownSuffixes = [...new Set(Object.values(config.exchangeSuffixes))].filter(
      (suffix) => suffix.length > 0
    );
  }

  mapToSymbol(name: string, currency: CurrencyCode): SymbolMapping {
    const normalized = name.trim().toUpperCase();
    const ccy = currency.trim().toUpperCase();

    if (!normalized) {
      return { status: 'unmappable', reason: 'empty name' };
    }

    if (this.knownSuffixes.some((suffix) => normalized.endsWith(suffix) && normalized.length > suffix.length)) {
      return { status: 'mapped', symbol: normalized, rule: 'already_suffixed' };
    }

    const tokens = tokenize(normalized);

    for (const entry of this.config.aliases[ccy] ?? []) {
      if (containsTokens(tokens, tokenize(entry.alias))) {
        return { status: 'mapped', symbol: entry.symbol, rule: 'alias' };
      }
    }

    const suffix = this.config.exchangeSuffixes[ccy];
    if (suffix === undefined) {
      return { status: 'unmappable', reason: `no exchange suffix configured for ${ccy}` };
    }

    const first = tokens[0];
    if (first !== undefined && TICKER_TOKEN.test(first)) {
      return { status: 'mapped', symbol: `${first}${suffix}`, rule: 'first_token' };
    }

    return { status: 'unmappable', reason: `no ticker-like token in "${name.trim()}"` };
  }
}
