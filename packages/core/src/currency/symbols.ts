/**
 * Currency symbols and symbol resolution
 */

import { z } from 'zod';
import type { CurrencyCode } from '../types/index.js';
import { loadDataFile } from '../utils/data-files.js';
import { escapeRegExp, LETTER } from '../utils/regex.js';
import { isKnownCurrency } from './iso4217.js';

const SymbolTableSchema = z.object({
  symbols: z.record(z.string().min(1), z.array(z.string().length(3)).min(1)),
});

/**
 * Priority of currencies when a symbol stands for several of them.
 * CHF is the company currency.
 */
const CURRENCY_PRIORITY: Record<CurrencyCode, number> = {
  CHF: 100,
  USD: 95,
  EUR: 90,
  GBP: 85,
  JPY: 80,
  CNY: 75,
  INR: 70,
  AUD: 70,
  CAD: 70,
  SGD: 70,
  HKD: 65,
};

const DEFAULT_PRIORITY = 50;

let symbols: ReadonlyMap<string, readonly CurrencyCode[]> | undefined;

/**
 * Symbol to candidate codes, longest symbols first so "R$" is tried before "R"
 */
export function getSymbolTable(): ReadonlyMap<string, readonly CurrencyCode[]> {
  if (!symbols) {
    const data = loadDataFile('currency-symbols.json', SymbolTableSchema);
    const sorted = Object.entries(data.symbols).sort(([a], [b]) => b.length - a.length);
    symbols = new Map(sorted.map(([symbol, codes]) => [symbol, Object.freeze([...codes])]));
  }
  return symbols;
}

/**
 * Ranking used to resolve shared symbols
 * The company currency ranks 100, level with CHF; equal ranks keep table order.
 */
export function calculateCurrencyPriority(currency: CurrencyCode, companyCurrency?: CurrencyCode): number {
  if (companyCurrency && currency === companyCurrency) return 100;
  return CURRENCY_PRIORITY[currency] ?? DEFAULT_PRIORITY;
}

/**
 * Resolve a symbol to a single ISO code
 *
 * The preferred currency wins when the symbol may stand for it; otherwise the
 * highest-priority code; ties keep table order.
 */
export function resolveSymbol(symbol: string, preferred?: CurrencyCode): CurrencyCode | undefined {
  const codes = getSymbolTable().get(symbol);
  if (!codes) return undefined;
  if (preferred && codes.includes(preferred)) return preferred;

  let best: CurrencyCode | undefined;
  let bestPriority = -1;
  for (const code of codes) {
    const priority = calculateCurrencyPriority(code);
    if (priority > bestPriority) {
      best = code;
      bestPriority = priority;
    }
  }
  return best;
}

/**
 * Every currency a text mentions, by ISO code or by symbol
 * Returns sorted, de-duplicated codes
 */
export function detectCurrencies(text: string): CurrencyCode[] {
  if (!text) return [];

  const detected = new Set<CurrencyCode>();

  for (const match of text.matchAll(/(?<![\p{L}\p{M}])[A-Z]{3}(?![\p{L}\p{M}])/gu)) {
    if (isKnownCurrency(match[0])) detected.add(match[0]);
  }

  // Longest symbols first; a matched symbol is blanked so "R$" does not also count as "R"
  let remaining = text;
  for (const [symbol, codes] of getSymbolTable()) {
    const pattern = symbolPattern(symbol);
    if (remaining.search(pattern) !== -1) {
      for (const code of codes) detected.add(code);
      remaining = remaining.replace(pattern, (found) => ' '.repeat(found.length));
    }
  }

  return [...detected].sort();
}

/**
 * Letter symbols ("kr", "Ft", "R") must stand alone; others match anywhere
 */
function symbolPattern(symbol: string): RegExp {
  const escaped = escapeRegExp(symbol);
  if (!/\p{L}/u.test(symbol)) return new RegExp(escaped, 'gu');
  return new RegExp(`(?<!${LETTER})${escaped}(?!${LETTER})`, 'gu');
}
