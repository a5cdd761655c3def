/**
 * ISO 4217 reference table
 * Loaded once from data/iso4217.json, then shared read-only
 */

import { z } from 'zod';
import type { CurrencyCode, CurrencyInfo } from '../types/index.js';
import { loadDataFile } from '../utils/data-files.js';

const CurrencyInfoSchema = z.object({
  code: z.string().regex(/^[A-Z]{3}$/, 'Currency code must be 3 upper-case letters'),
  name: z.string().min(1),
  minorUnits: z.number().int().min(0).max(4),
  decimalSeparator: z.enum(['.', ',']).optional(),
});

const CurrencyTableSchema = z.object({
  currencies: z.array(CurrencyInfoSchema).min(1),
});

let table: ReadonlyMap<CurrencyCode, Readonly<CurrencyInfo>> | undefined;

/**
 * All recognized currencies keyed by code
 */
export function getCurrencyTable(): ReadonlyMap<CurrencyCode, Readonly<CurrencyInfo>> {
  if (!table) {
    const data = loadDataFile('iso4217.json', CurrencyTableSchema);
    const entries = new Map<CurrencyCode, Readonly<CurrencyInfo>>();
    for (const info of data.currencies) {
      entries.set(info.code, Object.freeze({ ...info }));
    }
    table = entries;
  }
  return table;
}

export function getCurrency(code: string): Readonly<CurrencyInfo> | undefined {
  return getCurrencyTable().get(code);
}

export function isKnownCurrency(code: string): boolean {
  return getCurrencyTable().has(code);
}

/**
 * Minor-unit count of a currency, or undefined for unrecognized codes
 */
export function getMinorUnits(code: string): number | undefined {
  return getCurrency(code)?.minorUnits;
}

/**
 * Currencies written without decimals (JPY, KRW, CLP...)
 */
export function isNoDecimalCurrency(code: string): boolean {
  return getMinorUnits(code) === 0;
}

export function getCurrencyDisplayName(code: string): string {
  return getCurrency(code)?.name ?? code;
}
