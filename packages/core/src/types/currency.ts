import type { CurrencyCode } from './money.js';

/** Decimal mark conventionally used with a currency */
export type DecimalSeparator = '.' | ',';

/**
 * Reference entry of the ISO 4217 table
 */
export interface CurrencyInfo {
  code: CurrencyCode;

  /** English name from the ISO 4217 list */
  name: string;

  /** Number of digits after the decimal mark (0 for JPY, 2 for USD, 3 for KWD) */
  minorUnits: number;

  /**
   * Decimal mark of the currency's home locale.
   * Absent where no single convention dominates (EUR is written both ways).
   */
  decimalSeparator?: DecimalSeparator;
}
