/**
 * Money domain type
 * Represents a monetary amount with currency
 */

/** ISO 4217 alphabetic code (e.g., "USD", "CHF", "JPY") */
export type CurrencyCode = string;

export interface Money {
  /** Amount in smallest currency unit (e.g., cents for USD, yen for JPY) */
  amount: number;

  /** ISO 4217 currency code (e.g., "USD", "HUF", "EUR") */
  currency: CurrencyCode;
}

/**
 * A Money value whose currency has been checked against the ISO 4217 table
 * and whose amount is a non-negative safe integer of minor units.
 */
export type MonetaryAmount = Readonly<Money>;
