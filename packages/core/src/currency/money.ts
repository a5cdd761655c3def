/**
 * Money helpers
 * Amounts are integers of minor units; rendering uses the currency's minor-unit count
 */

import type { Money } from '../types/index.js';
import { ValidationError } from '../errors/index.js';
import { getMinorUnits } from './iso4217.js';

function requireMinorUnits(currency: string): number {
  const minorUnits = getMinorUnits(currency);
  if (minorUnits === undefined) {
    throw new ValidationError(`Unknown currency '${currency}'`, { currency });
  }
  return minorUnits;
}

/**
 * Render the amount as a plain decimal string: 4250 USD → "42.50", 1500 JPY → "1500"
 */
export function toDecimalString(money: Money): string {
  const minorUnits = requireMinorUnits(money.currency);
  const digits = String(money.amount).padStart(minorUnits + 1, '0');
  if (minorUnits === 0) return digits;
  return `${digits.slice(0, -minorUnits)}.${digits.slice(-minorUnits)}`;
}

/**
 * Amount in major units as a float, for range checks and display only
 */
export function toMajorUnits(money: Money): number {
  return money.amount / 10 ** requireMinorUnits(money.currency);
}

export function formatMoney(money: Money): string {
  return `${toDecimalString(money)} ${money.currency}`;
}
