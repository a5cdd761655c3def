import { describe, it, expect } from 'vitest';
import {
  getCurrencyTable,
  getCurrency,
  isKnownCurrency,
  getMinorUnits,
  isNoDecimalCurrency,
  getCurrencyDisplayName,
  resolveSymbol,
  calculateCurrencyPriority,
  detectCurrencies,
  toDecimalString,
  toMajorUnits,
  formatMoney,
} from '../index.js';
import { ValidationError } from '../../errors/index.js';

describe('ISO 4217 reference table', () => {
  it('should load every active code', () => {
    expect(getCurrencyTable().size).toBe(166);
  });

  it('should return a consistent minor-unit count for every code', () => {
    for (const [code, info] of getCurrencyTable()) {
      expect(info.code).toBe(code);
      expect([0, 2, 3, 4]).toContain(info.minorUnits);
      expect(getMinorUnits(code)).toBe(info.minorUnits);
      expect(getMinorUnits(code)).toBe(getMinorUnits(code));
      expect(isNoDecimalCurrency(code)).toBe(info.minorUnits === 0);
    }
  });

  it('should know the minor units of common currencies', () => {
    expect(getMinorUnits('USD')).toBe(2);
    expect(getMinorUnits('EUR')).toBe(2);
    expect(getMinorUnits('JPY')).toBe(0);
    expect(getMinorUnits('KRW')).toBe(0);
    expect(getMinorUnits('KWD')).toBe(3);
    expect(getMinorUnits('CLF')).toBe(4);
  });

  it('should reject codes outside the table', () => {
    expect(isKnownCurrency('XYZ')).toBe(false);
    expect(isKnownCurrency('usd')).toBe(false);
    expect(getCurrency('XYZ')).toBeUndefined();
    expect(getMinorUnits('XYZ')).toBeUndefined();
  });

  it('should expose the decimal separator convention where one exists', () => {
    expect(getCurrency('USD')?.decimalSeparator).toBe('.');
    expect(getCurrency('BRL')?.decimalSeparator).toBe(',');
    expect(getCurrency('EUR')?.decimalSeparator).toBeUndefined();
  });

  it('should return frozen entries', () => {
    expect(Object.isFrozen(getCurrency('USD'))).toBe(true);
  });

  it('should fall back to the code for display names', () => {
    expect(getCurrencyDisplayName('CHF')).toBe('Swiss Franc');
    expect(getCurrencyDisplayName('XYZ')).toBe('XYZ');
  });
});

describe('Currency symbols', () => {
  it('should resolve unique symbols', () => {
    expect(resolveSymbol('€')).toBe('EUR');
    expect(resolveSymbol('R$')).toBe('BRL');
    expect(resolveSymbol('zł')).toBe('PLN');
  });

  it('should resolve shared symbols by priority', () => {
    expect(resolveSymbol('$')).toBe('USD');
    expect(resolveSymbol('¥')).toBe('JPY');
    expect(resolveSymbol('£')).toBe('GBP');
    expect(resolveSymbol('Fr')).toBe('CHF');
  });

  it('should keep table order when priorities tie', () => {
    expect(resolveSymbol('kr')).toBe('SEK');
  });

  it('should prefer the preferred currency when the symbol can mean it', () => {
    expect(resolveSymbol('$', 'CAD')).toBe('CAD');
    expect(resolveSymbol('kr', 'NOK')).toBe('NOK');
    expect(resolveSymbol('¥', 'CNY')).toBe('CNY');
    expect(resolveSymbol('$', 'EUR')).toBe('USD');
  });

  it('should return undefined for unknown symbols', () => {
    expect(resolveSymbol('¤')).toBeUndefined();
  });

  it('should rank the company currency level with CHF', () => {
    expect(calculateCurrencyPriority('CHF')).toBe(100);
    expect(calculateCurrencyPriority('USD')).toBe(95);
    expect(calculateCurrencyPriority('SEK')).toBe(50);
    expect(calculateCurrencyPriority('SEK', 'SEK')).toBe(100);
    expect(calculateCurrencyPriority('USD', 'SEK')).toBe(95);
  });
});

describe('detectCurrencies', () => {
  it('should return an empty list for empty text', () => {
    expect(detectCurrencies('')).toEqual([]);
  });

  it('should find upper-case ISO codes', () => {
    expect(detectCurrencies('TOTAL 42.50 USD (39.10 EUR)')).toEqual(['EUR', 'USD']);
  });

  it('should ignore unknown and glued codes', () => {
    expect(detectCurrencies('REF XYZ INVUSD')).toEqual([]);
  });

  it('should list every code a symbol may stand for', () => {
    expect(detectCurrencies('Total ¥1200')).toEqual(['CNY', 'JPY']);
  });

  it('should not count a longer symbol twice', () => {
    expect(detectCurrencies('Total R$ 10,00')).toEqual(['BRL']);
  });

  it('should require letter symbols to stand alone', () => {
    expect(detectCurrencies('Summe 42,50 kr')).toEqual(['DKK', 'ISK', 'NOK', 'SEK']);
    expect(detectCurrencies('Kroner')).toEqual([]);
  });
});

describe('Money helpers', () => {
  it('should render minor units as a decimal string', () => {
    expect(toDecimalString({ amount: 4250, currency: 'USD' })).toBe('42.50');
    expect(toDecimalString({ amount: 5, currency: 'USD' })).toBe('0.05');
    expect(toDecimalString({ amount: 1500, currency: 'JPY' })).toBe('1500');
    expect(toDecimalString({ amount: 1234, currency: 'KWD' })).toBe('1.234');
  });

  it('should convert to major units', () => {
    expect(toMajorUnits({ amount: 4250, currency: 'USD' })).toBe(42.5);
    expect(toMajorUnits({ amount: 1500, currency: 'JPY' })).toBe(1500);
  });

  it('should format amount and code', () => {
    expect(formatMoney({ amount: 790, currency: 'USD' })).toBe('7.90 USD');
  });

  it('should throw ValidationError for unknown currencies', () => {
    expect(() => toDecimalString({ amount: 1, currency: 'XYZ' })).toThrow(ValidationError);
  });
});
