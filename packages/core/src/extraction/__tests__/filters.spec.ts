import { describe, it, expect } from 'vitest';
import { applyDecimalShiftFilter, isReasonableAmount, markExchangeRateTokens } from '../filters.js';
import { scanAmountTokens } from '../../parsing/index.js';
import { DEFAULT_EXTRACTOR_CONFIG } from '../../config.js';
import type { TotalCandidate } from '../../types/index.js';

function candidate(overrides: Partial<TotalCandidate>): TotalCandidate {
  return {
    amount: { amount: 4250, currency: 'USD' },
    keyword: 'TOTAL',
    language: 'en',
    line: 0,
    raw: '42.50 USD',
    wellFormed: true,
    ...overrides,
  };
}

describe('markExchangeRateTokens', () => {
  function marked(line: string): number[] {
    return [...markExchangeRateTokens(line, scanAmountTokens(line))];
  }

  it('should mark both sides of a rate expression', () => {
    expect(marked('1 USD = 0.92 EUR')).toEqual([0, 1]);
  });

  it('should mark every token of a labelled rate line', () => {
    expect(marked('Wechselkurs 0,92 / 1,08')).toEqual([0, 1]);
    expect(marked('EUR/USD 1.0850')).toEqual([0]);
  });

  it('should only mark tokens after the rate label or pair', () => {
    expect(marked('TOTAL 100.00 EUR (EUR/USD 1.08)')).toEqual([1]);
    expect(marked('TOTAL 100.00 EUR   Exchange rate 1 USD = 0.92 EUR')).toEqual([1, 2]);
  });

  it('should give back tokens that follow a total keyword after the label', () => {
    expect(marked('Exchange rate 0.92 TOTAL 100.00 EUR')).toEqual([0]);
  });

  it('should leave unrelated amounts alone', () => {
    expect(marked('TOTAL 100.00 EUR 5.00 USD')).toEqual([]);
  });
});

describe('isReasonableAmount', () => {
  const ranges = DEFAULT_EXTRACTOR_CONFIG.amountRanges;

  it('should accept amounts inside the standard range', () => {
    expect(isReasonableAmount({ amount: 1, currency: 'USD' }, ranges)).toBe(true);
    expect(isReasonableAmount({ amount: 100_000_000, currency: 'USD' }, ranges)).toBe(true);
  });

  it('should reject amounts outside the standard range', () => {
    expect(isReasonableAmount({ amount: 0, currency: 'USD' }, ranges)).toBe(false);
    expect(isReasonableAmount({ amount: 100_000_001, currency: 'USD' }, ranges)).toBe(false);
  });

  it('should use the no-decimal range for currencies without minor units', () => {
    expect(isReasonableAmount({ amount: 0, currency: 'JPY' }, ranges)).toBe(false);
    expect(isReasonableAmount({ amount: 100_000_000, currency: 'JPY' }, ranges)).toBe(true);
    expect(isReasonableAmount({ amount: 100_000_001, currency: 'JPY' }, ranges)).toBe(false);
  });
});

describe('applyDecimalShiftFilter', () => {
  it('should reject the badly formed side of a power-of-ten pair', () => {
    const good = candidate({});
    const bad = candidate({
      amount: { amount: 425_000, currency: 'USD' },
      keyword: 'AMOUNT DUE',
      line: 1,
      raw: '4250 USD',
      wellFormed: false,
    });

    const { kept, rejected } = applyDecimalShiftFilter([good, bad]);

    expect(kept).toEqual([good]);
    expect(rejected).toEqual([
      {
        reason: 'DecimalShift',
        message: '"4250 USD" looks like "42.50 USD" with a misplaced decimal mark',
        raw: '4250 USD',
        line: 1,
        keyword: 'AMOUNT DUE',
        currency: 'USD',
      },
    ]);
  });

  it('should keep pairs that are both well formed', () => {
    const a = candidate({});
    const b = candidate({ amount: { amount: 42_500, currency: 'USD' }, raw: '425.00 USD' });
    expect(applyDecimalShiftFilter([a, b]).kept).toEqual([a, b]);
  });

  it('should keep pairs in different currencies', () => {
    const a = candidate({});
    const b = candidate({ amount: { amount: 425_000, currency: 'EUR' }, raw: '4250 EUR', wellFormed: false });
    expect(applyDecimalShiftFilter([a, b]).rejected).toEqual([]);
  });

  it('should keep pairs that are not a power of ten apart', () => {
    const a = candidate({});
    const b = candidate({ amount: { amount: 8500, currency: 'USD' }, raw: '85 USD', wellFormed: false });
    expect(applyDecimalShiftFilter([a, b]).kept).toHaveLength(2);
  });
});
