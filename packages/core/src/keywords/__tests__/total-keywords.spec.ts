import { describe, it, expect } from 'vitest';
import {
  findExchangeRateMarks,
  findExclusionPhrases,
  findTotalKeywords,
  hasTotalKeyword,
  isExchangeRateLine,
  isLabelLine,
  isSupportedLanguage,
  listSupportedLanguages,
} from '../index.js';

describe('Keyword packs', () => {
  it('should list the supported languages in order', () => {
    expect(listSupportedLanguages()).toEqual([
      'ar', 'da', 'de', 'en', 'es', 'fr', 'hi', 'id', 'it', 'ja', 'ko',
      'nl', 'no', 'pl', 'pt', 'ru', 'sv', 'th', 'tr', 'vi', 'zh',
    ]);
  });

  it('should tell supported languages apart', () => {
    expect(isSupportedLanguage('en')).toBe(true);
    expect(isSupportedLanguage('EN')).toBe(false);
    expect(isSupportedLanguage('xx')).toBe(false);
  });
});

describe('findTotalKeywords', () => {
  it('should find a keyword case-insensitively', () => {
    expect(findTotalKeywords('Total: 42.50 USD', ['en'])).toEqual([
      { keyword: 'Total', language: 'en', start: 0, end: 5 },
    ]);
  });

  it('should keep the longest of overlapping keywords', () => {
    expect(findTotalKeywords('GRAND TOTAL 42.50', ['en'])).toEqual([
      { keyword: 'GRAND TOTAL', language: 'en', start: 0, end: 11 },
    ]);
  });

  it('should match multi-word keywords across runs of spaces', () => {
    expect(findTotalKeywords('TOTAL   A  PAYER 10,00', ['fr'])).toEqual([
      { keyword: 'TOTAL   A  PAYER', language: 'fr', start: 0, end: 16 },
    ]);
  });

  it('should not match keywords glued to other letters', () => {
    expect(findTotalKeywords('SUBTOTAL 40.00', ['en'])).toEqual([]);
    expect(findTotalKeywords('Zwischensumme 1.180,00', ['de'])).toEqual([]);
  });

  it('should drop keywords inside exclusion phrases', () => {
    expect(findTotalKeywords('SUB TOTAL 40.00', ['en'])).toEqual([]);
    expect(findTotalKeywords('TOTAL HT 100,00', ['fr'])).toEqual([]);
    expect(findTotalKeywords('Totale IVA 22,00', ['it'])).toEqual([]);
  });

  it('should apply exclusion phrases of every language', () => {
    expect(findTotalKeywords('TOTAL TVA 20,00', ['en'])).toEqual([]);
  });

  it('should find compound keywords', () => {
    expect(findTotalKeywords('Gesamtbetrag 1.404,20 EUR', ['de'])).toEqual([
      { keyword: 'Gesamtbetrag', language: 'de', start: 0, end: 12 },
    ]);
  });

  it('should match scripts written without spaces anywhere on the line', () => {
    expect(findTotalKeywords('お会計 合計 ¥1,200', ['ja'])).toEqual([
      { keyword: '合計', language: 'ja', start: 4, end: 6 },
    ]);
    expect(findTotalKeywords('ยอดรวม 100 บาท', ['th'])).toEqual([
      { keyword: 'ยอดรวม', language: 'th', start: 0, end: 6 },
    ]);
  });

  it('should only search the requested languages', () => {
    expect(findTotalKeywords('Gesamt 10,00 EUR', ['en'])).toEqual([]);
  });

  it('should attribute shared keywords to the first requested language', () => {
    expect(findTotalKeywords('TOTAL 5.00', ['fr', 'en'])).toEqual([
      { keyword: 'TOTAL', language: 'fr', start: 0, end: 5 },
    ]);
  });

  it('should find several keywords on one line', () => {
    const matches = findTotalKeywords('TOTAL 5.00 USD TOTAL 6.00 USD', ['en']);
    expect(matches.map((m) => m.start)).toEqual([0, 15]);
  });
});

describe('hasTotalKeyword', () => {
  it('should search every line', () => {
    expect(hasTotalKeyword('Thank you\nAmount due 5.00', ['en'])).toBe(true);
  });

  it('should return false for text without keywords', () => {
    expect(hasTotalKeyword('Nothing here')).toBe(false);
    expect(hasTotalKeyword('')).toBe(false);
  });
});

describe('isLabelLine', () => {
  it('should accept keyword and exclusion lines', () => {
    expect(isLabelLine('TOTAL 5.00', ['en'])).toBe(true);
    expect(isLabelLine('SUBTOTAL 5.00', ['en'])).toBe(true);
  });

  it('should reject plain lines', () => {
    expect(isLabelLine('42.50 USD', ['en'])).toBe(false);
  });
});

describe('isExchangeRateLine', () => {
  it('should detect rate labels in any language', () => {
    expect(isExchangeRateLine('Exchange rate: 1 USD = 0.92 EUR')).toBe(true);
    expect(isExchangeRateLine('Wechselkurs 0,92')).toBe(true);
    expect(isExchangeRateLine('Taux de change 1,08')).toBe(true);
  });

  it('should detect currency pairs of known codes', () => {
    expect(isExchangeRateLine('EUR/USD 1.0850')).toBe(true);
    expect(isExchangeRateLine('ABC/XYZ 1.0850')).toBe(false);
  });

  it('should leave total lines alone', () => {
    expect(isExchangeRateLine('TOTAL 100.00 EUR')).toBe(false);
  });
});

describe('findExclusionPhrases', () => {
  it('should locate exclusion phrases on a line', () => {
    expect(findExclusionPhrases('SUBTOTAL 40.00 USD')).toContainEqual({ start: 0, end: 8 });
    expect(findExclusionPhrases('TOTAL 42.50 USD')).toEqual([]);
  });
});

describe('findExchangeRateMarks', () => {
  it('should return where rate labels and currency pairs start', () => {
    expect(findExchangeRateMarks('Exchange rate 1 USD')).toEqual([0]);
    expect(findExchangeRateMarks('TOTAL 100.00 EUR (EUR/USD 1.08)')).toEqual([18]);
    expect(findExchangeRateMarks('TOTAL 100.00 EUR')).toEqual([]);
  });
});
