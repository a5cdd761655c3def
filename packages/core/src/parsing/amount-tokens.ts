/**
 * Amount token scanning
 *
 * Finds numbers on a line of OCR text and the currency marker next to each one.
 * A marker is an ISO code or a symbol directly before or after the number,
 * separated by at most two spaces: "42.50 USD", "CHF 42.50", "$42.50", "1.234,56 €".
 */

import type { CurrencyCode } from '../types/index.js';
import { getSymbolTable, isKnownCurrency, resolveSymbol } from '../currency/index.js';

export interface CurrencyMarker {
  /** Marker as written ("USD", "$", "kr") */
  text: string;
  /** Resolved code; undefined for a 3-letter code or currency sign outside ISO 4217 */
  currency?: CurrencyCode;
  position: 'prefix' | 'suffix';
  start: number;
  end: number;
}

export interface AmountToken {
  /** Digits and separators only, no sign and no marker */
  number: string;
  numberStart: number;
  numberEnd: number;
  /** Token text including sign and marker */
  raw: string;
  start: number;
  end: number;
  negative: boolean;
  /** Followed by "%" */
  percent: boolean;
  /** Glued to letters that are not a currency ("INV12345", "2kg") */
  identifier: boolean;
  /** The marker naming the currency, chosen from prefix and suffix */
  marker?: CurrencyMarker;
  prefix?: CurrencyMarker;
  suffix?: CurrencyMarker;
}

const SPACE = String.raw`[ \u00A0\u202F]`;

const NUMBER_PATTERN = new RegExp(
  [
    // grouped: 1,234 / 1.234,56 / 1'234.50 / 1 234,56
    String.raw`(?<![\p{N}.,'’])\d{1,3}(?:(?:[.,'’]|${SPACE})\d{3})+(?:[.,]\d+)?(?![\p{N}]|[.,'’]\d)`,
    // plain: 42 / 42.50 / 42,5
    String.raw`(?<![\p{N}.,'’])\d+(?:[.,]\d+)?(?![\p{N}]|[.,'’]\d)`,
  ].join('|'),
  'gu'
);

const ISO_CODE_AFTER = /^[A-Z]{3}(?![\p{L}\p{M}])/u;
const ISO_CODE_BEFORE = /(?<![\p{L}\p{M}])[A-Z]{3}$/u;
const CURRENCY_SIGN_AFTER = /^\p{Sc}/u;
const CURRENCY_SIGN_BEFORE = /\p{Sc}$/u;
const GAP_AFTER = new RegExp(`^${SPACE}{0,2}`, 'u');
const GAP_BEFORE = new RegExp(`${SPACE}{0,2}$`, 'u');
const PERCENT_AFTER = new RegExp(`^${SPACE}?%`, 'u');
const LETTER_CHAR = /[\p{L}\p{M}]/u;
const MINUS = new Set(['-', '−']);

function isLetter(char: string | undefined): boolean {
  return char !== undefined && LETTER_CHAR.test(char);
}

function symbolFitsAfter(text: string, symbol: string): boolean {
  if (!text.startsWith(symbol)) return false;
  return !isLetter(symbol[symbol.length - 1]) || !isLetter(text[symbol.length]);
}

function symbolFitsBefore(text: string, symbol: string): boolean {
  if (!text.endsWith(symbol)) return false;
  return !isLetter(symbol[0]) || !isLetter(text[text.length - symbol.length - 1]);
}

function markerAfter(line: string, from: number, preferred?: CurrencyCode): CurrencyMarker | undefined {
  const rest = line.slice(from);
  const gap = GAP_AFTER.exec(rest)?.[0].length ?? 0;
  const text = rest.slice(gap);
  const start = from + gap;

  for (const symbol of getSymbolTable().keys()) {
    if (symbolFitsAfter(text, symbol)) {
      return { text: symbol, currency: resolveSymbol(symbol, preferred), position: 'suffix', start, end: start + symbol.length };
    }
  }

  // An unknown code glued to the number is part of an identifier, not a currency
  const code = ISO_CODE_AFTER.exec(text)?.[0];
  if (code && (gap > 0 || isKnownCurrency(code))) {
    return {
      text: code,
      currency: isKnownCurrency(code) ? code : undefined,
      position: 'suffix',
      start,
      end: start + code.length,
    };
  }

  // A currency sign outside the symbol table ("₿") still marks the token, without a currency
  const sign = CURRENCY_SIGN_AFTER.exec(text)?.[0];
  if (sign) return { text: sign, position: 'suffix', start, end: start + sign.length };
  return undefined;
}

function markerBefore(line: string, to: number, preferred?: CurrencyCode): CurrencyMarker | undefined {
  const head = line.slice(0, to);
  const gap = GAP_BEFORE.exec(head)?.[0].length ?? 0;
  const text = head.slice(0, head.length - gap);
  const end = text.length;

  for (const symbol of getSymbolTable().keys()) {
    if (symbolFitsBefore(text, symbol)) {
      return { text: symbol, currency: resolveSymbol(symbol, preferred), position: 'prefix', start: end - symbol.length, end };
    }
  }

  const code = ISO_CODE_BEFORE.exec(text)?.[0];
  if (code && (gap > 0 || isKnownCurrency(code))) {
    return {
      text: code,
      currency: isKnownCurrency(code) ? code : undefined,
      position: 'prefix',
      start: end - code.length,
      end,
    };
  }

  const sign = CURRENCY_SIGN_BEFORE.exec(text)?.[0];
  if (sign) return { text: sign, position: 'prefix', start: end - sign.length, end };
  return undefined;
}

/**
 * Pick the marker that names the token's currency
 * Known codes win over unknown ones; suffix wins over prefix
 */
function chooseMarker(prefix?: CurrencyMarker, suffix?: CurrencyMarker): CurrencyMarker | undefined {
  if (suffix?.currency) return suffix;
  if (prefix?.currency) return prefix;
  return suffix ?? prefix;
}

/**
 * A minus sign directly before the number, not part of "2024-03" or "INV-12"
 */
function isSignedAt(line: string, numberStart: number): boolean {
  const charBefore = line[numberStart - 1];
  return (
    charBefore !== undefined &&
    MINUS.has(charBefore) &&
    !/[\p{L}\p{M}\p{N}]/u.test(line[numberStart - 2] ?? '')
  );
}

function buildToken(
  line: string,
  number: string,
  numberStart: number,
  signed: boolean,
  prefix: CurrencyMarker | undefined,
  suffix: CurrencyMarker | undefined
): AmountToken {
  const numberEnd = numberStart + number.length;
  const marker = chooseMarker(prefix, suffix);

  // "-$5.00": sign before a prefix marker
  const signBeforeMarker = !signed && marker?.position === 'prefix' && MINUS.has(line[marker.start - 1] ?? '');

  const charBefore = line[numberStart - 1];
  const gluedBefore = !signed && prefix === undefined && /[\p{L}\p{M}_#\/-]/u.test(charBefore ?? '');
  const gluedAfter = suffix === undefined && isLetter(line[numberEnd]);

  let start = signed ? numberStart - 1 : numberStart;
  let end = numberEnd;
  if (marker?.position === 'prefix') start = signBeforeMarker ? marker.start - 1 : marker.start;
  if (marker?.position === 'suffix') end = marker.end;

  return {
    number,
    numberStart,
    numberEnd,
    raw: line.slice(start, end),
    start,
    end,
    negative: signed || signBeforeMarker,
    percent: PERCENT_AFTER.test(line.slice(numberEnd)),
    identifier: gluedBefore || gluedAfter,
    marker,
    prefix,
    suffix,
  };
}

/**
 * Scan one line for amount tokens, in reading order
 *
 * @param preferred currency used to resolve symbols shared by several currencies ("$", "kr")
 */
export function scanAmountTokens(line: string, preferred?: CurrencyCode): AmountToken[] {
  const tokens: AmountToken[] = [];

  for (const match of line.matchAll(NUMBER_PATTERN)) {
    const numberStart = match.index ?? 0;
    const numberEnd = numberStart + match[0].length;

    const signed = isSignedAt(line, numberStart);

    const suffix = markerAfter(line, numberEnd, preferred);
    const prefix = markerBefore(line, signed ? numberStart - 1 : numberStart, preferred);

    tokens.push(buildToken(line, match[0], numberStart, signed, prefix, suffix));
  }

  return tokens;
}

/**
 * Forget a prefix marker that starts before `limit`
 * Used when the "marker" is really the tail of a keyword ("SUM 42.50")
 */
export function dropPrefixBefore(line: string, token: AmountToken, limit: number): AmountToken {
  if (!token.prefix || token.prefix.start >= limit) return token;
  return buildToken(line, token.number, token.numberStart, isSignedAt(line, token.numberStart), undefined, token.suffix);
}
