/**
 * Amount parsing
 *
 * Converts the digits and separators of an amount token into an integer count
 * of the currency's minor unit. Separator roles are decided from the token itself
 * where possible and from the currency otherwise:
 *
 *   "1.234,56 EUR"  -> 123456   ("." groups, "," is the decimal mark)
 *   "1'234.50 CHF"  -> 123450
 *   "1.234 JPY"     -> 1234     (no minor unit, so "." groups)
 *   "1.234 KWD"     -> 1234     (three minor units, so "." is decimal)
 *   "1.234 EUR"     -> AmbiguousFormat
 *   "3 100.00 USD"  -> AmbiguousFormat (space grouping with a decimal point)
 */

import type { CurrencyInfo } from '../types/index.js';

export type AmountParseFailureReason = 'AmbiguousFormat' | 'PrecisionMismatch' | 'OutOfRange';

export interface ParsedAmount {
  ok: true;
  /** Minor units */
  amount: number;
  /** Exactly the currency's number of fractional digits */
  wellFormed: boolean;
  /** Fractional digits as written */
  fractionDigits: number;
}

export interface AmountParseFailure {
  ok: false;
  reason: AmountParseFailureReason;
  message: string;
}

export type AmountParseResult = ParsedAmount | AmountParseFailure;

type DecimalMark = '.' | ',';

interface SeparatorLayout {
  /** Index of the decimal mark in the token, if any */
  decimalAt?: number;
}

const SPACE_MARKS = new Set([' ', '\u00A0', '\u202F']);
const APOSTROPHES = new Set(["'", '’']);

/**
 * Separator kind, with the space and apostrophe variants folded together
 */
function markKind(char: string): string {
  if (SPACE_MARKS.has(char)) return ' ';
  if (APOSTROPHES.has(char)) return "'";
  return char;
}

function isDecimalMark(char: string): char is DecimalMark {
  return char === '.' || char === ',';
}

function fail(reason: AmountParseFailureReason, message: string): AmountParseFailure {
  return { ok: false, reason, message };
}

/**
 * Decide which separator, if any, is the decimal mark
 */
function resolveLayout(
  token: string,
  marks: number[],
  currency: Readonly<CurrencyInfo>
): SeparatorLayout | AmountParseFailure {
  if (marks.length === 0) return {};

  const kinds = new Set(marks.map((i) => markKind(token.charAt(i))));
  const last = marks[marks.length - 1] ?? 0;
  const lastChar = token.charAt(last);
  const decimalMarks = marks.filter((i) => isDecimalMark(token.charAt(i)));

  // Both "." and ",": the later one is the decimal mark and appears once
  if (kinds.has('.') && kinds.has(',')) {
    if (!isDecimalMark(lastChar) || marks.filter((i) => token.charAt(i) === lastChar).length !== 1) {
      return fail('AmbiguousFormat', `Cannot tell the decimal mark in "${token}"`);
    }
    return { decimalAt: last };
  }

  // Spaces or apostrophes group; a "." or "," beside them is the decimal mark
  if (kinds.has(' ') || kinds.has("'")) {
    if (decimalMarks.length === 0) return {};
    if (decimalMarks.length > 1 || decimalMarks[0] !== last) {
      return fail('AmbiguousFormat', `Cannot tell the decimal mark in "${token}"`);
    }
    // Space grouping goes with a decimal comma; "3 100.00" is more likely a count and an amount
    if (kinds.has(' ') && lastChar === '.') {
      return fail('AmbiguousFormat', `"${token}" mixes space grouping with a "." decimal mark`);
    }
    return { decimalAt: last };
  }

  // One kind of mark, several times: grouping
  if (marks.length > 1) return {};

  const mark = marks[0] ?? 0;
  const char = token.charAt(mark);
  const digitsBefore = mark;
  const digitsAfter = token.length - mark - 1;

  if (digitsAfter !== 3 || digitsBefore > 3 || token.startsWith('0')) {
    return { decimalAt: mark };
  }

  // "1.234": grouping or decimal, depending on the currency
  if (currency.minorUnits === 0) return {};
  if (currency.minorUnits === 3) return { decimalAt: mark };
  if (currency.decimalSeparator === char) return { decimalAt: mark };
  if (currency.decimalSeparator !== undefined) return {};

  return fail(
    'AmbiguousFormat',
    `"${token}" could be ${token.slice(0, mark)}${token.slice(mark + 1)} or ${token.slice(0, mark)}.${token.slice(mark + 1)} ${currency.code}`
  );
}

/**
 * Check digit grouping: a leading group of 1-3 digits, then groups of exactly 3,
 * all separated by the same kind of mark
 */
function isValidGrouping(integerPart: string): boolean {
  const groups = integerPart.split(/[.,'’ \u00A0\u202F]/u);
  if (groups.length === 1) return true;

  const separators = new Set(
    [...integerPart].filter((char) => !/\d/.test(char)).map(markKind)
  );
  if (separators.size !== 1) return false;

  const [head, ...rest] = groups;
  if (head === undefined || head.length < 1 || head.length > 3) return false;
  return rest.every((group) => group.length === 3);
}

/**
 * Parse an amount token's number into minor units of `currency`
 *
 * @param token digits and separators only, as found by scanAmountTokens
 */
export function parseAmount(token: string, currency: Readonly<CurrencyInfo>): AmountParseResult {
  if (!/^\d/.test(token) || !/\d$/.test(token)) {
    return fail('AmbiguousFormat', `"${token}" is not a number`);
  }

  const marks: number[] = [];
  for (let i = 0; i < token.length; i++) {
    if (!/\d/.test(token.charAt(i))) marks.push(i);
  }

  const layout = resolveLayout(token, marks, currency);
  if ('ok' in layout) return layout;

  const integerPart = layout.decimalAt === undefined ? token : token.slice(0, layout.decimalAt);
  const fraction = layout.decimalAt === undefined ? '' : token.slice(layout.decimalAt + 1);

  if (!isValidGrouping(integerPart)) {
    return fail('AmbiguousFormat', `Irregular digit grouping in "${token}"`);
  }

  const minorUnits = currency.minorUnits;
  let kept = fraction;
  if (fraction.length > minorUnits) {
    const extra = fraction.slice(minorUnits);
    if (!/^0+$/.test(extra)) {
      return fail(
        'PrecisionMismatch',
        `"${token}" has ${fraction.length} decimals, ${currency.code} has ${minorUnits}`
      );
    }
    kept = fraction.slice(0, minorUnits);
  }

  const digits = integerPart.replace(/\D/g, '') + kept.padEnd(minorUnits, '0');
  const amount = Number(digits);
  if (!Number.isSafeInteger(amount)) {
    return fail('OutOfRange', `"${token}" is too large to represent exactly`);
  }

  const wellFormed =
    layout.decimalAt === undefined ? minorUnits === 0 : fraction.length === minorUnits;

  return { ok: true, amount, wellFormed, fractionDigits: fraction.length };
}
