/**
 * Candidate filters
 *
 * Exchange-rate detection runs before a token becomes a candidate; the range
 * check runs per candidate; the decimal-shift filter compares candidates with
 * each other once all windows have been scanned.
 */

import type { LanguageCode, Money, RejectedCandidate, TotalCandidate } from '../types/index.js';
import type { AmountToken } from '../parsing/index.js';
import type { ExtractorConfig } from '../config.js';
import { findExchangeRateMarks, findTotalKeywords, listSupportedLanguages } from '../keywords/index.js';
import { isNoDecimalCurrency, toMajorUnits } from '../currency/index.js';

const RATE_JOIN = /^\s*[=≈]\s*$/u;
const SHIFT_FACTORS = [10, 100, 1000];

/**
 * Indices of the tokens on a line that belong to an exchange rate
 *
 * Tokens after a rate label or currency pair count, unless a total keyword
 * sits between the label and the token ("Kurs 0.92 TOTAL 100.00 EUR"); so do
 * two neighbouring tokens joined by "=" ("1 USD = 0.92 EUR").
 */
export function markExchangeRateTokens(
  line: string,
  tokens: readonly AmountToken[],
  languages: readonly LanguageCode[] = listSupportedLanguages()
): Set<number> {
  const marked = new Set<number>();

  const rateStarts = findExchangeRateMarks(line);
  if (rateStarts.length > 0) {
    const keywordEnds = findTotalKeywords(line, languages).map((match) => match.end);
    tokens.forEach((token, index) => {
      const rateStart = rateStarts.filter((start) => start <= token.start).pop();
      if (rateStart === undefined) return;
      if (keywordEnds.some((end) => end > rateStart && end <= token.start)) return;
      marked.add(index);
    });
  }

  for (let i = 0; i + 1 < tokens.length; i++) {
    const gap = line.slice(tokens[i].end, tokens[i + 1].start);
    if (RATE_JOIN.test(gap)) {
      marked.add(i);
      marked.add(i + 1);
    }
  }
  return marked;
}

/**
 * Amount lies within the configured range for its currency, in major units
 */
export function isReasonableAmount(money: Money, ranges: ExtractorConfig['amountRanges']): boolean {
  const range = isNoDecimalCurrency(money.currency) ? ranges.noDecimal : ranges.standard;
  const major = toMajorUnits(money);
  return major >= range.min && major <= range.max;
}

function shiftFactor(a: number, b: number): number | undefined {
  const low = Math.min(a, b);
  const high = Math.max(a, b);
  if (low === 0 || high % low !== 0) return undefined;
  const factor = high / low;
  return SHIFT_FACTORS.includes(factor) ? factor : undefined;
}

/**
 * Reject candidates that look like a well-formed candidate of the same
 * currency with the decimal mark lost or misplaced (4250 USD next to 42.50 USD)
 */
export function applyDecimalShiftFilter(candidates: readonly TotalCandidate[]): {
  kept: TotalCandidate[];
  rejected: RejectedCandidate[];
} {
  const shifted = new Map<TotalCandidate, TotalCandidate>();

  for (let i = 0; i < candidates.length; i++) {
    for (let j = i + 1; j < candidates.length; j++) {
      const a = candidates[i];
      const b = candidates[j];
      if (a.amount.currency !== b.amount.currency) continue;
      if (a.wellFormed === b.wellFormed) continue;
      if (shiftFactor(a.amount.amount, b.amount.amount) === undefined) continue;

      const [good, bad] = a.wellFormed ? [a, b] : [b, a];
      if (!shifted.has(bad)) shifted.set(bad, good);
    }
  }

  const kept = candidates.filter((candidate) => !shifted.has(candidate));
  const rejected: RejectedCandidate[] = [];
  for (const candidate of candidates) {
    const reference = shifted.get(candidate);
    if (!reference) continue;
    rejected.push({
      reason: 'DecimalShift',
      message: `"${candidate.raw}" looks like "${reference.raw}" with a misplaced decimal mark`,
      raw: candidate.raw,
      line: candidate.line,
      keyword: candidate.keyword,
      currency: candidate.amount.currency,
    });
  }

  return { kept, rejected };
}
