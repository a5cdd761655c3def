/**
 * "TOTAL" keyword packs
 *
 * Each language lists the phrases that label a document total, the phrases that
 * contain such a keyword without being the total (SUBTOTAL, TOTAL HT...) and the
 * labels of exchange-rate lines. Scripts written without spaces (zh, ja, ko, th)
 * match keywords anywhere; the others require the keyword to stand alone.
 */

import { z } from 'zod';
import type { LanguageCode } from '../types/index.js';
import { loadDataFile } from '../utils/data-files.js';
import { escapeRegExp, LETTER } from '../utils/regex.js';
import { isKnownCurrency } from '../currency/index.js';

const LanguagePackSchema = z.object({
  name: z.string().min(1),
  wordBoundaries: z.boolean(),
  keywords: z.array(z.string().min(1)).min(1),
  exclusions: z.array(z.string().min(1)),
  exchangeRateLabels: z.array(z.string().min(1)),
});

const KeywordTableSchema = z.object({
  languages: z.record(z.string().regex(/^[a-z]{2}$/), LanguagePackSchema),
});

export interface LanguagePack {
  code: LanguageCode;
  name: string;
  keywords: readonly string[];
  /** One pattern per keyword, same order */
  keywordPatterns: readonly RegExp[];
  exclusionPatterns: readonly RegExp[];
  exchangeRateLabelPatterns: readonly RegExp[];
}

/**
 * A keyword found on a line
 */
export interface KeywordMatch {
  /** Keyword as written in the text */
  keyword: string;
  language: LanguageCode;
  start: number;
  end: number;
}

let packs: ReadonlyMap<LanguageCode, LanguagePack> | undefined;

function phrasePattern(phrase: string, wordBoundaries: boolean): RegExp {
  const body = phrase.trim().split(/\s+/).map(escapeRegExp).join('\\s+');
  return wordBoundaries
    ? new RegExp(`(?<!${LETTER})${body}(?!${LETTER})`, 'giu')
    : new RegExp(body, 'giu');
}

export function getLanguagePacks(): ReadonlyMap<LanguageCode, LanguagePack> {
  if (!packs) {
    const data = loadDataFile('total-keywords.json', KeywordTableSchema);
    const compiled = new Map<LanguageCode, LanguagePack>();
    for (const [code, pack] of Object.entries(data.languages)) {
      compiled.set(code, {
        code,
        name: pack.name,
        keywords: Object.freeze([...pack.keywords]),
        keywordPatterns: pack.keywords.map((k) => phrasePattern(k, pack.wordBoundaries)),
        exclusionPatterns: pack.exclusions.map((k) => phrasePattern(k, pack.wordBoundaries)),
        exchangeRateLabelPatterns: pack.exchangeRateLabels.map((k) => phrasePattern(k, pack.wordBoundaries)),
      });
    }
    packs = compiled;
  }
  return packs;
}

export function listSupportedLanguages(): LanguageCode[] {
  return [...getLanguagePacks().keys()].sort();
}

export function isSupportedLanguage(code: string): boolean {
  return getLanguagePacks().has(code);
}

function spans(line: string, pattern: RegExp): Array<{ start: number; end: number; text: string }> {
  return [...line.matchAll(pattern)].map((m) => {
    const start = m.index ?? 0;
    return { start, end: start + m[0].length, text: m[0] };
  });
}

/**
 * Find the total keywords on one line
 *
 * Exclusion phrases of every language veto overlapping keywords; when keywords
 * overlap each other ("GRAND TOTAL" / "TOTAL") the longest wins.
 */
export function findTotalKeywords(line: string, languages: readonly LanguageCode[]): KeywordMatch[] {
  const all = getLanguagePacks();
  const excluded = findExclusionPhrases(line);

  const found: KeywordMatch[] = [];
  for (const code of languages) {
    const pack = all.get(code);
    if (!pack) continue;
    for (const pattern of pack.keywordPatterns) {
      for (const span of spans(line, pattern)) {
        if (excluded.some((ex) => span.start < ex.end && ex.start < span.end)) continue;
        found.push({ keyword: span.text, language: code, start: span.start, end: span.end });
      }
    }
  }

  found.sort((a, b) => a.start - b.start || b.end - b.start - (a.end - a.start));

  const kept: KeywordMatch[] = [];
  for (const match of found) {
    const last = kept[kept.length - 1];
    if (last && match.start < last.end) continue;
    kept.push(match);
  }
  return kept;
}

/**
 * Line carries a total keyword or an exclusion phrase ("SUBTOTAL", "TOTAL HT")
 */
export function isLabelLine(line: string, languages: readonly LanguageCode[]): boolean {
  return findTotalKeywords(line, languages).length > 0 || findExclusionPhrases(line).length > 0;
}

/**
 * Exclusion phrases of every language found on a line ("SUBTOTAL", "TOTAL HT")
 */
export function findExclusionPhrases(line: string): Array<{ start: number; end: number }> {
  const found: Array<{ start: number; end: number }> = [];
  for (const pack of getLanguagePacks().values()) {
    for (const pattern of pack.exclusionPatterns) {
      found.push(...spans(line, pattern).map(({ start, end }) => ({ start, end })));
    }
  }
  return found;
}

export function hasTotalKeyword(text: string, languages: readonly LanguageCode[] = listSupportedLanguages()): boolean {
  if (!text) return false;
  return text.split(/\r?\n/).some((line) => findTotalKeywords(line, languages).length > 0);
}

const CURRENCY_PAIR = new RegExp(`(?<!${LETTER})([A-Z]{3})\\s?/\\s?([A-Z]{3})(?!${LETTER})`, 'gu');

/**
 * Start offsets of the exchange-rate labels ("EXCHANGE RATE", "WECHSELKURS")
 * and currency pairs ("EUR/USD") on a line, in order
 */
export function findExchangeRateMarks(line: string): number[] {
  const starts: number[] = [];
  for (const pack of getLanguagePacks().values()) {
    for (const pattern of pack.exchangeRateLabelPatterns) {
      starts.push(...spans(line, pattern).map((span) => span.start));
    }
  }
  for (const match of line.matchAll(CURRENCY_PAIR)) {
    if (isKnownCurrency(match[1]) && isKnownCurrency(match[2])) starts.push(match.index ?? 0);
  }
  return starts.sort((a, b) => a - b);
}

export function isExchangeRateLine(line: string): boolean {
  return findExchangeRateMarks(line).length > 0;
}
