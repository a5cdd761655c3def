/**
 * extractTotal
 *
 * Finds the document total in OCR text:
 * 1. Validate text, languages and configuration
 * 2. Locate "total" keywords line by line
 * 3. Scan a bounded window after each keyword, then before it on its line,
 *    for the first amount with a currency
 * 4. Filter exchange rates, out-of-range values and decimal-shift artifacts
 * 5. Succeed only when exactly one distinct amount survives
 *
 * Failures are returned as values. Nothing is thrown for bad input.
 */

import type {
  CurrencyCode,
  ExtractionFailure,
  ExtractionFailureReason,
  ExtractionResult,
  ExtractionSuccess,
  LanguageCode,
  MonetaryAmount,
  RejectedCandidate,
  TotalCandidate,
} from '../types/index.js';
import type { ExtractionContext } from '../interfaces/index.js';
import type { ExtractorConfig } from '../config.js';
import type { KeywordMatch } from '../keywords/index.js';
import type { AmountToken } from '../parsing/index.js';
import { safeResolveExtractorConfig } from '../config.js';
import { safeValidateExtractionInput } from '../validation.js';
import { findExclusionPhrases, findTotalKeywords, isLabelLine, listSupportedLanguages } from '../keywords/index.js';
import { dropPrefixBefore, parseAmount, scanAmountTokens } from '../parsing/index.js';
import { formatMoney, getCurrency } from '../currency/index.js';
import { ExtractionError } from '../errors/index.js';
import { formatZodIssues, safeLog } from '../utils/index.js';
import { applyDecimalShiftFilter, isReasonableAmount, markExchangeRateTokens } from './filters.js';

const OPERATION = 'extractTotal';

interface ScannedLine {
  tokens: AmountToken[];
  exchangeRate: Set<number>;
}

interface WindowToken {
  token: AmountToken;
  line: number;
}

interface ScanItem extends WindowToken {
  exchangeRate: boolean;
}

/** What a visited token did to its keyword occurrence */
type Visit = 'decided' | 'bare' | 'skipped';

type Decision =
  | { kind: 'candidate'; candidate: TotalCandidate }
  | { kind: 'rejected'; rejected: RejectedCandidate };

function tokenKey(line: number, token: AmountToken): string {
  return `${line}:${token.numberStart}`;
}

function failure(
  reason: ExtractionFailureReason,
  message: string,
  candidates: readonly TotalCandidate[] = [],
  rejected: readonly RejectedCandidate[] = [],
  issues?: readonly string[]
): ExtractionFailure {
  const result: ExtractionFailure = {
    ok: false,
    reason,
    message,
    candidates: Object.freeze([...candidates]),
    rejected: Object.freeze([...rejected]),
    ...(issues ? { issues: Object.freeze([...issues]) } : {}),
  };
  return Object.freeze(result);
}

function success(
  candidate: TotalCandidate,
  candidates: readonly TotalCandidate[],
  rejected: readonly RejectedCandidate[]
): ExtractionSuccess {
  const result: ExtractionSuccess = {
    ok: true,
    total: candidate.amount,
    candidate,
    candidates: Object.freeze([...candidates]),
    rejected: Object.freeze([...rejected]),
  };
  return Object.freeze(result);
}

/**
 * Turn the token chosen for a keyword into a candidate or a rejection
 */
function decide(
  item: WindowToken,
  match: KeywordMatch,
  currency: CurrencyCode | undefined,
  config: ExtractorConfig
): Decision {
  const { token, line } = item;
  const base = { raw: token.raw, line, keyword: match.keyword };

  const info = currency === undefined ? undefined : getCurrency(currency);
  if (!info) {
    const written = token.marker?.text ?? '';
    return {
      kind: 'rejected',
      rejected: {
        ...base,
        reason: 'UnknownCurrency',
        message: `"${written}" is not an ISO 4217 currency`,
      },
    };
  }

  if (token.negative) {
    return {
      kind: 'rejected',
      rejected: { ...base, currency: info.code, reason: 'Negative', message: `"${token.raw}" is negative` },
    };
  }

  const parsed = parseAmount(token.number, info);
  if (!parsed.ok) {
    return {
      kind: 'rejected',
      rejected: { ...base, currency: info.code, reason: parsed.reason, message: parsed.message },
    };
  }

  const amount: MonetaryAmount = Object.freeze({ amount: parsed.amount, currency: info.code });
  if (!isReasonableAmount(amount, config.amountRanges)) {
    return {
      kind: 'rejected',
      rejected: {
        ...base,
        currency: info.code,
        reason: 'OutOfRange',
        message: `${formatMoney(amount)} is outside the expected range for a total`,
      },
    };
  }

  return {
    kind: 'candidate',
    candidate: Object.freeze({
      amount,
      keyword: match.keyword,
      language: match.language,
      line,
      raw: token.raw,
      wellFormed: parsed.wellFormed,
    }),
  };
}

/**
 * Run extraction over validated input
 */
class TotalScan {
  private readonly scanned = new Map<number, ScannedLine>();
  private readonly candidates = new Map<string, TotalCandidate>();
  private readonly rejected = new Map<string, RejectedCandidate>();
  private keywordCount = 0;

  constructor(
    private readonly lines: readonly string[],
    private readonly languages: readonly LanguageCode[],
    private readonly config: ExtractorConfig
  ) {}

  run(): { keywords: number; candidates: TotalCandidate[]; rejected: RejectedCandidate[] } {
    this.lines.forEach((line, index) => {
      const matches = findTotalKeywords(line, this.languages);
      const labelStarts = [...matches, ...findExclusionPhrases(line)].map((label) => label.start);
      for (const match of matches) {
        this.keywordCount++;
        this.scanWindow(index, match, labelStarts.some((start) => start < match.start));
      }
    });

    return {
      keywords: this.keywordCount,
      candidates: [...this.candidates.values()],
      rejected: [...this.rejected.values()],
    };
  }

  private scanLine(index: number): ScannedLine {
    let entry = this.scanned.get(index);
    if (!entry) {
      const line = this.lines[index] ?? '';
      const tokens = scanAmountTokens(line, this.config.preferredCurrency);
      entry = { tokens, exchangeRate: markExchangeRateTokens(line, tokens, this.languages) };
      this.scanned.set(index, entry);
    }
    return entry;
  }

  /**
   * Tokens of the window after a keyword, in reading order
   * A later line with a keyword or exclusion phrase of its own ends the window
   */
  private *windowTokens(lineIndex: number, match: KeywordMatch): Generator<ScanItem> {
    const last = Math.min(this.lines.length - 1, lineIndex + this.config.windowLines);

    for (let index = lineIndex; index <= last; index++) {
      const line = this.lines[index] ?? '';
      if (index > lineIndex && isLabelLine(line, this.languages)) return;

      const from = index === lineIndex ? match.end : 0;
      const to = from + this.config.windowChars;
      const { tokens, exchangeRate } = this.scanLine(index);

      for (let i = 0; i < tokens.length; i++) {
        const token = tokens[i];
        if (token.numberStart < from || token.numberStart >= to) continue;
        yield {
          token: index === lineIndex ? dropPrefixBefore(line, token, from) : token,
          line: index,
          exchangeRate: exchangeRate.has(i),
        };
      }
    }
  }

  /**
   * Tokens on the keyword line that end before the keyword, nearest first
   */
  private *tokensBefore(lineIndex: number, match: KeywordMatch): Generator<ScanItem> {
    const from = match.start - this.config.windowChars;
    const { tokens, exchangeRate } = this.scanLine(lineIndex);

    for (let i = tokens.length - 1; i >= 0; i--) {
      const token = tokens[i];
      if (token.end > match.start || token.start < from) continue;
      yield { token, line: lineIndex, exchangeRate: exchangeRate.has(i) };
    }
  }

  /**
   * Look after the keyword first, then before it on the same line ("42.50 USD TOTAL")
   * The backward look is skipped when another label precedes the keyword on its line,
   * since amounts there belong to that label.
   */
  private scanWindow(lineIndex: number, match: KeywordMatch, labelBefore: boolean): void {
    let fallback: WindowToken | undefined;

    for (const item of this.windowTokens(lineIndex, match)) {
      const visit = this.visit(item, match);
      if (visit === 'decided') return;
      if (visit === 'bare' && !fallback) fallback = item;
    }

    if (!labelBefore) {
      for (const item of this.tokensBefore(lineIndex, match)) {
        if (this.visit(item, match) === 'decided') return;
      }
    }

    if (fallback && this.config.defaultCurrency) {
      this.record(fallback, match, this.config.defaultCurrency);
    }
  }

  private visit(item: ScanItem, match: KeywordMatch): Visit {
    const { token, line } = item;

    if (item.exchangeRate) {
      this.reject(line, token, {
        reason: 'ExchangeRate',
        message: `"${token.raw}" is part of an exchange rate`,
        raw: token.raw,
        line,
        keyword: match.keyword,
        currency: token.marker?.currency,
      });
      return 'skipped';
    }

    if (token.percent || token.identifier) return 'skipped';
    if (!token.marker) return 'bare';

    this.record(item, match, token.marker.currency);
    return 'decided';
  }

  private record(item: WindowToken, match: KeywordMatch, currency: CurrencyCode | undefined): void {
    const decision = decide(item, match, currency, this.config);
    if (decision.kind === 'rejected') {
      this.reject(item.line, item.token, decision.rejected);
      return;
    }

    const key = tokenKey(item.line, item.token);
    if (!this.candidates.has(key)) this.candidates.set(key, decision.candidate);
  }

  private reject(line: number, token: AmountToken, rejected: RejectedCandidate): void {
    const key = `${tokenKey(line, token)}:${rejected.reason}`;
    if (!this.rejected.has(key)) this.rejected.set(key, Object.freeze(rejected));
  }
}

function describeCandidates(candidates: readonly TotalCandidate[]): string {
  return candidates.map((candidate) => formatMoney(candidate.amount)).join(', ');
}

/**
 * Extract the document total from OCR text
 *
 * @param text OCR output, one line of the document per line of text
 * @param supportedLanguages keyword languages to search; all languages when omitted
 * @param ctx logger, logging options and configuration overrides
 */
export function extractTotal(
  text: string,
  supportedLanguages?: readonly LanguageCode[],
  ctx: ExtractionContext = {}
): ExtractionResult {
  const logCtx: ExtractionContext = { ...ctx, operationName: ctx.operationName ?? OPERATION };

  const resolved = safeResolveExtractorConfig(ctx.config);
  if (!resolved.ok) {
    const issues = resolved.issues.map((issue) => `config.${issue}`);
    safeLog(ctx.logger, 'warn', 'Invalid extractor configuration', { issues }, logCtx);
    return failure('InvalidInput', `Invalid extractor configuration: ${issues.join('; ')}`, [], [], issues);
  }
  const config = resolved.config;

  const validated = safeValidateExtractionInput(
    { text, languages: supportedLanguages === undefined ? undefined : [...supportedLanguages] },
    config.maxTextLength
  );
  if (!validated.success) {
    const issues = formatZodIssues(validated.error);
    safeLog(ctx.logger, 'warn', 'Invalid extraction input', { issues }, logCtx);
    return failure('InvalidInput', `Invalid input: ${issues.join('; ')}`, [], [], issues);
  }

  const languages = [...new Set(validated.data.languages ?? listSupportedLanguages())];
  const lines = validated.data.text.split(/\r?\n/);

  safeLog(ctx.logger, 'debug', 'Extracting total', { text: validated.data.text, languages }, logCtx);

  const scan = new TotalScan(lines, languages, config).run();

  let candidates = scan.candidates;
  const rejected = [...scan.rejected];
  if (config.decimalShiftFilter) {
    const shifted = applyDecimalShiftFilter(candidates);
    candidates = shifted.kept;
    rejected.push(...shifted.rejected);
  }

  const distinct = new Map<string, TotalCandidate>();
  for (const candidate of candidates) {
    const key = `${candidate.amount.amount}:${candidate.amount.currency}`;
    if (!distinct.has(key)) distinct.set(key, candidate);
  }
  const values = [...distinct.values()];

  let chosen: TotalCandidate | undefined = values.length === 1 ? values[0] : undefined;
  if (!chosen && values.length > 1 && config.preferredCurrency) {
    const preferred = values.filter((candidate) => candidate.amount.currency === config.preferredCurrency);
    if (preferred.length === 1) chosen = preferred[0];
  }

  if (chosen) {
    safeLog(
      ctx.logger,
      'info',
      'Total extracted',
      {
        total: formatMoney(chosen.amount),
        keyword: chosen.keyword,
        language: chosen.language,
        line: chosen.line,
        candidates: candidates.length,
        rejected,
      },
      logCtx
    );
    return success(chosen, candidates, rejected);
  }

  if (values.length === 0) {
    const message =
      scan.keywords === 0
        ? 'No total keyword found'
        : `No usable amount next to ${scan.keywords} total keyword(s)`;
    safeLog(ctx.logger, 'info', message, { keywords: scan.keywords, rejected }, logCtx);
    return failure('NotFound', message, candidates, rejected);
  }

  const message = `Found ${values.length} conflicting totals: ${describeCandidates(values)}`;
  safeLog(ctx.logger, 'info', message, { candidates: values, rejected }, logCtx);
  return failure('Ambiguous', message, candidates, rejected);
}

/**
 * Unwrap a successful extraction or throw ExtractionError
 */
export function requireTotal(result: ExtractionResult): MonetaryAmount {
  if (!result.ok) throw new ExtractionError(result);
  return result.total;
}
