/**
 * Extraction result types
 */

import type { MonetaryAmount } from './money.js';

/** Language code of a keyword pack (e.g., "en", "de", "fr") */
export type LanguageCode = string;

/**
 * Why a whole extraction failed
 *
 * - "InvalidInput": empty or non-textual text, bad language list or bad config
 * - "NotFound": no candidate survived filtering
 * - "Ambiguous": several conflicting candidates survived
 */
export type ExtractionFailureReason = 'InvalidInput' | 'NotFound' | 'Ambiguous';

/**
 * Why a single token was excluded
 *
 * - "UnknownCurrency": adjacent 3-letter code is not in ISO 4217
 * - "ExchangeRate": token is part of a rate expression or rate line
 * - "DecimalShift": token is a misplaced-decimal copy of a better candidate
 * - "AmbiguousFormat": separators cannot be told apart for this currency
 * - "PrecisionMismatch": more fractional digits than the currency allows
 * - "OutOfRange": value outside the reasonable range for the currency
 * - "Negative": value carries a minus sign
 */
export type CandidateRejectionReason =
  | 'UnknownCurrency'
  | 'ExchangeRate'
  | 'DecimalShift'
  | 'AmbiguousFormat'
  | 'PrecisionMismatch'
  | 'OutOfRange'
  | 'Negative';

export interface TotalCandidate {
  amount: MonetaryAmount;

  /** Keyword as written in the text */
  keyword: string;

  language: LanguageCode;

  /** Zero-based line index of the amount token */
  line: number;

  /** Token text including its currency marker */
  raw: string;

  /** True when the token had exactly the currency's number of fractional digits */
  wellFormed: boolean;
}

export interface RejectedCandidate {
  reason: CandidateRejectionReason;
  message: string;
  raw: string;
  line: number;
  keyword?: string;
  currency?: string;
}

export interface ExtractionSuccess {
  readonly ok: true;
  readonly total: MonetaryAmount;
  readonly candidate: TotalCandidate;
  /** Every accepted candidate, including duplicates of the total */
  readonly candidates: readonly TotalCandidate[];
  readonly rejected: readonly RejectedCandidate[];
}

export interface ExtractionFailure {
  readonly ok: false;
  readonly reason: ExtractionFailureReason;
  readonly message: string;
  readonly candidates: readonly TotalCandidate[];
  readonly rejected: readonly RejectedCandidate[];
  /** Validation issues for "InvalidInput" */
  readonly issues?: readonly string[];
}

export type ExtractionResult = ExtractionSuccess | ExtractionFailure;
