export type { CurrencyCode, Money, MonetaryAmount } from './money.js';
export type { CurrencyInfo, DecimalSeparator } from './currency.js';
export type {
  LanguageCode,
  ExtractionFailureReason,
  CandidateRejectionReason,
  TotalCandidate,
  RejectedCandidate,
  ExtractionSuccess,
  ExtractionFailure,
  ExtractionResult,
} from './extraction.js';
