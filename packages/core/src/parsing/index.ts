export { scanAmountTokens, dropPrefixBefore } from './amount-tokens.js';
export type { AmountToken, CurrencyMarker } from './amount-tokens.js';
export { parseAmount } from './amount.js';
export type {
  AmountParseResult,
  AmountParseFailure,
  AmountParseFailureReason,
  ParsedAmount,
} from './amount.js';
