export { extractTotal, requireTotal } from './extract-total.js';
export { markExchangeRateTokens, isReasonableAmount, applyDecimalShiftFilter } from './filters.js';
