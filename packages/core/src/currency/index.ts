export {
  getCurrencyTable,
  getCurrency,
  isKnownCurrency,
  getMinorUnits,
  isNoDecimalCurrency,
  getCurrencyDisplayName,
} from './iso4217.js';
export {
  getSymbolTable,
  resolveSymbol,
  calculateCurrencyPriority,
  detectCurrencies,
} from './symbols.js';
export { toDecimalString, toMajorUnits, formatMoney } from './money.js';
