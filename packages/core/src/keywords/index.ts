export {
  getLanguagePacks,
  listSupportedLanguages,
  isSupportedLanguage,
  findTotalKeywords,
  hasTotalKeyword,
  isLabelLine,
  findExclusionPhrases,
  findExchangeRateMarks,
  isExchangeRateLine,
} from './total-keywords.js';
export type { LanguagePack, KeywordMatch } from './total-keywords.js';
