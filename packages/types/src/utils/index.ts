export {
  PARSER_VERSION,
  INSTITUTION_NAME,
  DEBIT_COLUMNS,
  CREDIT_COLUMNS,
  TOTALS_COLUMNS,
  TOTALS_LABELS,
  SHEET_NAMES,
} from './constants.js';
export { monthAbbreviationToNumber, parseCreditDate } from './date.js';
export {
  NUMERIC_TOKEN_SOURCE,
  extractNumericTokens,
  stripNumericTokens,
  parseNumericToken,
  roundToTwoDecimals,
  formatCurrency,
  sumAmounts,
} from './money.js';
