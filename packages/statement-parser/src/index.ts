// Parser exports
export {
  parseStatement,
  groupDebitTransactions,
  matchCreditTransactions,
  detectAccountType,
  countVariantMatches,
  DEBIT_PATTERNS,
  CREDIT_PATTERNS,
} from './bbva/index.js';

export type {
  StatementParseResult,
  DebitDraft,
  DetectionCounts,
  GrouperState,
} from './bbva/index.js';
