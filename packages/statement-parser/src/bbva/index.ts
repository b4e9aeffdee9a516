import { ParserOptionsSchema, type ParsedMovements, type ParserOptions } from '@edocta/types';
import { matchCreditTransactions } from './credit-matcher.js';
import { groupDebitTransactions } from './debit-grouper.js';

export { groupDebitTransactions } from './debit-grouper.js';
export { matchCreditTransactions } from './credit-matcher.js';
export { detectAccountType, countVariantMatches } from './detection.js';
export { DEBIT_PATTERNS, CREDIT_PATTERNS } from './patterns.js';
export type { DebitDraft, DetectionCounts, GrouperState } from './types.js';

export type StatementParseResult = ParsedMovements & {
  warnings: string[];
};

/**
 * Parse the text lines of a BBVA statement with the layout named in options.
 * Malformed lines never fail the parse; an empty transaction list is reported
 * through the warnings and left to the caller to act on.
 */
export function parseStatement(lines: readonly string[], options: ParserOptions): StatementParseResult {
  const { accountType } = ParserOptionsSchema.parse(options);
  const warnings: string[] = [];

  const result: StatementParseResult =
    accountType === 'debito'
      ? { accountType, transactions: groupDebitTransactions(lines, warnings), warnings }
      : { accountType, transactions: matchCreditTransactions(lines, warnings), warnings };

  if (result.transactions.length === 0) {
    warnings.push('No transactions found');
  }

  return result;
}
