import type { AccountType } from '@edocta/types';
import { CREDIT_PATTERNS, DEBIT_PATTERNS } from './patterns.js';
import type { DetectionCounts } from './types.js';

export function countVariantMatches(lines: readonly string[]): DetectionCounts {
  let debitHeaders = 0;
  let creditLines = 0;

  for (const line of lines) {
    if (DEBIT_PATTERNS.header.test(line)) {
      debitHeaders++;
    } else if (CREDIT_PATTERNS.transactionLine.test(line)) {
      creditLines++;
    }
  }

  return { debitHeaders, creditLines };
}

/**
 * Guess the statement layout from which grammar matches more lines.
 * Ties go to debito; null when neither grammar matches anything.
 */
export function detectAccountType(lines: readonly string[]): AccountType | null {
  const { debitHeaders, creditLines } = countVariantMatches(lines);

  if (debitHeaders === 0 && creditLines === 0) {
    return null;
  }

  return creditLines > debitHeaders ? 'credito' : 'debito';
}
