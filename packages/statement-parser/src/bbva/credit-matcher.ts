import { parseNumericToken, type CreditTransaction } from '@edocta/types';
import { CREDIT_PATTERNS } from './patterns.js';

/**
 * Match credit card statement lines, one transaction per line.
 * A line that does not match the whole grammar is skipped.
 */
export function matchCreditTransactions(
  lines: readonly string[],
  warnings: string[] = []
): CreditTransaction[] {
  const transactions: CreditTransaction[] = [];
  let zeroAmounts = 0;

  for (const line of lines) {
    const match = CREDIT_PATTERNS.transactionLine.exec(line);
    if (match?.groups === undefined) continue;

    const { fechaOperacion, fechaCargo, descripcion, sign, amount } = match.groups;
    if (
      fechaOperacion === undefined ||
      fechaCargo === undefined ||
      descripcion === undefined ||
      sign === undefined ||
      amount === undefined
    ) {
      continue;
    }

    const value = parseNumericToken(amount);
    if (value === null) continue;

    if (value === 0) {
      zeroAmounts++;
      continue;
    }

    transactions.push({
      fechaOperacion,
      fechaCargo,
      descripcion,
      monto: sign === '+' ? value : -value,
    });
  }

  if (zeroAmounts > 0) {
    warnings.push(`Skipped ${zeroAmounts} credit line(s) with a zero amount`);
  }

  return transactions;
}
