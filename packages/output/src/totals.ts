/**
 * Totals Module
 *
 * Reduces parsed movements to the two sums shown on the "Totales" sheet.
 */

import {
  sumAmounts,
  TOTALS_LABELS,
  type ParsedMovements,
  type StatementTotals,
} from '@edocta/types';

/**
 * A row of the totals table
 */
export interface TotalsRow {
  concepto: string;
  monto: number;
}

/**
 * Compute total abonos and total cargos.
 *
 * Debit statements sum each column, counting unset cells as zero. Credit
 * statements put the sum of positive amounts under `totalCargos` and the
 * magnitude of negative amounts under `totalAbonos`: this pairing is inverted
 * relative to the debit one and is kept as the statements are reported.
 */
export function computeTotals(movements: ParsedMovements): StatementTotals {
  if (movements.accountType === 'debito') {
    return {
      totalAbonos: sumAmounts(movements.transactions.map(txn => txn.abono ?? 0)),
      totalCargos: sumAmounts(movements.transactions.map(txn => txn.cargo ?? 0)),
    };
  }

  const amounts = movements.transactions.map(txn => txn.monto);
  return {
    totalCargos: sumAmounts(amounts.filter(amount => amount > 0)),
    totalAbonos: Math.abs(sumAmounts(amounts.filter(amount => amount < 0))),
  };
}

/**
 * Lay out totals in the order each statement type presents them.
 */
export function totalsToRows(movements: ParsedMovements, totals: StatementTotals = computeTotals(movements)): TotalsRow[] {
  const abonos: TotalsRow = { concepto: TOTALS_LABELS.credits, monto: totals.totalAbonos };
  const cargos: TotalsRow = { concepto: TOTALS_LABELS.charges, monto: totals.totalCargos };

  return movements.accountType === 'debito' ? [abonos, cargos] : [cargos, abonos];
}
