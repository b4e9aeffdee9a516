/**
 * CSV Exporter Module
 * 
 * Converts parsed movements and their totals to CSV for spreadsheet import.
 */

import {
  CREDIT_COLUMNS,
  DEBIT_COLUMNS,
  TOTALS_COLUMNS,
  type CreditTransaction,
  type DebitTransaction,
  type ParsedMovements,
} from '@edocta/types';
import { totalsToRows } from './totals.js';

/**
 * Options for CSV export
 */
export interface CsvExportOptions {
  /** Include header row (default: true) */
  includeHeader?: boolean;
  /** Field delimiter (default: ',') */
  delimiter?: string;
  /** Include the operation and settlement date columns of debit statements (default: true) */
  includeDates?: boolean;
}

/**
 * Escape a value for CSV (handles quotes and delimiters)
 */
function escapeCsvValue(value: string | number | null | undefined, delimiter: string): string {
  if (value === null || value === undefined) {
    return '';
  }
  
  const str = String(value);
  
  const needsQuoting = str.includes(delimiter) || 
                       str.includes('"') || 
                       str.includes('\n') || 
                       str.includes('\r');
  
  if (needsQuoting) {
    // Escape quotes by doubling them and wrap in quotes
    return `"${str.replace(/"/g, '""')}"`;
  }
  
  return str;
}

function formatAmount(amount: number | null): string {
  return amount === null ? '' : amount.toFixed(2);
}

function rowToCsvLine(row: string[], delimiter: string): string {
  return row.map(value => escapeCsvValue(value, delimiter)).join(delimiter);
}

function buildDebitRow(txn: DebitTransaction, includeDates: boolean): string[] {
  const row: string[] = includeDates ? [txn.fechaOperacion, txn.fechaLiquidacion] : [];
  row.push(txn.descripcion, formatAmount(txn.cargo), formatAmount(txn.abono));
  return row;
}

function buildCreditRow(txn: CreditTransaction): string[] {
  return [txn.fechaOperacion, txn.fechaCargo, txn.descripcion, formatAmount(txn.monto)];
}

/**
 * Build header row for the movement table
 */
export function buildHeaderRow(accountType: ParsedMovements['accountType'], includeDates = true): string[] {
  if (accountType === 'credito') {
    return [
      CREDIT_COLUMNS.operationDate,
      CREDIT_COLUMNS.chargeDate,
      CREDIT_COLUMNS.description,
      CREDIT_COLUMNS.amount,
    ];
  }

  const headers: string[] = includeDates
    ? [DEBIT_COLUMNS.operationDate, DEBIT_COLUMNS.settlementDate]
    : [];
  headers.push(DEBIT_COLUMNS.description, DEBIT_COLUMNS.charge, DEBIT_COLUMNS.credit);
  return headers;
}

/**
 * Export parsed movements to CSV format, one row per transaction in
 * statement order.
 * 
 * @returns CSV text string
 */
export function exportCsv(
  movements: ParsedMovements,
  options: CsvExportOptions = {}
): string {
  const opts: Required<CsvExportOptions> = {
    includeHeader: options.includeHeader ?? true,
    delimiter: options.delimiter ?? ',',
    includeDates: options.includeDates ?? true,
  };
  
  const lines: string[] = [];
  
  if (opts.includeHeader) {
    lines.push(rowToCsvLine(buildHeaderRow(movements.accountType, opts.includeDates), opts.delimiter));
  }
  
  if (movements.accountType === 'debito') {
    for (const txn of movements.transactions) {
      lines.push(rowToCsvLine(buildDebitRow(txn, opts.includeDates), opts.delimiter));
    }
  } else {
    for (const txn of movements.transactions) {
      lines.push(rowToCsvLine(buildCreditRow(txn), opts.delimiter));
    }
  }
  
  return lines.join('\n');
}

/**
 * Export the totals table (Concepto, Monto) to CSV format.
 */
export function exportTotalsCsv(
  movements: ParsedMovements,
  options: Pick<CsvExportOptions, 'includeHeader' | 'delimiter'> = {}
): string {
  const delimiter = options.delimiter ?? ',';
  const lines: string[] = [];

  if (options.includeHeader ?? true) {
    lines.push(rowToCsvLine([TOTALS_COLUMNS.concept, TOTALS_COLUMNS.amount], delimiter));
  }

  for (const row of totalsToRows(movements)) {
    lines.push(rowToCsvLine([row.concepto, formatAmount(row.monto)], delimiter));
  }

  return lines.join('\n');
}
