/**
 * XLSX Exporter Module
 *
 * Writes a workbook with two sheets: "Movimientos" (one row per transaction)
 * and "Totales" (Concepto / Monto).
 */

import * as XLSX from 'xlsx';
import {
  parseCreditDate,
  SHEET_NAMES,
  TOTALS_COLUMNS,
  type ParsedMovements,
} from '@edocta/types';
import { buildHeaderRow } from './csv-exporter.js';
import { totalsToRows } from './totals.js';

type CellValue = string | number | null;

const DATE_FORMAT = 'dd/mm/yyyy';
const MS_PER_DAY = 86_400_000;
/** Days between the Excel epoch (1899-12-30) and the Unix epoch */
const EXCEL_EPOCH_OFFSET = 25_569;

/**
 * Credit statement dates become numeric date cells carrying the statement's
 * calendar day; anything else is written as the raw token. The serial is
 * computed from UTC parts so the host timezone never shifts the day.
 */
function toDateCell(token: string): XLSX.CellObject {
  const iso = parseCreditDate(token);
  if (iso === null) {
    return { t: 's', v: token };
  }
  return { t: 'n', v: Date.parse(iso) / MS_PER_DAY + EXCEL_EPOCH_OFFSET, z: DATE_FORMAT };
}

function buildMovementRows(movements: ParsedMovements): CellValue[][] {
  const rows: CellValue[][] = [buildHeaderRow(movements.accountType)];

  if (movements.accountType === 'debito') {
    for (const txn of movements.transactions) {
      rows.push([txn.fechaOperacion, txn.fechaLiquidacion, txn.descripcion, txn.cargo, txn.abono]);
    }
  } else {
    // Date columns are filled in by writeCreditDates
    for (const txn of movements.transactions) {
      rows.push([null, null, txn.descripcion, txn.monto]);
    }
  }

  return rows;
}

function writeCreditDates(sheet: XLSX.WorkSheet, movements: ParsedMovements): void {
  if (movements.accountType !== 'credito') {
    return;
  }
  movements.transactions.forEach((txn, index) => {
    const r = index + 1;
    sheet[XLSX.utils.encode_cell({ r, c: 0 })] = toDateCell(txn.fechaOperacion);
    sheet[XLSX.utils.encode_cell({ r, c: 1 })] = toDateCell(txn.fechaCargo);
  });
}

/**
 * Build the two-sheet workbook for a parsed statement.
 */
export function buildWorkbook(movements: ParsedMovements): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();

  const movementSheet = XLSX.utils.aoa_to_sheet(buildMovementRows(movements));
  writeCreditDates(movementSheet, movements);
  XLSX.utils.book_append_sheet(workbook, movementSheet, SHEET_NAMES.movements);

  const totalsRows: CellValue[][] = [[TOTALS_COLUMNS.concept, TOTALS_COLUMNS.amount]];
  for (const row of totalsToRows(movements)) {
    totalsRows.push([row.concepto, row.monto]);
  }
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(totalsRows), SHEET_NAMES.totals);

  return workbook;
}

/**
 * Serialize the workbook for a parsed statement to XLSX bytes.
 */
export function exportXlsx(movements: ParsedMovements): Buffer {
  const output: unknown = XLSX.write(buildWorkbook(movements), { type: 'buffer', bookType: 'xlsx' });
  if (!Buffer.isBuffer(output)) {
    throw new Error('XLSX writer did not return a buffer');
  }
  return output;
}
