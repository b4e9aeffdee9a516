/**
 * Output module - totals and conversion of parsed movements to export formats.
 */

export {
  computeTotals,
  totalsToRows,
  type TotalsRow,
} from './totals.js';

export {
  exportCsv,
  exportTotalsCsv,
  buildHeaderRow,
  type CsvExportOptions,
} from './csv-exporter.js';

export {
  buildWorkbook,
  exportXlsx,
} from './xlsx-exporter.js';
