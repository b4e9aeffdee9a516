export const PARSER_VERSION = '1.0.0';

export const INSTITUTION_NAME = 'BBVA México';

export const DEBIT_COLUMNS = {
  operationDate: 'Fecha Oper',
  settlementDate: 'Fecha Liq',
  description: 'Descripción',
  charge: 'Cargo',
  credit: 'Abono',
} as const;

export const CREDIT_COLUMNS = {
  operationDate: 'Fecha de la operación',
  chargeDate: 'Fecha de cargo',
  description: 'Descripción del movimiento',
  amount: 'Monto',
} as const;

export const TOTALS_COLUMNS = {
  concept: 'Concepto',
  amount: 'Monto',
} as const;

export const TOTALS_LABELS = {
  credits: 'Total abonos',
  charges: 'Total cargos',
} as const;

export const SHEET_NAMES = {
  movements: 'Movimientos',
  totals: 'Totales',
} as const;
