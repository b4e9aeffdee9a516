import { NUMERIC_TOKEN_SOURCE } from '@edocta/types';

export const DEBIT_PATTERNS = {
  header: /^(\d{2}\/[A-Z]{3})\s+(\d{2}\/[A-Z]{3})\s+(.*)/,
  referenceLine: 'referencia',
  transferReceived: 'SPEI RECIBIDO',
};

// 03-mar-2025 03-mar-2025 COMPRA TIENDA + $529.00
export const CREDIT_PATTERNS = {
  transactionLine: new RegExp(
    String.raw`^(?<fechaOperacion>\d{2}-[A-Za-z]{3}-\d{4})\s+` +
      String.raw`(?<fechaCargo>\d{2}-[A-Za-z]{3}-\d{4})\s+` +
      String.raw`(?<descripcion>.+?)\s+(?<sign>[+-])\s*\$?\s*(?<amount>${NUMERIC_TOKEN_SOURCE})$`
  ),
};
