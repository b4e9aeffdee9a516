/**
 * Monetary token grammar: 1-3 leading digits, optional comma-grouped
 * thousands, a decimal point and exactly two fractional digits.
 */
export const NUMERIC_TOKEN_SOURCE = String.raw`\d{1,3}(?:,\d{3})*\.\d{2}`;

const NUMERIC_TOKEN_PATTERN = new RegExp(NUMERIC_TOKEN_SOURCE, 'g');

export function extractNumericTokens(text: string): string[] {
  return text.match(NUMERIC_TOKEN_PATTERN) ?? [];
}

export function stripNumericTokens(text: string): string {
  return text.replace(NUMERIC_TOKEN_PATTERN, '');
}

export function parseNumericToken(token: string): number | null {
  if (token === '') {
    return null;
  }

  const num = parseFloat(token.replace(/,/g, ''));
  return isNaN(num) ? null : num;
}

export function roundToTwoDecimals(num: number): number {
  return Math.round(num * 100) / 100;
}

export function formatCurrency(amount: number): string {
  const absAmount = Math.abs(amount);
  const formatted = absAmount.toLocaleString('es-MX', {
    style: 'currency',
    currency: 'MXN',
  });
  return amount < 0 ? `-${formatted}` : formatted;
}

export function sumAmounts(amounts: number[]): number {
  return roundToTwoDecimals(amounts.reduce((sum, amt) => sum + amt, 0));
}
