import { describe, it, expect } from 'vitest';
import {
  extractNumericTokens,
  stripNumericTokens,
  parseNumericToken,
  roundToTwoDecimals,
  formatCurrency,
  sumAmounts,
} from '@edocta/types';

describe('extractNumericTokens', () => {
  it('should find every amount left to right', () => {
    expect(extractNumericTokens('PAGO 1,234.56 SALDO 10,000.00')).toEqual(['1,234.56', '10,000.00']);
  });

  it('should match amounts without grouping commas', () => {
    expect(extractNumericTokens('1.00')).toEqual(['1.00']);
    expect(extractNumericTokens('COMISION 35.00')).toEqual(['35.00']);
  });

  it('should take at most three leading digits before the decimal point', () => {
    expect(extractNumericTokens('1234.56')).toEqual(['234.56']);
  });

  it('should not match tokens without digits before the decimal point', () => {
    expect(extractNumericTokens('.50')).toEqual([]);
  });

  it('should not match integers or single decimals', () => {
    expect(extractNumericTokens('Referencia: 00112233')).toEqual([]);
    expect(extractNumericTokens('TASA 2.5')).toEqual([]);
  });
});

describe('stripNumericTokens', () => {
  it('should remove amounts and keep the surrounding text', () => {
    expect(stripNumericTokens('PAGO 1,234.56 SALDO')).toBe('PAGO  SALDO');
    expect(stripNumericTokens('PAGO SERVICIO 1,234.56')).toBe('PAGO SERVICIO ');
  });

  it('should leave text without amounts unchanged', () => {
    expect(stripNumericTokens('SPEI RECIBIDO')).toBe('SPEI RECIBIDO');
  });
});

describe('parseNumericToken', () => {
  it('should drop grouping commas', () => {
    expect(parseNumericToken('12,345.67')).toBe(12345.67);
    expect(parseNumericToken('1,000,000.00')).toBe(1000000);
  });

  it('should parse plain amounts', () => {
    expect(parseNumericToken('1.00')).toBe(1);
    expect(parseNumericToken('529.00')).toBe(529);
  });

  it('should return null for an empty token', () => {
    expect(parseNumericToken('')).toBeNull();
  });
});

describe('roundToTwoDecimals', () => {
  it('should round to two decimal places', () => {
    expect(roundToTwoDecimals(100.456)).toBe(100.46);
    expect(roundToTwoDecimals(100.454)).toBe(100.45);
    expect(roundToTwoDecimals(100)).toBe(100);
  });
});

describe('formatCurrency', () => {
  it('should format positive amounts', () => {
    expect(formatCurrency(1234.56)).toBe('$1,234.56');
    expect(formatCurrency(100)).toBe('$100.00');
  });

  it('should format negative amounts', () => {
    expect(formatCurrency(-1234.56)).toBe('-$1,234.56');
  });
});

describe('sumAmounts', () => {
  it('should sum amounts correctly', () => {
    expect(sumAmounts([100, 200, 300])).toBe(600);
    expect(sumAmounts([100.10, 200.20, 300.30])).toBe(600.6);
  });

  it('should handle empty array', () => {
    expect(sumAmounts([])).toBe(0);
  });
});
