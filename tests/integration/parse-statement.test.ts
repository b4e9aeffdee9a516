import { describe, it, expect } from 'vitest';
import { parseStatement } from '@edocta/statement-parser';
import { computeTotals, exportTotalsCsv } from '@edocta/output';
import { ParsedMovementsSchema } from '@edocta/types';

const debitStatementLines = [
  'BBVA MÉXICO, S.A.',
  'Estado de Cuenta',
  'Detalle de Movimientos Realizados',
  'FECHA OPER LIQ DESCRIPCION REFERENCIA CARGOS ABONOS OPERACION LIQUIDACION',
  '02/ENE 02/ENE SPEI RECIBIDO BANORTE 1,500.00 11,500.00 11,500.00',
  'Referencia 0184920001',
  'JUAN PEREZ',
  '05/ENE 05/ENE PAGO TARJETA DE CREDITO',
  '850.00 10,650.00 10,650.00',
  'CUENTA: 1234',
  '09/ENE 09/ENE COMISION',
  '10/ENE 10/ENE DEPOSITO EN EFECTIVO 2,000.00',
  '',
  'Referencia: 00112233',
];

const creditStatementLines = [
  'TARJETA DE CRÉDITO BBVA',
  'Fecha de la operación Fecha de cargo Descripción del movimiento Monto',
  '03-mar-2025 04-mar-2025 AMAZON MX - $529.00',
  '05-mar-2025 05-mar-2025 PAGO TARJETA + $2,000.00',
  '07-mar-2025 08-mar-2025 UBER *TRIP - $89.90',
  'Total cargos $618.90',
];

describe('parseStatement', () => {
  it('should group a debit statement into transactions', () => {
    const result = parseStatement(debitStatementLines, { accountType: 'debito' });

    expect(result.accountType).toBe('debito');
    expect(result.transactions).toEqual([
      {
        fechaOperacion: '02/ENE',
        fechaLiquidacion: '02/ENE',
        descripcion: 'SPEI RECIBIDO BANORTE JUAN PEREZ',
        cargo: null,
        abono: 1500,
      },
      {
        fechaOperacion: '05/ENE',
        fechaLiquidacion: '05/ENE',
        descripcion: 'PAGO TARJETA DE CREDITO CUENTA: 1234',
        cargo: 850,
        abono: null,
      },
      {
        fechaOperacion: '10/ENE',
        fechaLiquidacion: '10/ENE',
        descripcion: 'DEPOSITO EN EFECTIVO',
        cargo: null,
        abono: 2000,
      },
    ]);
    expect(result.warnings).toEqual(['Discarded 1 debit record(s) without cargo or abono']);
  });

  it('should match a credit statement line by line', () => {
    const result = parseStatement(creditStatementLines, { accountType: 'credito' });

    expect(result.accountType).toBe('credito');
    expect(result.transactions).toEqual([
      { fechaOperacion: '03-mar-2025', fechaCargo: '04-mar-2025', descripcion: 'AMAZON MX', monto: -529 },
      { fechaOperacion: '05-mar-2025', fechaCargo: '05-mar-2025', descripcion: 'PAGO TARJETA', monto: 2000 },
      { fechaOperacion: '07-mar-2025', fechaCargo: '08-mar-2025', descripcion: 'UBER *TRIP', monto: -89.9 },
    ]);
    expect(result.warnings).toEqual([]);
  });

  it('should report an empty result through the warnings', () => {
    const result = parseStatement(creditStatementLines, { accountType: 'debito' });

    expect(result.transactions).toEqual([]);
    expect(result.warnings).toEqual(['No transactions found']);
  });

  it('should produce output that satisfies the movements schema', () => {
    const debit = parseStatement(debitStatementLines, { accountType: 'debito' });
    const credit = parseStatement(creditStatementLines, { accountType: 'credito' });

    expect(ParsedMovementsSchema.safeParse(debit).success).toBe(true);
    expect(ParsedMovementsSchema.safeParse(credit).success).toBe(true);
  });

  it('should total a debit statement by column', () => {
    const result = parseStatement(debitStatementLines, { accountType: 'debito' });

    expect(computeTotals(result)).toEqual({ totalAbonos: 3500, totalCargos: 850 });
    expect(exportTotalsCsv(result)).toBe('Concepto,Monto\nTotal abonos,3500.00\nTotal cargos,850.00');
  });

  it('should total a credit statement by sign', () => {
    const result = parseStatement(creditStatementLines, { accountType: 'credito' });

    expect(computeTotals(result)).toEqual({ totalCargos: 2000, totalAbonos: 618.9 });
    expect(exportTotalsCsv(result)).toBe('Concepto,Monto\nTotal cargos,2000.00\nTotal abonos,618.90');
  });
});
