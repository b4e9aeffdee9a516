import { describe, it, expect, afterEach } from 'vitest';
import * as XLSX from 'xlsx';
import { buildWorkbook, exportXlsx } from '@edocta/output';
import type { ParsedMovements } from '@edocta/types';

const debitMovements: ParsedMovements = {
  accountType: 'debito',
  transactions: [
    { fechaOperacion: '01/ENE', fechaLiquidacion: '02/ENE', descripcion: 'PAGO SERVICIO', cargo: null, abono: 1234.56 },
    { fechaOperacion: '05/ENE', fechaLiquidacion: '05/ENE', descripcion: 'PAGO TARJETA', cargo: 500, abono: null },
  ],
};

const creditMovements: ParsedMovements = {
  accountType: 'credito',
  transactions: [
    { fechaOperacion: '03-Mar-2025', fechaCargo: '04-Mar-2025', descripcion: 'COMPRA TIENDA', monto: -529 },
    { fechaOperacion: '03-Xyz-2025', fechaCargo: '04-Mar-2025', descripcion: 'AJUSTE', monto: 10 },
  ],
};

describe('buildWorkbook', () => {
  it('should create the movements and totals sheets', () => {
    const workbook = buildWorkbook(debitMovements);

    expect(workbook.SheetNames).toEqual(['Movimientos', 'Totales']);
  });

  it('should write debit rows and leave unset amounts empty', () => {
    const sheet = buildWorkbook(debitMovements).Sheets['Movimientos'];

    expect(sheet?.['A1']?.v).toBe('Fecha Oper');
    expect(sheet?.['E1']?.v).toBe('Abono');
    expect(sheet?.['C2']?.v).toBe('PAGO SERVICIO');
    expect(sheet?.['D2']).toBeUndefined();
    expect(sheet?.['E2']?.v).toBe(1234.56);
    expect(sheet?.['D3']?.v).toBe(500);
    expect(sheet?.['E3']).toBeUndefined();
  });

  it('should write the totals sheet', () => {
    const sheet = buildWorkbook(debitMovements).Sheets['Totales'];

    expect(sheet?.['A1']?.v).toBe('Concepto');
    expect(sheet?.['B1']?.v).toBe('Monto');
    expect(sheet?.['A2']?.v).toBe('Total abonos');
    expect(sheet?.['B2']?.v).toBe(1234.56);
    expect(sheet?.['A3']?.v).toBe('Total cargos');
    expect(sheet?.['B3']?.v).toBe(500);
  });

  it('should write parseable credit dates as date cells', () => {
    const sheet = buildWorkbook(creditMovements).Sheets['Movimientos'];

    expect(sheet?.['A1']?.v).toBe('Fecha de la operación');
    expect(sheet?.['A2']).toEqual({ t: 'n', v: 45719, z: 'dd/mm/yyyy' });
    expect(sheet?.['B2']).toEqual({ t: 'n', v: 45720, z: 'dd/mm/yyyy' });
    expect(sheet?.['C2']?.v).toBe('COMPRA TIENDA');
    expect(sheet?.['D2']?.v).toBe(-529);
  });

  it('should keep unparseable credit dates as text', () => {
    const sheet = buildWorkbook(creditMovements).Sheets['Movimientos'];

    expect(sheet?.['A3']?.t).toBe('s');
    expect(sheet?.['A3']?.v).toBe('03-Xyz-2025');
  });
});

describe('exportXlsx', () => {
  it('should serialize the workbook as a zip container', () => {
    const buffer = exportXlsx(debitMovements);

    expect(buffer.length).toBeGreaterThan(0);
    expect(buffer.subarray(0, 2).toString('latin1')).toBe('PK');
  });

  describe('credit dates', () => {
    const originalTz = process.env['TZ'];

    afterEach(() => {
      if (originalTz === undefined) {
        delete process.env['TZ'];
      } else {
        process.env['TZ'] = originalTz;
      }
    });

    it('should keep the statement day when read back west of UTC', () => {
      process.env['TZ'] = 'America/Mexico_City';

      const workbook = XLSX.read(exportXlsx(creditMovements), { type: 'buffer' });
      const sheet = workbook.Sheets['Movimientos'];
      const operacion: unknown = sheet?.['A2']?.v;
      const cargo: unknown = sheet?.['B2']?.v;

      expect(operacion).toBe(45719);
      expect(cargo).toBe(45720);
      if (typeof operacion !== 'number' || typeof cargo !== 'number') {
        throw new Error('expected numeric date cells');
      }
      const opDate = XLSX.SSF.parse_date_code(operacion);
      const cargoDate = XLSX.SSF.parse_date_code(cargo);
      expect([opDate.y, opDate.m, opDate.d]).toEqual([2025, 3, 3]);
      expect([cargoDate.y, cargoDate.m, cargoDate.d]).toEqual([2025, 3, 4]);
    });
  });
});
