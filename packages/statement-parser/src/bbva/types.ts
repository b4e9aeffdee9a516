export type GrouperState = 'seeking_header' | 'accumulating';

/**
 * In-progress debit record. Only the grouper holds one, and only until the
 * next header line (or end of input) seals it.
 */
export interface DebitDraft {
  fechaOperacion: string;
  fechaLiquidacion: string;
  fragments: string[];
  cargo: number | null;
  abono: number | null;
}

export interface DetectionCounts {
  debitHeaders: number;
  creditLines: number;
}
