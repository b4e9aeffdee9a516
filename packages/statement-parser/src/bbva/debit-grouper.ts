import {
  extractNumericTokens,
  parseNumericToken,
  stripNumericTokens,
  type DebitTransaction,
} from '@edocta/types';
import { DEBIT_PATTERNS } from './patterns.js';
import type { DebitDraft, GrouperState } from './types.js';

/**
 * Group a debit account's statement lines into transactions.
 *
 * A header line (`DD/MMM DD/MMM rest`) opens a record; every following line
 * up to the next header either supplies the missing amount or extends the
 * description. Lines before the first header are ignored, and a record that
 * never receives an amount is dropped.
 *
 * @param lines - Trimmed text lines in page order
 * @param warnings - Collector for parse warnings
 */
export function groupDebitTransactions(
  lines: readonly string[],
  warnings: string[] = []
): DebitTransaction[] {
  const transactions: DebitTransaction[] = [];
  let state: GrouperState = 'seeking_header';
  let draft: DebitDraft | null = null;
  let discarded = 0;

  const seal = (current: DebitDraft): void => {
    const transaction = sealDraft(current);
    if (transaction === null) {
      discarded++;
    } else {
      transactions.push(transaction);
    }
  };

  for (const line of lines) {
    const header = DEBIT_PATTERNS.header.exec(line);

    if (header !== null) {
      if (state === 'accumulating' && draft !== null) {
        seal(draft);
      }
      draft = openDraft(header);
      state = 'accumulating';
      continue;
    }

    if (state === 'seeking_header' || draft === null) {
      continue;
    }

    accumulateLine(draft, line);
  }

  if (state === 'accumulating' && draft !== null) {
    seal(draft);
  }

  if (discarded > 0) {
    warnings.push(`Discarded ${discarded} debit record(s) without cargo or abono`);
  }

  return transactions;
}

function openDraft(header: RegExpExecArray): DebitDraft {
  const [, fechaOperacion = '', fechaLiquidacion = '', tail = ''] = header;

  const draft: DebitDraft = {
    fechaOperacion,
    fechaLiquidacion,
    fragments: [],
    cargo: null,
    abono: null,
  };

  assignAmount(draft, extractNumericTokens(tail));

  const residual = stripNumericTokens(tail).trim();
  if (residual !== '') {
    draft.fragments.push(residual);
  }

  return draft;
}

function accumulateLine(draft: DebitDraft, line: string): void {
  if (line === '' || line.toLowerCase().includes(DEBIT_PATTERNS.referenceLine)) {
    return;
  }

  const tokens = extractNumericTokens(line);
  if (tokens.length === 0) {
    draft.fragments.push(line);
    return;
  }

  // Only the first amount line of a record counts
  if (draft.cargo === null && draft.abono === null) {
    assignAmount(draft, tokens);
  }
}

/**
 * One token is an abono; with several, the first is the cargo and the rest
 * (running balances) are dropped.
 */
function assignAmount(draft: DebitDraft, tokens: string[]): void {
  const [first] = tokens;
  if (first === undefined) {
    return;
  }

  const value = parseNumericToken(first);
  if (tokens.length === 1) {
    draft.abono = value;
  } else {
    draft.cargo = value;
  }
}

function sealDraft(draft: DebitDraft): DebitTransaction | null {
  const descripcion = draft.fragments.join(' ');
  let { cargo, abono } = draft;

  // A received SPEI transfer is always an abono, whatever column it lines up under
  if (
    descripcion.toUpperCase().includes(DEBIT_PATTERNS.transferReceived) &&
    cargo !== null &&
    abono === null
  ) {
    abono = cargo;
    cargo = null;
  }

  if (cargo === null && abono === null) {
    return null;
  }

  return {
    fechaOperacion: draft.fechaOperacion,
    fechaLiquidacion: draft.fechaLiquidacion,
    descripcion,
    cargo,
    abono,
  };
}
