export {
  AccountTypeSchema,
  DebitTransactionSchema,
  CreditTransactionSchema,
  ParsedMovementsSchema,
  StatementTotalsSchema,
  StatementOutputSchema,
  ParserOptionsSchema,
} from './statement.js';

export type {
  AccountType,
  DebitTransaction,
  CreditTransaction,
  ParsedMovements,
  StatementTotals,
  StatementOutput,
  ParserOptions,
} from './statement.js';
