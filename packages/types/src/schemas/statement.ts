import { z } from 'zod';

export const AccountTypeSchema = z.enum(['debito', 'credito']);
export type AccountType = z.infer<typeof AccountTypeSchema>;

export const DebitTransactionSchema = z
  .object({
    fechaOperacion: z.string().regex(/^\d{2}\/[A-Z]{3}$/, 'Date must be in DD/MMM format'),
    fechaLiquidacion: z.string().regex(/^\d{2}\/[A-Z]{3}$/, 'Date must be in DD/MMM format'),
    descripcion: z.string(),
    cargo: z.number().nonnegative().nullable(),
    abono: z.number().nonnegative().nullable(),
  })
  .refine((txn) => txn.cargo !== null || txn.abono !== null, {
    message: 'Either cargo or abono must be set',
  });
export type DebitTransaction = z.infer<typeof DebitTransactionSchema>;

export const CreditTransactionSchema = z.object({
  fechaOperacion: z.string().regex(/^\d{2}-[A-Za-z]{3}-\d{4}$/, 'Date must be in DD-Mon-YYYY format'),
  fechaCargo: z.string().regex(/^\d{2}-[A-Za-z]{3}-\d{4}$/, 'Date must be in DD-Mon-YYYY format'),
  descripcion: z.string().min(1),
  monto: z.number().refine((value) => value !== 0, 'Monto must be nonzero'),
});
export type CreditTransaction = z.infer<typeof CreditTransactionSchema>;

export const ParsedMovementsSchema = z.discriminatedUnion('accountType', [
  z.object({
    accountType: z.literal('debito'),
    transactions: z.array(DebitTransactionSchema),
  }),
  z.object({
    accountType: z.literal('credito'),
    transactions: z.array(CreditTransactionSchema),
  }),
]);
export type ParsedMovements = z.infer<typeof ParsedMovementsSchema>;

export const StatementTotalsSchema = z.object({
  totalAbonos: z.number().nonnegative(),
  totalCargos: z.number().nonnegative(),
});
export type StatementTotals = z.infer<typeof StatementTotalsSchema>;

export const StatementOutputSchema = z.object({
  source: z.object({
    fileName: z.string().min(1),
    totalPages: z.number().int().nonnegative(),
  }),
  parserVersion: z.string(),
  parsedAt: z.string().datetime(),
  movements: ParsedMovementsSchema,
  totals: StatementTotalsSchema,
  warnings: z.array(z.string()),
});
export type StatementOutput = z.infer<typeof StatementOutputSchema>;

export const ParserOptionsSchema = z.object({
  accountType: AccountTypeSchema,
});
export type ParserOptions = z.infer<typeof ParserOptionsSchema>;
