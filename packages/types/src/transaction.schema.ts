/**
 * Transaction schemas for ledger entry creation and listing
 * Used for request/response validation and type generation
 */

import { z } from 'zod';

/**
 * Calendar date in ISO-8601 form (YYYY-MM-DD), no time component
 */
export const CalendarDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be formatted as YYYY-MM-DD')
  .refine((value) => {
    const parsed = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
  }, 'Date is not a valid calendar date');

/**
 * Request schema for adding a transaction
 * - amount and type are only shape-checked here; the ledger owns the
 *   positive-amount and Income/Expense rules and reports them itself
 * - description defaults to an empty string
 */
export const CreateTransactionRequestSchema = z.object({
  date: CalendarDateSchema,
  description: z.string().max(500, 'Description must be 500 characters or less').default(''),
  amount: z.number({ invalid_type_error: 'Amount must be a number' }),
  category: z.string().min(1, 'Category is required').max(100),
  type: z.string().min(1, 'Type is required'),
});

/**
 * Response schema for a stored transaction
 */
export const TransactionResponseSchema = z.object({
  index: z.number().int().nonnegative(),
  date: z.string(),
  description: z.string(),
  amount: z.number(),
  category: z.string(),
  type: z.enum(['Income', 'Expense']),
});

export const ListTransactionsResponseSchema = z.object({
  transactions: z.array(TransactionResponseSchema),
});

/**
 * Path parameter for positional delete
 */
export const TransactionIndexParamSchema = z.object({
  index: z.coerce
    .number({ invalid_type_error: 'Index must be a number' })
    .int('Index must be a whole number'),
});

export type ListTransactionsResponse = z.infer<typeof ListTransactionsResponseSchema>;
