import { z } from 'zod';

/**
 * Category → budget amount. Zero means the budget is not configured.
 */
export const BudgetMapSchema = z.record(
  // A parsed record is a plain object, where this key would not be kept
  z.string().min(1).refine((category) => category !== '__proto__', 'Category name is reserved'),
  z.number().nonnegative('Budget cannot be negative')
);

export const CompareBudgetsRequestSchema = z.object({
  budgets: BudgetMapSchema,
});
