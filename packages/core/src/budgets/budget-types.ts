/**
 * Budget Domain Types
 */

export type BudgetStatus = 'OverBudget' | 'UnderBudget';

/**
 * Category → configured budget. A missing key or 0 means "not configured".
 */
export type BudgetMap = Readonly<Record<string, number>>;

export interface BudgetComparison {
  category: string;
  actual: number;
  budget: number;
  status: BudgetStatus;
}

export interface ExpenseStatistics {
  total: number;
  averagePerCategory: number;
  topCategory: { category: string; amount: number };
  /** Percentage of `total`, rounded to 2 decimals */
  shares: Record<string, number>;
}
