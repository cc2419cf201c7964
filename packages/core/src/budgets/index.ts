/**
 * Budgets Domain
 */

export { compareBudgets, summarizeExpenses } from './budget-analysis.js';
export type {
  BudgetComparison,
  BudgetMap,
  BudgetStatus,
  ExpenseStatistics,
} from './budget-types.js';
