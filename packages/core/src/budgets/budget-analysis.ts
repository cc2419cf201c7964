/**
 * Budget analysis
 *
 * Pure functions over the ledger's per-category expense totals.
 * Nothing here reads or writes ledger state.
 */

import type { ExpensesByCategory } from '../ledger/ledger-types.js';
import type { BudgetComparison, BudgetMap, ExpenseStatistics } from './budget-types.js';

/**
 * Compare actual spending against configured budgets
 *
 * Business rules:
 * - Only categories that have expenses are evaluated
 * - A budget of 0 (or no budget) is treated as not configured and skipped
 * - Spending equal to the budget is still UnderBudget
 *
 * @returns One entry per evaluated category, in the order of `expenses`
 */
export function compareBudgets(
  expenses: ExpensesByCategory,
  budgets: BudgetMap
): BudgetComparison[] {
  const results: BudgetComparison[] = [];

  for (const [category, actual] of Object.entries(expenses)) {
    const budget = Object.hasOwn(budgets, category) ? budgets[category] ?? 0 : 0;
    if (!(budget > 0)) continue;

    results.push({
      category,
      actual,
      budget,
      status: actual > budget ? 'OverBudget' : 'UnderBudget',
    });
  }

  return results;
}

/**
 * Headline numbers for the expense breakdown
 *
 * @returns null when there are no expenses to summarise
 */
export function summarizeExpenses(expenses: ExpensesByCategory): ExpenseStatistics | null {
  const entries = Object.entries(expenses);
  const [first] = entries;
  if (!first) {
    return null;
  }

  const total = entries.reduce((sum, [, amount]) => sum + amount, 0);

  let top = { category: first[0], amount: first[1] };
  for (const [category, amount] of entries) {
    // Strictly greater: the first category wins a tie
    if (amount > top.amount) {
      top = { category, amount };
    }
  }

  return {
    total,
    averagePerCategory: total / entries.length,
    topCategory: top,
    // fromEntries defines own keys, so a category named "__proto__" survives
    shares: Object.fromEntries(
      entries.map(([category, amount]) => [category, roundTo(total > 0 ? (amount / total) * 100 : 0, 2)])
    ),
  };
}

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
