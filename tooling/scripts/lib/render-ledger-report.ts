import { formatRupiah, summarizeExpenses, type Ledger } from '@kasbook/core';

/**
 * Plain-text report lines for a ledger: totals, expense breakdown, balance history
 */
export function renderLedgerReport(ledger: Ledger): string[] {
  const lines = [
    `Transactions:   ${ledger.size}`,
    `Total income:   ${formatRupiah(ledger.totalIncome())}`,
    `Total expenses: ${formatRupiah(ledger.totalExpenses())}`,
    `Balance:        ${formatRupiah(ledger.balance())}`,
    '',
    'Expenses by category:',
  ];

  const expenses = ledger.expensesByCategory();
  const stats = summarizeExpenses(expenses);

  if (!stats) {
    lines.push('  (no expenses)');
  } else {
    for (const [category, amount] of Object.entries(expenses)) {
      lines.push(`  ${category}: ${formatRupiah(amount)} (${stats.shares[category] ?? 0}%)`);
    }
    lines.push(
      `  Highest: ${stats.topCategory.category} (${formatRupiah(stats.topCategory.amount)})`,
      `  Average per category: ${formatRupiah(stats.averagePerCategory)}`
    );
  }

  lines.push('', 'Balance over time:');
  const series = ledger.cumulativeBalanceSeries();
  if (series.length === 0) {
    lines.push('  (no transactions)');
  }
  for (const point of series) {
    lines.push(`  ${point.date}  ${formatRupiah(point.balance)}`);
  }

  return lines;
}
