/**
 * Report routes
 * - GET /v1/reports/expenses-by-category - expense breakdown and statistics
 * - GET /v1/reports/balance-series - running balance in date order
 */

import { Hono } from 'hono';
import { summarizeExpenses } from '@kasbook/core';
import type { AppBindings } from '../../types/context.js';

const reportsRoute = new Hono<AppBindings>();

reportsRoute.get('/expenses-by-category', (c) => {
  const categories = c.get('ledger').expensesByCategory();

  return c.json({
    categories,
    statistics: summarizeExpenses(categories),
  });
});

reportsRoute.get('/balance-series', (c) => {
  return c.json({ points: c.get('ledger').cumulativeBalanceSeries() });
});

export { reportsRoute };
