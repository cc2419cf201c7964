/**
 * POST /v1/budgets/compare - Compare spending per category with budgets
 *
 * Budgets are supplied per request; they are not stored with the session.
 * Categories without a budget, or with a budget of 0, are left out.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { compareBudgets } from '@kasbook/core';
import { CompareBudgetsRequestSchema } from '@kasbook/types';
import type { AppBindings } from '../../types/context.js';

const budgetsRoute = new Hono<AppBindings>();

budgetsRoute.post(
  '/compare',
  zValidator('json', CompareBudgetsRequestSchema, (result, c) => {
    if (!result.success) {
      return c.json({ error: 'Validation failed', issues: result.error.issues }, 400);
    }
  }),
  (c) => {
    const { budgets } = c.req.valid('json');
    const results = compareBudgets(c.get('ledger').expensesByCategory(), budgets);

    return c.json({ results });
  }
);

export { budgetsRoute };
