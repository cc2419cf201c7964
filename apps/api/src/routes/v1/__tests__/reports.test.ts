/**
 * Tests for the read-only ledger views: summary, reports, budgets
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { Hono } from 'hono';
import type { AppBindings } from '../../../types/context.js';
import { addTransaction, createTestApp, makeRequest } from '../../../test/helpers.js';

async function seedMonth(app: Hono<AppBindings>) {
  await addTransaction(app, { date: '2024-01-01', description: 'Salary', amount: 5000, category: 'Salary', type: 'Income' });
  await addTransaction(app, { date: '2024-01-03', description: 'Groceries', amount: 200, category: 'Food', type: 'Expense' });
  await addTransaction(app, { date: '2024-01-02', description: 'Bus', amount: 50, category: 'Transport', type: 'Expense' });
}

describe('Ledger views', () => {
  let app: Hono<AppBindings>;

  beforeEach(() => {
    ({ app } = createTestApp());
  });

  describe('GET /v1/summary', () => {
    it('should report zero totals for a new session', async () => {
      const response = await makeRequest(app, 'GET', '/v1/summary');

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({
        transactionCount: 0,
        totalIncome: 0,
        totalExpenses: 0,
        balance: 0,
        formatted: { totalIncome: 'Rp. 0', totalExpenses: 'Rp. 0', balance: 'Rp. 0' },
      });
    });

    it('should report totals with Rupiah formatting', async () => {
      await seedMonth(app);

      const response = await makeRequest(app, 'GET', '/v1/summary');

      expect(await response.json()).toEqual({
        transactionCount: 3,
        totalIncome: 5000,
        totalExpenses: 250,
        balance: 4750,
        formatted: { totalIncome: 'Rp. 5.000', totalExpenses: 'Rp. 250', balance: 'Rp. 4.750' },
      });
    });
  });

  describe('GET /v1/reports/expenses-by-category', () => {
    it('should return empty categories and null statistics without expenses', async () => {
      await addTransaction(app, { date: '2024-01-01', amount: 100, category: 'Salary', type: 'Income' });

      const response = await makeRequest(app, 'GET', '/v1/reports/expenses-by-category');

      expect(await response.json()).toEqual({ categories: {}, statistics: null });
    });

    it('should group expenses and summarise them', async () => {
      await seedMonth(app);

      const response = await makeRequest(app, 'GET', '/v1/reports/expenses-by-category');

      expect(await response.json()).toEqual({
        categories: { Food: 200, Transport: 50 },
        statistics: {
          total: 250,
          averagePerCategory: 125,
          topCategory: { category: 'Food', amount: 200 },
          shares: { Food: 80, Transport: 20 },
        },
      });
    });
  });

  describe('GET /v1/reports/balance-series', () => {
    it('should return the running balance in date order', async () => {
      await seedMonth(app);

      const response = await makeRequest(app, 'GET', '/v1/reports/balance-series');

      expect(await response.json()).toEqual({
        points: [
          { date: '2024-01-01', balance: 5000 },
          { date: '2024-01-02', balance: 4950 },
          { date: '2024-01-03', balance: 4750 },
        ],
      });
    });
  });

  describe('POST /v1/budgets/compare', () => {
    it('should flag over-budget categories and skip unset budgets', async () => {
      await seedMonth(app);

      const response = await makeRequest(app, 'POST', '/v1/budgets/compare', {
        body: { budgets: { Food: 150, Transport: 100, Bills: 0 } },
      });

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({
        results: [
          { category: 'Food', actual: 200, budget: 150, status: 'OverBudget' },
          { category: 'Transport', actual: 50, budget: 100, status: 'UnderBudget' },
        ],
      });
    });

    it('should treat a zero budget as not configured', async () => {
      await seedMonth(app);

      const response = await makeRequest(app, 'POST', '/v1/budgets/compare', {
        body: { budgets: { Food: 0 } },
      });

      expect(await response.json()).toEqual({ results: [] });
    });

    it('should reject negative budgets', async () => {
      const response = await makeRequest(app, 'POST', '/v1/budgets/compare', {
        body: { budgets: { Food: -1 } },
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({
        issues: [{ path: ['budgets', 'Food'], message: 'Budget cannot be negative' }],
      });
    });

    it('should reject a budget keyed by a reserved category name instead of dropping it', async () => {
      const response = await makeRequest(app, 'POST', '/v1/budgets/compare', {
        body: '{"budgets":{"__proto__":5,"Food":10}}',
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({
        error: 'Validation failed',
        issues: [{ path: ['budgets', '__proto__'], message: 'Category name is reserved' }],
      });
    });
  });
});
