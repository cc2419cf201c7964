/**
 * GET /v1/summary - Headline totals for the overview page
 *
 * Raw numbers for computation plus Rupiah strings for display
 */

import { Hono } from 'hono';
import { formatRupiah } from '@kasbook/core';
import type { AppBindings } from '../../types/context.js';

const summaryRoute = new Hono<AppBindings>();

summaryRoute.get('/', (c) => {
  const ledger = c.get('ledger');

  const totalIncome = ledger.totalIncome();
  const totalExpenses = ledger.totalExpenses();
  const balance = ledger.balance();

  return c.json({
    transactionCount: ledger.size,
    totalIncome,
    totalExpenses,
    balance,
    formatted: {
      totalIncome: formatRupiah(totalIncome),
      totalExpenses: formatRupiah(totalExpenses),
      balance: formatRupiah(balance),
    },
  });
});

export { summaryRoute };
