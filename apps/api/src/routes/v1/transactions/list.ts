/**
 * GET /v1/transactions - List the session's transactions
 *
 * Entries come back in insertion order with their current positional index,
 * which is the handle DELETE /v1/transactions/:index expects
 */

import { Hono } from 'hono';
import type { ListTransactionsResponse } from '@kasbook/types';
import type { AppBindings } from '../../../types/context.js';

const listTransactionsRoute = new Hono<AppBindings>();

listTransactionsRoute.get('/', (c) => {
  const ledger = c.get('ledger');

  const response: ListTransactionsResponse = {
    transactions: ledger.list().map((transaction, index) => ({ index, ...transaction })),
  };

  return c.json(response);
});

export { listTransactionsRoute };
