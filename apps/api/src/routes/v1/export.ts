/**
 * GET /v1/export - Download the session's transactions as CSV
 */

import { Hono } from 'hono';
import { transactionsToCsv } from '@kasbook/core';
import type { AppBindings } from '../../types/context.js';

export const EXPORT_FILENAME = 'transaksi.csv';

const exportRoute = new Hono<AppBindings>();

exportRoute.get('/', (c) => {
  const ledger = c.get('ledger');
  const csv = transactionsToCsv(ledger.list());

  c.get('logger').info({ rows: ledger.size }, 'Transactions exported');

  return c.body(csv, 200, {
    'Content-Type': 'text/csv; charset=utf-8',
    'Content-Disposition': `attachment; filename="${EXPORT_FILENAME}"`,
  });
});

export { exportRoute };
