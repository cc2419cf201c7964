/**
 * DELETE /v1/transactions/:index - Remove a transaction by position
 *
 * Later transactions shift down by one; clients should re-list afterwards
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { TransactionIndexParamSchema } from '@kasbook/types';
import { ledgerErrorBody, ledgerErrorStatus } from '../../../lib/ledger-errors.js';
import type { AppBindings } from '../../../types/context.js';

const deleteTransactionRoute = new Hono<AppBindings>();

deleteTransactionRoute.delete(
  '/:index',
  zValidator('param', TransactionIndexParamSchema, (result, c) => {
    if (!result.success) {
      return c.json({ error: 'Validation failed', issues: result.error.issues }, 400);
    }
  }),
  (c) => {
    const ledger = c.get('ledger');
    const log = c.get('logger');
    const { index } = c.req.valid('param');

    const result = ledger.delete(index);

    if (!result.success) {
      log.warn({ code: result.error.code, index }, 'Transaction delete rejected');
      return c.json(ledgerErrorBody(result.error), ledgerErrorStatus(result.error));
    }

    log.info({ index, remaining: ledger.size }, 'Transaction deleted');
    return c.json({ deleted: result.data });
  }
);

export { deleteTransactionRoute };
