/**
 * POST /v1/transactions - Record a transaction
 *
 * The body is shape-checked with zod; the amount and type rules belong to
 * the ledger, whose rejections are mapped to 400 responses
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { CreateTransactionRequestSchema } from '@kasbook/types';
import { ledgerErrorBody, ledgerErrorStatus } from '../../../lib/ledger-errors.js';
import type { AppBindings } from '../../../types/context.js';

const createTransactionRoute = new Hono<AppBindings>();

createTransactionRoute.post(
  '/',
  zValidator('json', CreateTransactionRequestSchema, (result, c) => {
    if (!result.success) {
      return c.json({ error: 'Validation failed', issues: result.error.issues }, 400);
    }
  }),
  (c) => {
    const ledger = c.get('ledger');
    const log = c.get('logger');
    const input = c.req.valid('json');

    const result = ledger.add(input);

    if (!result.success) {
      log.warn({ code: result.error.code, amount: input.amount, type: input.type }, 'Transaction rejected');
      return c.json(ledgerErrorBody(result.error), ledgerErrorStatus(result.error));
    }

    const { index, transaction } = result.data;
    log.info(
      { index, type: transaction.type, category: transaction.category, amount: transaction.amount },
      'Transaction added'
    );

    return c.json({ index, transaction }, 201);
  }
);

export { createTransactionRoute };
