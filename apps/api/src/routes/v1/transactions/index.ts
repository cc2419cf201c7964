/**
 * Transaction routes
 * Handles listing, recording and deleting ledger entries
 */

import { Hono } from 'hono';
import type { AppBindings } from '../../../types/context.js';
import { createTransactionRoute } from './create.js';
import { deleteTransactionRoute } from './delete.js';
import { listTransactionsRoute } from './list.js';

const transactionsRoute = new Hono<AppBindings>();

transactionsRoute.route('/', listTransactionsRoute);
transactionsRoute.route('/', createTransactionRoute);
transactionsRoute.route('/', deleteTransactionRoute);

export { transactionsRoute };
