/**
 * POST /v1/reset - Clear every transaction in the session's ledger
 *
 * The session id stays valid; its ledger is simply empty afterwards
 */

import { Hono } from 'hono';
import type { AppBindings } from '../../types/context.js';

const resetRoute = new Hono<AppBindings>();

resetRoute.post('/', (c) => {
  const cleared = c.get('ledger').clear();

  c.get('logger').info({ cleared }, 'Ledger reset');

  return c.json({ cleared });
});

export { resetRoute };
