/**
 * HTTP test helpers
 * Builds an isolated app per test and drives it in process through app.fetch
 */

import type { Env, Hono } from 'hono';
import { createLogger, SESSION_HEADER } from '@kasbook/observability';
import { createApp } from '../app.js';
import { LedgerRegistry } from '../lib/ledger-registry.js';

export const TEST_SESSION = 'test-session-0001';

/**
 * Request options for test helpers
 */
export interface RequestOptions {
  body?: unknown;
  headers?: Record<string, string>;
  session?: string | null;
}

/**
 * Fresh app with its own registry and a silent logger
 */
export function createTestApp(maxSessions = 10) {
  const registry = new LedgerRegistry({ maxSessions });
  const app = createApp({
    registry,
    logger: createLogger({ level: 'silent' }),
    webAppUrl: 'http://localhost:5173',
  });
  return { app, registry };
}

/**
 * Make an HTTP request to the Hono app
 *
 * Sends TEST_SESSION as the session header unless `session` is given;
 * pass `session: null` to send no session header at all.
 */
export async function makeRequest<E extends Env>(
  app: Hono<E>,
  method: string,
  path: string,
  options: RequestOptions = {}
): Promise<Response> {
  const { body, headers = {}, session = TEST_SESSION } = options;

  const init: RequestInit = {
    method: method.toUpperCase(),
    headers: {
      'Content-Type': 'application/json',
      ...(session !== null && { [SESSION_HEADER]: session }),
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = typeof body === 'string' ? body : JSON.stringify(body);
  }

  const request = new Request(`http://localhost${path}`, init);
  return app.fetch(request);
}

/**
 * POST a transaction and fail the test if it was not accepted
 */
export async function addTransaction<E extends Env>(
  app: Hono<E>,
  transaction: {
    date: string;
    description?: string;
    amount: number;
    category: string;
    type: string;
  },
  session: string = TEST_SESSION
): Promise<void> {
  const response = await makeRequest(app, 'POST', '/v1/transactions', { body: transaction, session });
  if (response.status !== 201) {
    throw new Error(`Expected 201 adding transaction, got ${response.status}: ${await response.text()}`);
  }
}
