import type { Ledger } from '@kasbook/core';
import type { Logger } from '@kasbook/observability';

/**
 * Shared Hono context variables for API requests.
 */
export type ContextVariables = {
  requestId: string;
  logger: Logger;
  sessionId: string;
  ledger: Ledger;
};

export type AppBindings = {
  Variables: ContextVariables;
};

declare module 'hono' {
  // Allow c.var / c.get access without casting everywhere
  interface ContextVariableMap extends ContextVariables {}
}
