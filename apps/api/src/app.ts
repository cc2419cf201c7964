import { Hono } from 'hono';
import type { Logger } from '@kasbook/observability';
import { corsMiddleware } from './middleware/cors.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { requestLoggerMiddleware } from './middleware/request-logger.js';
import { sessionMiddleware } from './middleware/session.js';
import type { LedgerRegistry } from './lib/ledger-registry.js';
import { healthRoute } from './routes/v1/health.js';
import { categoriesRoute } from './routes/v1/categories.js';
import { transactionsRoute } from './routes/v1/transactions/index.js';
import { summaryRoute } from './routes/v1/summary.js';
import { reportsRoute } from './routes/v1/reports.js';
import { budgetsRoute } from './routes/v1/budgets.js';
import { exportRoute } from './routes/v1/export.js';
import { resetRoute } from './routes/v1/reset.js';
import type { AppBindings } from './types/context.js';

export interface AppDependencies {
  registry: LedgerRegistry;
  logger: Logger;
  webAppUrl: string;
}

export function createApp({ registry, logger, webAppUrl }: AppDependencies) {
  const app = new Hono<AppBindings>();

  // Apply request ID middleware first for log correlation
  app.use('*', requestIdMiddleware);
  app.use('*', requestLoggerMiddleware(logger));

  app.use('*', corsMiddleware(webAppUrl));

  app.route('/health', healthRoute);

  // Mount v1 routes
  const v1 = new Hono<AppBindings>();

  v1.route('/health', healthRoute);
  v1.route('/categories', categoriesRoute);

  // Everything below works on the caller's session ledger
  const ledgerRoutes = new Hono<AppBindings>();
  ledgerRoutes.use('*', sessionMiddleware(registry));

  ledgerRoutes.route('/transactions', transactionsRoute);
  ledgerRoutes.route('/summary', summaryRoute);
  ledgerRoutes.route('/reports', reportsRoute);
  ledgerRoutes.route('/budgets', budgetsRoute);
  ledgerRoutes.route('/export', exportRoute);
  ledgerRoutes.route('/reset', resetRoute);

  v1.route('/', ledgerRoutes);

  app.route('/v1', v1);

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((err, c) => {
    logger.error({ err, requestId: c.get('requestId') }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}
