import { serve } from '@hono/node-server';
import { createLogger } from '@kasbook/observability';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { LedgerRegistry } from './lib/ledger-registry.js';

const config = loadConfig();
const logger = createLogger({ level: config.logLevel });

const registry = new LedgerRegistry({ maxSessions: config.maxSessions, logger });
const app = createApp({ registry, logger, webAppUrl: config.webAppUrl });

logger.info({ port: config.port, maxSessions: config.maxSessions }, 'Starting server');

serve({
  fetch: app.fetch,
  port: config.port,
});

logger.info({ port: config.port }, 'Server running');
