/**
 * @kasbook/observability
 *
 * Structured logging for Kasbook services and scripts.
 */

export { createLogger, maskSessionId, SESSION_HEADER } from './logger.js';
export type { Logger } from './logger.js';
