import pino from 'pino';

/**
 * Header carrying the ledger session id. Anyone holding the id can read
 * and change that session's ledger, so it never reaches the logs.
 */
export const SESSION_HEADER = 'x-ledger-session';

/**
 * Redact sensitive data from logs
 * - Session headers and session id fields
 * - Authorization headers, in case a proxy forwards them
 */
const REDACTION_PATHS = [
  `req.headers["${SESSION_HEADER}"]`,
  `headers["${SESSION_HEADER}"]`,
  'req.headers.authorization',
  'headers.authorization',
  'sessionId',
  '*.sessionId',
];

/**
 * Mask a session id down to its last 4 characters
 */
export function maskSessionId(sessionId: string): string {
  return sessionId.length <= 4 ? '****' : `****${sessionId.slice(-4)}`;
}

const EMBEDDED_SESSION_PATTERN = new RegExp(`(${SESSION_HEADER}\\s*[:=]\\s*)([A-Za-z0-9_-]+)`, 'gi');

/**
 * Mask session ids written into free text, e.g. "x-ledger-session: abc..."
 */
function maskEmbeddedSessions(value: string): string {
  return value.replace(
    EMBEDDED_SESSION_PATTERN,
    (_match, prefix: string, sessionId: string) => `${prefix}${maskSessionId(sessionId)}`
  );
}

/**
 * Recursively mask session ids in the strings of a log object.
 * Only plain objects and arrays are walked; serializers handle the rest.
 */
function maskSessionsDeep(value: unknown): unknown {
  if (typeof value === 'string') {
    return maskEmbeddedSessions(value);
  }
  if (Array.isArray(value)) {
    return value.map(maskSessionsDeep);
  }
  if (value !== null && typeof value === 'object' && Object.getPrototypeOf(value) === Object.prototype) {
    return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, maskSessionsDeep(entry)]));
  }
  return value;
}

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Environment-based log levels
 * - Automatic redaction of session ids, including ids embedded in strings
 * - Request ID correlation via child loggers
 * - ISO 8601 timestamps
 */
export function createLogger(options?: pino.LoggerOptions, destination?: pino.DestinationStream) {
  const config: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      req: pino.stdSerializers.req,
      res: pino.stdSerializers.res,
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      log: (object) => Object.fromEntries(
        Object.entries(object).map(([key, value]) => [key, maskSessionsDeep(value)])
      ),
    },
    // Messages and interpolation arguments
    hooks: {
      logMethod(args, method) {
        for (let i = 0; i < args.length; i++) {
          const arg: unknown = args[i];
          if (typeof arg === 'string') {
            args[i] = maskEmbeddedSessions(arg);
          }
        }
        method.apply(this, args);
      },
    },
    ...options,
  };

  return destination ? pino(config, destination) : pino(config);
}

export type Logger = pino.Logger;
