import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const ApiEnvironmentSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  MAX_SESSIONS: z.coerce.number().int().positive().default(1000),
  WEB_APP_URL: z.string().url().default('http://localhost:5173'),
});

export type ApiConfig = {
  port: number;
  logLevel: (typeof LOG_LEVELS)[number];
  maxSessions: number;
  webAppUrl: string;
};

/**
 * Read API settings from the environment
 *
 * Empty strings count as unset so `PORT=` falls back to the default.
 *
 * @throws Error naming every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const raw = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const result = ApiEnvironmentSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`Invalid API configuration: ${errors}`);
  }

  return {
    port: result.data.PORT,
    logLevel: result.data.LOG_LEVEL,
    maxSessions: result.data.MAX_SESSIONS,
    webAppUrl: result.data.WEB_APP_URL,
  };
}
