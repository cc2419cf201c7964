import type { MiddlewareHandler } from "hono";
import type { Logger } from "@kasbook/observability";
import type { AppBindings } from "../types/context.js";

/**
 * Attach a per-request child logger and log each completed request
 * Must run after requestIdMiddleware
 */
export function requestLoggerMiddleware(baseLogger: Logger): MiddlewareHandler<AppBindings> {
  return async (c, next) => {
    const log = baseLogger.child({ requestId: c.get("requestId") });
    c.set("logger", log);

    const startedAt = performance.now();
    await next();

    log.debug(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        durationMs: Math.round(performance.now() - startedAt),
      },
      "Request completed"
    );
  };
}
