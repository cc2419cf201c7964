import type { MiddlewareHandler } from "hono";
import { randomUUID } from "node:crypto";
import { SESSION_HEADER } from "@kasbook/observability";
import type { LedgerRegistry } from "../lib/ledger-registry.js";
import type { AppBindings } from "../types/context.js";

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{8,128}$/;

/**
 * Session middleware
 * Resolves the caller's ledger from the x-ledger-session header
 * A new session is started (and its id echoed back) when the header is absent
 */
export function sessionMiddleware(registry: LedgerRegistry): MiddlewareHandler<AppBindings> {
  return async (c, next) => {
    const provided = c.req.header(SESSION_HEADER);

    if (provided !== undefined && !SESSION_ID_PATTERN.test(provided)) {
      return c.json(
        { error: "Session id must be 8-128 characters of letters, digits, '-' or '_'" },
        400
      );
    }

    const sessionId = provided ?? randomUUID();
    c.set("sessionId", sessionId);
    c.set("ledger", registry.resolve(sessionId));
    c.header(SESSION_HEADER, sessionId);

    await next();
  };
}
