import type { MiddlewareHandler } from "hono";
import { randomUUID } from "node:crypto";
import type { AppBindings } from "../types/context.js";

export const REQUEST_ID_HEADER = "x-request-id";

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

/**
 * Request ID middleware
 * Reuses the caller's x-request-id when it is a short token, otherwise mints
 * a fresh one. The id is echoed back and tags every log line of the request.
 */
export const requestIdMiddleware: MiddlewareHandler<AppBindings> = async (c, next) => {
  const provided = c.req.header(REQUEST_ID_HEADER);
  const requestId = provided !== undefined && REQUEST_ID_PATTERN.test(provided) ? provided : randomUUID();

  c.set("requestId", requestId);
  c.header(REQUEST_ID_HEADER, requestId);

  await next();
};
