import { cors } from "hono/cors";
import { SESSION_HEADER } from "@kasbook/observability";

export function computeAllowedOrigins(webAppUrl: string): Set<string> {
  const allowed = new Set<string>();
  allowed.add(webAppUrl);

  const url = new URL(webAppUrl);
  if (url.hostname.startsWith("www.")) {
    const withoutWww = `${url.protocol}//${url.hostname.replace(/^www\./, "")}${
      url.port ? `:${url.port}` : ""
    }`;
    allowed.add(withoutWww);
  } else if (!url.hostname.includes("localhost")) {
    const withWww = `${url.protocol}//www.${url.hostname}${url.port ? `:${url.port}` : ""}`;
    allowed.add(withWww);
  }

  return allowed;
}

/**
 * CORS for the dashboard front-end
 * The session header must be both accepted and exposed so the browser can
 * keep using the session id the API hands out
 */
export function corsMiddleware(webAppUrl: string) {
  const allowedOrigins = computeAllowedOrigins(webAppUrl);

  return cors({
    origin: (origin) => {
      // Allow configured web app URL (and www variant)
      if (origin && allowedOrigins.has(origin)) {
        return origin;
      }

      // Allow localhost for development
      if (origin && /^http:\/\/localhost:\d+$/.test(origin)) {
        return origin;
      }

      // Reject all other origins
      return "";
    },
    allowMethods: ["GET", "POST", "DELETE", "OPTIONS"],
    allowHeaders: ["Content-Type", "X-Requested-With", "X-Request-Id", SESSION_HEADER],
    exposeHeaders: [SESSION_HEADER, "X-Request-Id", "Content-Disposition"],
    maxAge: 86400, // 24 hours - browser caches preflight response
  });
}
