import type { MiddlewareHandler } from "hono";
import { log } from "../logger.js";
import { clientIp } from "./client-ip.js";

/**
 * Structured audit logging middleware.
 *
 * Emits one JSON log line per request with timing, status, method, path
 * and client IP. Server errors log at `error`, client errors at `warn`.
 */
export function auditLog(): MiddlewareHandler {
  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;
    const ip = clientIp(c);

    await next();

    const status = c.res.status;
    const fields = {
      method,
      path,
      status,
      duration: Date.now() - start,
      ip,
      userAgent: c.req.header("user-agent") || "unknown",
    };

    if (status >= 500) log.error("request", fields);
    else if (status >= 400) log.warn("request", fields);
    else log.info("request", fields);
  };
}
