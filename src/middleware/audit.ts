import type { MiddlewareHandler } from "hono";
import { logger, type Logger } from "../logger.js";
import { clientIp } from "./rate-limit.js";

/**
 * Structured audit logging middleware.
 *
 * One log line per request with timing, status, method, path and client IP.
 */
export function auditLog(log: Logger = logger.child({ component: "audit" })): MiddlewareHandler {
  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;
    const ip = clientIp((name) => c.req.header(name));
    const userAgent = c.req.header("user-agent") || "unknown";

    await next();

    const status = c.res.status;
    const fields = { method, path, status, duration: Date.now() - start, ip, userAgent };

    if (status >= 500) log.error("request", fields);
    else if (status >= 400) log.warn("request", fields);
    else log.info("request", fields);
  };
}
