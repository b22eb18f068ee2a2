/**
 * Structured request logging.
 *
 * One pino line per request, through a child logger bound to the
 * request id. Client errors log at warn, server errors at error.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";

export function loggerMiddleware(logger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();

    await next();

    const status = c.res.status;
    const log = logger.child({ requestId: c.get("requestId") });
    const entry = {
      method: c.req.method,
      path: c.req.path,
      status,
      durationMs: Math.round(performance.now() - start),
    };
    const msg = `${entry.method} ${entry.path} ${String(status)}`;

    if (status >= 500) {
      log.error(entry, msg);
    } else if (status >= 400) {
      log.warn(entry, msg);
    } else {
      log.info(entry, msg);
    }
  };
}
