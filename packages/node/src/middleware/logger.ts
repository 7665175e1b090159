/**
 * Request logging middleware.
 *
 * Emits one entry per request with method, path, status, duration and
 * request id. `pinoRequestLog` routes entries to a pino logger.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
}

export type RequestLogFn = (entry: RequestLogEntry) => void;

export function loggerMiddleware(log: RequestLogFn): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
    });
  };
}

/**
 * 5xx at error, 4xx at warn, everything else at info.
 */
export function pinoRequestLog(logger: Logger): RequestLogFn {
  return (entry) => {
    const msg = `${entry.method} ${entry.path} ${entry.status}`;
    if (entry.status >= 500) logger.error(entry, msg);
    else if (entry.status >= 400) logger.warn(entry, msg);
    else logger.info(entry, msg);
  };
}
