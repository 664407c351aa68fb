/**
 * Request logging middleware.
 *
 * Hands one structured entry per request to a log function (pino in
 * production). Paths listed in `skipPaths` (health checks) are not logged.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
}

export interface LoggerOptions {
  readonly skipPaths?: readonly string[];
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
  options: LoggerOptions = {},
): MiddlewareHandler<AppEnv> {
  const skip = new Set(options.skipPaths ?? []);

  return async (c, next) => {
    if (skip.has(c.req.path)) {
      return next();
    }

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
