/**
 * Request logging middleware.
 *
 * Hands one entry per request to a log function; main.ts routes it into
 * pino.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** Set once the account middleware has run */
  readonly accountId?: number | undefined;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
  clock: () => number = Date.now,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = clock();

    await next();

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: clock() - start,
      requestId: c.get("requestId"),
      accountId: c.get("account")?.id,
    });
  };
}
