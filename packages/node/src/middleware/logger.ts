/**
 * Request logging middleware.
 *
 * Measures each request and hands a RequestLogEntry to `log`;
 * main.ts routes the entries to pino.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { AuthContext } from "../types/auth.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** Resolved caller; absent on routes outside /api */
  readonly account?: string;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    // Only /api routes run the auth middleware
    const auth: AuthContext | undefined = c.get("auth");
    const entry: RequestLogEntry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      ...(auth !== undefined ? { account: auth.account } : {}),
    };

    log(entry);
  };
}
