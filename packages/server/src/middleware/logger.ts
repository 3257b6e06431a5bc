/**
 * Request logging middleware.
 *
 * Emits one entry per request after the response is produced. Requests
 * the OpenAPI validator turned away carry the rejection kind and reason,
 * so they can be told apart from handler errors with the same status.
 */

import type { MiddlewareHandler } from "hono";
import type { RejectionLogEntry } from "@oapi-guard/validator";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  readonly rejection: {
    readonly kind: RejectionLogEntry["kind"];
    readonly reason: string;
  } | null;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    const rejection = c.get("rejection");
    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      rejection:
        rejection === undefined
          ? null
          : { kind: rejection.kind, reason: rejection.message },
    });
  };
}
