/**
 * Request ID middleware - generates or propagates a request ID for tracing.
 */
import { randomUUID } from "node:crypto";

import type { MiddlewareHandler } from "hono";

import { createLogger } from "../../logger.js";

const log = createLogger("middleware");

/**
 * Attaches a unique ID to each request, reusing an incoming x-request-id.
 */
export const requestIdMiddleware: MiddlewareHandler = async (c, next) => {
  const requestId = c.req.header("x-request-id") ?? randomUUID();

  c.set("requestId", requestId);
  c.header("x-request-id", requestId);

  log.debug({ requestId, method: c.req.method, path: c.req.path }, "Request started");

  const start = Date.now();
  await next();

  log.debug(
    { requestId, path: c.req.path, status: c.res.status, durationMs: Date.now() - start },
    "Request completed",
  );
};

declare module "hono" {
  interface ContextVariableMap {
    requestId: string;
  }
}
