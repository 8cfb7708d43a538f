/**
 * Global error boundary: every unhandled error is logged and answered
 * with a JSON 500 carrying the request id.
 */
import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";

import { config } from "../config.js";
import { createLogger } from "../logger.js";

const log = createLogger("api");

export const errorHandler: ErrorHandler = (err, c) => {
  const requestId = c.get("requestId") ?? "unknown";

  if (err instanceof HTTPException) {
    return c.json({ error: err.message, requestId }, err.status);
  }

  log.error(
    {
      operation: "unhandledError",
      requestId,
      error: err.message,
      stack: err.stack,
      path: c.req.path,
      method: c.req.method,
    },
    "Unhandled error",
  );

  // Internal messages stay out of production responses
  const message = config.NODE_ENV === "production" ? "Internal server error" : err.message;

  return c.json({ error: message, requestId }, 500);
};
