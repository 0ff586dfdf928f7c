/**
 * Error boundary for the HTTP API: thrown errors and unknown routes
 * become JSON bodies carrying the request id.
 */
import type { ErrorHandler, NotFoundHandler } from "hono";
import { HTTPException } from "hono/http-exception";

import { createLogger } from "../logger.js";

const log = createLogger("api");

export const errorHandler: ErrorHandler = (error, c) => {
  const requestId = c.get("requestId") ?? "unknown";
  const where = { requestId, method: c.req.method, path: c.req.path };

  if (error instanceof HTTPException) {
    log.warn({ ...where, status: error.status, error: error.message }, "Request rejected");
    return c.json({ error: error.message, requestId }, error.status);
  }

  log.error({ ...where, error: error.message, stack: error.stack }, "Unhandled error");

  // Internal messages stay out of production responses
  const message =
    process.env.NODE_ENV === "production" ? "Internal server error" : error.message;

  return c.json({ error: message, requestId }, 500);
};

export const notFoundHandler: NotFoundHandler = (c) =>
  c.json({ error: `No route for ${c.req.method} ${c.req.path}` }, 404);
