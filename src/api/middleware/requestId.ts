/**
 * Request ID middleware - generates or propagates request ID for tracing.
 */
import { randomUUID } from "node:crypto";

import type { MiddlewareHandler } from "hono";
import { createLogger } from "../../logger.js";

const log = createLogger("middleware");

const MAX_REQUEST_ID_LENGTH = 128;

/**
 * Incoming ids are accepted only when short and header-safe.
 */
function acceptRequestId(value: string | undefined): string | undefined {
  if (!value || value.length > MAX_REQUEST_ID_LENGTH) {
    return undefined;
  }
  return /^[\w.:-]+$/.test(value) ? value : undefined;
}

/**
 * Request ID middleware - attaches unique ID to each request.
 * Propagates existing x-request-id header if present.
 */
export const requestIdMiddleware: MiddlewareHandler = async (c, next) => {
  const requestId = acceptRequestId(c.req.header("x-request-id")) ?? randomUUID();

  // Store in context for downstream use
  c.set("requestId", requestId);

  // Add to response headers
  c.header("x-request-id", requestId);

  log.debug({ requestId, path: c.req.path }, "Request started");

  const start = performance.now();
  await next();

  log.debug(
    {
      requestId,
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - start),
    },
    "Request completed",
  );
};

// Type augmentation for Hono context
declare module "hono" {
  interface ContextVariableMap {
    requestId: string;
  }
}
