/**
 * Request ID middleware - generates or propagates request ID for tracing.
 *
 * Scrapers and proxies may send their own x-request-id. It is reused only
 * when it is a plain token; anything else is replaced so a header value
 * never reaches the logs or the response verbatim.
 *
 * @see Rule #86
 */
import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";

import { createLogger } from "../../logger.js";

const log = createLogger("middleware");

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

/**
 * Incoming id when usable, otherwise a fresh UUID.
 */
export function resolveRequestId(header: string | undefined): string {
  return header !== undefined && REQUEST_ID_PATTERN.test(header)
    ? header
    : randomUUID();
}

export const requestIdMiddleware: MiddlewareHandler = async (c, next) => {
  const incoming = c.req.header("x-request-id");
  const requestId = resolveRequestId(incoming);

  if (incoming !== undefined && incoming !== requestId) {
    log.debug({ requestId }, "Ignored malformed x-request-id header");
  }

  c.set("requestId", requestId);
  c.header("x-request-id", requestId);

  const start = Date.now();
  await next();

  log.debug(
    {
      requestId,
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
    },
    "✓ Request completed",
  );
};

// Type augmentation for Hono context
declare module "hono" {
  interface ContextVariableMap {
    requestId: string;
  }
}
