/**
 * Global error boundary for the exporter's HTTP surface.
 *
 * Device failures never reach here: they live in the registry snapshot and
 * scrape_success. What does arrive is a fault in rendering or routing.
 * HTTPExceptions keep their status; anything else is a 500.
 *
 * @see Rule #85
 */
import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";

import { runtimeEnv } from "../config.js";
import { createLogger } from "../logger.js";

const log = createLogger("api");

export const errorHandler: ErrorHandler = (err, c) => {
  const requestId = c.get("requestId");
  const status = err instanceof HTTPException ? err.status : 500;

  log.error(
    {
      operation: "unhandledError",
      requestId,
      status,
      error: err.message,
      stack: err.stack,
      path: c.req.path,
    },
    `❌ ${c.req.method} ${c.req.path} failed`,
  );

  // Internal messages stay out of production responses; HTTPException
  // messages are meant for the client
  const message =
    status === 500 && runtimeEnv.NODE_ENV === "production"
      ? "Internal server error"
      : err.message;

  return c.json({ error: message, path: c.req.path, requestId }, status);
};
