/**
 * Hono application for the HTTP exporter: request tracing, error boundary,
 * exporter routes and a JSON 404.
 */
import { Hono } from "hono";

import { errorHandler } from "./errorHandler.js";
import { requestIdMiddleware } from "./middleware/requestId.js";
import { type RouteDependencies, createRoutes } from "./routes.js";

export function createApp(deps: RouteDependencies): Hono {
  const app = new Hono();

  app.use("*", requestIdMiddleware);
  app.onError(errorHandler);

  app.route("/", createRoutes(deps));

  app.notFound((c) =>
    c.json({ error: "Not found", path: c.req.path, requestId: c.get("requestId") }, 404),
  );

  return app;
}
