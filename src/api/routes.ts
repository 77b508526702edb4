/**
 * HTTP routes for the Wemo exporter.
 *
 * - GET <metricsPath> - Prometheus exposition of the current snapshot
 * - GET /api/health - Snapshot and scheduler status as JSON
 *
 * Routes only read the registry. Device failures never turn into error
 * statuses: the health is carried by scrape_success.
 */
import { Hono } from "hono";

import { createLogger } from "../logger.js";
import { renderSnapshot } from "../prometheus/index.js";
import type { MetricsRegistry } from "../registry/index.js";
import type { SchedulerStatus } from "../scheduler/index.js";

const log = createLogger("api");

export type RouteDependencies = Readonly<{
  registry: MetricsRegistry;
  metricsPath: string;
  /** Absent when the app runs without a scheduler */
  scheduler?: SchedulerStatus | undefined;
}>;

function toIso(epochMs: number | null): string | null {
  return epochMs === null ? null : new Date(epochMs).toISOString();
}

export function createRoutes(deps: RouteDependencies): Hono {
  const routes = new Hono();

  // ===========================================================================
  // Prometheus Scrape
  // ===========================================================================

  routes.get(deps.metricsPath, async (c) => {
    const snapshot = deps.registry.current();
    const rendered = await renderSnapshot(snapshot);

    log.debug(
      { requestId: c.get("requestId"), status: snapshot.status },
      "Metrics scraped",
    );

    return c.body(rendered.body, 200, {
      "Content-Type": rendered.contentType,
    });
  });

  // ===========================================================================
  // Health Check
  // ===========================================================================

  routes.get("/api/health", (c) => {
    const snapshot = deps.registry.current();

    return c.json({
      status: snapshot.status,
      healthy: snapshot.healthy,
      consecutiveFailures: snapshot.consecutiveFailures,
      lastSuccessAt: toIso(snapshot.lastSuccessAt),
      lastAttemptAt: toIso(snapshot.lastAttemptAt),
      lastError: snapshot.lastError
        ? {
            type: snapshot.lastError.type,
            message: snapshot.lastError.message,
            at: toIso(snapshot.lastError.at),
          }
        : null,
      scheduler: deps.scheduler
        ? { state: deps.scheduler.getState(), ...deps.scheduler.getStats() }
        : null,
      requestId: c.get("requestId"),
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}
