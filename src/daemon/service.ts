/**
 * Daemon Module - Service Layer
 *
 * Composition for `start`: one registry shared by the scheduler (writer)
 * and the HTTP exporter (reader), plus bounded graceful shutdown.
 */
import { serve } from "@hono/node-server";

import { createApp } from "../api/app.js";
import { createLogger, logOperationComplete } from "../logger.js";
import { createMetricsRegistry } from "../registry/index.js";
import { createScheduler } from "../scheduler/index.js";
import type {
  ClosableServer,
  Daemon,
  DaemonOptions,
  Listen,
  ShutdownOutcome,
} from "./schema.js";

const log = createLogger("daemon");

/**
 * Serve the app on all interfaces with the Node.js adapter.
 */
export const listenWithNodeServer: Listen = (app, port) =>
  serve({ fetch: app.fetch, port, hostname: "0.0.0.0" }, (info) => {
    log.info({ port: info.port }, `Prometheus endpoint listening on port ${info.port}`);
  });

function closeServer(server: ClosableServer): Promise<void> {
  return new Promise((resolve) => {
    server.close((error) => {
      if (error) {
        log.warn({ error: error.message }, "HTTP server close reported an error");
      }
      resolve();
    });
  });
}

/**
 * Resolve with the work's completion or "timed_out" after `ms`.
 */
async function withDeadline(
  work: Promise<unknown>,
  ms: number,
): Promise<ShutdownOutcome> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<ShutdownOutcome>((resolve) => {
    timer = setTimeout(() => resolve("timed_out"), ms);
  });

  try {
    return await Promise.race([
      work.then((): ShutdownOutcome => "completed"),
      deadline,
    ]);
  } finally {
    clearTimeout(timer);
  }
}

export function createDaemon(options: DaemonOptions): Daemon {
  const { settings, client } = options;
  const listen = options.listen ?? listenWithNodeServer;

  const registry = createMetricsRegistry(options.clock);
  const scheduler = createScheduler({
    client,
    registry,
    intervalMs: settings.intervalMs,
    clock: options.clock,
  });
  const app = createApp({
    registry,
    scheduler,
    metricsPath: settings.metricsPath,
  });

  let server: ClosableServer | null = null;
  let stopping: Promise<ShutdownOutcome> | null = null;

  async function shutdown(): Promise<ShutdownOutcome> {
    const startTime = Date.now();
    log.info("Shutting down gracefully...");

    const activeServer = server;
    server = null;

    const outcome = await withDeadline(
      Promise.all([
        scheduler.stop(),
        activeServer ? closeServer(activeServer) : Promise.resolve(),
      ]),
      settings.shutdownTimeoutMs,
    );

    if (outcome === "timed_out") {
      log.warn(
        { shutdownTimeoutMs: settings.shutdownTimeoutMs },
        "Shutdown deadline reached before in-flight work settled",
      );
    } else {
      logOperationComplete(log, "shutdown", startTime);
    }

    return outcome;
  }

  return {
    app,
    registry,
    scheduler,

    start(): void {
      if (server) {
        log.warn("Daemon already started");
        return;
      }

      server = listen(app, settings.port);
      scheduler.start();

      log.info(
        {
          address: client.address,
          port: settings.port,
          metricsPath: settings.metricsPath,
          intervalMs: settings.intervalMs,
        },
        "Exporter started",
      );
    },

    stop(): Promise<ShutdownOutcome> {
      stopping ??= shutdown();
      return stopping;
    },
  };
}
