/**
 * Daemon Module - Schemas and Types
 *
 * @see Rule #4 (Data First)
 */
import type { Hono } from "hono";

import type { DeviceClient } from "../device/index.js";
import type { MetricsRegistry } from "../registry/index.js";
import type { Scheduler } from "../scheduler/index.js";

/**
 * Anything the daemon can close on shutdown. close() must wait for
 * in-flight responses before calling back.
 */
export type ClosableServer = {
  close(callback?: (err?: Error) => void): unknown;
};

export type Listen = (app: Hono, port: number) => ClosableServer;

export type DaemonSettings = Readonly<{
  port: number;
  metricsPath: string;
  intervalMs: number;
  shutdownTimeoutMs: number;
}>;

export type DaemonOptions = Readonly<{
  settings: DaemonSettings;
  client: DeviceClient;
  /** Defaults to @hono/node-server */
  listen?: Listen;
  clock?: () => number;
}>;

export type ShutdownOutcome = "completed" | "timed_out";

export type Daemon = Readonly<{
  app: Hono;
  registry: MetricsRegistry;
  scheduler: Scheduler;
  start(): void;
  stop(): Promise<ShutdownOutcome>;
}>;
