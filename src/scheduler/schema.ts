/**
 * Scheduler Module - Schemas and Types
 *
 * @see Rule #4 (Data First)
 */
import type { DeviceClient } from "../device/index.js";
import type { MetricsRegistry } from "../registry/index.js";

// =============================================================================
// State Machine
// =============================================================================

/**
 * idle → polling → (idle | backoff) → polling → … ; terminated after stop().
 * backoff is observational only: the interval never changes.
 */
export type SchedulerState = "idle" | "polling" | "backoff" | "terminated";

export type SchedulerStats = Readonly<{
  polls: number;
  failures: number;
  /** Ticks dropped because a poll was still in flight */
  skippedTicks: number;
  lastPollDurationMs: number | null;
}>;

export const INITIAL_SCHEDULER_STATS: SchedulerStats = {
  polls: 0,
  failures: 0,
  skippedTicks: 0,
  lastPollDurationMs: null,
};

// =============================================================================
// Scheduler Contract
// =============================================================================

export type SchedulerOptions = Readonly<{
  client: DeviceClient;
  registry: MetricsRegistry;
  intervalMs: number;
  clock?: () => number;
}>;

export type Scheduler = Readonly<{
  /** Poll immediately, then on every interval tick */
  start(): void;
  /** Stop ticking; resolves once the in-flight poll settles */
  stop(): Promise<void>;
  getState(): SchedulerState;
  getStats(): SchedulerStats;
}>;

/**
 * Read-only view used by the health endpoint.
 */
export type SchedulerStatus = Pick<Scheduler, "getState" | "getStats">;
