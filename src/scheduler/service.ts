/**
 * Scheduler Module - Service Layer
 *
 * Drives Device Client → Metric Mapper → Registry on a fixed interval.
 * Poll duration never shifts the schedule; a tick that finds a poll still
 * in flight is skipped, so two polls never overlap.
 *
 * @see Rule #27 (Module-Scoped Color-Coded Loggers)
 */
import { formatDeviceError, protocolError } from "../device/index.js";
import { createLogger, logOperationStart } from "../logger.js";
import {
  type EnergyCounterState,
  INITIAL_ENERGY_COUNTER,
  mapReading,
} from "../metrics/index.js";
import type {
  Scheduler,
  SchedulerOptions,
  SchedulerState,
  SchedulerStats,
} from "./schema.js";
import { INITIAL_SCHEDULER_STATS } from "./schema.js";

const log = createLogger("scheduler");

export function createScheduler(options: SchedulerOptions): Scheduler {
  const { client, registry, intervalMs } = options;
  const clock = options.clock ?? Date.now;

  let state: SchedulerState = "idle";
  let stats: SchedulerStats = INITIAL_SCHEDULER_STATS;
  let counter: EnergyCounterState = INITIAL_ENERGY_COUNTER;
  let timer: ReturnType<typeof setInterval> | null = null;
  let inFlight: Promise<void> | null = null;
  let stopped = false;
  let stopping: Promise<void> | null = null;

  /**
   * One poll cycle. Never rejects: every failure ends in the registry.
   */
  async function poll(): Promise<void> {
    const startTime = clock();
    state = "polling";
    logOperationStart(log, "poll", { address: client.address });

    let succeeded = false;
    try {
      const result = await client.query();

      if (result.isOk()) {
        const mapped = mapReading(result.value, counter);
        counter = mapped.counter;
        registry.publish(mapped.metrics);
        succeeded = true;
      } else {
        registry.recordFailure(result.error);
        log.warn(
          { errorType: result.error.type },
          `Poll failed: ${formatDeviceError(result.error)}`,
        );
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      registry.recordFailure(
        protocolError(client.address, `Unexpected poll failure: ${message}`),
      );
      log.error({ error: message }, "Error in poll cycle");
    }

    const durationMs = clock() - startTime;
    stats = {
      ...stats,
      polls: stats.polls + 1,
      failures: stats.failures + (succeeded ? 0 : 1),
      lastPollDurationMs: durationMs,
    };

    if (stopped) {
      state = "terminated";
    } else {
      state = succeeded ? "idle" : "backoff";
    }

    log.debug({ durationMs, state }, "Poll cycle finished");
  }

  function tick(): void {
    if (inFlight) {
      stats = { ...stats, skippedTicks: stats.skippedTicks + 1 };
      log.warn(
        { intervalMs, skippedTicks: stats.skippedTicks },
        "Previous poll still in flight, skipping tick",
      );
      return;
    }

    inFlight = poll().finally(() => {
      inFlight = null;
    });
  }

  async function shutdown(): Promise<void> {
    log.info("Stopping scheduler...");
    stopped = true;
    if (timer) {
      clearInterval(timer);
      timer = null;
    }

    if (inFlight) {
      await inFlight;
    }

    state = "terminated";
    log.info({ ...stats }, "Scheduler stopped");
  }

  return {
    start(): void {
      if (timer || stopped) {
        log.warn({ state }, "Scheduler already started or terminated");
        return;
      }

      log.info({ intervalMs, address: client.address }, "Starting scheduler");
      tick();
      timer = setInterval(tick, intervalMs);
    },

    stop(): Promise<void> {
      stopping ??= shutdown();
      return stopping;
    },

    getState(): SchedulerState {
      return state;
    },

    getStats(): SchedulerStats {
      return stats;
    },
  };
}
