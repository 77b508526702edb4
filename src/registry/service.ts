/**
 * Registry Module - Service Layer
 *
 * Explicitly constructed holder of the published snapshot. A write builds a
 * new frozen snapshot and swaps the reference, so a reader sees either the
 * whole previous set or the whole new one.
 */
import { type DeviceError, formatDeviceError } from "../device/index.js";
import { createLogger } from "../logger.js";
import type { MetricSet } from "../metrics/index.js";
import type { MetricsRegistry, RegistrySnapshot } from "./schema.js";
import { UNINITIALIZED_SNAPSHOT } from "./schema.js";
import { applyFailure, applyPublish } from "./transform.js";

const log = createLogger("registry");

/**
 * Create an empty registry. The first current() returns the
 * uninitialized snapshot.
 */
export function createMetricsRegistry(
  clock: () => number = Date.now,
): MetricsRegistry {
  let snapshot: RegistrySnapshot = UNINITIALIZED_SNAPSHOT;

  return {
    publish(metrics: MetricSet): void {
      const wasHealthy = snapshot.healthy;
      snapshot = applyPublish(snapshot, metrics, clock());

      if (!wasHealthy) {
        log.info(
          { samples: metrics.samples.length },
          "Metrics published, device healthy",
        );
      }
    },

    recordFailure(error: DeviceError): void {
      snapshot = applyFailure(snapshot, error, clock());

      log.debug(
        {
          status: snapshot.status,
          consecutiveFailures: snapshot.consecutiveFailures,
          error: formatDeviceError(error),
        },
        "Poll failure recorded",
      );
    },

    current(): RegistrySnapshot {
      return snapshot;
    },
  };
}
