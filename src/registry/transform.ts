/**
 * Registry Module - Pure Transformations
 *
 * Snapshot transitions and the health sample.
 *
 * @see Rule #5 (Pure Transformations), #8 (Immutability)
 */
import { type DeviceError, formatDeviceError } from "../device/index.js";
import {
  type MetricSample,
  type MetricSet,
  SCRAPE_SUCCESS,
} from "../metrics/index.js";
import type { RegistrySnapshot } from "./schema.js";

/**
 * Snapshot after a successful poll. The previous error stays on record.
 */
export function applyPublish(
  previous: RegistrySnapshot,
  metrics: MetricSet,
  now: number,
): RegistrySnapshot {
  const next: RegistrySnapshot = {
    status: "ok",
    metrics,
    healthy: true,
    lastError: previous.lastError,
    lastSuccessAt: now,
    lastAttemptAt: now,
    consecutiveFailures: 0,
  };
  return Object.freeze(next);
}

/**
 * Snapshot after a failed poll. Metrics are carried over untouched.
 */
export function applyFailure(
  previous: RegistrySnapshot,
  error: DeviceError,
  now: number,
): RegistrySnapshot {
  const next: RegistrySnapshot = {
    status: previous.metrics ? "stale" : "uninitialized",
    metrics: previous.metrics,
    healthy: false,
    lastError: Object.freeze({
      type: error.type,
      message: formatDeviceError(error),
      at: now,
    }),
    lastSuccessAt: previous.lastSuccessAt,
    lastAttemptAt: now,
    consecutiveFailures: previous.consecutiveFailures + 1,
  };
  return Object.freeze(next);
}

/**
 * The scrape_success sample for a snapshot.
 */
export function healthSample(snapshot: RegistrySnapshot): MetricSample {
  return {
    name: SCRAPE_SUCCESS.name,
    type: SCRAPE_SUCCESS.type,
    unit: SCRAPE_SUCCESS.unit,
    value: snapshot.healthy ? 1 : 0,
    timestamp: snapshot.lastAttemptAt ?? 0,
  };
}

/**
 * Every sample an exporter should render: published metrics (none before
 * the first successful poll) followed by scrape_success.
 */
export function snapshotSamples(
  snapshot: RegistrySnapshot,
): ReadonlyArray<MetricSample> {
  const published = snapshot.metrics ? snapshot.metrics.samples : [];
  return [...published, healthSample(snapshot)];
}
