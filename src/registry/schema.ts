/**
 * Registry Module - Schemas and Types
 *
 * The snapshot published to exporters. Snapshots are immutable: every
 * write replaces the whole object.
 *
 * @see Rule #4 (Data First)
 */
import type { DeviceError, DeviceErrorType } from "../device/index.js";
import type { MetricSet } from "../metrics/index.js";

// =============================================================================
// Snapshot
// =============================================================================

/**
 * - uninitialized: no successful poll yet, no metric values
 * - ok: latest poll succeeded
 * - stale: latest poll failed, metrics are the last known good set
 */
export type SnapshotStatus = "uninitialized" | "ok" | "stale";

export type LastError = Readonly<{
  type: DeviceErrorType;
  message: string;
  /** When the failure was recorded (epoch ms) */
  at: number;
}>;

export type RegistrySnapshot = Readonly<{
  status: SnapshotStatus;
  metrics: MetricSet | null;
  /** Whether the most recent poll succeeded */
  healthy: boolean;
  lastError: LastError | null;
  lastSuccessAt: number | null;
  lastAttemptAt: number | null;
  consecutiveFailures: number;
}>;

export const UNINITIALIZED_SNAPSHOT: RegistrySnapshot = Object.freeze({
  status: "uninitialized",
  metrics: null,
  healthy: false,
  lastError: null,
  lastSuccessAt: null,
  lastAttemptAt: null,
  consecutiveFailures: 0,
});

// =============================================================================
// Registry Contract
// =============================================================================

/**
 * Holder of the current snapshot. Writes come from the scheduler only;
 * reads come from any number of scrapes.
 */
export type MetricsRegistry = Readonly<{
  /** Replace the published metrics after a successful poll */
  publish(metrics: MetricSet): void;
  /** Record a failed poll, keeping the last known good metrics */
  recordFailure(error: DeviceError): void;
  current(): RegistrySnapshot;
}>;
