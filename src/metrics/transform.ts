/**
 * Metrics Module - Pure Transformations
 *
 * Reading → MetricSet mapping and unit normalization.
 * No side effects, no I/O - just data in, data out. Energy counter state
 * is passed in and returned, never held here.
 *
 * @see Rule #5 (Pure Transformations), #8 (Immutability)
 */
import type { DeviceState, Reading } from "../device/index.js";
import type {
  DeviceMetricName,
  EnergyCounterState,
  JsonRecord,
  MetricName,
  MetricSample,
  MetricSet,
} from "./schema.js";
import { METRIC_CATALOG } from "./schema.js";

// =============================================================================
// Unit Normalization
// =============================================================================

/**
 * Every Insight quantity is a magnitude; a negative or non-finite value
 * is a garbled field.
 */
function measurementOrNaN(value: number): number {
  return Number.isFinite(value) && value >= 0 ? value : Number.NaN;
}

export function milliwattsToWatts(milliwatts: number): number {
  return measurementOrNaN(milliwatts) / 1000;
}

/**
 * The device reports energy in milliwatt-minutes.
 */
export function milliwattMinutesToWattHours(milliwattMinutes: number): number {
  return measurementOrNaN(milliwattMinutes) / 60_000;
}

/**
 * Standby keeps the relay closed, so it counts as on.
 */
export function stateToGauge(state: DeviceState): 0 | 1 {
  return state === "off" ? 0 : 1;
}

// =============================================================================
// Counter Re-basing
// =============================================================================

/**
 * Fold a raw device counter into a series that never decreases.
 * A raw value below the previous one is a device-side reset: the previous
 * value is added to the offset. A negative or non-finite raw value is
 * unusable and leaves the state untouched.
 *
 * @example
 * rebaseCounter({ lastRaw: 340, offset: 0 }, 5)
 * // { value: 345, state: { lastRaw: 5, offset: 340 } }
 */
export function rebaseCounter(
  state: EnergyCounterState,
  raw: number,
): Readonly<{ value: number; state: EnergyCounterState }> {
  if (!Number.isFinite(raw) || raw < 0) {
    return { value: Number.NaN, state };
  }

  const offset =
    state.lastRaw !== null && raw < state.lastRaw
      ? state.offset + state.lastRaw
      : state.offset;

  return { value: raw + offset, state: { lastRaw: raw, offset } };
}

// =============================================================================
// Reading → MetricSet
// =============================================================================

/**
 * Map a Reading to the fixed metric catalog.
 * Never throws: unusable device values become NaN samples.
 */
export function mapReading(
  reading: Reading,
  counter: EnergyCounterState,
): Readonly<{ metrics: MetricSet; counter: EnergyCounterState }> {
  const energy = rebaseCounter(
    counter,
    milliwattMinutesToWattHours(reading.totalMilliwattMinutes),
  );

  const values: Record<DeviceMetricName, number> = {
    device_power_watts: milliwattsToWatts(reading.currentPowerMilliwatts),
    device_energy_watt_hours_total: energy.value,
    device_state: stateToGauge(reading.state),
    device_today_energy_watt_hours: milliwattMinutesToWattHours(
      reading.todayMilliwattMinutes,
    ),
    device_on_for_seconds: measurementOrNaN(reading.onForSeconds),
    device_today_on_time_seconds: measurementOrNaN(reading.onTodaySeconds),
  };

  const timestamp = reading.collectedAt;
  const samples = METRIC_CATALOG.map(
    (definition): MetricSample =>
      Object.freeze({
        name: definition.name,
        type: definition.type,
        unit: definition.unit,
        value: values[definition.name],
        timestamp,
      }),
  );

  return {
    metrics: Object.freeze({ timestamp, samples: Object.freeze(samples) }),
    counter: energy.state,
  };
}

/**
 * Look up one sample value by name.
 *
 * @returns The value or null when the set has no such sample
 */
export function getSampleValue(
  metrics: MetricSet,
  name: MetricName,
): number | null {
  const sample = metrics.samples.find((s) => s.name === name);
  return sample ? sample.value : null;
}

// =============================================================================
// One-shot JSON
// =============================================================================

/**
 * Build the one-shot JSON record from a mapped set and its Reading.
 */
export function toJsonRecord(metrics: MetricSet, reading: Reading): JsonRecord {
  const valueOf = (name: DeviceMetricName): number | null => {
    const value = getSampleValue(metrics, name);
    return value === null || Number.isNaN(value) ? null : value;
  };

  return {
    device_power_watts: valueOf("device_power_watts"),
    device_energy_watt_hours_total: valueOf("device_energy_watt_hours_total"),
    device_state: valueOf("device_state"),
    device_today_energy_watt_hours: valueOf("device_today_energy_watt_hours"),
    device_on_for_seconds: valueOf("device_on_for_seconds"),
    device_today_on_time_seconds: valueOf("device_today_on_time_seconds"),
    device_state_on: reading.state !== "off",
    address: reading.address,
    device_type: reading.deviceType,
    scrape_success: 1,
    timestamp: new Date(metrics.timestamp).toISOString(),
  };
}
