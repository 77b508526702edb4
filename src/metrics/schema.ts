/**
 * Metrics Module - Schemas and Types
 *
 * The metric catalog is a published contract: scrape clients and the
 * one-shot JSON consumers depend on these exact names.
 *
 * @see Rule #4 (Data First)
 */

// =============================================================================
// Catalog
// =============================================================================

export type MetricType = "gauge" | "counter";

export type MetricUnit = "watts" | "watt_hours" | "seconds";

export type MetricDefinition = Readonly<{
  name: string;
  type: MetricType;
  unit: MetricUnit | null;
  help: string;
}>;

/**
 * Metrics derived from a Reading, in output order.
 */
export const METRIC_CATALOG = [
  {
    name: "device_power_watts",
    type: "gauge",
    unit: "watts",
    help: "Instantaneous power draw reported by the plug",
  },
  {
    name: "device_energy_watt_hours_total",
    type: "counter",
    unit: "watt_hours",
    help: "Energy consumed through the plug, re-based across device counter resets",
  },
  {
    name: "device_state",
    type: "gauge",
    unit: null,
    help: "Relay state (1 = on or standby, 0 = off)",
  },
  {
    name: "device_today_energy_watt_hours",
    type: "gauge",
    unit: "watt_hours",
    help: "Energy consumed since the device's midnight",
  },
  {
    name: "device_on_for_seconds",
    type: "gauge",
    unit: "seconds",
    help: "Seconds since the relay last switched on",
  },
  {
    name: "device_today_on_time_seconds",
    type: "gauge",
    unit: "seconds",
    help: "Seconds the relay has been on since the device's midnight",
  },
] as const satisfies ReadonlyArray<MetricDefinition>;

/**
 * Health metric owned by the registry, not derived from device content.
 */
export const SCRAPE_SUCCESS = {
  name: "scrape_success",
  type: "gauge",
  unit: null,
  help: "1 if the most recent device poll succeeded, else 0",
} as const satisfies MetricDefinition;

export type DeviceMetricName = (typeof METRIC_CATALOG)[number]["name"];

export type MetricName = DeviceMetricName | (typeof SCRAPE_SUCCESS)["name"];

// =============================================================================
// Samples
// =============================================================================

export type MetricSample = Readonly<{
  name: MetricName;
  type: MetricType;
  unit: MetricUnit | null;
  /** NaN marks a value the device did not report usably */
  value: number;
  /** Acquisition time (epoch ms) */
  timestamp: number;
}>;

/**
 * All samples derived from one Reading. Every sample shares `timestamp`.
 */
export type MetricSet = Readonly<{
  timestamp: number;
  samples: ReadonlyArray<MetricSample>;
}>;

// =============================================================================
// Energy Counter Re-basing
// =============================================================================

/**
 * Tracks the last raw device counter and the offset accumulated over
 * device-side resets.
 */
export type EnergyCounterState = Readonly<{
  lastRaw: number | null;
  offset: number;
}>;

export const INITIAL_ENERGY_COUNTER: EnergyCounterState = {
  lastRaw: null,
  offset: 0,
};

// =============================================================================
// One-shot JSON
// =============================================================================

/**
 * JSON record written by the one-shot exporter. NaN values become null.
 */
export type JsonRecord = Readonly<
  Record<DeviceMetricName, number | null> & {
    device_state_on: boolean;
    address: string;
    device_type: string;
    /** Always 1: a failed poll writes no record */
    scrape_success: 1;
    timestamp: string;
  }
>;
