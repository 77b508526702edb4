/**
 * Metrics Module - Public API
 *
 * @see Rule #2 (Module Boundaries are Contracts)
 */

// Types
export type {
  DeviceMetricName,
  EnergyCounterState,
  JsonRecord,
  MetricDefinition,
  MetricName,
  MetricSample,
  MetricSet,
  MetricType,
  MetricUnit,
} from "./schema.js";

export {
  INITIAL_ENERGY_COUNTER,
  METRIC_CATALOG,
  SCRAPE_SUCCESS,
} from "./schema.js";

// Pure transformations
export {
  getSampleValue,
  mapReading,
  milliwattMinutesToWattHours,
  milliwattsToWatts,
  rebaseCounter,
  stateToGauge,
  toJsonRecord,
} from "./transform.js";
