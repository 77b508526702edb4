/**
 * Registry Module - Public API
 *
 * @see Rule #2 (Module Boundaries are Contracts)
 */

// Types
export type {
  LastError,
  MetricsRegistry,
  RegistrySnapshot,
  SnapshotStatus,
} from "./schema.js";

export { UNINITIALIZED_SNAPSHOT } from "./schema.js";

// Service functions
export { createMetricsRegistry } from "./service.js";

// Pure transformations
export {
  applyFailure,
  applyPublish,
  healthSample,
  snapshotSamples,
} from "./transform.js";
