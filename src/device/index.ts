/**
 * Device Module - Public API
 *
 * Exports only what's needed by other modules.
 * Internal implementation details stay hidden.
 *
 * @see Rule #2 (Module Boundaries are Contracts)
 */

// Types
export type {
  DeviceClient,
  DeviceState,
  Reading,
  WemoClientOptions,
} from "./schema.js";
export type { DeviceError, DeviceErrorType } from "./errors.js";

// Error utilities
export {
  formatDeviceError,
  protocolError,
  timeout,
  unreachable,
} from "./errors.js";

// Service functions (side effects)
export { createWemoClient } from "./service.js";

// Pure transformations
export {
  buildInsightRequest,
  parseDeviceState,
  parseInsightParams,
  parseInsightResponse,
  parseSetupDocument,
} from "./transform.js";
