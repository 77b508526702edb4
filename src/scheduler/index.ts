/**
 * Scheduler Module - Public API
 *
 * @see Rule #2 (Module Boundaries are Contracts)
 */

// Types
export type {
  Scheduler,
  SchedulerOptions,
  SchedulerState,
  SchedulerStats,
  SchedulerStatus,
} from "./schema.js";

export { INITIAL_SCHEDULER_STATS } from "./schema.js";

// Service functions
export { createScheduler } from "./service.js";
