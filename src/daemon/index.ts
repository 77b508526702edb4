/**
 * Daemon Module - Public API
 *
 * @see Rule #2 (Module Boundaries are Contracts)
 */
export type {
  ClosableServer,
  Daemon,
  DaemonOptions,
  DaemonSettings,
  Listen,
  ShutdownOutcome,
} from "./schema.js";

export { createDaemon, listenWithNodeServer } from "./service.js";
