/**
 * Prometheus Module - Public API
 *
 * @see Rule #2 (Module Boundaries are Contracts)
 */
export type { RenderedMetrics } from "./service.js";
export { renderSnapshot } from "./service.js";
