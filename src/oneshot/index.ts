/**
 * One-shot Module - Public API
 *
 * @see Rule #2 (Module Boundaries are Contracts)
 */
export type {
  LineWriter,
  OneShotOptions,
  RepeatedScrapOptions,
  RepeatedScrapSummary,
} from "./schema.js";

export { runOneShot, runRepeatedScrap } from "./service.js";
