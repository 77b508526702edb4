/**
 * One-shot Module - Schemas and Types
 *
 * @see Rule #4 (Data First)
 */
import type { DeviceClient } from "../device/index.js";

/**
 * Output sink for JSON lines (stdout in the CLI).
 */
export type LineWriter = (line: string) => void;

export type OneShotOptions = Readonly<{
  client: DeviceClient;
  write: LineWriter;
}>;

export type RepeatedScrapOptions = OneShotOptions &
  Readonly<{
    /** Polls per second, > 0 */
    frequencyHz: number;
    /** Aborting ends the loop after the current poll */
    signal: AbortSignal;
  }>;

export type RepeatedScrapSummary = Readonly<{
  polls: number;
  failures: number;
}>;
