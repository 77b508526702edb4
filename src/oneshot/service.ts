/**
 * One-shot Module - Service Layer
 *
 * Direct Device Client → Metric Mapper → JSON path. Bypasses the scheduler
 * and the registry entirely.
 */
import { type Result, err, ok } from "neverthrow";

import { type DeviceError, formatDeviceError } from "../device/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import {
  type EnergyCounterState,
  INITIAL_ENERGY_COUNTER,
  type JsonRecord,
  mapReading,
  toJsonRecord,
} from "../metrics/index.js";
import type {
  OneShotOptions,
  RepeatedScrapOptions,
  RepeatedScrapSummary,
} from "./schema.js";

const log = createLogger("oneshot");

/**
 * Query once and map. Shared by both scrap modes.
 */
async function scrapOnce(
  options: OneShotOptions,
  counter: EnergyCounterState,
): Promise<
  Result<Readonly<{ record: JsonRecord; counter: EnergyCounterState }>, DeviceError>
> {
  const result = await options.client.query();
  if (result.isErr()) {
    return err(result.error);
  }

  const mapped = mapReading(result.value, counter);
  return ok({
    record: toJsonRecord(mapped.metrics, result.value),
    counter: mapped.counter,
  });
}

/**
 * Perform exactly one poll and write the mapped reading as one JSON line.
 * On failure nothing is written.
 */
export async function runOneShot(
  options: OneShotOptions,
): Promise<Result<JsonRecord, DeviceError>> {
  const startTime = Date.now();
  logOperationStart(log, "oneShot", { address: options.client.address });

  const result = await scrapOnce(options, INITIAL_ENERGY_COUNTER);

  if (result.isErr()) {
    logOperationFailed(log, "oneShot", formatDeviceError(result.error));
    return err(result.error);
  }

  options.write(JSON.stringify(result.value.record));
  logOperationComplete(log, "oneShot", startTime);
  return ok(result.value.record);
}

/**
 * Wait for `ms` or until the signal aborts, whichever comes first.
 */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Poll at `frequencyHz` and write one JSON line per successful poll until
 * the signal aborts. Failures are logged and the loop continues.
 */
export async function runRepeatedScrap(
  options: RepeatedScrapOptions,
): Promise<RepeatedScrapSummary> {
  const periodMs = 1000 / options.frequencyHz;
  let counter = INITIAL_ENERGY_COUNTER;
  let polls = 0;
  let failures = 0;

  log.info(
    { address: options.client.address, periodMs },
    "Starting repeated scrap",
  );

  while (!options.signal.aborted) {
    const result = await scrapOnce(options, counter);
    polls += 1;

    if (result.isOk()) {
      counter = result.value.counter;
      options.write(JSON.stringify(result.value.record));
    } else {
      failures += 1;
      log.warn(
        { errorType: result.error.type },
        `Scrap failed: ${formatDeviceError(result.error)}`,
      );
    }

    await sleep(periodMs, options.signal);
  }

  log.info({ polls, failures }, "Repeated scrap stopped");
  return { polls, failures };
}
