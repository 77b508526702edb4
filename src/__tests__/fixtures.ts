/**
 * Shared test fixtures: readings and stub device clients.
 */
import { type Result, ok } from "neverthrow";

import type { DeviceClient, DeviceError, Reading } from "../device/index.js";

export const TEST_ADDRESS = "192.168.1.40";

export const COLLECTED_AT = 1_700_000_100_000;

/**
 * Reading of a plug drawing 12.5 W with 340 Wh on its lifetime counter.
 */
export function createReading(overrides: Partial<Reading> = {}): Reading {
  return {
    address: TEST_ADDRESS,
    deviceType: "urn:Belkin:device:insight:1",
    state: "on",
    lastChange: 1_700_000_000_000,
    onForSeconds: 60,
    onTodaySeconds: 120,
    onTotalSeconds: 3600,
    currentPowerMilliwatts: 12_500,
    todayMilliwattMinutes: 600_000,
    totalMilliwattMinutes: 20_400_000,
    powerThresholdMilliwatts: 8000,
    collectedAt: COLLECTED_AT,
    ...overrides,
  };
}

/**
 * Reading whose lifetime counter holds `wattHours`.
 */
export function readingWithEnergy(wattHours: number): Reading {
  return createReading({ totalMilliwattMinutes: wattHours * 60_000 });
}

/**
 * Client that answers with `results` in order, repeating the last one.
 */
export function sequenceClient(
  results: ReadonlyArray<Result<Reading, DeviceError>>,
): DeviceClient {
  let index = 0;
  return {
    address: TEST_ADDRESS,
    query: async () => {
      const result = results[Math.min(index, results.length - 1)];
      index += 1;
      if (!result) {
        throw new Error("sequenceClient needs at least one result");
      }
      return result;
    },
  };
}

export function okClient(reading: Reading = createReading()): DeviceClient {
  return sequenceClient([ok(reading)]);
}

/**
 * Let pending promise chains run to completion.
 */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
