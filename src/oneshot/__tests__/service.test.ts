/**
 * One-shot Service Tests
 *
 * JSON output for a single poll and the repeated scrap loop.
 */
import { err, ok } from "neverthrow";
import { describe, expect, test, vi } from "vitest";

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
  logOperationStart: vi.fn(),
  logOperationComplete: vi.fn(),
  logOperationFailed: vi.fn(),
}));

import {
  COLLECTED_AT,
  TEST_ADDRESS,
  okClient,
  readingWithEnergy,
  sequenceClient,
} from "../../__tests__/fixtures.js";
import { unreachable } from "../../device/index.js";
import { runOneShot, runRepeatedScrap } from "../service.js";

describe("runOneShot", () => {
  test("writes exactly one JSON line for a successful poll", async () => {
    const write = vi.fn();

    const result = await runOneShot({ client: okClient(), write });

    expect(result.isOk()).toBe(true);
    expect(write).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(write.mock.calls[0]?.[0]))).toEqual({
      device_power_watts: 12.5,
      device_energy_watt_hours_total: 340,
      device_state: 1,
      device_today_energy_watt_hours: 10,
      device_on_for_seconds: 60,
      device_today_on_time_seconds: 120,
      device_state_on: true,
      address: TEST_ADDRESS,
      device_type: "urn:Belkin:device:insight:1",
      scrape_success: 1,
      timestamp: new Date(COLLECTED_AT).toISOString(),
    });
  });

  test("writes nothing and returns the error when the device is unreachable", async () => {
    const write = vi.fn();
    const error = unreachable(TEST_ADDRESS, "fetch failed");

    const result = await runOneShot({
      client: sequenceClient([err(error)]),
      write,
    });

    expect(result._unsafeUnwrapErr()).toBe(error);
    expect(write).not.toHaveBeenCalled();
  });
});

describe("runRepeatedScrap", () => {
  test("polls until the signal aborts", async () => {
    const controller = new AbortController();
    const lines: string[] = [];

    const summary = await runRepeatedScrap({
      client: okClient(),
      frequencyHz: 1000,
      signal: controller.signal,
      write: (line) => {
        lines.push(line);
        if (lines.length === 3) {
          controller.abort();
        }
      },
    });

    expect(lines).toHaveLength(3);
    expect(summary).toEqual({ polls: 3, failures: 0 });
  });

  test("keeps going after a failed poll", async () => {
    const controller = new AbortController();
    const lines: string[] = [];

    const summary = await runRepeatedScrap({
      client: sequenceClient([
        err(unreachable(TEST_ADDRESS, "fetch failed")),
        ok(readingWithEnergy(340)),
      ]),
      frequencyHz: 1000,
      signal: controller.signal,
      write: (line) => {
        lines.push(line);
        if (lines.length === 3) {
          controller.abort();
        }
      },
    });

    expect(summary).toEqual({ polls: 4, failures: 1 });
  });

  test("carries the energy counter across polls", async () => {
    const controller = new AbortController();
    const energy: unknown[] = [];

    await runRepeatedScrap({
      client: sequenceClient([
        ok(readingWithEnergy(340)),
        ok(readingWithEnergy(2)),
        ok(readingWithEnergy(10)),
      ]),
      frequencyHz: 1000,
      signal: controller.signal,
      write: (line) => {
        const record: unknown = JSON.parse(line);
        if (typeof record === "object" && record !== null) {
          energy.push(Reflect.get(record, "device_energy_watt_hours_total"));
        }
        if (energy.length === 3) {
          controller.abort();
        }
      },
    });

    expect(energy).toEqual([340, 342, 350]);
  });

  test("does not poll when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const write = vi.fn();

    const summary = await runRepeatedScrap({
      client: okClient(),
      frequencyHz: 10,
      signal: controller.signal,
      write,
    });

    expect(summary).toEqual({ polls: 0, failures: 0 });
    expect(write).not.toHaveBeenCalled();
  });
});
