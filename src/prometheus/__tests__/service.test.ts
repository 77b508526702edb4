/**
 * Prometheus Rendering Tests
 *
 * Snapshot → exposition text, including the uninitialized and stale cases.
 */
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
}));

import {
  TEST_ADDRESS,
  createReading,
} from "../../__tests__/fixtures.js";
import { unreachable } from "../../device/index.js";
import { INITIAL_ENERGY_COUNTER, mapReading } from "../../metrics/index.js";
import { createMetricsRegistry } from "../../registry/index.js";
import { renderSnapshot } from "../service.js";

function lines(body: string): string[] {
  return body.split("\n").filter((line) => line.length > 0);
}

function sampleLines(body: string): string[] {
  return lines(body).filter((line) => !line.startsWith("#"));
}

function publishedRegistry() {
  const registry = createMetricsRegistry(() => 1000);
  registry.publish(mapReading(createReading(), INITIAL_ENERGY_COUNTER).metrics);
  return registry;
}

describe("renderSnapshot", () => {
  test("renders only scrape_success 0 before the first poll", async () => {
    const registry = createMetricsRegistry(() => 1000);

    const { body } = await renderSnapshot(registry.current());

    expect(sampleLines(body)).toEqual(["scrape_success 0"]);
  });

  test("renders every published metric with its type", async () => {
    const { body } = await renderSnapshot(publishedRegistry().current());

    expect(sampleLines(body)).toEqual([
      "device_power_watts 12.5",
      "device_energy_watt_hours_total 340",
      "device_state 1",
      "device_today_energy_watt_hours 10",
      "device_on_for_seconds 60",
      "device_today_on_time_seconds 120",
      "scrape_success 1",
    ]);
    expect(lines(body)).toContain("# TYPE device_power_watts gauge");
    expect(lines(body)).toContain(
      "# TYPE device_energy_watt_hours_total counter",
    );
    expect(lines(body)).toContain("# TYPE scrape_success gauge");
  });

  test("keeps last known values with scrape_success 0 after a failure", async () => {
    const registry = publishedRegistry();
    registry.recordFailure(unreachable(TEST_ADDRESS, "fetch failed"));

    const { body } = await renderSnapshot(registry.current());
    const samples = sampleLines(body);

    expect(samples).toContain("device_power_watts 12.5");
    expect(samples).toContain("device_energy_watt_hours_total 340");
    expect(samples.at(-1)).toBe("scrape_success 0");
  });

  test("leaves out a counter without a usable value", async () => {
    const registry = createMetricsRegistry(() => 1000);
    registry.publish(
      mapReading(
        createReading({ totalMilliwattMinutes: Number.NaN }),
        INITIAL_ENERGY_COUNTER,
      ).metrics,
    );

    const { body } = await renderSnapshot(registry.current());

    expect(
      lines(body).filter((line) =>
        line.includes("device_energy_watt_hours_total"),
      ),
    ).toEqual([]);
    expect(sampleLines(body)).toContain("device_power_watts 12.5");
  });

  test("leaves out a counter sample below zero", async () => {
    const registry = createMetricsRegistry(() => 1000);
    const { metrics } = mapReading(createReading(), INITIAL_ENERGY_COUNTER);
    registry.publish({
      timestamp: metrics.timestamp,
      samples: metrics.samples.map((sample) =>
        sample.name === "device_energy_watt_hours_total"
          ? { ...sample, value: -5 }
          : sample,
      ),
    });

    const { body } = await renderSnapshot(registry.current());

    expect(body).not.toContain("device_energy_watt_hours_total");
    expect(sampleLines(body)).toContain("scrape_success 1");
  });

  test("uses the Prometheus text content type", async () => {
    const { contentType } = await renderSnapshot(
      createMetricsRegistry().current(),
    );

    expect(contentType.startsWith("text/plain")).toBe(true);
  });

  test("renders the same snapshot identically twice", async () => {
    const snapshot = publishedRegistry().current();

    const first = await renderSnapshot(snapshot);
    const second = await renderSnapshot(snapshot);

    expect(second.body).toBe(first.body);
  });
});
