/**
 * Prometheus Module - Exposition Rendering
 *
 * Renders one registry snapshot in the Prometheus text format. A fresh
 * prom-client Registry is built per render from the pinned snapshot, so
 * one scrape never mixes two polls.
 */
import { Counter, Gauge, Registry } from "prom-client";

import {
  METRIC_CATALOG,
  type MetricDefinition,
  type MetricSample,
  SCRAPE_SUCCESS,
} from "../metrics/index.js";
import { type RegistrySnapshot, snapshotSamples } from "../registry/index.js";

export type RenderedMetrics = Readonly<{
  body: string;
  contentType: string;
}>;

const DEFINITIONS: ReadonlyArray<MetricDefinition> = [
  ...METRIC_CATALOG,
  SCRAPE_SUCCESS,
];

function register(
  registry: Registry,
  definition: MetricDefinition,
  sample: MetricSample,
): void {
  const configuration = {
    name: definition.name,
    help: definition.help,
    registers: [registry],
  };

  if (definition.type === "counter") {
    // A counter cannot carry NaN or go below zero; leave the sample out
    if (!Number.isFinite(sample.value) || sample.value < 0) {
      return;
    }
    new Counter(configuration).inc(sample.value);
    return;
  }

  new Gauge(configuration).set(sample.value);
}

/**
 * Render a snapshot. Metrics without a sample (before the first successful
 * poll) are absent from the output; scrape_success is always present.
 */
export async function renderSnapshot(
  snapshot: RegistrySnapshot,
): Promise<RenderedMetrics> {
  const registry = new Registry();
  const samples = snapshotSamples(snapshot);

  for (const definition of DEFINITIONS) {
    const sample = samples.find((s) => s.name === definition.name);
    if (sample) {
      register(registry, definition, sample);
    }
  }

  return { body: await registry.metrics(), contentType: registry.contentType };
}
