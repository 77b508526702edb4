/**
 * Device Module - Service Layer
 *
 * Side effects happen here: UPnP HTTP calls to the Wemo Insight plug.
 * Uses Result types for explicit error handling. No retries - retry
 * policy belongs to the scheduler.
 *
 * @see Rule #87 (Result Type for All Operations That Can Fail)
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type { DeviceError } from "./errors.js";
import {
  formatDeviceError,
  protocolError,
  timeout,
  unreachable,
} from "./errors.js";
import type {
  DeviceClient,
  InsightEndpoint,
  Reading,
  WemoClientOptions,
} from "./schema.js";
import { GET_INSIGHT_PARAMS_ACTION, WEMO_PROBE_PORTS } from "./schema.js";
import {
  buildInsightRequest,
  parseInsightParams,
  parseInsightResponse,
  parseSetupDocument,
} from "./transform.js";

const log = createLogger("device");

// =============================================================================
// Failure Classification
// =============================================================================

function toDeviceError(
  error: unknown,
  options: WemoClientOptions,
): DeviceError {
  const cause = error instanceof Error ? error : new Error(String(error));

  if (cause.name === "TimeoutError" || cause.name === "AbortError") {
    return timeout(options.address, options.timeoutMs);
  }

  return unreachable(options.address, cause.message, cause);
}

// =============================================================================
// Discovery
// =============================================================================

/**
 * Fetch and parse setup.xml on one port.
 */
async function describeOnPort(
  options: WemoClientOptions,
  port: number,
  signal: AbortSignal,
): Promise<Result<InsightEndpoint, DeviceError>> {
  const url = `http://${options.address}:${port}/setup.xml`;

  try {
    const response = await fetch(url, { method: "GET", signal });

    if (!response.ok) {
      return err(
        protocolError(
          options.address,
          `HTTP ${response.status} for ${url}`,
        ),
      );
    }

    const description = parseSetupDocument(await response.text());
    if (!description) {
      return err(
        protocolError(
          options.address,
          `No Insight service described on port ${port}`,
        ),
      );
    }

    return ok({ ...description, port });
  } catch (error) {
    return err(toDeviceError(error, options));
  }
}

/**
 * Find the port and control URL of the Insight service.
 * A configured port is used as is; otherwise known ports are probed in order.
 */
async function discoverEndpoint(
  options: WemoClientOptions,
  signal: AbortSignal,
): Promise<Result<InsightEndpoint, DeviceError>> {
  if (options.port !== undefined) {
    return describeOnPort(options, options.port, signal);
  }

  let protocolFailure: DeviceError | null = null;

  for (const port of WEMO_PROBE_PORTS) {
    const result = await describeOnPort(options, port, signal);

    if (result.isOk()) {
      log.info(
        {
          address: options.address,
          port,
          deviceType: result.value.deviceType,
          friendlyName: result.value.friendlyName,
        },
        "Wemo Insight discovered",
      );
      return result;
    }

    // The shared deadline is gone, further probes would abort immediately
    if (result.error.type === "TIMEOUT") {
      return result;
    }

    if (result.error.type === "PROTOCOL_ERROR") {
      protocolFailure = result.error;
    }

    log.debug(
      { port, error: formatDeviceError(result.error) },
      "Probe failed, trying next port",
    );
  }

  return err(
    protocolFailure ??
      unreachable(
        options.address,
        `No Wemo device answered on ports ${WEMO_PROBE_PORTS.join(", ")}`,
      ),
  );
}

// =============================================================================
// GetInsightParams
// =============================================================================

async function requestInsightParams(
  options: WemoClientOptions,
  endpoint: InsightEndpoint,
  signal: AbortSignal,
  now: () => number,
): Promise<Result<Reading, DeviceError>> {
  const url = `http://${options.address}:${endpoint.port}${endpoint.controlUrl}`;

  try {
    const response = await fetch(url, {
      method: "POST",
      headers: {
        "Content-Type": 'text/xml; charset="utf-8"',
        SOAPACTION: `"${GET_INSIGHT_PARAMS_ACTION}"`,
      },
      body: buildInsightRequest(),
      signal,
    });

    if (!response.ok) {
      return err(
        protocolError(
          options.address,
          `HTTP ${response.status}: ${response.statusText}`,
        ),
      );
    }

    const body = await response.text();
    const params = parseInsightResponse(body);
    if (params === null) {
      return err(
        protocolError(
          options.address,
          "Unexpected GetInsightParams response",
          body,
        ),
      );
    }

    const reading = parseInsightParams(params, {
      address: options.address,
      deviceType: endpoint.deviceType,
      collectedAt: now(),
    });
    if (!reading) {
      return err(
        protocolError(options.address, "Malformed InsightParams", params),
      );
    }

    return ok(reading);
  } catch (error) {
    return err(toDeviceError(error, options));
  }
}

// =============================================================================
// Client
// =============================================================================

/**
 * Create a client for one Wemo Insight plug.
 *
 * The discovered endpoint is cached between queries and dropped on any
 * failure, so the next query probes again.
 *
 * @example
 * const client = createWemoClient({ address: "192.168.1.40", timeoutMs: 10_000 });
 * const result = await client.query();
 */
export function createWemoClient(options: WemoClientOptions): DeviceClient {
  const now = options.clock ?? Date.now;
  let endpoint: InsightEndpoint | null = null;

  async function query(): Promise<Result<Reading, DeviceError>> {
    const signal = AbortSignal.timeout(options.timeoutMs);

    let target = endpoint;
    if (target === null) {
      const discovered = await discoverEndpoint(options, signal);
      if (discovered.isErr()) {
        return err(discovered.error);
      }
      target = discovered.value;
      endpoint = target;
    }

    const result = await requestInsightParams(options, target, signal, now);

    if (result.isErr()) {
      log.debug(
        { error: formatDeviceError(result.error) },
        "Dropping cached endpoint after failed query",
      );
      endpoint = null;
    }

    return result;
  }

  return { address: options.address, query };
}
