/**
 * Device Module - Schemas and Types
 *
 * Data shapes for the Wemo Insight UPnP exchange and the raw Reading it
 * produces. Schemas are the source of truth - types derived with z.infer<>.
 *
 * @see Rule #4 (Data First)
 */
import type { Result } from "neverthrow";
import { z } from "zod";

import type { DeviceError } from "./errors.js";

// =============================================================================
// Protocol Constants
// =============================================================================

/**
 * Ports a Wemo device is known to bind its UPnP server to, in probe order.
 * The port changes after a device reboot.
 */
export const WEMO_PROBE_PORTS: ReadonlyArray<number> = [
  49153, 49152, 49154, 49151, 49155,
];

export const INSIGHT_SERVICE_TYPE = "urn:Belkin:service:insight:1";

export const GET_INSIGHT_PARAMS_ACTION = `${INSIGHT_SERVICE_TYPE}#GetInsightParams`;

/**
 * Number of `|`-separated fields the parser needs from InsightParams.
 */
export const INSIGHT_PARAMS_FIELD_COUNT = 11;

// =============================================================================
// setup.xml Device Description
// =============================================================================

export const SetupDocumentSchema = z.object({
  root: z.object({
    device: z.object({
      deviceType: z.string().describe("e.g. urn:Belkin:device:insight:1"),
      friendlyName: z.string().optional(),
      serviceList: z.object({
        service: z.array(
          z.object({
            serviceType: z.string(),
            controlURL: z.string(),
          }),
        ),
      }),
    }),
  }),
});

export type SetupDocument = z.infer<typeof SetupDocumentSchema>;

/**
 * What discovery learns from setup.xml.
 */
export type InsightDescription = Readonly<{
  deviceType: string;
  friendlyName: string | null;
  controlUrl: string;
}>;

/**
 * Cached connection handle: where to send GetInsightParams.
 */
export type InsightEndpoint = InsightDescription &
  Readonly<{
    port: number;
  }>;

// =============================================================================
// GetInsightParams SOAP Response
// =============================================================================

export const InsightResponseSchema = z.object({
  Envelope: z.object({
    Body: z.object({
      GetInsightParamsResponse: z.object({
        InsightParams: z.string().min(1),
      }),
    }),
  }),
});

// =============================================================================
// Reading
// =============================================================================

/**
 * Relay state. Standby means the relay is on but the load draws
 * less than the power threshold.
 */
export type DeviceState = "off" | "on" | "standby";

/**
 * Raw values from one query. Units are the device's own.
 * Numeric fields the device garbles arrive as NaN.
 */
export type Reading = Readonly<{
  address: string;
  deviceType: string;
  state: DeviceState;
  /** Last relay state change (epoch ms) */
  lastChange: number;
  onForSeconds: number;
  onTodaySeconds: number;
  onTotalSeconds: number;
  currentPowerMilliwatts: number;
  /** Energy since midnight in milliwatt-minutes */
  todayMilliwattMinutes: number;
  /** Energy since device reset in milliwatt-minutes */
  totalMilliwattMinutes: number;
  powerThresholdMilliwatts: number;
  /** Acquisition time (epoch ms) */
  collectedAt: number;
}>;

// =============================================================================
// Client Contract
// =============================================================================

export type WemoClientOptions = Readonly<{
  address: string;
  /** Skip probing and use this UPnP port */
  port?: number | undefined;
  /** Bound for one complete query, discovery included */
  timeoutMs: number;
  clock?: () => number;
}>;

/**
 * One device, fixed at construction. query() never throws and never retries.
 */
export type DeviceClient = Readonly<{
  address: string;
  query(): Promise<Result<Reading, DeviceError>>;
}>;
